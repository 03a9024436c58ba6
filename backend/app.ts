import express from "express";
import cors from "cors";
import type { PatientDirectory } from "./repository/PatientDirectory";
import type { AppointmentRepository } from "./repository/AppointmentRepository";
import type { DiagnosisChangeHandler } from "./approval/DiagnosisChangeHandler";
import { buildApprovalChain } from "./approval/handlers";
import { registeredPatientTypes } from "./domain/PatientRegistry";
import { ConsoleNotifier } from "./notifications/ConsoleNotifier";
import { AuditTrail, auditMiddleware } from "./middleware/audit";
import { authMiddleware, handleTokenRequest, handleTokenRefresh } from "./middleware/auth";
import { generalRateLimiter } from "./middleware/rateLimiter";
import { errorHandler } from "./middleware/errorHandler";
import { getAppointmentRepository, getPatientDirectory } from "./repository/RepositoryFactory";
import { createPatientRouter } from "./routes/patients";
import { createAppointmentRouter } from "./routes/appointments";
import { asyncHandler } from "./routes/types";
import { checkDatabase } from "./database/connection";
import type { AvailabilityCheck } from "./scheduling/AppointmentScheduler";

const DEFAULT_ORIGINS = ["http://localhost:3000", "http://localhost:3001", "http://127.0.0.1:5500"];

export interface AppDependencies {
  readonly directory?: PatientDirectory;
  readonly appointments?: AppointmentRepository;
  readonly approvalChain?: DiagnosisChangeHandler;
  readonly isDoctorAvailable?: AvailabilityCheck;
}

function allowedOrigins(): string[] {
  return process.env.CORS_ORIGINS
    ? process.env.CORS_ORIGINS.split(",").map((s) => s.trim()).filter(Boolean)
    : DEFAULT_ORIGINS;
}

export function createApp(deps: AppDependencies = {}): express.Express {
  const app = express();
  const origins = allowedOrigins();

  app.use(cors({
    origin(requestOrigin: string | undefined, callback: (err: Error | null, allow?: boolean | string) => void) {
      // Allow server-to-server / curl / health-pings (no Origin header)
      if (!requestOrigin) return callback(null, true);
      if (origins.includes(requestOrigin)) {
        return callback(null, requestOrigin);
      }
      console.warn(`[CORS] Blocked request from origin: ${requestOrigin}`);
      callback(new Error(`Origin ${requestOrigin} not allowed by CORS`));
    },
    methods: ["GET", "POST", "PATCH", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "X-Staff-Id", "X-Staff-Role"],
    credentials: true,
  }));

  app.use(express.json({ limit: "1mb" }));

  // ---- Privacy headers (prevent response caching of patient data) ----
  app.use((_req, res, next) => {
    res.setHeader("Cache-Control", "no-store, no-cache, must-revalidate, private");
    res.setHeader("Pragma", "no-cache");
    res.setHeader("Expires", "0");
    next();
  });

  app.use(generalRateLimiter);
  app.use(authMiddleware);
  app.use(auditMiddleware);

  const notifier = new ConsoleNotifier();
  const directory = deps.directory ?? getPatientDirectory();
  const appointments = deps.appointments ?? getAppointmentRepository({ auditLogger: new AuditTrail(), notifier });

  app.get("/api/health", asyncHandler(async (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      database: process.env.DATABASE_URL ? await checkDatabase() : "in-memory",
      patientTypes: registeredPatientTypes(),
    });
  }));

  app.post("/api/auth/token", asyncHandler(handleTokenRequest));
  app.post("/api/auth/refresh", asyncHandler(handleTokenRefresh));

  app.use("/api/patients", createPatientRouter(directory));
  app.use(
    "/api/appointments",
    createAppointmentRouter({
      appointments,
      approvalChain: deps.approvalChain ?? buildApprovalChain(),
      capabilities: { notifier },
      isDoctorAvailable: deps.isDoctorAvailable,
    }),
  );

  app.use(errorHandler);

  return app;
}
