import { Router } from "express";
import type { Appointment } from "../domain/Appointment";
import type { EntityCapabilities } from "../domain/Capabilities";
import type { DiagnosisChangeHandler } from "../approval/DiagnosisChangeHandler";
import { changeDiagnosis } from "../approval/changeDiagnosis";
import type { AppointmentRepository } from "../repository/AppointmentRepository";
import { appointmentFromRecord, appointmentToRecord } from "../serialization/AppointmentCodec";
import { schedulerFor, type AvailabilityCheck } from "../scheduling/AppointmentScheduler";
import { AuditTrail } from "../middleware/audit";
import { diagnosisChangeRateLimiter } from "../middleware/rateLimiter";
import {
  CreateAppointmentRequestSchema,
  DiagnosisChangeRequestSchema,
  ServiceRequestSchema,
  parseOrThrow,
} from "../validation/schemas";
import { asyncHandler, type ApiHandler } from "./types";

export interface AppointmentRouteDeps {
  readonly appointments: AppointmentRepository;
  readonly approvalChain: DiagnosisChangeHandler;
  // Audit sink is per request (carries the staff id); the rest is shared.
  readonly capabilities: Omit<EntityCapabilities, "auditLogger">;
  readonly isDoctorAvailable?: AvailabilityCheck;
}

function view(appointment: Appointment) {
  return {
    appointment: appointmentToRecord(appointment),
    status: appointment.status,
    total: appointment.calculateTotal(),
  };
}

export interface AppointmentHandlers {
  create: ApiHandler;
  get: ApiHandler;
  report: ApiHandler;
  addService: ApiHandler;
  removeService: ApiHandler;
  confirm: ApiHandler;
  cancel: ApiHandler;
  changeDiagnosis: ApiHandler;
}

export function createAppointmentHandlers(deps: AppointmentRouteDeps): AppointmentHandlers {
  const { appointments, approvalChain } = deps;

  return {
    // POST /api/appointments — { record, channel? }
    // Nothing is audited or stored unless the booking is accepted.
    async create(req, res) {
      const body = parseOrThrow(CreateAppointmentRequestSchema, req.body, "appointment request");
      const appointment = appointmentFromRecord(body.record, {
        capabilities: { ...deps.capabilities, auditLogger: new AuditTrail(req.auth?.staffId) },
      });

      if (await appointments.has(appointment.appointmentId)) {
        res.status(409).json({ error: `Appointment already exists: ${appointment.appointmentId}` });
        return;
      }

      const scheduling = body.channel
        ? schedulerFor(body.channel, deps.isDoctorAvailable).schedule(appointment)
        : undefined;

      if (scheduling && !scheduling.scheduled) {
        res.status(422).json({
          error: `Scheduling failed at ${scheduling.failedStep}: ${scheduling.error}`,
          scheduling,
        });
        return;
      }

      appointment.recordCreation();
      await appointments.save(appointment);
      res.status(201).json({ ...view(appointment), scheduling });
    },

    async get(req, res) {
      const appointment = await appointments.get(req.params.appointmentId);
      res.json(view(appointment));
    },

    async report(req, res) {
      const appointment = await appointments.get(req.params.appointmentId);
      res.json({ appointmentId: appointment.appointmentId, report: appointment.generateReport() });
    },

    async addService(req, res) {
      const service = parseOrThrow(ServiceRequestSchema, req.body, "service");
      const appointment = await appointments.get(req.params.appointmentId);
      appointment.addService(service);
      await appointments.save(appointment);
      res.status(201).json(view(appointment));
    },

    // Removes the first matching service only.
    async removeService(req, res) {
      const service = parseOrThrow(ServiceRequestSchema, req.body, "service");
      const appointment = await appointments.get(req.params.appointmentId);
      if (!appointment.removeService(service)) {
        res.status(404).json({ error: `Service not found on appointment: ${service.name}` });
        return;
      }
      await appointments.save(appointment);
      res.json(view(appointment));
    },

    async confirm(req, res) {
      const appointment = await appointments.get(req.params.appointmentId);
      appointment.confirm();
      await appointments.save(appointment);
      res.json(view(appointment));
    },

    async cancel(req, res) {
      const appointment = await appointments.get(req.params.appointmentId);
      appointment.cancel();
      await appointments.save(appointment);
      res.json(view(appointment));
    },

    // The role is read from the token, never from the body. Tokens carry the
    // role they were issued with; see handleTokenRequest for how it is granted.
    async changeDiagnosis(req, res) {
      const { diagnosis } = parseOrThrow(DiagnosisChangeRequestSchema, req.body, "diagnosis change");
      const appointment = await appointments.get(req.params.appointmentId);

      const outcome = changeDiagnosis(req.auth?.role ?? "", appointment, diagnosis, approvalChain);
      if (outcome.approved) await appointments.save(appointment);

      res.json({ outcome, diagnosis: appointment.diagnosis });
    },
  };
}

export function createAppointmentRouter(deps: AppointmentRouteDeps): Router {
  const handlers = createAppointmentHandlers(deps);
  const router = Router();

  router.post("/", asyncHandler(handlers.create));
  router.get("/:appointmentId", asyncHandler(handlers.get));
  router.get("/:appointmentId/report", asyncHandler(handlers.report));
  router.post("/:appointmentId/services", asyncHandler(handlers.addService));
  router.delete("/:appointmentId/services", asyncHandler(handlers.removeService));
  router.post("/:appointmentId/confirm", asyncHandler(handlers.confirm));
  router.post("/:appointmentId/cancel", asyncHandler(handlers.cancel));
  router.post("/:appointmentId/diagnosis", diagnosisChangeRateLimiter, asyncHandler(handlers.changeDiagnosis));

  return router;
}
