import dotenv from "dotenv";
import { existsSync } from "fs";
import { resolve as pathResolve } from "path";

// Load .env before any module that reads process.env.
// Resolve from deterministic locations so startup cwd does not matter.
const envPathCandidates = [
  pathResolve(__dirname, "..", ".env"),
  pathResolve(__dirname, "..", "..", ".env"),
  pathResolve(process.cwd(), ".env"),
];

const resolvedEnvPath = envPathCandidates.find((p) => existsSync(p));
if (resolvedEnvPath) {
  dotenv.config({ path: resolvedEnvPath });
} else {
  dotenv.config();
}

import { createApp } from "./app";
import { closeDatabasePool } from "./database/connection";

const PORT = parseInt(process.env.PORT || "3001", 10);

const app = createApp();

// ---- Graceful shutdown ----
async function shutdown(signal: string): Promise<void> {
  console.log(`[Clinic] ${signal} received, shutting down`);
  try {
    await closeDatabasePool();
  } catch (err) {
    console.error("[Clinic] Failed to close database pool:", err instanceof Error ? err.message : err);
  }
  process.exit(0);
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

app.listen(PORT, "0.0.0.0", () => {
  console.log(`[Clinic] Server running on port ${PORT}`);
  console.log(`[Clinic] API health check: http://0.0.0.0:${PORT}/api/health`);
  console.log(`[Clinic] Environment: ${process.env.NODE_ENV || "development"}`);
  console.log(`[Clinic] Database: ${process.env.DATABASE_URL ? "PostgreSQL" : "In-memory"}`);
  console.log(`[Clinic] Auth: ${process.env.DISABLE_AUTH === "true" ? "DISABLED (dev mode)" : "JWT enabled"}`);
  if (!process.env.STAFF_ROSTER) {
    console.warn("[Clinic] STAFF_ROSTER not set: token roles are self-asserted");
  }
});
