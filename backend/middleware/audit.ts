import type { Request, Response, NextFunction } from "express";
import { query } from "../database/connection";
import type { AuditLogger } from "../domain/Capabilities";

// Audit Logging
//
// Records state-changing operations, both HTTP requests and domain events
// (appointment created / confirmed / cancelled, diagnosis updated).
// Append-only: no deletes, no updates.

export type AuditAction =
  | "patient_created"
  | "patient_updated"
  | "patient_removed"
  | "appointment_created"
  | "appointment_changed"
  | "diagnosis_change_requested"
  | "token_issued"
  | "token_refreshed"
  | "domain_event";

export interface AuditEntry {
  staffId?: string;
  action: AuditAction;
  resource?: string;
  detail?: Record<string, unknown>;
  ipAddress?: string;
  userAgent?: string;
}

const IN_MEMORY_AUDIT_CAP = 10000;

// In-memory fallback when no database is available
const inMemoryAuditLog: AuditEntry[] = [];

export async function writeAuditLog(entry: AuditEntry): Promise<void> {
  if (!process.env.DATABASE_URL) {
    inMemoryAuditLog.push(entry);
    if (inMemoryAuditLog.length > IN_MEMORY_AUDIT_CAP) {
      inMemoryAuditLog.splice(0, inMemoryAuditLog.length - IN_MEMORY_AUDIT_CAP);
    }
    return;
  }

  try {
    await query(
      `INSERT INTO audit_log (staff_id, action, resource, detail, ip_address, user_agent)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [
        entry.staffId || null,
        entry.action,
        entry.resource || null,
        entry.detail ? JSON.stringify(entry.detail) : null,
        entry.ipAddress || null,
        entry.userAgent || null,
      ],
    );
  } catch (err) {
    // Audit logging must never crash the caller
    console.error("[Audit] Failed to write audit log:", err instanceof Error ? err.message : err);
  }
}

export function getInMemoryAuditLog(): readonly AuditEntry[] {
  return inMemoryAuditLog;
}

export function clearInMemoryAuditLog(): void {
  inMemoryAuditLog.length = 0;
}

// Audit sink handed to domain entities. Fire-and-forget.
export class AuditTrail implements AuditLogger {
  constructor(private readonly staffId?: string) {}

  record(eventText: string): void {
    console.log(`[Audit] ${eventText}`);
    writeAuditLog({
      staffId: this.staffId,
      action: "domain_event",
      resource: "appointment",
      detail: { event: eventText },
    }).catch((err: unknown) => console.error("[Audit] Domain event dropped:", err));
  }
}

function classifyRequest(method: string, path: string): { action: AuditAction; resource: string } {
  if (path.includes("/auth/token")) return { action: "token_issued", resource: "auth" };
  if (path.includes("/auth/refresh")) return { action: "token_refreshed", resource: "auth" };
  if (path.includes("/diagnosis")) return { action: "diagnosis_change_requested", resource: "appointment" };
  if (path.startsWith("/api/appointments")) {
    return method === "POST" && path === "/api/appointments"
      ? { action: "appointment_created", resource: "appointment" }
      : { action: "appointment_changed", resource: "appointment" };
  }
  if (method === "DELETE") return { action: "patient_removed", resource: "patient" };
  if (method === "PATCH" || method === "PUT") return { action: "patient_updated", resource: "patient" };
  return { action: "patient_created", resource: "patient" };
}

// Middleware: auto-logs state-changing requests
export function auditMiddleware(req: Request, _res: Response, next: NextFunction): void {
  if (req.method !== "POST" && req.method !== "PUT" && req.method !== "PATCH" && req.method !== "DELETE") {
    return next();
  }

  const { action, resource } = classifyRequest(req.method, req.path);

  const entry: AuditEntry = {
    staffId: req.auth?.staffId,
    action,
    resource,
    detail: {
      method: req.method,
      path: req.path,
    },
    ipAddress: req.ip || req.socket.remoteAddress,
    userAgent: req.headers["user-agent"],
  };

  // Fire-and-forget: audit log must not block
  writeAuditLog(entry).catch((err: unknown) => console.error("[Audit] Request entry dropped:", err));

  next();
}
