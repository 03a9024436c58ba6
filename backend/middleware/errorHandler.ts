import type { NextFunction } from "express";
import { ClinicError, type ClinicErrorCode } from "../domain/errors";
import type { ApiResponse } from "../routes/types";

const STATUS_BY_CODE: Readonly<Record<ClinicErrorCode, number>> = {
  unknown_patient_type: 400,
  invalid_patient: 400,
  invalid_record: 400,
  invalid_service: 400,
  not_found: 404,
  permission_denied: 403,
};

// ---- Global error handler ----
export function errorHandler(err: Error, _req: unknown, res: ApiResponse, _next: NextFunction): void {
  if (err instanceof ClinicError) {
    res.status(STATUS_BY_CODE[err.code]).json({ error: err.message, code: err.code, details: err.details });
    return;
  }

  console.error("[Clinic Server Error]", err.message);
  res.status(500).json({ error: err.message || "Internal server error." });
}
