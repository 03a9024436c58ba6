import type { Appointment } from "../domain/Appointment";
import { PermissionDeniedError } from "../domain/errors";
import type { ApprovalOutcome, DiagnosisChangeHandler } from "./DiagnosisChangeHandler";
import { DIAGNOSIS_CHANGE_ROLES } from "./StaffRole";

// Explicit role guard. Throws before the guarded operation runs.
export function requireRole(requesterRole: string, allowedRoles: readonly string[]): void {
  if (!allowedRoles.includes(requesterRole)) {
    throw new PermissionDeniedError(allowedRoles);
  }
}

// The role check is orthogonal to which handler approves: an authorized
// front-line requester can still end up approved by the chief.
export function changeDiagnosis(
  requesterRole: string,
  appointment: Appointment,
  newDiagnosis: string,
  chain: DiagnosisChangeHandler,
): ApprovalOutcome {
  requireRole(requesterRole, DIAGNOSIS_CHANGE_ROLES);

  console.log(`[Approval] Diagnosis change requested for ${appointment.appointmentId} by ${requesterRole}`);
  return chain.handle(appointment, newDiagnosis);
}
