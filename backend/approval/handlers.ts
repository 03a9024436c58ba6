import { DiagnosisChangeHandler, containsPhrase } from "./DiagnosisChangeHandler";
import { StaffRole } from "./StaffRole";

export const MINOR_CHANGE_MARKER = "minor change";
export const TREATMENT_REVISION_MARKER = "treatment revision";

export class AttendingDoctor extends DiagnosisChangeHandler {
  readonly level = StaffRole.FrontLine;
  readonly title = "Attending doctor";

  protected approves(newDiagnosis: string): boolean {
    return containsPhrase(newDiagnosis, MINOR_CHANGE_MARKER);
  }
}

export class DepartmentHead extends DiagnosisChangeHandler {
  readonly level = StaffRole.Department;
  readonly title = "Department head";

  protected approves(newDiagnosis: string): boolean {
    return containsPhrase(newDiagnosis, TREATMENT_REVISION_MARKER);
  }
}

export class ChiefPhysician extends DiagnosisChangeHandler {
  readonly level = StaffRole.Chief;
  readonly title = "Chief physician";

  protected approves(): boolean {
    return true;
  }
}

// attending doctor -> department head -> chief physician
export function buildApprovalChain(): DiagnosisChangeHandler {
  const doctor = new AttendingDoctor();
  doctor.setSuccessor(new DepartmentHead())?.setSuccessor(new ChiefPhysician());
  return doctor;
}
