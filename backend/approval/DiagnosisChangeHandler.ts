import type { Appointment } from "../domain/Appointment";
import type { StaffRole } from "./StaffRole";

// Chain of responsibility for diagnosis changes.
// - Each handler has one local approval rule and at most one successor.
// - The chain is a singly linked, acyclic list.
// - The first handler whose rule matches overwrites the diagnosis; nobody after it runs.

export type ApprovalOutcome =
  | { readonly approved: true; readonly level: StaffRole; readonly approvedBy: string }
  | { readonly approved: false };

export abstract class DiagnosisChangeHandler {
  abstract readonly level: StaffRole;
  abstract readonly title: string;

  private successor: DiagnosisChangeHandler | undefined;

  constructor(successor?: DiagnosisChangeHandler) {
    this.successor = successor;
  }

  get next(): DiagnosisChangeHandler | undefined {
    return this.successor;
  }

  // Returns the successor so chains can be wired fluently.
  setSuccessor(successor: DiagnosisChangeHandler | undefined): DiagnosisChangeHandler | undefined {
    for (let cursor = successor; cursor; cursor = cursor.next) {
      if (cursor === this) throw new Error(`Approval chain cycle rejected at ${this.title}.`);
    }
    this.successor = successor;
    return successor;
  }

  protected abstract approves(newDiagnosis: string): boolean;

  handle(appointment: Appointment, newDiagnosis: string): ApprovalOutcome {
    if (this.approves(newDiagnosis)) {
      console.log(`[Approval] ${this.title} approved diagnosis change for ${appointment.appointmentId}`);
      appointment.updateDiagnosis(newDiagnosis);
      return { approved: true, level: this.level, approvedBy: this.title };
    }

    if (this.successor) {
      console.log(`[Approval] ${this.title} forwarded request for ${appointment.appointmentId}`);
      return this.successor.handle(appointment, newDiagnosis);
    }

    console.log(`[Approval] Diagnosis change for ${appointment.appointmentId} cannot be approved`);
    return { approved: false };
  }
}

export function containsPhrase(text: string, phrase: string): boolean {
  return text.toLowerCase().includes(phrase.toLowerCase());
}
