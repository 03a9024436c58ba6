import { isAnyPatient, type AnyPatient } from "../domain/AnyPatient";
import { InvalidPatientError, NotFoundError } from "../domain/errors";
import { nameMatches, type PatientDirectory, type PatientId } from "./PatientDirectory";

// In-memory directory (reference implementation)
// - For local runs, unit tests, and demos.
// - Holds live entity references: setter changes are visible without save().

export class InMemoryPatientDirectory implements PatientDirectory {
  private readonly patients: AnyPatient[] = [];

  private indexOf(patientId: PatientId): number {
    return this.patients.findIndex((p) => p.patientId === patientId);
  }

  async add(candidate: unknown): Promise<AnyPatient> {
    if (!isAnyPatient(candidate)) {
      console.error("[Clinic] Rejected invalid patient object");
      throw new InvalidPatientError();
    }
    if (this.indexOf(candidate.patientId) !== -1) {
      throw new InvalidPatientError(`Patient id already in directory: ${candidate.patientId}`);
    }

    this.patients.push(candidate);
    console.log(`[Clinic] Patient ${candidate.name} added`);
    return candidate;
  }

  async remove(patientId: PatientId): Promise<void> {
    const index = this.indexOf(patientId);
    if (index === -1) {
      console.error(`[Clinic] Patient not found: ${patientId}`);
      throw new NotFoundError("Patient", patientId);
    }

    this.patients.splice(index, 1);
    console.log(`[Clinic] Patient ${patientId} removed`);
  }

  async get(patientId: PatientId): Promise<AnyPatient> {
    const found = this.patients.find((p) => p.patientId === patientId);
    if (!found) throw new NotFoundError("Patient", patientId);
    return found;
  }

  async save(patient: AnyPatient): Promise<void> {
    const index = this.indexOf(patient.patientId);
    if (index === -1) throw new NotFoundError("Patient", patient.patientId);
    this.patients[index] = patient;
  }

  async all(): Promise<readonly AnyPatient[]> {
    return this.patients.slice();
  }

  async searchByNameSubstring(text: string): Promise<readonly AnyPatient[]> {
    return this.patients.filter((p) => nameMatches(p, text));
  }
}
