import type { AnyPatient } from "../domain/AnyPatient";

// Clinic Directory Boundary
// - The ONLY layer that stores patients.
// - Ids are unique within a directory; insertion order is kept for listings.
// - add() rejects anything that is not a patient entity (InvalidPatientError).
// - remove()/get()/save() on an absent id fail with NotFoundError.

export type PatientId = string;

export interface PatientDirectory {
  add(candidate: unknown): Promise<AnyPatient>;
  remove(patientId: PatientId): Promise<void>;
  get(patientId: PatientId): Promise<AnyPatient>;

  // Persists setter changes made to a patient already in the directory.
  save(patient: AnyPatient): Promise<void>;

  all(): Promise<readonly AnyPatient[]>;

  // Case-insensitive substring match on the patient's name.
  searchByNameSubstring(text: string): Promise<readonly AnyPatient[]>;
}

export function nameMatches(patient: AnyPatient, text: string): boolean {
  return patient.name.toLowerCase().includes(text.toLowerCase());
}
