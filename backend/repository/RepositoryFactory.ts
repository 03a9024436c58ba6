import type { PatientDirectory } from "./PatientDirectory";
import type { AppointmentRepository } from "./AppointmentRepository";
import { InMemoryPatientDirectory } from "./InMemoryPatientDirectory";
import { PostgresPatientDirectory } from "./PostgresPatientDirectory";
import { InMemoryAppointmentRepository } from "./InMemoryAppointmentRepository";
import { PostgresAppointmentRepository } from "./PostgresAppointmentRepository";
import type { EntityCapabilities } from "../domain/Capabilities";

// Repository Factory
// - The ONLY place where the storage implementation is selected.
// - Selects PostgreSQL when DATABASE_URL is set, otherwise falls back to in-memory.

let directory: PatientDirectory | undefined;
let appointments: AppointmentRepository | undefined;

export function getPatientDirectory(): PatientDirectory {
  if (!directory) {
    if (process.env.DATABASE_URL) {
      console.log("[Clinic] Using PostgreSQL patient directory");
      directory = new PostgresPatientDirectory();
    } else {
      console.log("[Clinic] Using in-memory patient directory (no DATABASE_URL set)");
      directory = new InMemoryPatientDirectory();
    }
  }
  return directory;
}

// Capabilities are attached to appointments decoded from storage.
export function getAppointmentRepository(capabilities: EntityCapabilities = {}): AppointmentRepository {
  if (!appointments) {
    appointments = process.env.DATABASE_URL
      ? new PostgresAppointmentRepository(capabilities)
      : new InMemoryAppointmentRepository();
  }
  return appointments;
}

export function resetRepositories(): void {
  directory = undefined;
  appointments = undefined;
}
