import type { AuditLogger, Notifier } from "../domain/Capabilities";
import type { CommonPatientFields } from "../domain/Patient";
import { AdultPatient } from "../domain/AdultPatient";
import { ChildPatient } from "../domain/ChildPatient";
import { SeniorPatient } from "../domain/SeniorPatient";
import { Appointment } from "../domain/Appointment";
import type { AnyPatient } from "../domain/AnyPatient";
import type { EntityCapabilities } from "../domain/Capabilities";

export function commonFields(overrides: Partial<CommonPatientFields> = {}): CommonPatientFields {
  return {
    patientId: "A123",
    name: "Ivan Petrov",
    age: 35,
    gender: "m",
    medicalHistory: "Pollen allergy",
    ...overrides,
  };
}

export function adult(overrides: Partial<CommonPatientFields> = {}, occupation = "Programmer"): AdultPatient {
  return new AdultPatient(commonFields(overrides), occupation);
}

export function child(overrides: Partial<CommonPatientFields> = {}, guardian = "Anna Sidorova"): ChildPatient {
  return new ChildPatient(
    commonFields({ patientId: "C456", name: "Masha Sidorova", age: 8, gender: "f", medicalHistory: "Cold", ...overrides }),
    guardian,
  );
}

export function senior(overrides: Partial<CommonPatientFields> = {}, conditions = "Diabetes"): SeniorPatient {
  return new SeniorPatient(
    commonFields({ patientId: "S789", name: "Petr Ivanov", age: 70, gender: "m", medicalHistory: "Hypertension", ...overrides }),
    conditions,
  );
}

export function appointment(patient: AnyPatient = adult(), capabilities: EntityCapabilities = {}): Appointment {
  return new Appointment(
    {
      appointmentId: "AP101",
      patient,
      doctor: "Dr. Ivanov",
      date: "2024-03-01",
      diagnosis: "Flu",
      prescription: "Paracetamol",
      doctorInfo: { name: "Dr. Ivanov", specialty: "Therapist", contactInfo: "ivanov@clinic.test" },
    },
    capabilities,
  );
}

export class RecordingAuditLogger implements AuditLogger {
  readonly events: string[] = [];

  record(eventText: string): void {
    this.events.push(eventText);
  }
}

export class RecordingNotifier implements Notifier {
  readonly messages: string[] = [];

  send(message: string): void {
    this.messages.push(message);
  }
}

export class FailingSink implements AuditLogger, Notifier {
  record(): void {
    throw new Error("audit store offline");
  }

  send(): void {
    throw new Error("notification channel offline");
  }
}
