import type { Appointment } from "../domain/Appointment";

export type AppointmentId = string;

export interface AppointmentRepository {
  // Insert or replace by appointment id.
  save(appointment: Appointment): Promise<void>;
  get(appointmentId: AppointmentId): Promise<Appointment>;
  has(appointmentId: AppointmentId): Promise<boolean>;
}
