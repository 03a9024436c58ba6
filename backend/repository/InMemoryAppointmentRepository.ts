import type { Appointment } from "../domain/Appointment";
import { NotFoundError } from "../domain/errors";
import type { AppointmentId, AppointmentRepository } from "./AppointmentRepository";

export class InMemoryAppointmentRepository implements AppointmentRepository {
  private readonly store = new Map<AppointmentId, Appointment>();

  async save(appointment: Appointment): Promise<void> {
    this.store.set(appointment.appointmentId, appointment);
  }

  async get(appointmentId: AppointmentId): Promise<Appointment> {
    const found = this.store.get(appointmentId);
    if (!found) throw new NotFoundError("Appointment", appointmentId);
    return found;
  }

  async has(appointmentId: AppointmentId): Promise<boolean> {
    return this.store.has(appointmentId);
  }
}
