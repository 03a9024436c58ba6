import type { Appointment, AppointmentStatus } from "../domain/Appointment";
import type { EntityCapabilities } from "../domain/Capabilities";
import { NotFoundError } from "../domain/errors";
import { appointmentFromRecord, appointmentToRecord } from "../serialization/AppointmentCodec";
import { query } from "../database/connection";
import type { AppointmentId, AppointmentRepository } from "./AppointmentRepository";

// PostgreSQL appointment storage. The record layout is stored as-is (jsonb);
// status lives in its own column because it is not part of the record.

interface AppointmentRow {
  [key: string]: unknown;
  appointment_id: string;
  status: string;
  record: unknown;
}

function toStatus(value: string): AppointmentStatus {
  if (value === "confirmed" || value === "cancelled") return value;
  return "scheduled";
}

export class PostgresAppointmentRepository implements AppointmentRepository {
  constructor(private readonly capabilities: EntityCapabilities = {}) {}

  private decode(row: AppointmentRow): Appointment {
    return appointmentFromRecord(row.record, { capabilities: this.capabilities, status: toStatus(row.status) });
  }

  async save(appointment: Appointment): Promise<void> {
    await query(
      `INSERT INTO appointments (appointment_id, patient_id, status, record)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (appointment_id)
       DO UPDATE SET patient_id = EXCLUDED.patient_id, status = EXCLUDED.status, record = EXCLUDED.record, updated_at = NOW()`,
      [
        appointment.appointmentId,
        appointment.patient.patientId,
        appointment.status,
        JSON.stringify(appointmentToRecord(appointment)),
      ],
    );
  }

  async get(appointmentId: AppointmentId): Promise<Appointment> {
    const result = await query<AppointmentRow>(
      `SELECT appointment_id, status, record FROM appointments WHERE appointment_id = $1`,
      [appointmentId],
    );
    const row = result.rows[0];
    if (!row) throw new NotFoundError("Appointment", appointmentId);
    return this.decode(row);
  }

  async has(appointmentId: AppointmentId): Promise<boolean> {
    const result = await query(`SELECT 1 FROM appointments WHERE appointment_id = $1`, [appointmentId]);
    return (result.rowCount ?? 0) > 0;
  }
}
