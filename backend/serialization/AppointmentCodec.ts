import { Appointment, type AppointmentStatus } from "../domain/Appointment";
import type { EntityCapabilities } from "../domain/Capabilities";
import { InvalidRecordError } from "../domain/errors";
import { AppointmentRecordSchema } from "../validation/schemas";
import { patientFromRecord, patientToRecord, type PatientRecord } from "./PatientCodec";

// Appointment <-> record codec.
// The patient is embedded as its full record; services keep their order.

export interface DoctorInfoRecord {
  readonly name: string;
  readonly specialty: string;
  readonly contact_info: string;
}

export interface ServiceRecord {
  readonly name: string;
  readonly price: number;
}

export interface AppointmentRecord {
  readonly appointment_id: string;
  readonly patient: PatientRecord;
  readonly doctor: string;
  readonly date: string;
  readonly diagnosis: string;
  readonly prescription: string;
  readonly doctor_info: DoctorInfoRecord;
  readonly services: readonly ServiceRecord[];
}

export function appointmentToRecord(appointment: Appointment): AppointmentRecord {
  const info = appointment.doctorInfo;
  return {
    appointment_id: appointment.appointmentId,
    patient: patientToRecord(appointment.patient),
    doctor: appointment.doctor,
    date: appointment.date,
    diagnosis: appointment.diagnosis,
    prescription: appointment.prescription,
    doctor_info: {
      name: info.name,
      specialty: info.specialty,
      contact_info: info.contactInfo,
    },
    services: appointment.services.map((s) => ({ name: s.name, price: s.price })),
  };
}

export interface AppointmentDecodeOptions {
  readonly capabilities?: EntityCapabilities;
  // Status is stored beside the record, never inside it.
  readonly status?: AppointmentStatus;
}

// Restores the patient first, then doctor info, then replays services in order.
export function appointmentFromRecord(input: unknown, options: AppointmentDecodeOptions = {}): Appointment {
  const parsed = AppointmentRecordSchema.safeParse(input);
  if (!parsed.success) throw new InvalidRecordError("appointment record", parsed.error.issues);
  const data = parsed.data;

  const patient = patientFromRecord(data.patient);

  const doctorInfo = {
    name: data.doctor_info.name,
    specialty: data.doctor_info.specialty,
    contactInfo: data.doctor_info.contact_info,
  };

  const fields = {
    appointmentId: data.appointment_id,
    patient,
    doctor: data.doctor,
    date: data.date,
    diagnosis: data.diagnosis,
    prescription: data.prescription,
    doctorInfo,
    status: options.status,
  };

  const appointment = new Appointment(fields, options.capabilities);

  for (const service of data.services) {
    appointment.addService({ name: service.name, price: service.price });
  }

  return appointment;
}
