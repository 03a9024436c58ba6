import type { AnyPatient } from "./AnyPatient";
import type { DoctorInfo } from "./DoctorInfo";
import { isSameService, type Service } from "./Service";
import { safeNotify, safeRecord, type EntityCapabilities } from "./Capabilities";
import { InvalidServiceError } from "./errors";

// Appointment aggregate.
// - Owns its DoctorInfo and its ordered Service list (duplicates allowed).
// - Holds a non-owning reference to the patient.
// - Status is runtime-only and is not part of the appointment record.

export type AppointmentStatus = "scheduled" | "confirmed" | "cancelled";

export interface AppointmentFields {
  readonly appointmentId: string;
  readonly patient: AnyPatient;
  readonly doctor: string;
  readonly date: string;
  readonly diagnosis: string;
  readonly prescription: string;
  readonly doctorInfo: DoctorInfo;
  readonly status?: AppointmentStatus;
}

export class Appointment {
  readonly appointmentId: string;

  private _patient: AnyPatient;
  private _doctor: string;
  private _date: string;
  private _diagnosis: string;
  private _prescription: string;
  private _doctorInfo: DoctorInfo;
  private readonly _services: Service[] = [];
  private _status: AppointmentStatus;
  private creationRecorded = false;

  private readonly capabilities: EntityCapabilities;

  constructor(fields: AppointmentFields, capabilities: EntityCapabilities = {}) {
    this.appointmentId = fields.appointmentId;
    this._patient = fields.patient;
    this._doctor = fields.doctor;
    this._date = fields.date;
    this._diagnosis = fields.diagnosis;
    this._prescription = fields.prescription;
    this._doctorInfo = fields.doctorInfo;
    this._status = fields.status ?? "scheduled";
    this.capabilities = capabilities;
  }

  // The constructor alone is used when restoring a stored record; it audits nothing.
  static schedule(fields: AppointmentFields, capabilities: EntityCapabilities = {}): Appointment {
    const appointment = new Appointment(fields, capabilities);
    appointment.recordCreation();
    return appointment;
  }

  // Audits the creation event. Only the first call records.
  recordCreation(): void {
    if (this.creationRecorded) return;
    this.creationRecorded = true;
    safeRecord(this.capabilities.auditLogger, `Appointment ${this.appointmentId} created`);
  }

  get patient(): AnyPatient {
    return this._patient;
  }

  set patient(value: AnyPatient) {
    this._patient = value;
  }

  get doctor(): string {
    return this._doctor;
  }

  set doctor(value: string) {
    this._doctor = value;
  }

  get date(): string {
    return this._date;
  }

  set date(value: string) {
    this._date = value;
  }

  get diagnosis(): string {
    return this._diagnosis;
  }

  get prescription(): string {
    return this._prescription;
  }

  set prescription(value: string) {
    this._prescription = value;
  }

  get doctorInfo(): DoctorInfo {
    return this._doctorInfo;
  }

  set doctorInfo(value: DoctorInfo) {
    this._doctorInfo = value;
  }

  get status(): AppointmentStatus {
    return this._status;
  }

  // Returns a copy; callers go through addService/removeService.
  get services(): readonly Service[] {
    return this._services.slice();
  }

  updateDiagnosis(newDiagnosis: string): void {
    this._diagnosis = newDiagnosis;
    safeRecord(this.capabilities.auditLogger, `Appointment ${this.appointmentId} diagnosis updated: ${newDiagnosis}`);
  }

  addService(service: Service): void {
    if (!Number.isFinite(service.price) || service.price < 0) {
      throw new InvalidServiceError(service.name, service.price);
    }
    this._services.push({ name: service.name, price: service.price });
  }

  // Removes the first matching entry only. Returns false when nothing matched.
  removeService(service: Service): boolean {
    const index = this._services.findIndex((s) => isSameService(s, service));
    if (index === -1) {
      console.warn(`[Appointment] Service not found on ${this.appointmentId}: ${service.name}`);
      return false;
    }
    this._services.splice(index, 1);
    return true;
  }

  calculateTotal(): number {
    return this._services.reduce((sum, s) => sum + s.price, 0);
  }

  confirm(): void {
    this._status = "confirmed";
    safeNotify(this.capabilities.notifier, `Your appointment on ${this._date} is confirmed.`);
    safeRecord(this.capabilities.auditLogger, `Appointment ${this.appointmentId} confirmed`);
  }

  cancel(): void {
    this._status = "cancelled";
    safeNotify(this.capabilities.notifier, `Appointment ${this.appointmentId} cancelled.`);
    safeRecord(this.capabilities.auditLogger, `Appointment ${this.appointmentId} cancelled`);
  }

  generateReport(): string {
    const serviceNames = this._services.length > 0 ? this._services.map((s) => s.name).join(", ") : "No services";
    const info = this._doctorInfo;

    return [
      "Appointment report:",
      `  Appointment ID: ${this.appointmentId}`,
      `  Patient: ${this._patient.describe()}`,
      `  Doctor: ${this._doctor}`,
      `  Date: ${this._date}`,
      `  Diagnosis: ${this._diagnosis}`,
      `  Prescription: ${this._prescription}`,
      `  Doctor info: ${info.name}, ${info.specialty}, ${info.contactInfo}`,
      `  Services: ${serviceNames}`,
      `  Total cost: ${this.calculateTotal()}`,
    ].join("\n");
  }
}
