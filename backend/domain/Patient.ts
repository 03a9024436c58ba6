import { isGender } from "./Gender";
import type { PatientVariant } from "./PatientVariant";
import { safeNotify, type EntityCapabilities } from "./Capabilities";

// Patient contract:
// - Created through the registry factory or record decoding only.
// - Construction stores age/gender as given; only setters validate.
// - Setters never throw: a rejected value is logged and the previous value kept.

export const MIN_AGE_EXCLUSIVE = 1;
export const MAX_AGE_EXCLUSIVE = 110;

export interface CommonPatientFields {
  readonly patientId: string;
  readonly name: string;
  readonly age: number | null;
  readonly gender: string | null;
  readonly medicalHistory: string;
}

export function isValidAge(age: number): boolean {
  return Number.isInteger(age) && age > MIN_AGE_EXCLUSIVE && age < MAX_AGE_EXCLUSIVE;
}

export abstract class Patient<TVariant extends PatientVariant = PatientVariant> {
  abstract readonly variant: TVariant;

  private _patientId: string;
  private _name: string;
  private _age: number | null;
  private _gender: string | null;
  private _medicalHistory: string;

  protected readonly capabilities: EntityCapabilities;

  protected constructor(fields: CommonPatientFields, capabilities: EntityCapabilities = {}) {
    this._patientId = fields.patientId;
    this._name = fields.name;
    this._age = fields.age;
    this._gender = fields.gender;
    this._medicalHistory = fields.medicalHistory;
    this.capabilities = capabilities;
  }

  get patientId(): string {
    return this._patientId;
  }

  set patientId(value: string) {
    this._patientId = value;
  }

  get name(): string {
    return this._name;
  }

  set name(value: string) {
    this._name = value;
  }

  get age(): number | null {
    return this._age;
  }

  set age(value: number | null) {
    if (value !== null && isValidAge(value)) {
      this._age = value;
      return;
    }
    console.warn(`[Patient] Rejected age for ${this._patientId}: ${String(value)}`);
  }

  get gender(): string | null {
    return this._gender;
  }

  set gender(value: string | null) {
    if (value !== null && isGender(value)) {
      this._gender = value;
      return;
    }
    console.warn(`[Patient] Rejected gender for ${this._patientId}: ${String(value)}`);
  }

  get medicalHistory(): string {
    return this._medicalHistory;
  }

  set medicalHistory(value: string) {
    this._medicalHistory = value;
  }

  // Raw value of the single variant-specific field.
  abstract get distinguishingValue(): string;

  abstract renderHistory(): string;

  abstract describe(): string;

  requestAppointment(date: string): void {
    safeNotify(this.capabilities.notifier, `Appointment request for ${date} sent`);
  }

  toString(): string {
    return this.describe();
  }
}
