import { Patient, type CommonPatientFields } from "./Patient";
import { PatientVariant } from "./PatientVariant";
import type { EntityCapabilities } from "./Capabilities";

export class AdultPatient extends Patient<PatientVariant.Adult> {
  readonly variant = PatientVariant.Adult;

  private _occupation: string;

  constructor(fields: CommonPatientFields, occupation: string, capabilities?: EntityCapabilities) {
    super(fields, capabilities);
    this._occupation = occupation;
  }

  get occupation(): string {
    return this._occupation;
  }

  set occupation(value: string) {
    this._occupation = value;
  }

  get distinguishingValue(): string {
    return this._occupation;
  }

  renderHistory(): string {
    return `Adult patient [${this.name}], occupation: ${this.occupation}\n${this.medicalHistory}`;
  }

  describe(): string {
    return `Patient: ${this.name}, occupation: ${this.occupation}, age: ${String(this.age)}, gender: ${String(this.gender)}`;
  }
}
