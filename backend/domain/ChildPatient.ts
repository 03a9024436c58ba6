import { Patient, type CommonPatientFields } from "./Patient";
import { PatientVariant } from "./PatientVariant";
import type { EntityCapabilities } from "./Capabilities";

export class ChildPatient extends Patient<PatientVariant.Child> {
  readonly variant = PatientVariant.Child;

  // Legal guardian's name, as written on the intake form.
  private _guardian: string;

  constructor(fields: CommonPatientFields, guardian: string, capabilities?: EntityCapabilities) {
    super(fields, capabilities);
    this._guardian = guardian;
  }

  get guardian(): string {
    return this._guardian;
  }

  set guardian(value: string) {
    this._guardian = value;
  }

  get distinguishingValue(): string {
    return this._guardian;
  }

  renderHistory(): string {
    return `Child patient [${this.name}], guardian: ${this.guardian}\n${this.medicalHistory}`;
  }

  describe(): string {
    return `Patient: ${this.name}, guardian: ${this.guardian}, age: ${String(this.age)}`;
  }
}
