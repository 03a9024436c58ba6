import { Patient, type CommonPatientFields } from "./Patient";
import { PatientVariant } from "./PatientVariant";
import type { EntityCapabilities } from "./Capabilities";

export class SeniorPatient extends Patient<PatientVariant.Senior> {
  readonly variant = PatientVariant.Senior;

  // Free text; not a coded problem list.
  private _chronicConditions: string;

  constructor(fields: CommonPatientFields, chronicConditions: string, capabilities?: EntityCapabilities) {
    super(fields, capabilities);
    this._chronicConditions = chronicConditions;
  }

  get chronicConditions(): string {
    return this._chronicConditions;
  }

  set chronicConditions(value: string) {
    this._chronicConditions = value;
  }

  get distinguishingValue(): string {
    return this._chronicConditions;
  }

  renderHistory(): string {
    return `Senior patient [${this.name}], chronic conditions: ${this.chronicConditions}\n${this.medicalHistory}`;
  }

  describe(): string {
    return `Patient: ${this.name}, chronic conditions: ${this.chronicConditions}, age: ${String(this.age)}`;
  }
}
