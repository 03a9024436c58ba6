import type { AnyPatient } from "../domain/AnyPatient";
import type { EntityCapabilities } from "../domain/Capabilities";
import type { CommonPatientFields } from "../domain/Patient";
import { resolvePatientType } from "../domain/PatientRegistry";
import { PatientVariant, VARIANT_TAGS } from "../domain/PatientVariant";
import { InvalidRecordError, UnknownPatientTypeError } from "../domain/errors";
import { PatientRecordSchema, PatientTypeTagSchema, type PatientRecordInput } from "../validation/schemas";

// Patient <-> record codec.
// Contract:
// - Record keys are snake_case and stable.
// - `type` is the lowercased variant tag; exactly one variant field is written.
// - decode(encode(p)) is field-wise equal to p, and encode(decode(r)) === r for any encoded r.

interface BasePatientRecord {
  readonly patient_id: string;
  readonly name: string;
  readonly age: number | null;
  readonly gender: string | null;
  readonly medical_history: string;
}

export interface AdultPatientRecord extends BasePatientRecord {
  readonly type: (typeof VARIANT_TAGS)[PatientVariant.Adult];
  readonly occupation: string;
}

export interface ChildPatientRecord extends BasePatientRecord {
  readonly type: (typeof VARIANT_TAGS)[PatientVariant.Child];
  readonly guardian: string;
}

export interface SeniorPatientRecord extends BasePatientRecord {
  readonly type: (typeof VARIANT_TAGS)[PatientVariant.Senior];
  readonly chronic_conditions: string;
}

export type PatientRecord = AdultPatientRecord | ChildPatientRecord | SeniorPatientRecord;

export function patientToRecord(patient: AnyPatient): PatientRecord {
  const base: BasePatientRecord = {
    patient_id: patient.patientId,
    name: patient.name,
    age: patient.age,
    gender: patient.gender,
    medical_history: patient.medicalHistory,
  };

  switch (patient.variant) {
    case PatientVariant.Adult:
      return { ...base, type: VARIANT_TAGS[PatientVariant.Adult], occupation: patient.occupation };
    case PatientVariant.Child:
      return { ...base, type: VARIANT_TAGS[PatientVariant.Child], guardian: patient.guardian };
    case PatientVariant.Senior:
      return { ...base, type: VARIANT_TAGS[PatientVariant.Senior], chronic_conditions: patient.chronicConditions };
  }
}

function variantFieldOf(variant: PatientVariant, data: PatientRecordInput): string {
  switch (variant) {
    case PatientVariant.Adult:
      return data.occupation ?? "";
    case PatientVariant.Child:
      return data.guardian ?? "";
    case PatientVariant.Senior:
      return data.chronic_conditions ?? "";
  }
}

export function parsePatientRecord(input: unknown): PatientRecordInput {
  const parsed = PatientRecordSchema.safeParse(input);
  if (!parsed.success) throw new InvalidRecordError("patient record", parsed.error.issues);
  return parsed.data;
}

export function patientFromRecord(input: unknown, capabilities?: EntityCapabilities): AnyPatient {
  const tagged = PatientTypeTagSchema.safeParse(input);
  if (!tagged.success) throw new InvalidRecordError("patient record", tagged.error.issues);

  const tag = tagged.data.type ?? "";
  const entry = resolvePatientType(tag);
  if (!entry) throw new UnknownPatientTypeError(tag);

  const data = parsePatientRecord(input);

  // Absent age/gender pass through as null; no defaults are invented.
  const fields: CommonPatientFields = {
    patientId: data.patient_id,
    name: data.name,
    age: data.age ?? null,
    gender: data.gender ?? null,
    medicalHistory: data.medical_history ?? "",
  };

  return entry.construct(fields, variantFieldOf(entry.variant, data), capabilities);
}
