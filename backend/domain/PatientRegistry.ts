import { AdultPatient } from "./AdultPatient";
import { ChildPatient } from "./ChildPatient";
import { SeniorPatient } from "./SeniorPatient";
import type { AnyPatient } from "./AnyPatient";
import type { CommonPatientFields } from "./Patient";
import type { EntityCapabilities } from "./Capabilities";
import { PatientVariant, VARIANT_TAGS } from "./PatientVariant";
import { UnknownPatientTypeError } from "./errors";

// Patient Type Registry
// - The ONLY place where a type tag is mapped to a concrete patient variant.
// - Tags are matched case-insensitively (stored lowercased).
// - Populated once at module load; later writes may only add new tags.
// - Construction does NOT validate age/gender. Only setters do.

export type PatientConstructor = (
  fields: CommonPatientFields,
  variantField: string,
  capabilities?: EntityCapabilities,
) => AnyPatient;

export interface PatientTypeEntry {
  readonly variant: PatientVariant;
  readonly construct: PatientConstructor;
}

const registry = new Map<string, PatientTypeEntry>();

function normalizeTag(tag: string): string {
  return tag.toLowerCase();
}

export function registerPatientType(tag: string, variant: PatientVariant, construct: PatientConstructor): void {
  const key = normalizeTag(tag);
  if (!key) throw new Error("Patient type tag must not be empty.");
  if (registry.has(key)) {
    throw new Error(`Patient type already registered: ${key}`);
  }
  registry.set(key, { variant, construct });
}

export function resolvePatientType(tag: string): PatientTypeEntry | undefined {
  return registry.get(normalizeTag(tag));
}

export function registeredPatientTypes(): readonly string[] {
  return Array.from(registry.keys());
}

export function createPatient(
  tag: string,
  fields: CommonPatientFields,
  variantField: string,
  capabilities?: EntityCapabilities,
): AnyPatient {
  const entry = resolvePatientType(tag);
  if (!entry) throw new UnknownPatientTypeError(tag);
  return entry.construct(fields, variantField, capabilities);
}

const adult: PatientConstructor = (fields, occupation, capabilities) => new AdultPatient(fields, occupation, capabilities);
const child: PatientConstructor = (fields, guardian, capabilities) => new ChildPatient(fields, guardian, capabilities);
const senior: PatientConstructor = (fields, conditions, capabilities) =>
  new SeniorPatient(fields, conditions, capabilities);

registerPatientType(VARIANT_TAGS[PatientVariant.Adult], PatientVariant.Adult, adult);
registerPatientType(VARIANT_TAGS[PatientVariant.Child], PatientVariant.Child, child);
registerPatientType(VARIANT_TAGS[PatientVariant.Senior], PatientVariant.Senior, senior);

// Short aliases accepted by the factory. Records are always written with the full tag.
registerPatientType("adult", PatientVariant.Adult, adult);
registerPatientType("child", PatientVariant.Child, child);
registerPatientType("senior", PatientVariant.Senior, senior);
