import { AdultPatient } from "./AdultPatient";
import { ChildPatient } from "./ChildPatient";
import { SeniorPatient } from "./SeniorPatient";

export type AnyPatient = AdultPatient | ChildPatient | SeniorPatient;

export function isAnyPatient(value: unknown): value is AnyPatient {
  return value instanceof AdultPatient || value instanceof ChildPatient || value instanceof SeniorPatient;
}
