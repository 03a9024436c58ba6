import type { Patient } from "./Patient";

// Ordering over patients: by age, then by medical history length.
// Equality is deliberately NOT identity: two different patients (any name, any
// variant) with equal age and equal history length compare equal.
// A missing age sorts before every numeric age.

function compareAge(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a < b ? -1 : 1;
}

export function comparePatients(a: Patient, b: Patient): number {
  const byAge = compareAge(a.age, b.age);
  if (byAge !== 0) return byAge;
  return Math.sign(a.medicalHistory.length - b.medicalHistory.length);
}

export function isLessThan(a: Patient, b: Patient): boolean {
  return comparePatients(a, b) < 0;
}

export function isGreaterThan(a: Patient, b: Patient): boolean {
  return comparePatients(a, b) > 0;
}

export function isEqualTo(a: Patient, b: Patient): boolean {
  return comparePatients(a, b) === 0;
}

// Returns a new array; Array.prototype.sort is stable.
export function sortPatients<T extends Patient>(patients: readonly T[]): T[] {
  return patients.slice().sort(comparePatients);
}
