import { describe, it, expect } from "vitest";
import { comparePatients, isEqualTo, isGreaterThan, isLessThan, sortPatients } from "../domain/PatientOrdering";
import { adult, child, senior } from "./fixtures";

describe("PatientOrdering", () => {
  it("orders by age first", () => {
    const younger = adult({ age: 30, medicalHistory: "a much longer medical history" });
    const older = senior({ age: 70, medicalHistory: "x" });

    expect(isLessThan(younger, older)).toBe(true);
    expect(isGreaterThan(older, younger)).toBe(true);
    expect(isEqualTo(younger, older)).toBe(false);
  });

  it("falls back to history length when ages are equal", () => {
    const shortHistory = adult({ age: 40, medicalHistory: "abc" });
    const longHistory = adult({ patientId: "A2", age: 40, medicalHistory: "abcdef" });

    expect(isLessThan(shortHistory, longHistory)).toBe(true);
    expect(isGreaterThan(longHistory, shortHistory)).toBe(true);
    expect(comparePatients(shortHistory, longHistory)).toBe(-1);
  });

  it("treats equal age and equal history length as equal regardless of identity, name or variant", () => {
    const a = adult({ patientId: "A1", name: "Anna", age: 9, medicalHistory: "flu" });
    const b = child({ patientId: "C9", name: "Boris", age: 9, medicalHistory: "pox" });

    expect(isEqualTo(a, b)).toBe(true);
    expect(isLessThan(a, b)).toBe(false);
    expect(isGreaterThan(a, b)).toBe(false);
  });

  it("orders a missing age before any numeric age", () => {
    const unknownAge = adult({ age: null });
    const known = adult({ age: 2 });

    expect(isLessThan(unknownAge, known)).toBe(true);
    expect(isEqualTo(unknownAge, adult({ age: null }))).toBe(true);
  });

  it("sorts into a new array, keeping ties in input order", () => {
    const first = adult({ patientId: "T1", age: 50, medicalHistory: "ab" });
    const second = senior({ patientId: "T2", age: 50, medicalHistory: "cd" });
    const youngest = child({ patientId: "T3", age: 5 });
    const input = [first, second, youngest];

    const sorted = sortPatients(input);

    expect(sorted.map((p) => p.patientId)).toEqual(["T3", "T1", "T2"]);
    expect(input.map((p) => p.patientId)).toEqual(["T1", "T2", "T3"]);
  });
});
