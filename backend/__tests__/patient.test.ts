import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AdultPatient } from "../domain/AdultPatient";
import { PatientVariant } from "../domain/PatientVariant";
import { adult, child, commonFields, senior, RecordingNotifier, FailingSink } from "./fixtures";

describe("Patient", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("age setter", () => {
    it.each([2, 50, 109])("accepts %i", (age) => {
      const patient = adult();
      patient.age = age;
      expect(patient.age).toBe(age);
    });

    it.each([1, 110, 0, -5])("rejects %i and keeps the previous age", (age) => {
      const patient = adult({ age: 35 });
      patient.age = age;
      expect(patient.age).toBe(35);
    });

    it("rejects a fractional age", () => {
      const patient = adult({ age: 35 });
      patient.age = 36.5;
      expect(patient.age).toBe(35);
    });

    it("rejects null without throwing", () => {
      const patient = adult({ age: 35 });
      expect(() => {
        patient.age = null;
      }).not.toThrow();
      expect(patient.age).toBe(35);
    });

    it("logs the rejection", () => {
      const patient = adult({ age: 35 });
      patient.age = 110;
      expect(console.warn).toHaveBeenCalledWith("[Patient] Rejected age for A123: 110");
    });
  });

  describe("gender setter", () => {
    it("accepts the two recognized codes", () => {
      const patient = adult({ gender: "m" });
      patient.gender = "f";
      expect(patient.gender).toBe("f");
      patient.gender = "m";
      expect(patient.gender).toBe("m");
    });

    it("rejects anything else and keeps the previous value", () => {
      const patient = adult({ gender: "f" });
      patient.gender = "x";
      expect(patient.gender).toBe("f");
      patient.gender = "M";
      expect(patient.gender).toBe("f");
    });
  });

  it("keeps out-of-range values given at construction", () => {
    const patient = new AdultPatient(commonFields({ age: 200, gender: "unknown" }), "Pilot");
    expect(patient.age).toBe(200);
    expect(patient.gender).toBe("unknown");
  });

  it("carries its variant", () => {
    expect(adult().variant).toBe(PatientVariant.Adult);
    expect(child().variant).toBe(PatientVariant.Child);
    expect(senior().variant).toBe(PatientVariant.Senior);
  });

  describe("renderHistory", () => {
    it("prefixes the adult history with the occupation", () => {
      expect(adult().renderHistory()).toBe("Adult patient [Ivan Petrov], occupation: Programmer\nPollen allergy");
    });

    it("prefixes the child history with the guardian", () => {
      expect(child().renderHistory()).toBe("Child patient [Masha Sidorova], guardian: Anna Sidorova\nCold");
    });

    it("prefixes the senior history with chronic conditions", () => {
      expect(senior().renderHistory()).toBe("Senior patient [Petr Ivanov], chronic conditions: Diabetes\nHypertension");
    });

    it("reflects the current value of the distinguishing field", () => {
      const patient = child();
      patient.guardian = "Olga Sidorova";
      expect(patient.renderHistory()).toBe("Child patient [Masha Sidorova], guardian: Olga Sidorova\nCold");
    });
  });

  describe("describe", () => {
    it("includes name, occupation, age and gender for adults", () => {
      expect(adult().describe()).toBe("Patient: Ivan Petrov, occupation: Programmer, age: 35, gender: m");
    });

    it("includes name, guardian and age for children", () => {
      expect(child().describe()).toBe("Patient: Masha Sidorova, guardian: Anna Sidorova, age: 8");
    });

    it("includes name, chronic conditions and age for seniors", () => {
      expect(senior().describe()).toBe("Patient: Petr Ivanov, chronic conditions: Diabetes, age: 70");
    });

    it("is used as the string form", () => {
      expect(String(senior())).toBe("Patient: Petr Ivanov, chronic conditions: Diabetes, age: 70");
    });
  });

  describe("requestAppointment", () => {
    it("notifies through the patient's notifier", () => {
      const notifier = new RecordingNotifier();
      const patient = new AdultPatient(commonFields(), "Programmer", { notifier });
      patient.requestAppointment("2023-10-15");
      expect(notifier.messages).toEqual(["Appointment request for 2023-10-15 sent"]);
    });

    it("does nothing without a notifier", () => {
      expect(() => adult().requestAppointment("2023-10-15")).not.toThrow();
    });

    it("survives a failing notifier", () => {
      vi.spyOn(console, "error").mockImplementation(() => {});
      const patient = new AdultPatient(commonFields(), "Programmer", { notifier: new FailingSink() });
      expect(() => patient.requestAppointment("2023-10-15")).not.toThrow();
      expect(console.error).toHaveBeenCalledWith("[Notify] Sink rejected message:", "notification channel offline");
    });
  });
});
