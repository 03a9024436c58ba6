import { describe, it, expect, vi, afterEach } from "vitest";
import { Appointment } from "../domain/Appointment";
import { InvalidServiceError } from "../domain/errors";
import { adult, appointment, FailingSink, RecordingAuditLogger, RecordingNotifier } from "./fixtures";

describe("Appointment", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("services", () => {
    it("totals service prices", () => {
      const booked = appointment();
      booked.addService({ name: "Consultation", price: 50 });
      booked.addService({ name: "X-ray", price: 35.5 });

      expect(booked.calculateTotal()).toBe(85.5);
    });

    it("refuses a negative or non-finite price", () => {
      const booked = appointment();

      expect(() => booked.addService({ name: "Refund", price: -3 })).toThrow(
        "Service price must be a non-negative number: Refund (-3)",
      );
      expect(() => booked.addService({ name: "Broken", price: Number.NaN })).toThrow(InvalidServiceError);
      expect(booked.services).toEqual([]);
    });

    it("accepts a free service", () => {
      const booked = appointment();
      booked.addService({ name: "Follow-up", price: 0 });
      expect(booked.calculateTotal()).toBe(0);
      expect(booked.services).toHaveLength(1);
    });

    it("totals zero without services", () => {
      expect(appointment().calculateTotal()).toBe(0);
    });

    it("removes only the first matching service", () => {
      const booked = appointment();
      booked.addService({ name: "Consultation", price: 50 });
      booked.addService({ name: "X-ray", price: 30 });
      booked.addService({ name: "Consultation", price: 50 });

      expect(booked.removeService({ name: "Consultation", price: 50 })).toBe(true);
      expect(booked.services).toEqual([
        { name: "X-ray", price: 30 },
        { name: "Consultation", price: 50 },
      ]);
      expect(booked.calculateTotal()).toBe(80);
    });

    it("reports a missing service without changing the list", () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      const booked = appointment();
      booked.addService({ name: "Consultation", price: 50 });

      expect(booked.removeService({ name: "Consultation", price: 60 })).toBe(false);
      expect(booked.services).toHaveLength(1);
    });

    it("does not expose its internal list", () => {
      const booked = appointment();
      booked.addService({ name: "Consultation", price: 50 });
      const snapshot = booked.services;
      booked.addService({ name: "X-ray", price: 30 });

      expect(snapshot).toHaveLength(1);
    });
  });

  it("renders a report", () => {
    const booked = appointment();
    booked.addService({ name: "Consultation", price: 50 });
    booked.addService({ name: "X-ray", price: 30 });

    expect(booked.generateReport()).toBe(
      [
        "Appointment report:",
        "  Appointment ID: AP101",
        "  Patient: Patient: Ivan Petrov, occupation: Programmer, age: 35, gender: m",
        "  Doctor: Dr. Ivanov",
        "  Date: 2024-03-01",
        "  Diagnosis: Flu",
        "  Prescription: Paracetamol",
        "  Doctor info: Dr. Ivanov, Therapist, ivanov@clinic.test",
        "  Services: Consultation, X-ray",
        "  Total cost: 80",
      ].join("\n"),
    );
  });

  it("says so when there are no services", () => {
    expect(appointment().generateReport()).toContain("  Services: No services\n  Total cost: 0");
  });

  describe("capabilities", () => {
    it("audits creation through schedule()", () => {
      const auditLogger = new RecordingAuditLogger();
      Appointment.schedule(
        {
          appointmentId: "AP7",
          patient: adult(),
          doctor: "Dr. Lee",
          date: "2024-05-05",
          diagnosis: "",
          prescription: "",
          doctorInfo: { name: "Dr. Lee", specialty: "ENT", contactInfo: "lee@clinic.test" },
        },
        { auditLogger },
      );

      expect(auditLogger.events).toEqual(["Appointment AP7 created"]);
    });

    it("records creation only once", () => {
      const auditLogger = new RecordingAuditLogger();
      const booked = appointment(adult(), { auditLogger });

      booked.recordCreation();
      booked.recordCreation();

      expect(auditLogger.events).toEqual(["Appointment AP101 created"]);
    });

    it("notifies and audits on confirm and cancel", () => {
      const auditLogger = new RecordingAuditLogger();
      const notifier = new RecordingNotifier();
      const booked = appointment(adult(), { auditLogger, notifier });

      booked.confirm();
      expect(booked.status).toBe("confirmed");
      booked.cancel();
      expect(booked.status).toBe("cancelled");

      expect(notifier.messages).toEqual(["Your appointment on 2024-03-01 is confirmed.", "Appointment AP101 cancelled."]);
      expect(auditLogger.events).toEqual(["Appointment AP101 confirmed", "Appointment AP101 cancelled"]);
    });

    it("treats failing sinks as non-fatal", () => {
      vi.spyOn(console, "error").mockImplementation(() => {});
      const sink = new FailingSink();
      const booked = appointment(adult(), { auditLogger: sink, notifier: sink });

      expect(() => booked.confirm()).not.toThrow();
      expect(() => booked.updateDiagnosis("Angina")).not.toThrow();
      expect(booked.status).toBe("confirmed");
      expect(booked.diagnosis).toBe("Angina");
    });

    it("starts as scheduled", () => {
      expect(appointment().status).toBe("scheduled");
    });
  });
});
