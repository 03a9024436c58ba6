import type { ZodIssue } from "zod";

// Clinic error taxonomy. Every failure the core reports is one of these;
// setter validation is the only path that absorbs bad input instead.

export type ClinicErrorCode =
  | "unknown_patient_type"
  | "invalid_patient"
  | "invalid_record"
  | "invalid_service"
  | "not_found"
  | "permission_denied";

export class ClinicError extends Error {
  readonly code: ClinicErrorCode;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(code: ClinicErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): { code: ClinicErrorCode; message: string; details: Readonly<Record<string, unknown>> } {
    return { code: this.code, message: this.message, details: this.details };
  }
}

export class UnknownPatientTypeError extends ClinicError {
  readonly tag: string;

  constructor(tag: string) {
    super("unknown_patient_type", `Unknown patient type: ${tag}`, { tag });
    this.tag = tag;
  }
}

export class InvalidPatientError extends ClinicError {
  constructor(message = "Invalid patient object.") {
    super("invalid_patient", message);
  }
}

export class InvalidRecordError extends ClinicError {
  readonly issues: readonly ZodIssue[];

  constructor(what: string, issues: readonly ZodIssue[]) {
    super("invalid_record", `Malformed ${what}: ${issues.map((i) => `${i.path.join(".") || "(root)"} ${i.message}`).join("; ")}`, {
      issues: issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
    this.issues = issues;
  }
}

export class InvalidServiceError extends ClinicError {
  constructor(name: string, price: number) {
    super("invalid_service", `Service price must be a non-negative number: ${name} (${price})`, { name, price });
  }
}

export class NotFoundError extends ClinicError {
  constructor(resource: string, id: string) {
    super("not_found", `${resource} not found: ${id}`, { resource, id });
  }
}

export class PermissionDeniedError extends ClinicError {
  readonly requiredRoles: readonly string[];

  constructor(requiredRoles: readonly string[]) {
    super("permission_denied", `One of the following roles is required: ${requiredRoles.join(", ")}`, {
      requiredRoles,
    });
    this.requiredRoles = requiredRoles;
  }
}
