import { z } from "zod";
import { InvalidRecordError } from "../domain/errors";

// Input Validation Schemas (Zod)
//
// Record schemas describe the persisted layout (snake_case keys, stable).
// They check shape only: age/gender ranges are NOT enforced here, because
// decoding a record must accept whatever construction accepts.

// --- Records ---

export const PatientRecordSchema = z.object({
  patient_id: z.string(),
  name: z.string(),
  age: z.number().finite().nullable().optional(),
  gender: z.string().nullable().optional(),
  medical_history: z.string().nullable().optional(),
  type: z.string().optional(),
  occupation: z.string().optional(),
  guardian: z.string().optional(),
  chronic_conditions: z.string().optional(),
});

export type PatientRecordInput = z.infer<typeof PatientRecordSchema>;

// Only the variant tag; read before the rest of the record is checked.
export const PatientTypeTagSchema = z.object({ type: z.string().optional() }).passthrough();

export const DoctorInfoRecordSchema = z.object({
  name: z.string(),
  specialty: z.string(),
  contact_info: z.string(),
});

export const ServiceRecordSchema = z.object({
  name: z.string(),
  price: z.number().finite().nonnegative("price must be non-negative"),
});

export const AppointmentRecordSchema = z.object({
  appointment_id: z.string(),
  patient: z.unknown(),
  doctor: z.string(),
  date: z.string(),
  diagnosis: z.string(),
  prescription: z.string(),
  doctor_info: DoctorInfoRecordSchema,
  services: z.array(ServiceRecordSchema).default([]),
});

export type AppointmentRecordInput = z.infer<typeof AppointmentRecordSchema>;

// --- API request schemas ---

export const TokenRequestSchema = z.object({
  staffId: z.string().trim().min(3).max(128),
  role: z.string().trim().min(1).max(64),
});

export const RefreshTokenRequestSchema = z.object({
  refreshToken: z.string().min(1),
});

// Setter-based update. Range checks happen in the entity setters.
export const PatientUpdateRequestSchema = z
  .object({
    name: z.string().min(1).max(500),
    age: z.number().int(),
    gender: z.string().max(16),
    medicalHistory: z.string().max(20000),
    occupation: z.string().max(500),
    guardian: z.string().max(500),
    chronicConditions: z.string().max(2000),
  })
  .partial()
  .refine((data) => Object.keys(data).length > 0, { message: "Provide at least one field to update." });

export type PatientUpdateRequest = z.infer<typeof PatientUpdateRequestSchema>;

export const ServiceRequestSchema = ServiceRecordSchema;

export const DiagnosisChangeRequestSchema = z.object({
  diagnosis: z.string().min(1).max(2000, "Diagnosis must be 2000 characters or less"),
});

export const PatientSearchQuerySchema = z.object({
  q: z.string().max(200).optional(),
});

export const CreateAppointmentRequestSchema = z.object({
  channel: z.enum(["online", "front-desk"]).optional(),
  record: z.unknown(),
});

// --- Helpers ---

export function parseOrThrow<TSchema extends z.ZodTypeAny>(schema: TSchema, input: unknown, what: string): z.infer<TSchema> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw new InvalidRecordError(what, parsed.error.issues);
  return parsed.data;
}
