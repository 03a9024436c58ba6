import { Router } from "express";
import type { AnyPatient } from "../domain/AnyPatient";
import { PatientVariant } from "../domain/PatientVariant";
import { sortPatients } from "../domain/PatientOrdering";
import type { PatientDirectory } from "../repository/PatientDirectory";
import { patientFromRecord, patientToRecord } from "../serialization/PatientCodec";
import {
  PatientSearchQuerySchema,
  PatientUpdateRequestSchema,
  parseOrThrow,
  type PatientUpdateRequest,
} from "../validation/schemas";
import { asyncHandler, type ApiHandler } from "./types";

type VariantFieldKey = "occupation" | "guardian" | "chronicConditions";

const VARIANT_FIELD: Readonly<Record<PatientVariant, VariantFieldKey>> = {
  [PatientVariant.Adult]: "occupation",
  [PatientVariant.Child]: "guardian",
  [PatientVariant.Senior]: "chronicConditions",
};

function applyVariantField(patient: AnyPatient, value: string): void {
  switch (patient.variant) {
    case PatientVariant.Adult:
      patient.occupation = value;
      return;
    case PatientVariant.Child:
      patient.guardian = value;
      return;
    case PatientVariant.Senior:
      patient.chronicConditions = value;
      return;
  }
}

// Applies an update through the entity setters. Returns the names of fields
// whose value the setters refused (age/gender out of range).
export function applyPatientUpdate(patient: AnyPatient, update: PatientUpdateRequest): string[] {
  const rejected: string[] = [];

  if (update.name !== undefined) patient.name = update.name;
  if (update.medicalHistory !== undefined) patient.medicalHistory = update.medicalHistory;

  if (update.age !== undefined) {
    patient.age = update.age;
    if (patient.age !== update.age) rejected.push("age");
  }

  if (update.gender !== undefined) {
    patient.gender = update.gender;
    if (patient.gender !== update.gender) rejected.push("gender");
  }

  const variantKey = VARIANT_FIELD[patient.variant];
  const variantValue = update[variantKey];
  if (variantValue !== undefined) applyVariantField(patient, variantValue);

  return rejected;
}

function foreignVariantFields(patient: AnyPatient, update: PatientUpdateRequest): VariantFieldKey[] {
  const own = VARIANT_FIELD[patient.variant];
  return Object.values(VARIANT_FIELD).filter((key) => key !== own && update[key] !== undefined);
}

export interface PatientHandlers {
  list: ApiHandler;
  create: ApiHandler;
  get: ApiHandler;
  update: ApiHandler;
  remove: ApiHandler;
  history: ApiHandler;
}

export function createPatientHandlers(directory: PatientDirectory): PatientHandlers {
  return {
    // GET /api/patients?q=<substring>&order=age
    async list(req, res) {
      const { q } = parseOrThrow(PatientSearchQuerySchema, { q: req.query.q }, "search query");
      const found = q ? await directory.searchByNameSubstring(q) : await directory.all();
      const patients = req.query.order === "age" ? sortPatients(found) : found;
      res.json({ patients: patients.map(patientToRecord), count: patients.length });
    },

    // POST /api/patients — body is a patient record
    async create(req, res) {
      const patient = patientFromRecord(req.body);
      await directory.add(patient);
      res.status(201).json(patientToRecord(patient));
    },

    async get(req, res) {
      const patient = await directory.get(req.params.patientId);
      res.json(patientToRecord(patient));
    },

    async update(req, res) {
      const update = parseOrThrow(PatientUpdateRequestSchema, req.body, "patient update");
      const patient = await directory.get(req.params.patientId);

      const foreign = foreignVariantFields(patient, update);
      if (foreign.length > 0) {
        res.status(400).json({ error: `Fields not applicable to ${patient.variant} patient: ${foreign.join(", ")}` });
        return;
      }

      const rejected = applyPatientUpdate(patient, update);
      await directory.save(patient);
      res.json({ patient: patientToRecord(patient), rejected });
    },

    async remove(req, res) {
      await directory.remove(req.params.patientId);
      res.json({ removed: req.params.patientId });
    },

    async history(req, res) {
      const patient = await directory.get(req.params.patientId);
      res.json({ patientId: patient.patientId, summary: patient.describe(), history: patient.renderHistory() });
    },
  };
}

export function createPatientRouter(directory: PatientDirectory): Router {
  const handlers = createPatientHandlers(directory);
  const router = Router();

  router.get("/", asyncHandler(handlers.list));
  router.post("/", asyncHandler(handlers.create));
  router.get("/:patientId", asyncHandler(handlers.get));
  router.patch("/:patientId", asyncHandler(handlers.update));
  router.delete("/:patientId", asyncHandler(handlers.remove));
  router.get("/:patientId/history", asyncHandler(handlers.history));

  return router;
}
