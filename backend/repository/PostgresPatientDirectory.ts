import { isAnyPatient, type AnyPatient } from "../domain/AnyPatient";
import { InvalidPatientError, NotFoundError } from "../domain/errors";
import { patientFromRecord, patientToRecord } from "../serialization/PatientCodec";
import { query } from "../database/connection";
import type { PatientDirectory, PatientId } from "./PatientDirectory";

// =========================================================================
// PostgreSQL Patient Directory
//
// Same contract as InMemoryPatientDirectory. Each row stores the patient's
// record (jsonb) next to the columns used for lookup. Entities handed out are
// decoded copies: setter changes must be written back with save().
// =========================================================================

interface PatientRow {
  [key: string]: unknown;
  patient_id: string;
  record: unknown;
}

// ILIKE treats % and _ as wildcards; search text is matched literally.
export function escapeLikePattern(text: string): string {
  return text.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export class PostgresPatientDirectory implements PatientDirectory {
  async add(candidate: unknown): Promise<AnyPatient> {
    if (!isAnyPatient(candidate)) {
      console.error("[Clinic] Rejected invalid patient object");
      throw new InvalidPatientError();
    }

    const result = await query(
      `INSERT INTO patients (patient_id, variant, name, record)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (patient_id) DO NOTHING`,
      [candidate.patientId, candidate.variant, candidate.name, JSON.stringify(patientToRecord(candidate))],
    );
    if ((result.rowCount ?? 0) === 0) {
      throw new InvalidPatientError(`Patient id already in directory: ${candidate.patientId}`);
    }

    console.log(`[Clinic] Patient ${candidate.name} added`);
    return candidate;
  }

  async remove(patientId: PatientId): Promise<void> {
    const result = await query(`DELETE FROM patients WHERE patient_id = $1`, [patientId]);
    if ((result.rowCount ?? 0) === 0) {
      console.error(`[Clinic] Patient not found: ${patientId}`);
      throw new NotFoundError("Patient", patientId);
    }
    console.log(`[Clinic] Patient ${patientId} removed`);
  }

  async get(patientId: PatientId): Promise<AnyPatient> {
    const result = await query<PatientRow>(`SELECT patient_id, record FROM patients WHERE patient_id = $1`, [
      patientId,
    ]);
    const row = result.rows[0];
    if (!row) throw new NotFoundError("Patient", patientId);
    return patientFromRecord(row.record);
  }

  async save(patient: AnyPatient): Promise<void> {
    const result = await query(
      `UPDATE patients SET name = $2, record = $3, updated_at = NOW() WHERE patient_id = $1`,
      [patient.patientId, patient.name, JSON.stringify(patientToRecord(patient))],
    );
    if ((result.rowCount ?? 0) === 0) throw new NotFoundError("Patient", patient.patientId);
  }

  async all(): Promise<readonly AnyPatient[]> {
    const result = await query<PatientRow>(`SELECT patient_id, record FROM patients ORDER BY created_at, patient_id`);
    return result.rows.map((row) => patientFromRecord(row.record));
  }

  async searchByNameSubstring(text: string): Promise<readonly AnyPatient[]> {
    const result = await query<PatientRow>(
      `SELECT patient_id, record FROM patients
       WHERE name ILIKE '%' || $1 || '%' ESCAPE '\\'
       ORDER BY created_at, patient_id`,
      [escapeLikePattern(text)],
    );
    return result.rows.map((row) => patientFromRecord(row.record));
  }
}
