import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { loadRecord, saveRecord } from "../storage/RecordFiles";
import { patientFromRecord, patientToRecord } from "../serialization/PatientCodec";
import { InvalidRecordError } from "../domain/errors";
import { child } from "./fixtures";

describe("Record files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "clinic-records-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes indented UTF-8 JSON with non-ASCII text unescaped", async () => {
    const file = join(dir, "patient.json");

    await saveRecord({ patient_id: "R1", name: "Мария" }, file);

    expect(await readFile(file, "utf-8")).toBe('{\n    "patient_id": "R1",\n    "name": "Мария"\n}\n');
  });

  it("restores a patient saved to disk", async () => {
    const file = join(dir, "child.json");
    await saveRecord(patientToRecord(child()), file);

    const restored = patientFromRecord(await loadRecord(file));

    expect(restored.describe()).toBe("Patient: Masha Sidorova, guardian: Anna Sidorova, age: 8");
    expect(patientToRecord(restored)).toEqual(patientToRecord(child()));
  });

  it("fails on a missing file", async () => {
    await expect(loadRecord(join(dir, "absent.json"))).rejects.toThrow(/ENOENT/);
  });

  it("fails on text that is not JSON", async () => {
    const file = join(dir, "broken.json");
    await writeFile(file, "{ not json", "utf-8");

    await expect(loadRecord(file)).rejects.toThrow(SyntaxError);
  });

  it("leaves shape checks to the codec", async () => {
    const file = join(dir, "partial.json");
    await saveRecord({ name: "No id" }, file);

    const doc = await loadRecord(file);

    expect(doc).toEqual({ name: "No id" });
    expect(() => patientFromRecord(doc)).toThrow(InvalidRecordError);
  });
});
