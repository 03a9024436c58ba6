import { readFile, writeFile } from "fs/promises";

// JSON record files: one patient or appointment record per file.
// Written as UTF-8, 4-space indent; non-ASCII text is kept as-is.

export async function saveRecord(record: unknown, filename: string): Promise<void> {
  await writeFile(filename, `${JSON.stringify(record, null, 4)}\n`, { encoding: "utf-8" });
}

// Returns the parsed document. Shape checks belong to the record codecs.
export async function loadRecord(filename: string): Promise<unknown> {
  const text = await readFile(filename, { encoding: "utf-8" });
  const parsed: unknown = JSON.parse(text);
  return parsed;
}
