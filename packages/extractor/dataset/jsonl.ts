import { extractedRecordSchema, type ExtractedRecord } from "../types";
import { appendLines } from "./io";
import { FILE_NAME_COLUMN, type DatasetCodec, type DatasetContents } from "./types";

/**
 * Parse one line into a record, or null when it is blank, not JSON or not
 * an object.
 */
export function parseRecordLine(line: string): ExtractedRecord | null {
  if (!line.trim()) return null;

  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }

  const parsed = extractedRecordSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export const jsonlCodec: DatasetCodec = {
  format: "jsonl",
  extension: ".jsonl",

  read(text: string): DatasetContents {
    const identities = new Set<string>();
    let rowCount = 0;

    for (const line of text.split("\n")) {
      const record = parseRecordLine(line);
      if (!record) continue;

      rowCount++;
      const fileName = record[FILE_NAME_COLUMN];
      if (typeof fileName === "string" && fileName) identities.add(fileName);
    }

    return { identities, rowCount };
  },

  append(records: readonly ExtractedRecord[], path: string, headerWritten: boolean): boolean {
    if (records.length > 0) {
      appendLines(
        path,
        records.map((record) => JSON.stringify(record)),
      );
    }
    return headerWritten;
  },
};
