import { z } from "zod";

/**
 * Path-like reference to one input document, as presented to the extractor.
 */
export type DocumentRef = string;

export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

export type ExtractedRecord = { [key: string]: FieldValue };

/**
 * A record as stored in a dataset: always carries the document it came from.
 */
export type DatasetRecord = ExtractedRecord & { file_name: string };

export const fieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(fieldValueSchema),
    z.record(z.string(), fieldValueSchema),
  ]),
);

export const extractedRecordSchema = z.record(z.string(), fieldValueSchema);

/**
 * Encodings a dataset file can use.
 *   csv   - flattened, delimited table with one header row
 *   jsonl - one JSON object per line, nested structure kept
 */
export type DatasetFormat = "csv" | "jsonl";

export const DATASET_FORMATS: readonly DatasetFormat[] = ["csv", "jsonl"];

export type ExtractFn = (ref: DocumentRef, signal: AbortSignal) => Promise<ExtractedRecord>;
