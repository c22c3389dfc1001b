import { copyFileSync, existsSync, mkdirSync, readFileSync } from "node:fs";
import { dirname, extname } from "node:path";
import { DatasetNotFoundError, UnsupportedFormatError } from "../errors";
import type { DatasetFormat, ExtractedRecord } from "../types";
import { jsonlCodec } from "./jsonl";
import { tableCodec } from "./table";
import type { DatasetCodec, DatasetOptions } from "./types";

export { flattenRecord, collectColumns, type FlatValue } from "./flatten";
export { parseRows, endsInQuotedCell, formatRow, readHeader } from "./table";
export { parseRecordLine } from "./jsonl";
export {
  DEFAULT_DELIMITER,
  FILE_NAME_COLUMN,
  type DatasetCodec,
  type DatasetContents,
  type DatasetOptions,
} from "./types";

const codecs: Record<DatasetFormat, DatasetCodec> = {
  csv: tableCodec,
  jsonl: jsonlCodec,
};

const EXTENSION_FORMATS: Record<string, DatasetFormat> = {
  ".csv": "csv",
  ".jsonl": "jsonl",
  ".ndjson": "jsonl",
};

export interface LoadedDataset {
  format: DatasetFormat;
  /** Raw `file_name` values, normalize with the identity resolver */
  identities: Set<string>;
  rowCount: number;
}

export function getCodec(format: DatasetFormat): DatasetCodec {
  return codecs[format];
}

export function datasetExtension(format: DatasetFormat): string {
  return codecs[format].extension;
}

/**
 * Infer a dataset's format from its file extension.
 */
export function inferFormat(path: string): DatasetFormat {
  const format = EXTENSION_FORMATS[extname(path).toLowerCase()];
  if (!format) throw new UnsupportedFormatError(path);
  return format;
}

export function isDatasetFile(path: string): boolean {
  return extname(path).toLowerCase() in EXTENSION_FORMATS;
}

/**
 * Read an existing dataset: its format, the identities in its `file_name`
 * column and its row count.
 */
export function loadDataset(
  path: string,
  format?: DatasetFormat,
  options: DatasetOptions = {},
): LoadedDataset {
  const resolvedFormat = format ?? inferFormat(path);
  if (!existsSync(path)) throw new DatasetNotFoundError(path);

  const text = readFileSync(path, "utf8");
  const { identities, rowCount } = codecs[resolvedFormat].read(text, options);
  return { format: resolvedFormat, identities, rowCount };
}

/**
 * Append a batch of records to a dataset file. Returns the header state to
 * pass to the next flush.
 */
export function flushRecords(
  records: readonly ExtractedRecord[],
  path: string,
  headerWritten: boolean,
  format: DatasetFormat,
  options: DatasetOptions = {},
): boolean {
  return codecs[format].append(records, path, headerWritten, options);
}

/**
 * Byte-identical copy used to seed a continuation run.
 */
export function copyDataset(src: string, dest: string): void {
  if (!existsSync(src)) throw new DatasetNotFoundError(src);
  mkdirSync(dirname(dest), { recursive: true });
  copyFileSync(src, dest);
}
