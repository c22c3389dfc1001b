import type { DatasetFormat, ExtractedRecord } from "../types";

export interface DatasetOptions {
  /** Table delimiter, a single character */
  delimiter?: string;
  /** Called with flattened keys a table flush had no column for */
  onUnknownColumns?: (columns: string[]) => void;
}

export interface DatasetContents {
  /** Raw `file_name` values, not yet normalized */
  identities: Set<string>;
  rowCount: number;
}

/**
 * One on-disk encoding of a dataset.
 */
export interface DatasetCodec {
  readonly format: DatasetFormat;
  readonly extension: string;

  /** Parse a whole dataset file */
  read(text: string, options: DatasetOptions): DatasetContents;

  /**
   * Append records to path without touching prior content.
   * Returns whether a header is present afterwards.
   */
  append(
    records: readonly ExtractedRecord[],
    path: string,
    headerWritten: boolean,
    options: DatasetOptions,
  ): boolean;
}

export const DEFAULT_DELIMITER = "$";
export const FILE_NAME_COLUMN = "file_name";
