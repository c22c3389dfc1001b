import type { Logger } from "@pagesift/shared";
import type { DatasetFormat, ExtractedRecord } from "../types";
import { flushRecords } from "./index";

/**
 * Destination the scheduler hands full batches to.
 */
export interface RecordSink {
  flush(records: readonly ExtractedRecord[]): void;
}

export interface DatasetWriterOptions {
  headerWritten?: boolean;
  delimiter?: string;
  logger?: Logger;
}

/**
 * Appends batches to one dataset file and carries the header flag between
 * flushes. Owned by a single caller; not safe to share between writers.
 */
export class DatasetWriter implements RecordSink {
  private _headerWritten: boolean;
  private _flushes = 0;
  private _rows = 0;

  constructor(
    readonly path: string,
    readonly format: DatasetFormat,
    private readonly options: DatasetWriterOptions = {},
  ) {
    this._headerWritten = options.headerWritten ?? false;
  }

  get headerWritten(): boolean {
    return this._headerWritten;
  }

  get flushes(): number {
    return this._flushes;
  }

  /** Rows appended by this writer */
  get rows(): number {
    return this._rows;
  }

  flush(records: readonly ExtractedRecord[]): void {
    const { logger, delimiter } = this.options;

    this._headerWritten = flushRecords(records, this.path, this._headerWritten, this.format, {
      delimiter,
      onUnknownColumns: (columns) =>
        logger?.warn({ columns }, "Columns missing from the dataset header were not written"),
    });
    this._flushes++;
    this._rows += records.length;

    logger?.info({ records: records.length, total: this._rows, path: this.path }, "Flushed batch");
  }
}
