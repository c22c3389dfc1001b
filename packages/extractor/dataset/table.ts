import { closeSync, existsSync, openSync, readFileSync, readSync } from "node:fs";
import type { ExtractedRecord } from "../types";
import { collectColumns, flattenRecord, type FlatValue } from "./flatten";
import { appendLines } from "./io";
import {
  DEFAULT_DELIMITER,
  FILE_NAME_COLUMN,
  type DatasetCodec,
  type DatasetContents,
  type DatasetOptions,
} from "./types";

const HEADER_CHUNK = 64 * 1024;

function toCell(value: FlatValue | undefined, delimiter: string): string {
  if (value === null || value === undefined) return "";
  const text = String(value);
  if (text.includes(delimiter) || /["\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function formatRow(cells: (FlatValue | undefined)[], delimiter: string): string {
  return cells.map((cell) => toCell(cell, delimiter)).join(delimiter);
}

interface ScanResult {
  rows: string[][];
  /** Text ended inside an open quoted cell */
  quoted: boolean;
}

function scanRows(text: string, delimiter: string): ScanResult {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = "";
  let quoted = false;
  let i = 0;

  const endRow = () => {
    row.push(cell);
    if (row.length > 1 || row[0] !== "") rows.push(row);
    row = [];
    cell = "";
  };

  while (i < text.length) {
    const ch = text[i];

    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        cell += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && cell === "") {
      quoted = true;
    } else if (ch === delimiter) {
      row.push(cell);
      cell = "";
    } else if (ch === "\n") {
      endRow();
    } else if (ch === "\r") {
      if (text[i + 1] === "\n") i++;
      endRow();
    } else {
      cell += ch;
    }
    i++;
  }

  const open = quoted;
  if (cell !== "" || row.length > 0 || open) endRow();
  return { rows, quoted: open };
}

/**
 * Split delimited text into rows of cells. Quoted cells may contain the
 * delimiter, doubled quotes and line breaks. Blank lines are dropped.
 */
export function parseRows(text: string, delimiter: string): string[][] {
  return scanRows(text, delimiter).rows;
}

/**
 * Whether the text stops inside a quoted cell, as a row cut off mid-write does.
 */
export function endsInQuotedCell(text: string, delimiter: string): boolean {
  return scanRows(text, delimiter).quoted;
}

/**
 * Read only the header row of an existing table.
 */
export function readHeader(path: string, delimiter: string): string[] | null {
  if (!existsSync(path)) return null;

  const fd = openSync(path, "r");
  try {
    const chunks: Buffer[] = [];
    let position = 0;

    while (true) {
      const buffer = Buffer.alloc(HEADER_CHUNK);
      const bytesRead = readSync(fd, buffer, 0, HEADER_CHUNK, position);
      if (bytesRead === 0) break;
      position += bytesRead;
      chunks.push(buffer.subarray(0, bytesRead));
      const rows = parseRows(Buffer.concat(chunks).toString("utf8"), delimiter);
      // A first row followed by a second means the header is complete
      if (rows.length > 1) return rows[0];
    }

    const rows = parseRows(Buffer.concat(chunks).toString("utf8"), delimiter);
    return rows.length > 0 ? rows[0] : null;
  } finally {
    closeSync(fd);
  }
}

export const tableCodec: DatasetCodec = {
  format: "csv",
  extension: ".csv",

  read(text: string, options: DatasetOptions): DatasetContents {
    const rows = parseRows(text, options.delimiter ?? DEFAULT_DELIMITER);
    const identities = new Set<string>();
    if (rows.length === 0) return { identities, rowCount: 0 };

    const [columns, ...rest] = rows;
    // Rows cut short by an interrupted write have fewer cells than the header
    const body = rest.filter((row) => row.length === columns.length);
    const fileNameIndex = columns.indexOf(FILE_NAME_COLUMN);

    if (fileNameIndex !== -1) {
      for (const row of body) {
        const value = row[fileNameIndex];
        if (value) identities.add(value);
      }
    }

    return { identities, rowCount: body.length };
  },

  append(
    records: readonly ExtractedRecord[],
    path: string,
    headerWritten: boolean,
    options: DatasetOptions,
  ): boolean {
    if (records.length === 0) return true;

    const delimiter = options.delimiter ?? DEFAULT_DELIMITER;
    const flat = records.map((record) => flattenRecord(record));
    const existing = headerWritten ? readHeader(path, delimiter) : null;
    const columns = existing ?? collectColumns(flat);

    if (existing && options.onUnknownColumns) {
      const known = new Set(existing);
      const unknown = collectColumns(flat).filter(
        (column) =>
          !known.has(column) &&
          flat.some((row) => row[column] !== undefined && row[column] !== null && row[column] !== ""),
      );
      if (unknown.length > 0) options.onUnknownColumns(unknown);
    }

    const lines: string[] = [];
    if (!headerWritten) lines.push(formatRow(columns, delimiter));
    for (const row of flat) {
      lines.push(formatRow(columns.map((column) => row[column]), delimiter));
    }

    // A row cut off inside a quoted cell is closed before new rows follow it
    appendLines(path, lines, () =>
      endsInQuotedCell(readFileSync(path, "utf8"), delimiter) ? '"\n' : "\n",
    );
    return true;
  },
};
