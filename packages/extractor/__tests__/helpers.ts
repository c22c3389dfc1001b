import { createLogger, type Logger } from "@pagesift/shared";
import type { RecordSink } from "../dataset/writer";
import type { ExtractedRecord } from "../types";

export interface CapturedLogger {
  logger: Logger;
  lines: Record<string, unknown>[];
}

/**
 * Logger whose JSON lines are kept in memory.
 */
export function captureLogger(): CapturedLogger {
  const lines: Record<string, unknown>[] = [];
  const logger = createLogger({
    write(chunk: string) {
      lines.push(JSON.parse(chunk));
    },
  });
  return { logger, lines };
}

export class MemorySink implements RecordSink {
  readonly batches: ExtractedRecord[][] = [];

  flush(records: readonly ExtractedRecord[]): void {
    this.batches.push([...records]);
  }

  get records(): ExtractedRecord[] {
    return this.batches.flat();
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
