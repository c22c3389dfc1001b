import type { Logger } from "@pagesift/shared";
import pLimit from "p-limit";
import type { RecordSink } from "./dataset/writer";
import { ConfigError, FatalExtractionError, RunAbortedError } from "./errors";
import { defaultClassifier, type FatalErrorClassifier } from "./fatal";
import type { DatasetRecord, DocumentRef, ExtractFn } from "./types";
import { AsyncQueue } from "./utils/async-queue";

export type OutcomeStatus = "ok" | "failed" | "cancelled" | "fatal";

export interface ExtractionProgress {
  /** Document whose outcome was just drained */
  ref: DocumentRef;
  status: OutcomeStatus;
  total: number;
  completed: number;
  succeeded: number;
  failed: number;
}

export interface ExtractionOptions {
  refs: readonly DocumentRef[];
  concurrency: number;
  extract: ExtractFn;
  writer: RecordSink;
  /** Records per flush */
  flushEvery: number;
  logger: Logger;
  classifier?: FatalErrorClassifier;
  /** Stamp each record with generation_seconds (default true) */
  timed?: boolean;
  onProgress?: (progress: ExtractionProgress) => void;
}

export interface ExtractionSummary {
  dispatched: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  flushes: number;
}

type TaskOutcome =
  | { status: "ok"; ref: DocumentRef; record: DatasetRecord }
  | { status: "failed"; ref: DocumentRef }
  | { status: "cancelled"; ref: DocumentRef }
  | { status: "fatal"; ref: DocumentRef; error: FatalExtractionError };

export function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Extract every document with at most `concurrency` extractions in flight.
 *
 * All tasks are created up front; outcomes are drained in completion order
 * by this function alone, which batches successes into the writer. A fatal
 * error aborts the shared signal before it propagates, so nothing queued
 * starts afterwards. The batch collected so far is flushed and
 * RunAbortedError is thrown. Any other error leaving the drain loop, such
 * as a failed flush, cancels outstanding tasks the same way.
 */
export async function runExtraction(options: ExtractionOptions): Promise<ExtractionSummary> {
  const {
    refs,
    concurrency,
    extract,
    writer,
    flushEvery,
    logger,
    classifier = defaultClassifier,
    timed = true,
    onProgress,
  } = options;

  assertPositiveInteger("concurrency", concurrency);
  assertPositiveInteger("flushEvery", flushEvery);

  const summary: ExtractionSummary = {
    dispatched: refs.length,
    succeeded: 0,
    failed: 0,
    cancelled: 0,
    flushes: 0,
  };
  if (refs.length === 0) return summary;

  const controller = new AbortController();
  const limit = pLimit(concurrency);
  const channel = new AsyncQueue<TaskOutcome>(refs.length);

  const runTask = async (ref: DocumentRef): Promise<TaskOutcome> => {
    if (controller.signal.aborted) return { status: "cancelled", ref };

    const started = performance.now();
    try {
      const extracted = await extract(ref, controller.signal);
      const record: DatasetRecord = { ...extracted, file_name: ref };
      if (timed) {
        record.generation_seconds = Math.round(performance.now() - started) / 1000;
      }
      return { status: "ok", ref, record };
    } catch (error) {
      if (controller.signal.aborted) return { status: "cancelled", ref };
      if (classifier.isFatal(error)) {
        const fatal = new FatalExtractionError(ref, error);
        controller.abort(fatal);
        throw fatal;
      }
      logger.error({ err: error, file_name: ref }, `Extraction failed for ${ref}`);
      return { status: "failed", ref };
    }
  };

  logger.info({ documents: refs.length, concurrency, flushEvery }, "Dispatching extraction tasks");

  const tasks = refs.map((ref) =>
    limit(() => runTask(ref)).then(
      (outcome) => channel.push(outcome),
      (error: unknown) =>
        channel.push({
          status: "fatal",
          ref,
          error: error instanceof FatalExtractionError ? error : new FatalExtractionError(ref, error),
        }),
    ),
  );

  const cancelOutstanding = (reason: unknown) => {
    controller.abort(reason);
    limit.clearQueue();
    channel.close();
  };

  let batch: DatasetRecord[] = [];
  const flush = () => {
    if (batch.length === 0) return;
    writer.flush(batch);
    summary.flushes++;
    batch = [];
  };

  let completed = 0;
  let fatal: FatalExtractionError | null = null;

  try {
    while (completed < refs.length) {
      const outcome = await channel.pop();
      if (outcome === null) break;
      completed++;

      switch (outcome.status) {
        case "ok":
          summary.succeeded++;
          batch.push(outcome.record);
          logger.debug(
            { file_name: outcome.ref, generation_seconds: outcome.record.generation_seconds },
            "Extracted",
          );
          if (batch.length >= flushEvery) flush();
          break;
        case "failed":
          summary.failed++;
          break;
        case "cancelled":
          summary.cancelled++;
          break;
        case "fatal":
          fatal = outcome.error;
          break;
      }

      onProgress?.({
        ref: outcome.ref,
        status: outcome.status,
        total: refs.length,
        completed,
        succeeded: summary.succeeded,
        failed: summary.failed,
      });

      if (fatal) break;
    }

    if (fatal) {
      cancelOutstanding(fatal);
      summary.cancelled = refs.length - summary.succeeded - summary.failed - 1;
      logger.error({ err: fatal, file_name: fatal.ref }, "Fatal error, cancelled outstanding tasks");
      flush();
      throw new RunAbortedError(summary, fatal);
    }

    flush();
  } catch (error) {
    // A failed flush or progress callback ends the run as well
    if (!controller.signal.aborted) {
      cancelOutstanding(error);
      logger.error({ err: error }, "Extraction stopped, cancelled outstanding tasks");
    }
    throw error;
  }

  await Promise.all(tasks);
  logger.info({ ...summary }, "Extraction finished");
  return summary;
}
