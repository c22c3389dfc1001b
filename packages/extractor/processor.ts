import { existsSync } from "node:fs";
import { createLocalStorage } from "@pagesift/shared";
import { snapshotConfig, type ExtractorConfig } from "./config";
import { inferFormat } from "./dataset";
import { DatasetWriter } from "./dataset/writer";
import { DatasetNotFoundError } from "./errors";
import type { FatalErrorClassifier } from "./fatal";
import { listInputDocuments } from "./inputs";
import { measureCoverage, planResume, seedContinuation, type Coverage } from "./resume";
import {
  assertPositiveInteger,
  runExtraction,
  type ExtractionProgress,
  type ExtractionSummary,
} from "./scheduler";
import type { DatasetFormat, DocumentRef, ExtractFn } from "./types";
import { createRun, writeError, type RunWorkspace } from "./workspace";

export interface ProcessOptions {
  extract: ExtractFn;
  /** Dataset of an earlier run to continue */
  continueFrom?: string;
  /** Check coverage of the written dataset at the end */
  verbose?: boolean;
  /** Cap on documents dispatched by this run */
  limit?: number;
  /** JSON Schema recorded in the run metadata */
  schema?: unknown;
  classifier?: FatalErrorClassifier;
  onStart?: (run: RunStart) => void;
  onProgress?: (progress: ExtractionProgress) => void;
  now?: () => Date;
}

export interface RunStart {
  workspace: RunWorkspace;
  datasetPath: string;
  format: DatasetFormat;
  inputs: number;
  alreadyCovered: number;
  pending: number;
}

export interface RunReport {
  runDir: string;
  datasetPath: string;
  format: DatasetFormat;
  inputs: number;
  alreadyCovered: number;
  seededRowCount: number;
  summary: ExtractionSummary;
  coverage?: Coverage;
}

/**
 * Extract every input document under the configured root into a new run
 * workspace, optionally continuing an earlier dataset. A run that fails
 * leaves an error report in its workspace and rethrows.
 */
export async function processDirectory(
  config: ExtractorConfig,
  options: ProcessOptions,
): Promise<RunReport> {
  const { extract, continueFrom, verbose = false, limit, schema = null, classifier, now } = options;
  const { inputRoot, outputRoot } = config.storage;
  const { concurrency, flushEvery, delimiter, runName } = config.extract;

  assertPositiveInteger("concurrency", concurrency);
  assertPositiveInteger("flushEvery", flushEvery);
  if (limit !== undefined) assertPositiveInteger("limit", limit);
  if (continueFrom) {
    inferFormat(continueFrom);
    if (!existsSync(continueFrom)) throw new DatasetNotFoundError(continueFrom);
  }

  const inputs = await listInputDocuments(
    createLocalStorage(inputRoot),
    inputRoot,
    config.extract.extensions,
  );

  const workspace = await createRun(outputRoot, {
    name: runName,
    config: snapshotConfig(config),
    schema,
    now,
  });
  const { logger } = workspace;
  workspace.log(`Started run ${workspace.id} with ${inputs.length} input documents`);

  try {
    let format = config.extract.outputFormat;
    let pending: DocumentRef[] = inputs;
    let headerWritten = false;
    let alreadyCovered = 0;
    let seededRowCount = 0;

    if (continueFrom) {
      const plan = planResume({
        inputs,
        datasetPath: continueFrom,
        root: inputRoot,
        configuredFormat: format,
        dataset: { delimiter },
        logger,
      });
      format = plan.format;
      pending = plan.pending;
      alreadyCovered = plan.alreadyCovered;
      seededRowCount = plan.seededRowCount;
      ({ headerWritten } = seedContinuation(plan, workspace.datasetPath(format)));
      workspace.log(
        `Continuing ${continueFrom}: ${alreadyCovered} of ${inputs.length} documents already covered`,
      );
    }

    if (limit !== undefined && pending.length > limit) {
      pending = pending.slice(0, limit);
    }

    const datasetPath = workspace.datasetPath(format);
    options.onStart?.({
      workspace,
      datasetPath,
      format,
      inputs: inputs.length,
      alreadyCovered,
      pending: pending.length,
    });

    const writer = new DatasetWriter(datasetPath, format, { headerWritten, delimiter, logger });
    const summary = await runExtraction({
      refs: pending,
      concurrency,
      extract,
      writer,
      flushEvery,
      logger,
      classifier,
      onProgress: options.onProgress,
    });

    const report: RunReport = {
      runDir: workspace.dir,
      datasetPath,
      format,
      inputs: inputs.length,
      alreadyCovered,
      seededRowCount,
      summary,
    };

    if (verbose) {
      report.coverage = existsSync(datasetPath)
        ? measureCoverage(inputs, datasetPath, inputRoot, format, { delimiter })
        : { total: inputs.length, covered: 0, missing: [...inputs] };

      if (report.coverage.missing.length > 0) {
        logger.warn(
          { missing: report.coverage.missing.length, sample: report.coverage.missing.slice(0, 20) },
          "Some input documents are not in the dataset",
        );
      }
    }

    workspace.log(`Finished run ${workspace.id}: ${summary.succeeded} records written`);
    return report;
  } catch (error) {
    const reportPath = await writeError(workspace, error, now);
    workspace.log(`Run failed, error report written to ${reportPath}`, error);
    throw error;
  }
}
