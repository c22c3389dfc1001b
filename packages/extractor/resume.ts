import { statSync } from "node:fs";
import type { Logger } from "@pagesift/shared";
import { copyDataset, loadDataset, type DatasetOptions } from "./dataset";
import { buildIdentitySet, identityIds } from "./identity";
import type { DatasetFormat, DocumentRef } from "./types";

export interface ResumeOptions {
  inputs: readonly DocumentRef[];
  /** Dataset of the run being continued */
  datasetPath: string;
  root: string;
  /** Format the new run was configured with; the existing one wins */
  configuredFormat?: DatasetFormat;
  dataset?: DatasetOptions;
  logger?: Logger;
}

export interface ResumePlan {
  /** Inputs not yet in the dataset, in input order */
  pending: DocumentRef[];
  format: DatasetFormat;
  sourcePath: string;
  seededRowCount: number;
  priorIdentities: Set<string>;
  /** Inputs the dataset already covers */
  alreadyCovered: number;
}

export interface Coverage {
  total: number;
  covered: number;
  /** Inputs with no row in the dataset */
  missing: DocumentRef[];
}

/**
 * Work out what a continuation run still has to do.
 */
export function planResume(options: ResumeOptions): ResumePlan {
  const { inputs, datasetPath, root, configuredFormat, logger } = options;
  const existing = loadDataset(datasetPath, undefined, options.dataset);

  if (configuredFormat && configuredFormat !== existing.format) {
    logger?.warn(
      { configured: configuredFormat, existing: existing.format },
      `Continuing a ${existing.format} dataset; ignoring configured ${configuredFormat} output format`,
    );
  }

  const priorIdentities = buildIdentitySet(existing.identities, root);
  const pending = inputs.filter((ref) => !isCovered(ref, root, priorIdentities));
  // Rows for inputs no longer present do not count
  const alreadyCovered = countIntersection(buildIdentitySet(inputs, root), priorIdentities);

  logger?.info(
    {
      source: datasetPath,
      rows: existing.rowCount,
      inputs: inputs.length,
      alreadyCovered,
      pending: pending.length,
    },
    "Planned continuation run",
  );

  return {
    pending,
    format: existing.format,
    sourcePath: datasetPath,
    seededRowCount: existing.rowCount,
    priorIdentities,
    alreadyCovered,
  };
}

/**
 * Copy the prior dataset into the new run's file so appends land after it.
 */
export function seedContinuation(plan: ResumePlan, outputPath: string): { headerWritten: boolean } {
  copyDataset(plan.sourcePath, outputPath);
  return { headerWritten: plan.format === "csv" && statSync(outputPath).size > 0 };
}

/**
 * Re-read a dataset and compare it with the inputs it should cover.
 */
export function measureCoverage(
  inputs: readonly DocumentRef[],
  datasetPath: string,
  root: string,
  format?: DatasetFormat,
  options?: DatasetOptions,
): Coverage {
  const { identities } = loadDataset(datasetPath, format, options);
  const written = buildIdentitySet(identities, root);
  const missing = inputs.filter((ref) => !isCovered(ref, root, written));

  return {
    total: inputs.length,
    covered: countIntersection(buildIdentitySet(inputs, root), written),
    missing,
  };
}

function isCovered(ref: DocumentRef, root: string, known: Set<string>): boolean {
  for (const id of identityIds(ref, root)) {
    if (known.has(id)) return true;
  }
  return false;
}

function countIntersection(a: Set<string>, b: Set<string>): number {
  let count = 0;
  for (const value of a) {
    if (b.has(value)) count++;
  }
  return count;
}
