import type { Dirent } from "node:fs";
import { mkdir, readdir } from "node:fs/promises";
import { join, resolve } from "node:path";
import {
  createFileLogger,
  createLocalStorage,
  formatErrorChain,
  type Logger,
  type Storage,
} from "@pagesift/shared";
import { datasetExtension, isDatasetFile } from "./dataset";
import { WorkspaceExistsError } from "./errors";
import type { DatasetFormat } from "./types";

const LOG_FILE = "run.log";
const METADATA_FILE = "metadata.json";
const CONFIG_SNAPSHOT_FILE = "config_snapshot.json";

export interface RunWorkspace {
  /** Timestamp the directory is named after, e.g. 20250501_103000 */
  readonly id: string;
  readonly dir: string;
  readonly name: string;
  readonly createdAt: Date;
  readonly logPath: string;
  readonly logger: Logger;
  readonly storage: Storage;

  datasetPath(format: DatasetFormat): string;

  /** Append a timestamped line; an attached error adds its cause chain */
  log(message: string, error?: unknown): void;
}

export interface CreateRunOptions {
  /** Dataset file stem */
  name?: string;
  config?: Record<string, unknown>;
  schema?: unknown;
  now?: () => Date;
}

export interface RunInfo {
  id: string;
  dir: string;
  /** Dataset file in the run, null when the run wrote none */
  datasetPath: string | null;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Local-time timestamp, YYYYMMDD_HHMMSS (with _mmm when millis is set).
 */
export function formatTimestamp(date: Date, millis = false): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return millis ? `${day}_${time}_${pad(date.getMilliseconds(), 3)}` : `${day}_${time}`;
}

/**
 * Allocate a fresh run directory under root and record what the run was
 * started with. Two runs in the same second collide and the second fails.
 */
export async function createRun(root: string, options: CreateRunOptions = {}): Promise<RunWorkspace> {
  const { name = "dataset", config = {}, schema = null, now = () => new Date() } = options;
  const createdAt = now();
  const id = formatTimestamp(createdAt);
  const dir = join(resolve(root), id);

  await mkdir(resolve(root), { recursive: true });
  try {
    await mkdir(dir);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EEXIST") {
      throw new WorkspaceExistsError(dir, { cause: err });
    }
    throw err;
  }

  const storage = createLocalStorage(dir);
  await storage.write(CONFIG_SNAPSHOT_FILE, `${JSON.stringify(config, null, 2)}\n`);
  await storage.write(
    METADATA_FILE,
    `${JSON.stringify({ run_id: id, name, created_at: createdAt.toISOString(), schema, config }, null, 2)}\n`,
  );

  const logPath = join(dir, LOG_FILE);
  const logger = createFileLogger(logPath, { run: id });

  return {
    id,
    dir,
    name,
    createdAt,
    logPath,
    logger,
    storage,
    datasetPath: (format) => join(dir, `${id}_${name}${datasetExtension(format)}`),
    log(message, error) {
      if (error === undefined) {
        logger.info(message);
      } else {
        logger.error({ err: error }, message);
      }
    },
  };
}

/**
 * Persist a standalone report for an error that ended the run.
 */
export async function writeError(
  workspace: RunWorkspace,
  error: unknown,
  now: () => Date = () => new Date(),
): Promise<string> {
  const at = now();
  const key = `error_${formatTimestamp(at, true)}.txt`;
  await workspace.storage.write(key, `${at.toISOString()}\n\n${formatErrorChain(error)}\n`);
  return workspace.storage.resolve(key);
}

/**
 * Run directories under root, newest first.
 */
export async function listRuns(root: string): Promise<RunInfo[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(resolve(root), { withFileTypes: true });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }

  const dirs = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort()
    .reverse();

  const runs: RunInfo[] = [];
  for (const id of dirs) {
    const dir = join(resolve(root), id);
    const files = (await readdir(dir)).sort();
    const dataset = files.find((file) => isDatasetFile(file));
    runs.push({ id, dir, datasetPath: dataset ? join(dir, dataset) : null });
  }
  return runs;
}

/**
 * The most recent run that contains a dataset, or null.
 */
export async function findLatestRun(root: string): Promise<RunInfo | null> {
  const runs = await listRuns(root);
  return runs.find((run) => run.datasetPath !== null) ?? null;
}
