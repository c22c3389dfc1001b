/**
 * Batch mode: upload every page through the File API and submit one batch
 * job, then collect the job's answers into a dataset in the same run
 * directory once it has finished.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, extname, join, resolve } from "node:path";
import { GoogleGenAI, type InlinedRequest } from "@google/genai";
import { createFileLogger, createLocalStorage } from "@pagesift/shared";
import pLimit from "p-limit";
import { z } from "zod";
import { snapshotConfig, type ExtractorConfig, type ImageSettings } from "./config";
import { datasetExtension } from "./dataset";
import { DatasetWriter } from "./dataset/writer";
import { BatchError, FatalExtractionError } from "./errors";
import { defaultClassifier, type FatalErrorClassifier } from "./fatal";
import { parseRecord } from "./gemini";
import { listInputDocuments } from "./inputs";
import { preprocessImage, type PreparedImage } from "./preprocess";
import { assertPositiveInteger } from "./scheduler";
import type { DatasetRecord, DocumentRef } from "./types";
import { createRun, listRuns, writeError } from "./workspace";

export const BATCH_METADATA_FILE = "batch_metadata.json";
const RETRIEVE_LOG_FILE = "batch_retrieve.log";

const SUCCEEDED_STATES = new Set(["JOB_STATE_SUCCEEDED", "JOB_STATE_PARTIALLY_SUCCEEDED"]);
const FAILED_STATES = new Set(["JOB_STATE_FAILED", "JOB_STATE_CANCELLED", "JOB_STATE_EXPIRED"]);

export interface UploadedFile {
  name?: string;
  uri?: string;
  mimeType?: string;
}

/** One answer of a finished job, in the order its request was submitted */
export interface BatchResponse {
  response?: {
    candidates?: { content?: { parts?: { text?: string; thought?: boolean }[] } }[];
  };
  error?: { message?: string };
}

export interface BatchJobStatus {
  name?: string;
  state?: string;
  error?: { message?: string };
  dest?: { inlinedResponses?: BatchResponse[] };
}

/**
 * The slice of the Gemini client batch mode needs. `createGeminiBatchClient`
 * wraps `GoogleGenAI.files` and `GoogleGenAI.batches`; tests pass a fake.
 */
export interface BatchClient {
  upload(params: {
    file: string;
    config: { mimeType: string; displayName: string };
  }): Promise<UploadedFile>;
  create(params: {
    model: string;
    src: InlinedRequest[];
    config: { displayName: string };
  }): Promise<BatchJobStatus>;
  get(params: { name: string }): Promise<BatchJobStatus>;
}

export function createGeminiBatchClient(apiKey: string): BatchClient {
  const ai = new GoogleGenAI({ apiKey });
  return {
    upload: (params) => ai.files.upload(params),
    create: (params) => ai.batches.create(params),
    get: (params) => ai.batches.get(params),
  };
}

const batchMetadataSchema = z.object({
  batch_job_name: z.string().min(1),
  submit_time: z.string(),
  model: z.string(),
  name: z.string().min(1),
  format: z.enum(["csv", "jsonl"]),
  file_count: z.number().int().nonnegative(),
  /** Submitted documents in request order */
  files: z.array(z.object({ file_name: z.string().min(1), uploaded: z.string() })),
});

export type BatchMetadata = z.infer<typeof batchMetadataSchema>;

export interface BatchSubmitOptions {
  client: BatchClient;
  prompt: string;
  schema: Record<string, unknown>;
  /** Cap on documents submitted */
  limit?: number;
  classifier?: FatalErrorClassifier;
  /** Replaces the sharp pipeline, mainly for tests */
  preprocess?: (path: string, settings: Partial<ImageSettings>) => Promise<PreparedImage>;
  onUploaded?: (progress: BatchUploadProgress) => void;
  now?: () => Date;
}

export interface BatchUploadProgress {
  ref: DocumentRef;
  ok: boolean;
  completed: number;
  total: number;
}

export interface BatchSubmitReport {
  runDir: string;
  jobName: string;
  state: string;
  submitted: number;
  failed: number;
}

interface UploadedPage {
  ref: DocumentRef;
  name: string;
  uri: string;
  mimeType: string;
}

/**
 * Preprocess and upload every input document, then submit them as one
 * batch job. The job is recorded in `batch_metadata.json` inside a new run
 * directory so `retrieveBatch` can find it later.
 */
export async function submitBatch(
  config: ExtractorConfig,
  options: BatchSubmitOptions,
): Promise<BatchSubmitReport> {
  const {
    client,
    prompt,
    schema,
    limit,
    classifier = defaultClassifier,
    preprocess = preprocessImage,
    onUploaded,
    now = () => new Date(),
  } = options;
  const { inputRoot, outputRoot } = config.storage;
  const { concurrency, runName, outputFormat } = config.extract;

  assertPositiveInteger("concurrency", concurrency);
  if (limit !== undefined) assertPositiveInteger("limit", limit);

  const found = await listInputDocuments(
    createLocalStorage(inputRoot),
    inputRoot,
    config.extract.extensions,
  );
  const inputs = limit !== undefined ? found.slice(0, limit) : found;

  const workspace = await createRun(outputRoot, {
    name: runName,
    config: snapshotConfig(config),
    schema,
    now,
  });
  const { logger } = workspace;
  workspace.log(`Preparing batch of ${inputs.length} input documents`);

  try {
    const uploadLimit = pLimit(concurrency);
    let completed = 0;

    const uploads = await Promise.all(
      inputs.map((ref) =>
        uploadLimit(async (): Promise<UploadedPage | null> => {
          let page: UploadedPage | null = null;
          try {
            page = await uploadPage(client, ref, config.image, preprocess);
            logger.debug({ file_name: ref, uploaded: page.name }, "Uploaded");
          } catch (error) {
            if (classifier.isFatal(error)) {
              uploadLimit.clearQueue();
              throw new FatalExtractionError(ref, error);
            }
            logger.error({ err: error, file_name: ref }, `Upload failed for ${ref}`);
          }
          completed++;
          onUploaded?.({ ref, ok: page !== null, completed, total: inputs.length });
          return page;
        }),
      ),
    );

    const pages = uploads.filter((page): page is UploadedPage => page !== null);
    if (pages.length === 0) {
      throw new BatchError("No documents were uploaded, nothing to submit");
    }

    const job = await client.create({
      model: config.gemini.model,
      src: pages.map((page) => toRequest(page, prompt, schema)),
      config: { displayName: `${runName}_${workspace.id}` },
    });
    if (!job.name) throw new BatchError("Batch job was created without a name");

    const metadata: BatchMetadata = {
      batch_job_name: job.name,
      submit_time: now().toISOString(),
      model: config.gemini.model,
      name: runName,
      format: outputFormat,
      file_count: pages.length,
      files: pages.map((page) => ({ file_name: page.ref, uploaded: page.name })),
    };
    await workspace.storage.write(BATCH_METADATA_FILE, `${JSON.stringify(metadata, null, 2)}\n`);

    const state = job.state ?? "JOB_STATE_UNSPECIFIED";
    workspace.log(`Submitted batch job ${job.name} (${state}) with ${pages.length} documents`);

    return {
      runDir: workspace.dir,
      jobName: job.name,
      state,
      submitted: pages.length,
      failed: inputs.length - pages.length,
    };
  } catch (error) {
    const reportPath = await writeError(workspace, error, now);
    workspace.log(`Batch submission failed, error report written to ${reportPath}`, error);
    throw error;
  }
}

async function uploadPage(
  client: BatchClient,
  ref: DocumentRef,
  image: ImageSettings,
  preprocess: NonNullable<BatchSubmitOptions["preprocess"]>,
): Promise<UploadedPage> {
  const { data, mimeType } = await preprocess(ref, image);
  const stem = basename(ref, extname(ref));
  const dir = await mkdtemp(join(tmpdir(), "pagesift-upload-"));

  try {
    const path = join(dir, `${stem}.${image.outputFormat}`);
    await writeFile(path, data);
    const file = await client.upload({ file: path, config: { mimeType, displayName: stem } });
    if (!file.uri) throw new BatchError("Upload returned no file URI");
    return { ref, name: file.name ?? "", uri: file.uri, mimeType: file.mimeType ?? mimeType };
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

function toRequest(page: UploadedPage, prompt: string, schema: Record<string, unknown>): InlinedRequest {
  return {
    contents: [
      {
        role: "user",
        parts: [{ fileData: { fileUri: page.uri, mimeType: page.mimeType } }, { text: prompt }],
      },
    ],
    config: {
      responseMimeType: "application/json",
      responseJsonSchema: schema,
    },
  };
}

export interface BatchRun {
  id: string;
  dir: string;
  metadata: BatchMetadata;
}

/**
 * Read the batch metadata of a run directory.
 */
export async function loadBatchRun(dir: string): Promise<BatchRun> {
  const storage = createLocalStorage(dir);
  const content = await storage.read(BATCH_METADATA_FILE);
  if (content === null) {
    throw new BatchError(`No ${BATCH_METADATA_FILE} in ${storage.basePath}, not a batch run`);
  }

  let value: unknown;
  try {
    value = JSON.parse(new TextDecoder().decode(content));
  } catch (err) {
    throw new BatchError(`${BATCH_METADATA_FILE} is not valid JSON in ${storage.basePath}`, {
      cause: err,
    });
  }

  const parsed = batchMetadataSchema.safeParse(value);
  if (!parsed.success) {
    throw new BatchError(`${BATCH_METADATA_FILE} is malformed in ${storage.basePath}`, {
      cause: parsed.error,
    });
  }
  return { id: basename(storage.basePath), dir: storage.basePath, metadata: parsed.data };
}

/**
 * The newest run under root that holds a submitted batch.
 */
export async function findLatestBatchRun(root: string): Promise<BatchRun> {
  for (const run of await listRuns(root)) {
    if (await createLocalStorage(run.dir).exists(BATCH_METADATA_FILE)) {
      return loadBatchRun(run.dir);
    }
  }
  throw new BatchError(`No batch run under ${resolve(root)}`);
}

export type BatchOutcome = "completed" | "pending" | "failed";

export interface BatchRetrieveOptions {
  client: BatchClient;
  /** Run directory of the submission, the newest batch run when omitted */
  runDir?: string;
}

export interface BatchRetrieveReport {
  runDir: string;
  jobName: string;
  state: string;
  outcome: BatchOutcome;
  /** Set once records were written */
  datasetPath?: string;
  written: number;
  failed: number;
  /** Job-level failure message */
  error?: string;
}

/**
 * Check a submitted batch job and, when it has finished, write its records
 * to the run's dataset. Each run's results are written once.
 */
export async function retrieveBatch(
  config: ExtractorConfig,
  options: BatchRetrieveOptions,
): Promise<BatchRetrieveReport> {
  const { client } = options;
  const run = options.runDir
    ? await loadBatchRun(resolve(options.runDir))
    : await findLatestBatchRun(config.storage.outputRoot);
  const { metadata } = run;
  const jobName = metadata.batch_job_name;

  const logger = createFileLogger(join(run.dir, RETRIEVE_LOG_FILE), { run: run.id });
  logger.info({ job: jobName }, "Checking batch job");

  try {
    const job = await client.get({ name: jobName });
    const state = job.state ?? "JOB_STATE_UNSPECIFIED";
    const report: BatchRetrieveReport = {
      runDir: run.dir,
      jobName,
      state,
      outcome: "pending",
      written: 0,
      failed: 0,
    };

    if (FAILED_STATES.has(state)) {
      report.outcome = "failed";
      report.error = job.error?.message;
      logger.error({ state, error: report.error }, "Batch job did not finish");
      return report;
    }
    if (!SUCCEEDED_STATES.has(state)) {
      logger.info({ state }, "Batch job is still processing");
      return report;
    }

    report.outcome = "completed";
    const datasetFile = `${run.id}_${metadata.name}${datasetExtension(metadata.format)}`;
    const storage = createLocalStorage(run.dir);
    if (await storage.exists(datasetFile)) {
      throw new BatchError(`Batch results were already written to ${storage.resolve(datasetFile)}`);
    }

    const responses = job.dest?.inlinedResponses ?? [];
    if (responses.length !== metadata.files.length) {
      logger.warn(
        { submitted: metadata.files.length, received: responses.length },
        "Batch returned a different number of responses than documents submitted",
      );
    }

    const records: DatasetRecord[] = [];
    metadata.files.forEach(({ file_name: ref }, index) => {
      const item = responses[index];
      try {
        if (!item) throw new BatchError("No response");
        if (item.error) throw new BatchError(item.error.message ?? "Request failed");
        records.push({ ...parseRecord(ref, responseText(item)), file_name: ref });
      } catch (error) {
        logger.error({ err: error, file_name: ref }, `No record for ${ref}`);
      }
    });
    report.failed = metadata.files.length - records.length;

    if (records.length === 0) {
      logger.warn("Batch job finished without any usable records");
      return report;
    }

    const datasetPath = storage.resolve(datasetFile);
    const writer = new DatasetWriter(datasetPath, metadata.format, {
      delimiter: config.extract.delimiter,
      logger,
    });
    const { flushEvery } = config.extract;
    for (let start = 0; start < records.length; start += flushEvery) {
      writer.flush(records.slice(start, start + flushEvery));
    }

    report.datasetPath = datasetPath;
    report.written = records.length;
    logger.info({ written: records.length, failed: report.failed }, "Batch results written");
    return report;
  } catch (error) {
    logger.error({ err: error }, "Batch retrieval failed");
    throw error;
  }
}

function responseText(item: BatchResponse): string | undefined {
  const parts = item.response?.candidates?.[0]?.content?.parts ?? [];
  const text = parts
    .filter((part) => !part.thought)
    .map((part) => part.text ?? "")
    .join("");
  return text || undefined;
}
