import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { existsSync, mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import {
  retrieveBatch,
  submitBatch,
  type BatchClient,
  type BatchJobStatus,
  type BatchResponse,
  type BatchUploadProgress,
} from "../batch";
import { loadExtractorConfig, type ExtractorConfig } from "../config";
import { loadDataset } from "../dataset";
import { BatchError, FatalExtractionError } from "../errors";
import type { PreparedImage } from "../preprocess";

const FIRST = () => new Date(2025, 4, 1, 10, 30, 0);

type UploadParams = Parameters<BatchClient["upload"]>[0];
type CreateParams = Parameters<BatchClient["create"]>[0];

class FakeBatchClient implements BatchClient {
  readonly uploads: { file: string; displayName: string; mimeType: string; bytes: string }[] = [];
  readonly created: CreateParams[] = [];
  readonly fetched: string[] = [];
  readonly failUploads = new Map<string, Error>();
  job: BatchJobStatus = { name: "batches/test-job", state: "JOB_STATE_PENDING" };

  async upload({ file, config }: UploadParams) {
    const error = this.failUploads.get(config.displayName);
    if (error) throw error;
    this.uploads.push({ file, ...config, bytes: readFileSync(file, "utf8") });
    return {
      name: `files/${config.displayName}`,
      uri: `https://files.test/${config.displayName}`,
      mimeType: config.mimeType,
    };
  }

  async create(params: CreateParams) {
    this.created.push(params);
    return { name: "batches/test-job", state: "JOB_STATE_PENDING" };
  }

  async get({ name }: { name: string }) {
    this.fetched.push(name);
    return this.job;
  }
}

const fakePreprocess = async (path: string): Promise<PreparedImage> => ({
  data: Buffer.from(`bytes:${basename(path)}`),
  mimeType: "image/png",
});

const answer = (text: string): BatchResponse => ({
  response: { candidates: [{ content: { parts: [{ text }] } }] },
});

const schema = { type: "object", properties: { name: { type: "string" } } };

describe("batch mode", () => {
  let root: string;
  let runs: string;
  let inputs: string[];
  let client: FakeBatchClient;

  const configure = (env: Record<string, string> = {}): ExtractorConfig =>
    loadExtractorConfig({
      EXTRACT_INPUT_ROOT: root,
      EXTRACT_OUTPUT_ROOT: runs,
      EXTRACT_CONCURRENCY: "2",
      ...env,
    });

  const submit = (config = configure(), onUploaded?: (progress: BatchUploadProgress) => void) =>
    submitBatch(config, {
      client,
      prompt: "Read the page.",
      schema,
      preprocess: fakePreprocess,
      onUploaded,
      now: FIRST,
    });

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "pagesift-batch-in-"));
    runs = await mkdtemp(join(tmpdir(), "pagesift-batch-out-"));
    mkdirSync(join(root, "sub"));
    for (const name of ["a.png", "b.png", "sub/c.png"]) writeFileSync(join(root, name), "");
    inputs = ["a.png", "b.png", "sub/c.png"].map((name) => join(root, name));
    client = new FakeBatchClient();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    rmSync(runs, { recursive: true, force: true });
  });

  describe("submitBatch", () => {
    test("uploads every page and submits them as one job", async () => {
      const report = await submit();

      const runDir = join(runs, "20250501_103000");
      expect(report).toEqual({
        runDir,
        jobName: "batches/test-job",
        state: "JOB_STATE_PENDING",
        submitted: 3,
        failed: 0,
      });

      expect(client.created).toHaveLength(1);
      expect(client.created[0].model).toBe("gemini-2.5-flash");
      expect(client.created[0].config).toEqual({ displayName: "dataset_20250501_103000" });
      expect(client.created[0].src).toHaveLength(3);
      expect(client.created[0].src[0]).toEqual({
        contents: [
          {
            role: "user",
            parts: [
              { fileData: { fileUri: "https://files.test/a", mimeType: "image/png" } },
              { text: "Read the page." },
            ],
          },
        ],
        config: { responseMimeType: "application/json", responseJsonSchema: schema },
      });
    });

    test("records the job and its documents in request order", async () => {
      const report = await submit();

      const metadata: unknown = JSON.parse(
        readFileSync(join(report.runDir, "batch_metadata.json"), "utf8"),
      );
      expect(metadata).toEqual({
        batch_job_name: "batches/test-job",
        submit_time: FIRST().toISOString(),
        model: "gemini-2.5-flash",
        name: "dataset",
        format: "csv",
        file_count: 3,
        files: [
          { file_name: inputs[0], uploaded: "files/a" },
          { file_name: inputs[1], uploaded: "files/b" },
          { file_name: inputs[2], uploaded: "files/c" },
        ],
      });
    });

    test("uploads preprocessed bytes from temporary files it removes", async () => {
      await submit();

      const uploads = [...client.uploads].sort((a, b) => a.displayName.localeCompare(b.displayName));
      expect(uploads.map(({ displayName, mimeType, bytes }) => ({ displayName, mimeType, bytes }))).toEqual([
        { displayName: "a", mimeType: "image/png", bytes: "bytes:a.png" },
        { displayName: "b", mimeType: "image/png", bytes: "bytes:b.png" },
        { displayName: "c", mimeType: "image/png", bytes: "bytes:c.png" },
      ]);
      expect(uploads.some(({ file }) => existsSync(file))).toBe(false);
    });

    test("leaves out documents whose upload failed", async () => {
      client.failUploads.set("b", new Error("upload interrupted"));
      const progress: BatchUploadProgress[] = [];

      const report = await submit(configure(), (event) => progress.push(event));

      expect(report.submitted).toBe(2);
      expect(report.failed).toBe(1);
      expect(client.created[0].src).toHaveLength(2);
      expect(progress).toHaveLength(3);
      expect(progress.filter((event) => !event.ok).map((event) => event.ref)).toEqual([inputs[1]]);

      const metadata: unknown = JSON.parse(
        readFileSync(join(report.runDir, "batch_metadata.json"), "utf8"),
      );
      expect(metadata).toMatchObject({
        file_count: 2,
        files: [
          { file_name: inputs[0], uploaded: "files/a" },
          { file_name: inputs[2], uploaded: "files/c" },
        ],
      });
    });

    test("stops on a fatal upload error and writes an error report", async () => {
      client.failUploads.set("a", new Error("PERMISSION_DENIED: API key not valid"));

      await expect(submit(configure({ EXTRACT_CONCURRENCY: "1" }))).rejects.toBeInstanceOf(
        FatalExtractionError,
      );

      const runDir = join(runs, "20250501_103000");
      expect(client.uploads).toHaveLength(0);
      expect(client.created).toHaveLength(0);
      expect(readdirSync(runDir)).toContain("error_20250501_103000_000.txt");
      expect(existsSync(join(runDir, "batch_metadata.json"))).toBe(false);
    });

    test("refuses to submit an empty batch", async () => {
      for (const name of ["a", "b", "c"]) client.failUploads.set(name, new Error("upload interrupted"));

      await expect(submit()).rejects.toThrow(
        new BatchError("No documents were uploaded, nothing to submit"),
      );
      expect(client.created).toHaveLength(0);
    });
  });

  describe("retrieveBatch", () => {
    test("reports a job that is still running", async () => {
      const { runDir } = await submit();
      client.job = { name: "batches/test-job", state: "JOB_STATE_RUNNING" };

      const report = await retrieveBatch(configure(), { client });

      expect(report).toEqual({
        runDir,
        jobName: "batches/test-job",
        state: "JOB_STATE_RUNNING",
        outcome: "pending",
        written: 0,
        failed: 0,
      });
      expect(client.fetched).toEqual(["batches/test-job"]);
      expect(readdirSync(runDir)).toContain("batch_retrieve.log");
      expect(existsSync(join(runDir, "20250501_103000_dataset.csv"))).toBe(false);
    });

    test("writes the records of a finished job by request order", async () => {
      const { runDir } = await submit();
      client.job = {
        name: "batches/test-job",
        state: "JOB_STATE_SUCCEEDED",
        dest: {
          inlinedResponses: [
            {
              response: {
                candidates: [
                  { content: { parts: [{ text: "thinking", thought: true }, { text: '{"name":"A"}' }] } },
                ],
              },
            },
            { error: { message: "INTERNAL" } },
            answer('{"name":"C"}'),
          ],
        },
      };

      const report = await retrieveBatch(configure(), { client, runDir });

      const datasetPath = join(runDir, "20250501_103000_dataset.csv");
      expect(report).toEqual({
        runDir,
        jobName: "batches/test-job",
        state: "JOB_STATE_SUCCEEDED",
        outcome: "completed",
        datasetPath,
        written: 2,
        failed: 1,
      });

      const dataset = loadDataset(datasetPath);
      expect(dataset.rowCount).toBe(2);
      expect(dataset.identities).toEqual(new Set([inputs[0], inputs[2]]));
    });

    test("counts documents the job returned no answer for as failed", async () => {
      const { runDir } = await submit();
      client.job = {
        name: "batches/test-job",
        state: "JOB_STATE_SUCCEEDED",
        dest: { inlinedResponses: [answer('{"name":"A"}'), answer("not json")] },
      };

      const report = await retrieveBatch(configure(), { client, runDir });

      expect(report.written).toBe(1);
      expect(report.failed).toBe(2);
      expect(loadDataset(join(runDir, "20250501_103000_dataset.csv")).identities).toEqual(
        new Set([inputs[0]]),
      );
    });

    test("writes the results of a run only once", async () => {
      const { runDir } = await submit();
      client.job = {
        name: "batches/test-job",
        state: "JOB_STATE_SUCCEEDED",
        dest: { inlinedResponses: [answer('{"name":"A"}')] },
      };
      await retrieveBatch(configure(), { client, runDir });

      await expect(retrieveBatch(configure(), { client, runDir })).rejects.toThrow(
        `Batch results were already written to ${join(runDir, "20250501_103000_dataset.csv")}`,
      );
      expect(loadDataset(join(runDir, "20250501_103000_dataset.csv")).rowCount).toBe(1);
    });

    test("reports a failed job without writing anything", async () => {
      const { runDir } = await submit();
      client.job = {
        name: "batches/test-job",
        state: "JOB_STATE_FAILED",
        error: { message: "Batch could not be processed" },
      };

      const report = await retrieveBatch(configure(), { client, runDir });

      expect(report.outcome).toBe("failed");
      expect(report.error).toBe("Batch could not be processed");
      expect(report.datasetPath).toBeUndefined();
      expect(existsSync(join(runDir, "20250501_103000_dataset.csv"))).toBe(false);
    });

    test("finds the newest run that holds a batch", async () => {
      const { runDir } = await submit();
      mkdirSync(join(runs, "20250501_110000"));

      const report = await retrieveBatch(configure(), { client });

      expect(report.runDir).toBe(runDir);
    });

    test("rejects a run directory without batch metadata", async () => {
      const dir = join(runs, "20250101_000000");
      mkdirSync(dir);

      await expect(retrieveBatch(configure(), { client, runDir: dir })).rejects.toThrow(
        `No batch_metadata.json in ${dir}, not a batch run`,
      );
      expect(client.fetched).toEqual([]);
    });

    test("rejects an output root without batch runs", async () => {
      await expect(retrieveBatch(configure(), { client })).rejects.toThrow(
        `No batch run under ${runs}`,
      );
    });
  });
});
