import { existsSync, readdirSync, statSync } from "node:fs";
import { join } from "node:path";
import {
  createGeminiExtractor,
  createGeminiGenerator,
  findLatestRun,
  hasGeminiCredentials,
  isDatasetFile,
  isDatasetFormat,
  loadExtractorConfig,
  loadPrompt,
  loadSchema,
  processDirectory,
  ConfigError,
  RunAbortedError,
  DatasetNotFoundError,
  type ExtractionProgress,
  type ExtractorConfig,
} from "@pagesift/extractor";
import {
  blank,
  formatDuration,
  formatProgress,
  header,
  keyValue,
  logError,
  logWarning,
  section,
  writeMultiLineProgress,
} from "@pagesift/shared";
import { parseFlags, type ParsedFlags } from "../flags";

const HELP = `
pagesift extract - Extract structured records from page images

Usage
  pagesift extract [options]

Every image under the input root is sent to the model with the configured
prompt and JSON Schema. Records are appended to a dataset in a new run
directory under the output root.

Options
  --continue, -c [path]   Continue a dataset: a dataset file, a run directory,
                          or "latest" (default when no path is given).
                          Documents already in it are skipped.
  --workers, -w <n>       Extractions in flight (default: 8)
  --flush, -f <n>         Records per write to the dataset (default: 25)
  --format <csv|jsonl>    Dataset format for new datasets (default: csv)
  --limit, -l <n>         Extract at most n documents
  --verbose, -v           Check which inputs are missing from the dataset at the end
  --help, -h              Show this help

Environment Variables
  GEMINI_API_KEY          Gemini API key (required)
  EXTRACT_MODEL           Model name (default: gemini-2.5-flash)
  EXTRACT_INPUT_ROOT      Folder of page images (default: ./data)
  EXTRACT_OUTPUT_ROOT     Folder run directories are created in (default: ./runs)
  EXTRACT_RUN_NAME        Dataset file stem (default: dataset)
  EXTRACT_OUTPUT_FORMAT   csv or jsonl (default: csv)
  EXTRACT_DELIMITER       csv field delimiter (default: $)
  EXTRACT_CONCURRENCY     Worker count (default: 8)
  EXTRACT_FLUSH_EVERY     Records per flush (default: 25)
  EXTRACT_EXTENSIONS      Input extensions (default: .png,.jpg,.jpeg,.tif,.tiff,.webp)
  EXTRACT_SCHEMA_PATH     JSON Schema for records (default: schemas/journal.schema.json)
  EXTRACT_PROMPT_PATH     Prompt text (default: prompts/journal.txt)
  IMAGE_MAX_DIM           Longest image side in pixels (default: 3000)
  IMAGE_MARGINS           Crop left,top,right,bottom in pixels (default: 0,0,0,0)
  IMAGE_CONTRAST          Contrast factor (default: 1)
  IMAGE_FORMAT            png, jpeg, webp or tiff (default: png)

Examples
  npm run extract                         # Extract everything under ./data
  npm run extract -- -w 4 --format jsonl  # 4 workers, jsonl output
  npm run extract -- --continue           # Pick up where the latest run stopped
  npm run extract -- -c runs/20250501_103000/20250501_103000_dataset.csv
`;

/**
 * Apply command-line overrides on top of the environment configuration.
 */
export function applyFlags(config: ExtractorConfig, flags: ParsedFlags): ExtractorConfig {
  let outputFormat = config.extract.outputFormat;
  if (flags.format !== undefined) {
    if (!isDatasetFormat(flags.format)) {
      throw new ConfigError(`Unknown dataset format: ${flags.format} (expected csv or jsonl)`);
    }
    outputFormat = flags.format;
  }

  return {
    ...config,
    extract: {
      ...config.extract,
      outputFormat,
      concurrency: flags.workers ?? config.extract.concurrency,
      flushEvery: flags.flushEvery ?? config.extract.flushEvery,
    },
  };
}

/**
 * Turn a --continue target into a dataset path.
 */
export async function resolveContinuation(target: string, outputRoot: string): Promise<string> {
  if (target === "latest") {
    const latest = await findLatestRun(outputRoot);
    if (!latest?.datasetPath) {
      throw new ConfigError(`No run with a dataset under ${outputRoot}`);
    }
    return latest.datasetPath;
  }

  if (existsSync(target) && statSync(target).isDirectory()) {
    const dataset = readdirSync(target).sort().find((file) => isDatasetFile(file));
    if (!dataset) throw new DatasetNotFoundError(target);
    return join(target, dataset);
  }

  return target;
}

export async function runExtract(args: string[]) {
  const flags = parseFlags(args);
  if (flags.help) {
    console.log(HELP);
    return;
  }

  const config = applyFlags(loadExtractorConfig(), flags);
  if (!hasGeminiCredentials(config)) {
    throw new ConfigError("GEMINI_API_KEY environment variable is required");
  }

  const continueFrom =
    flags.continueFrom !== undefined
      ? await resolveContinuation(flags.continueFrom, config.storage.outputRoot)
      : undefined;

  const [schema, prompt] = await Promise.all([
    loadSchema(config.extract.schemaPath),
    loadPrompt(config.extract.promptPath),
  ]);

  const extract = createGeminiExtractor({
    generator: createGeminiGenerator(config.gemini.apiKey),
    model: config.gemini.model,
    prompt,
    schema,
    image: config.image,
  });

  header();
  section("Extraction");
  keyValue("Model", config.gemini.model);
  keyValue("Input", config.storage.inputRoot);
  keyValue("Output", config.storage.outputRoot);
  keyValue("Workers", config.extract.concurrency);
  keyValue("Flush every", config.extract.flushEvery);
  if (continueFrom) keyValue("Continuing", continueFrom);
  if (flags.limit !== undefined) keyValue("Limit", flags.limit);
  blank();

  // Progress tracking
  const startTime = Date.now();
  let latest: ExtractionProgress | null = null;
  let prevLineCount = 0;

  const updateProgress = () => {
    if (!latest) return;
    const elapsedMs = Date.now() - startTime;
    const lines = formatProgress({
      saved: latest.succeeded,
      total: latest.total,
      docsPerSec: elapsedMs > 0 ? latest.completed / (elapsedMs / 1000) : 0,
      failed: latest.failed > 0 ? latest.failed : undefined,
      elapsedMs,
    });
    prevLineCount = writeMultiLineProgress(lines, prevLineCount);
  };

  let progressInterval: NodeJS.Timeout | undefined;

  try {
    const report = await processDirectory(config, {
      extract,
      continueFrom,
      verbose: flags.verbose,
      limit: flags.limit,
      schema,
      onStart: (run) => {
        keyValue("Run", run.workspace.dir);
        keyValue("Dataset", run.datasetPath);
        keyValue("Documents", run.inputs);
        if (run.alreadyCovered > 0) keyValue("Already done", run.alreadyCovered);
        keyValue("Pending", run.pending);
        blank();
        if (!flags.verbose) progressInterval = setInterval(updateProgress, 100);
      },
      onProgress: (progress) => {
        latest = progress;
        if (flags.verbose) logOutcome(progress);
      },
    });

    clearInterval(progressInterval);
    if (!flags.verbose) updateProgress();
    blank();

    section("Done");
    keyValue("Written", report.summary.succeeded);
    keyValue("Failed", report.summary.failed);
    keyValue("Flushes", report.summary.flushes);
    keyValue("Duration", formatDuration(Date.now() - startTime));
    keyValue("Dataset", report.datasetPath);

    if (report.coverage) {
      blank();
      section("Coverage");
      keyValue("Inputs", report.coverage.total);
      keyValue("In dataset", report.coverage.covered);
      for (const missing of report.coverage.missing.slice(0, 20)) {
        logWarning(`Missing: ${missing}`);
      }
      if (report.coverage.missing.length > 20) {
        logWarning(`... and ${report.coverage.missing.length - 20} more`);
      }
    }
  } catch (err) {
    clearInterval(progressInterval);
    if (err instanceof RunAbortedError) {
      if (!flags.verbose) updateProgress();
      blank();
      logWarning(
        `Stopped early: ${err.summary.succeeded} written, ${err.summary.cancelled} cancelled. ` +
          "Re-run with --continue to pick up the rest.",
      );
    }
    throw err;
  }
}

function logOutcome({ ref, status, completed, total }: ExtractionProgress) {
  const counter = `[${completed}/${total}]`;
  switch (status) {
    case "ok":
      console.log(`  ${counter} Extracted: ${ref}`);
      break;
    case "failed":
      logError(`${counter} Failed: ${ref} (see run.log)`);
      break;
    case "cancelled":
      logWarning(`${counter} Cancelled: ${ref}`);
      break;
    case "fatal":
      logError(`${counter} Fatal: ${ref}`);
      break;
  }
}
