import {
  createGeminiBatchClient,
  hasGeminiCredentials,
  loadExtractorConfig,
  loadPrompt,
  loadSchema,
  retrieveBatch,
  submitBatch,
  ConfigError,
  type ExtractorConfig,
} from "@pagesift/extractor";
import {
  blank,
  header,
  keyValue,
  logError,
  logWarning,
  progressBar,
  section,
} from "@pagesift/shared";
import { parseFlags } from "../flags";

const SUBMIT_HELP = `
pagesift batch-submit - Submit every page as one Gemini batch job

Usage
  pagesift batch-submit [options]

Pages are preprocessed, uploaded through the File API and submitted as a
single batch job. The job is recorded in batch_metadata.json inside a new
run directory; collect the results later with batch-retrieve.

Options
  --limit, -l <n>   Submit at most n documents
  --help, -h        Show this help

Uses the same environment variables as "pagesift extract".
`;

const RETRIEVE_HELP = `
pagesift batch-retrieve - Collect the results of a submitted batch job

Usage
  pagesift batch-retrieve [run-dir]

Checks the job recorded in run-dir (default: the newest batch run under the
output root). A finished job's records are written to the run's dataset;
a job still running can be checked again later.

Options
  --help, -h   Show this help
`;

function requireCredentials(config: ExtractorConfig) {
  if (!hasGeminiCredentials(config)) {
    throw new ConfigError("GEMINI_API_KEY environment variable is required");
  }
}

export async function runBatchSubmit(args: string[]) {
  const flags = parseFlags(args);
  if (flags.help) {
    console.log(SUBMIT_HELP);
    return;
  }

  const config = loadExtractorConfig();
  requireCredentials(config);

  const [schema, prompt] = await Promise.all([
    loadSchema(config.extract.schemaPath),
    loadPrompt(config.extract.promptPath),
  ]);

  header();
  section("Batch submit");
  keyValue("Model", config.gemini.model);
  keyValue("Input", config.storage.inputRoot);
  keyValue("Output", config.storage.outputRoot);
  if (flags.limit !== undefined) keyValue("Limit", flags.limit);
  blank();

  const report = await submitBatch(config, {
    client: createGeminiBatchClient(config.gemini.apiKey),
    prompt,
    schema,
    limit: flags.limit,
    onUploaded: ({ ref, ok, completed, total }) => {
      if (!ok) logError(`Upload failed: ${ref} (see run.log)`);
      process.stdout.write(`\r  Uploading ${progressBar(completed, total)} ${completed}/${total}`);
    },
  });
  blank();
  blank();

  section("Submitted");
  keyValue("Job", report.jobName);
  keyValue("State", report.state);
  keyValue("Documents", report.submitted);
  if (report.failed > 0) keyValue("Upload failures", report.failed);
  keyValue("Run", report.runDir);
  blank();
  console.log("  Check on it with: npm run batch-retrieve");
}

export async function runBatchRetrieve(args: string[]) {
  const flags = parseFlags(args);
  if (flags.help) {
    console.log(RETRIEVE_HELP);
    return;
  }
  const runDir = args.find((arg) => !arg.startsWith("-"));

  const config = loadExtractorConfig();
  requireCredentials(config);

  header();
  const report = await retrieveBatch(config, {
    client: createGeminiBatchClient(config.gemini.apiKey),
    runDir,
  });

  section("Batch job");
  keyValue("Job", report.jobName);
  keyValue("State", report.state);
  keyValue("Run", report.runDir);
  blank();

  switch (report.outcome) {
    case "pending":
      logWarning("Job is still processing, try again later");
      break;
    case "failed":
      logError(`Job did not finish: ${report.error ?? report.state}`);
      process.exitCode = 1;
      break;
    case "completed":
      section("Done");
      keyValue("Written", report.written);
      keyValue("Failed", report.failed);
      if (report.datasetPath) keyValue("Dataset", report.datasetPath);
      else logWarning("No usable records in the job's results (see batch_retrieve.log)");
      break;
  }
}
