import { resolve } from "node:path";
import {
  createLocalStorage,
  blank,
  header,
  keyValue,
  logWarning,
  section,
} from "@pagesift/shared";
import {
  findLatestRun,
  listInputDocuments,
  loadDataset,
  loadExtractorConfig,
  measureCoverage,
} from "@pagesift/extractor";
import { parseFlags } from "../flags";

export async function runStatus(args: string[]) {
  const flags = parseFlags(args);
  const config = loadExtractorConfig();
  const { inputRoot, outputRoot } = config.storage;
  const { delimiter, extensions } = config.extract;

  header();

  const inputs = await listInputDocuments(createLocalStorage(inputRoot), inputRoot, extensions);
  section("Inputs");
  keyValue("root", resolve(inputRoot));
  keyValue("documents", inputs.length);
  blank();

  const latest = await findLatestRun(outputRoot);
  section("Latest run");
  if (!latest?.datasetPath) {
    keyValue("runs", resolve(outputRoot));
    logWarning("No run with a dataset yet");
    return;
  }

  const dataset = loadDataset(latest.datasetPath, undefined, { delimiter });
  const coverage = measureCoverage(inputs, latest.datasetPath, inputRoot, dataset.format, {
    delimiter,
  });

  keyValue("run", latest.id);
  keyValue("dataset", latest.datasetPath);
  keyValue("rows", dataset.rowCount);
  keyValue("covered", `${coverage.covered}/${coverage.total}`);
  keyValue("remaining", coverage.missing.length);

  if (flags.verbose) {
    blank();
    for (const missing of coverage.missing) {
      console.log(`  ${missing}`);
    }
  }
}
