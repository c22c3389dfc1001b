import { readdirSync } from "node:fs";
import { loadDataset, listRuns, loadExtractorConfig } from "@pagesift/extractor";
import { blank, header, keyValue, section } from "@pagesift/shared";

export async function runRuns(_args: string[]) {
  const config = loadExtractorConfig();
  const runs = await listRuns(config.storage.outputRoot);

  header();
  section(`Runs in ${config.storage.outputRoot}`);
  blank();

  if (runs.length === 0) {
    console.log("  (none)");
    return;
  }

  for (const run of runs) {
    if (!run.datasetPath) {
      keyValue(run.id, "no dataset");
      continue;
    }
    const { rowCount } = loadDataset(run.datasetPath, undefined, {
      delimiter: config.extract.delimiter,
    });
    const errors = countErrorReports(run.dir);
    keyValue(run.id, `${rowCount} rows${errors > 0 ? `, ${errors} error report(s)` : ""}`);
  }
}

function countErrorReports(dir: string): number {
  return readdirSync(dir).filter((name) => /^error_.*\.txt$/.test(name)).length;
}
