import { config as loadEnv } from "dotenv";
import { PagesiftError } from "@pagesift/extractor";
import { logError } from "@pagesift/shared";
import { runBatchRetrieve, runBatchSubmit } from "./commands/batch";
import { runExtract } from "./commands/extract";
import { runRuns } from "./commands/runs";
import { runStatus } from "./commands/status";

const HELP = `
pagesift - Extract structured datasets from scanned pages

Usage
  pagesift <command> [options]

Commands
  extract          Extract records from the input images into a new run
  status           Show how much of the input the latest dataset covers
  runs             List run directories
  batch-submit     Upload every page and submit one Gemini batch job
  batch-retrieve   Write the results of a finished batch job to its run

Run "pagesift <command> --help" for command options.

Examples
  npm run extract
  npm run extract -- --continue
  npm run status -- -v
  npm run batch-submit -- --limit 100
  npm run batch-retrieve
`;

async function main() {
  loadEnv();

  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    console.log(HELP);
    return;
  }

  switch (command) {
    case "extract":
      await runExtract(args.slice(1));
      break;
    case "status":
      await runStatus(args.slice(1));
      break;
    case "runs":
      await runRuns(args.slice(1));
      break;
    case "batch-submit":
      await runBatchSubmit(args.slice(1));
      break;
    case "batch-retrieve":
      await runBatchRetrieve(args.slice(1));
      break;
    default:
      logError(`Unknown command: ${command}`);
      console.log(HELP);
      process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  if (err instanceof PagesiftError) {
    logError(err.message);
  } else {
    console.error("Fatal error:", err);
  }
  process.exitCode = 1;
});
