import { NodeDirectoryScanner } from "../adapters/node-directory-scanner";
import { NodeSummaryStore } from "../adapters/node-summary-store";
import { SummaryRecorder } from "../services/summary-recorder";
import { devRuntime, exitOnError } from "./runtime";

async function main() {
  const { config, logger, resultsDir } = devRuntime("npm run dev:build-summary -- <results-dir>");

  const recorder = new SummaryRecorder(
    new NodeDirectoryScanner(logger.child("scanner")),
    new NodeSummaryStore({ logger: logger.child("store"), minFreeDiskBytes: config.minFreeDiskBytes }),
    logger
  );

  const file = await recorder.record(resultsDir);
  console.log(file);
}

main().catch(exitOnError);
