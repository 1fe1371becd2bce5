import { ChokidarFileWatcher } from "../adapters/chokidar-file-watcher";
import { NodeDirectoryScanner } from "../adapters/node-directory-scanner";
import { NodeSummaryStore } from "../adapters/node-summary-store";
import { SummaryRecorder } from "../services/summary-recorder";
import { SummaryWatcher } from "../services/summary-watcher";
import { devRuntime, exitOnError } from "./runtime";

async function main() {
  const { config, logger, resultsDir } = devRuntime("npm run dev:watch -- <results-dir>");

  const recorder = new SummaryRecorder(
    new NodeDirectoryScanner(logger.child("scanner")),
    new NodeSummaryStore({ logger: logger.child("store"), minFreeDiskBytes: config.minFreeDiskBytes }),
    logger
  );
  const watcher = new SummaryWatcher(new ChokidarFileWatcher(), recorder, {
    debounceMs: config.watchDebounceMs,
    logger: logger.child("watcher"),
  });

  // baseline summary before any change is seen
  await recorder.record(resultsDir);
  await watcher.start(resultsDir);

  process.once("SIGINT", () => {
    watcher
      .stop()
      .then(() => process.exit(0))
      .catch(exitOnError);
  });
}

main().catch(exitOnError);
