import { getResultSizeInfo } from "@dir-summary/core-domain";
import { NodeDirectoryScanner } from "../adapters/node-directory-scanner";
import { NodeSummaryStore } from "../adapters/node-summary-store";
import { SummaryAggregator } from "../services/summary-aggregator";
import { devRuntime, exitOnError } from "./runtime";

async function main() {
  const { logger, resultsDir } = devRuntime("npm run dev:merge-summaries -- <results-dir>");

  const aggregator = new SummaryAggregator({
    store: new NodeSummaryStore({ logger: logger.child("store") }),
    scanner: new NodeDirectoryScanner(logger.child("scanner")),
    logger,
  });

  const { clientCollectedBytes, collectedBytes, summary } = await aggregator.aggregate(resultsDir);

  console.log(
    JSON.stringify(
      { collectedBytes, ...getResultSizeInfo(clientCollectedBytes, summary) },
      null,
      2
    )
  );
}

main().catch(exitOnError);
