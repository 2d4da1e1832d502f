import { loadConfig, type ClientConfig } from "../application/config";
import { ConfigError } from "../application/errors";
import { createNodeSyncContext } from "../application/sync-context";
import { createRootLogger, logError } from "../infra/logger";
import { runSyncCycle } from "../services/sync-cycle";

async function main(): Promise<number> {
  let config: ClientConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`${err.message}\nMissing or invalid: ${err.keys.join(", ")}`);
      return 1;
    }
    throw err;
  }

  const logger = createRootLogger(config.logLevel);
  const ctx = createNodeSyncContext(config, logger);

  try {
    const summary = await runSyncCycle(ctx);
    const failed = summary.report.results.filter((r) => r.outcome === "failed").length;

    logger.info(
      {
        purged: summary.purgedMessages,
        firstRun: summary.firstRun,
        submitted: summary.submittedPaths,
        tombstones: summary.tombstones,
        planned: summary.plannedActions,
        failed,
        snapshotRefreshed: summary.report.snapshotRefreshed,
      },
      "Sync cycle finished"
    );

    return summary.report.snapshotRefreshed ? 0 : 1;
  } catch (err) {
    logError(logger, err, "Sync cycle aborted");
    return 1;
  } finally {
    try {
      await ctx.queue.close();
    } catch (err) {
      logError(logger, err, "Failed to close queue connection");
    }
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err) => {
    console.error(err);
    process.exitCode = 1;
  }
);
