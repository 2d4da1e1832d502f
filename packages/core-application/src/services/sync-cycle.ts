import { snapshotPaths, type DirectorySnapshot, type SyncActionPlan } from "@dirsync/core-domain";
import type { SyncContext } from "../application/sync-context";
import { SyncStageError, type SyncStage } from "../application/errors";
import { childLogger } from "../infra/logger";
import { prepareQueue } from "./queue-bootstrap";
import { buildFinalSnapshot, countTombstones } from "./sync-diff";
import { ActionExecutor, type ActionReport } from "./action-executor";

export type SyncCycleSummary = {
  purgedMessages: number;
  firstRun: boolean;
  submittedPaths: number;
  tombstones: number;
  plannedActions: number;
  report: ActionReport;
};

async function stage<T>(name: SyncStage, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    throw err instanceof SyncStageError ? err : new SyncStageError(name, err);
  }
}

/**
 * One sync cycle: bootstrap → load → diff → submit → execute.
 *
 * A failure in any stage before `execute` rejects with SyncStageError and
 * leaves the persisted last snapshot untouched, so the next run starts from
 * the same baseline. Per-path failures inside `execute` are reported in the
 * summary instead.
 */
export async function runSyncCycle(ctx: SyncContext): Promise<SyncCycleSummary> {
  const logger = childLogger(ctx.logger, import.meta);
  logger.info({ clientId: ctx.clientId, root: ctx.paths.rootAbs }, "Starting sync cycle");

  const purgedMessages = await stage("bootstrap", () => prepareQueue(ctx.queue, ctx.queueName, logger));

  const { last, current } = await stage("load", async () => {
    logger.debug("Getting last snapshot");
    const last = await ctx.snapshots.getLastSnapshot();
    logger.debug("Getting current snapshot");
    const current = await ctx.snapshots.getLocalMetadata();
    return { last, current };
  });

  const finalSnapshot: DirectorySnapshot = await stage("diff", async () => {
    if (last) {
      logger.info("Last snapshot exists, comparing with current snapshot");
    } else {
      logger.info("Last snapshot does not exist, sending current snapshot");
    }
    return buildFinalSnapshot(last, current);
  });

  const tombstones = countTombstones(finalSnapshot);
  const paths = snapshotPaths(finalSnapshot);
  const submittedPaths = paths.length;
  logger.debug({ paths }, "Snapshot paths");
  logger.info({ paths: submittedPaths, tombstones }, "Submitting snapshot");

  const plan: SyncActionPlan | null = await stage("submit", () =>
    ctx.transport.submitSnapshot(ctx.clientId, finalSnapshot)
  );
  const plannedActions = plan ? Object.keys(plan.files).length : 0;

  const report = await stage("execute", () => new ActionExecutor({ ...ctx, logger }).apply(plan));

  return {
    purgedMessages,
    firstRun: last === null,
    submittedPaths,
    tombstones,
    plannedActions,
    report,
  };
}
