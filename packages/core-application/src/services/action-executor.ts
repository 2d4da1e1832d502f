import type {
  FileAction,
  FileActionDirective,
  NormalizedPath,
  SyncActionPlan,
} from "@dirsync/core-domain";
import type { SyncContext } from "../application/sync-context";
import { describeError } from "../application/errors";
import { logError } from "../infra/logger";

export type DirectiveOutcome = "ok" | "failed" | "skipped";

export type DirectiveResult = {
  path: NormalizedPath;
  action: FileAction | "unknown";
  outcome: DirectiveOutcome;
  fileUrl?: string;
  error?: string;
};

export type ActionReport = {
  results: DirectiveResult[];
  snapshotRefreshed: boolean;
  snapshotError?: string;
};

type ExecutorContext = Pick<SyncContext, "clientId" | "logger" | "snapshots" | "files" | "directories" | "paths">;

function depth(p: string): number {
  return p.split("/").length;
}

/**
 * Directories first (shallow before deep) so later downloads find their
 * parents, then everything else by path. Correctness does not depend on it.
 */
export function orderDirectives(plan: SyncActionPlan): Array<[NormalizedPath, FileActionDirective]> {
  const entries = Object.entries(plan.files);
  const dirs = entries
    .filter(([, d]) => d.action === "mkdir")
    .sort(([a], [b]) => depth(a) - depth(b) || a.localeCompare(b));
  const rest = entries
    .filter(([, d]) => d.action !== "mkdir")
    .sort(([a], [b]) => a.localeCompare(b));
  return [...dirs, ...rest];
}

export class ActionExecutor {
  constructor(private readonly ctx: ExecutorContext) {}

  /**
   * Applies every directive, isolating failures per path, then captures and
   * persists a fresh snapshot. The snapshot step runs only after all
   * directives were attempted and also runs for an empty plan.
   */
  async apply(plan: SyncActionPlan | null): Promise<ActionReport> {
    const { logger, snapshots } = this.ctx;
    const results: DirectiveResult[] = [];

    if (!plan || Object.keys(plan.files).length === 0) {
      logger.info("No sync actions to process");
    } else {
      for (const [p, directive] of orderDirectives(plan)) {
        results.push(await this.applyOne(p, directive));
      }
    }

    const failed = results.filter((r) => r.outcome === "failed").length;
    if (failed > 0) {
      logger.warn({ failed, total: results.length }, "Some actions failed; they will be planned again next cycle");
    }

    logger.info("Creating new snapshot");
    try {
      await snapshots.createDirectorySnapshot();
      logger.info("Created snapshot after sync");
      return { results, snapshotRefreshed: true };
    } catch (err) {
      logError(logger, err, "Failed to create snapshot after sync");
      return { results, snapshotRefreshed: false, snapshotError: describeError(err) };
    }
  }

  private async applyOne(p: NormalizedPath, directive: FileActionDirective): Promise<DirectiveResult> {
    const { logger, clientId, files, directories, paths } = this.ctx;

    if (directive.action === "unknown") {
      logger.warn({ path: p, action: directive.rawAction }, "Unknown action, skipping");
      return { path: p, action: "unknown", outcome: "skipped" };
    }

    const action = directive.action;
    logger.debug({ path: p, action }, "Processing action");

    try {
      switch (action) {
        case "upload": {
          const { fileUrl } = await files.upload(paths.toAbsolute(p), clientId);
          logger.info({ path: p, fileUrl }, "Uploaded");
          return { path: p, action, outcome: "ok", fileUrl };
        }
        case "download": {
          await files.download(p);
          logger.info({ path: p }, "Downloaded");
          return { path: p, action, outcome: "ok" };
        }
        case "mkdir": {
          await directories.mkdir(paths.toAbsolute(p));
          logger.info({ path: p }, "Created directory");
          return { path: p, action, outcome: "ok" };
        }
      }
    } catch (err) {
      logError(logger, err, `Failed to ${action} ${p}`);
      return { path: p, action, outcome: "failed", error: describeError(err) };
    }
  }
}
