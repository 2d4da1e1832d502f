import { describe, it, expect } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { DirectorySnapshot, SyncActionPlan } from "@dirsync/core-domain";
import { runSyncCycle } from "./sync-cycle";
import { SyncStageError } from "../application/errors";
import { NodeSnapshotStore } from "../adapters/node-snapshot-store";
import { NodePathMapper } from "../adapters/node-path-mapper";
import {
  createHarness,
  dirRecord,
  fileRecord,
  InMemoryWorkspace,
  silentLogger,
  snapshotOf,
} from "../testing/in-memory";

/** Plans uploads for local content the server lacks and downloads/mkdirs for the reverse. */
function serverPlanner(ws: InMemoryWorkspace) {
  return (snapshot: DirectorySnapshot): SyncActionPlan | null => {
    const files: SyncActionPlan["files"] = {};
    for (const [p, r] of Object.entries(snapshot.files)) {
      if (r.status === "deleted" || r.kind === "directory") continue;
      const remote = ws.server.get(p);
      if (!remote || remote.hash !== r.hash) files[p] = { action: "upload" };
    }
    for (const [p, r] of ws.server) {
      if (!(p in snapshot.files)) files[p] = r.kind === "directory" ? { action: "mkdir" } : { action: "download" };
    }
    return Object.keys(files).length > 0 ? { files } : null;
  };
}

describe("sync-cycle", () => {
  it("submits the current snapshot unchanged on first run", async () => {
    const h = createHarness();
    h.ws.putLocal(fileRecord("a.txt", "a1"), dirRecord("docs"));

    const summary = await runSyncCycle(h.ctx);

    expect(h.transport.submitted).toEqual([
      { clientId: "client-a", snapshot: snapshotOf(fileRecord("a.txt", "a1"), dirRecord("docs")) },
    ]);
    expect(summary).toMatchObject({ firstRun: true, submittedPaths: 2, tombstones: 0, plannedActions: 0 });
    expect(h.ws.lastSnapshot).toEqual(snapshotOf(fileRecord("a.txt", "a1"), dirRecord("docs")));
  });

  it("submits tombstones for removed paths and current metadata for the rest", async () => {
    const h = createHarness();
    h.ws.lastSnapshot = snapshotOf(fileRecord("a.txt", "a1"), fileRecord("b.txt", "b1"));
    h.ws.putLocal(fileRecord("b.txt", "b2", { mtimeMs: 2000 }), fileRecord("c.txt", "c1"));

    const summary = await runSyncCycle(h.ctx);

    expect(h.transport.submitted[0]?.snapshot).toEqual(
      snapshotOf(
        fileRecord("a.txt", "a1", { status: "deleted" }),
        fileRecord("b.txt", "b2", { mtimeMs: 2000 }),
        fileRecord("c.txt", "c1")
      )
    );
    expect(summary).toMatchObject({ firstRun: false, submittedPaths: 3, tombstones: 1 });
  });

  it("purges the queue before loading any snapshot", async () => {
    const h = createHarness();
    h.queue.pending.set("client-a-queue", 3);

    const summary = await runSyncCycle(h.ctx);

    expect(summary.purgedMessages).toBe(3);
    expect(h.queue.calls).toEqual(["declare:client-a-queue", "purge:client-a-queue"]);
  });

  it("aborts before loading or submitting when the purge fails", async () => {
    const h = createHarness();
    h.queue.failures.purge = new Error("transport closed");

    const err = await runSyncCycle(h.ctx).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SyncStageError);
    expect(err).toMatchObject({ stage: "bootstrap" });
    expect(h.snapshots.calls).toEqual([]);
    expect(h.transport.submitted).toEqual([]);
  });

  it("runs as a first run while the last snapshot on disk is corrupt, then compares again", async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), "dirsync-cycle-"));
    try {
      await fs.writeFile(path.join(root, "a.txt"), "a");
      const snapshots = new NodeSnapshotStore({ rootAbs: root, clientId: "client-a", logger: silentLogger() });
      await fs.mkdir(path.dirname(snapshots.snapshotFile()), { recursive: true });
      await fs.writeFile(snapshots.snapshotFile(), "{trunc");
      const h = createHarness();
      const ctx = { ...h.ctx, snapshots, paths: new NodePathMapper(root) };

      const first = await runSyncCycle(ctx);
      const second = await runSyncCycle(ctx);

      expect(first).toMatchObject({ firstRun: true, submittedPaths: 1, report: { snapshotRefreshed: true } });
      expect(second).toMatchObject({ firstRun: false, submittedPaths: 1, tombstones: 0 });
      expect(h.transport.submitted).toHaveLength(2);
    } finally {
      await fs.rm(root, { recursive: true, force: true });
    }
  });

  it("aborts in the load stage when the snapshot store rejects", async () => {
    const h = createHarness();
    h.snapshots.failures.last = new Error("EIO");

    const err = await runSyncCycle(h.ctx).catch((e: unknown) => e);

    expect(err).toMatchObject({ stage: "load" });
    expect(h.transport.submitted).toEqual([]);
  });

  it("aborts in the load stage when the current metadata cannot be read", async () => {
    const h = createHarness();
    h.snapshots.failures.local = new Error("EACCES");

    const err = await runSyncCycle(h.ctx).catch((e: unknown) => e);

    expect(err).toMatchObject({ stage: "load" });
    expect(h.snapshots.calls).toEqual(["getLastSnapshot", "getLocalMetadata"]);
  });

  it("leaves the last snapshot untouched and runs no actions when submission fails", async () => {
    const ws = new InMemoryWorkspace();
    const h = createHarness(() => ({ files: { "a.txt": { action: "upload" } } }), ws);
    const baseline = snapshotOf(fileRecord("old.txt", "o"));
    ws.lastSnapshot = baseline;
    ws.putLocal(fileRecord("a.txt", "a"));
    h.transport.failure = new Error("ECONNREFUSED");

    const err = await runSyncCycle(h.ctx).catch((e: unknown) => e);

    expect(err).toMatchObject({ stage: "submit" });
    expect(ws.lastSnapshot).toBe(baseline);
    expect(h.files.uploads).toEqual([]);
    expect(h.snapshots.calls).not.toContain("createDirectorySnapshot");
  });

  it("refreshes the snapshot when the server has nothing to do", async () => {
    const h = createHarness(() => null);
    h.ws.putLocal(fileRecord("a.txt", "a"));
    h.ws.lastSnapshot = snapshotOf(fileRecord("a.txt", "a"));

    const summary = await runSyncCycle(h.ctx);

    expect(summary.plannedActions).toBe(0);
    expect(summary.report).toEqual({ results: [], snapshotRefreshed: true });
    expect(h.snapshots.calls).toEqual(["getLastSnapshot", "getLocalMetadata", "createDirectorySnapshot"]);
  });

  it("converges: a second cycle submits no tombstones and gets no plan", async () => {
    const ws = new InMemoryWorkspace();
    ws.putLocal(fileRecord("a.txt", "a1"));
    ws.putServer(dirRecord("docs"), fileRecord("docs/remote.md", "r1"));
    const h = createHarness(serverPlanner(ws), ws);

    const first = await runSyncCycle(h.ctx);
    expect(first.report.results.map((r) => [r.path, r.action, r.outcome])).toEqual([
      ["docs", "mkdir", "ok"],
      ["a.txt", "upload", "ok"],
      ["docs/remote.md", "download", "ok"],
    ]);

    const second = await runSyncCycle(h.ctx);
    expect(second).toMatchObject({ firstRun: false, tombstones: 0, plannedActions: 0, submittedPaths: 3 });
  });

  it("emits a tombstone once, in the cycle right after the deletion", async () => {
    const ws = new InMemoryWorkspace();
    ws.putLocal(fileRecord("a.txt", "a1"), fileRecord("b.txt", "b1"));
    const h = createHarness(() => null, ws);

    await runSyncCycle(h.ctx);
    ws.local.delete("a.txt");

    const afterDelete = await runSyncCycle(h.ctx);
    expect(afterDelete.tombstones).toBe(1);
    expect(h.transport.submitted[1]?.snapshot.files["a.txt"]?.status).toBe("deleted");

    const next = await runSyncCycle(h.ctx);
    expect(next.tombstones).toBe(0);
    expect(Object.keys(h.transport.submitted[2]?.snapshot.files ?? {})).toEqual(["b.txt"]);
  });

  it("re-plans a path whose upload failed in the next cycle", async () => {
    const ws = new InMemoryWorkspace();
    ws.putLocal(fileRecord("a.txt", "a1"), fileRecord("b.txt", "b1"));
    const h = createHarness(serverPlanner(ws), ws);
    h.files.failing.add("a.txt");

    const first = await runSyncCycle(h.ctx);
    expect(first.report.results.map((r) => r.outcome)).toEqual(["failed", "ok"]);
    expect(first.report.snapshotRefreshed).toBe(true);

    h.files.failing.clear();
    const second = await runSyncCycle(h.ctx);
    expect(second.report.results).toEqual([
      { path: "a.txt", action: "upload", outcome: "ok", fileUrl: "https://files.test/a.txt" },
    ]);
  });
});
