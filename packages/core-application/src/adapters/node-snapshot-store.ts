import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import { z } from "zod";

import { createPathMap, type ClientId, type DirectorySnapshot, type FileRecord } from "@dirsync/core-domain";
import type { SnapshotStore } from "../ports/snapshot-store";
import type { FileHasher } from "../ports/file-hasher";
import { childLogger, logError, type Logger } from "../infra/logger";
import { describeError, SnapshotStoreError } from "../application/errors";
import { pathMapSchema } from "../application/sync-wire";
import { NodeFileHasher } from "./node-file-hasher";
import { createSyncIgnore, STATE_DIR_NAME } from "./sync-ignore";
import { toPosix } from "./node-path-mapper";

const SNAPSHOT_FILE_VERSION = 1;

const fileRecordSchema = z.object({
  path: z.string().min(1),
  status: z.enum(["present", "deleted"]),
  kind: z.enum(["file", "directory"]),
  size: z.number().nonnegative(),
  mtimeMs: z.number(),
  hash: z.string(),
});

const storedSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_FILE_VERSION),
  clientId: z.string(),
  syncRoot: z.string(),
  capturedAtIso: z.string(),
  files: pathMapSchema,
});

type StoredSnapshot = Omit<z.infer<typeof storedSnapshotSchema>, "files"> & {
  files: Record<string, FileRecord>;
};

function describeIssue(error: z.ZodError, prefix: string[] = []): string {
  const issue = error.issues[0];
  return issue ? `${[...prefix, ...issue.path].join(".")}: ${issue.message}` : "unknown issue";
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Node implementation of the SnapshotStore port. The last snapshot lives in
 * `<root>/.dirsync/state/last-snapshot.json` and records which client and
 * root it was captured for, since snapshots from another client or root are
 * not comparable.
 *
 * An unreadable or corrupt last snapshot is moved aside to
 * `last-snapshot.corrupt.json` and the run continues as a first run.
 */
export class NodeSnapshotStore implements SnapshotStore {
  private readonly rootAbs: string;
  private readonly ignore: (absPath: string) => boolean;
  private readonly hasher: FileHasher;
  private readonly logger: Logger;

  constructor(
    private readonly deps: {
      rootAbs: string;
      clientId: ClientId;
      logger: Logger;
      hasher?: FileHasher;
      now?: () => Date;
    }
  ) {
    this.rootAbs = path.resolve(deps.rootAbs);
    this.ignore = createSyncIgnore(this.rootAbs);
    this.hasher = deps.hasher ?? new NodeFileHasher();
    this.logger = childLogger(deps.logger, import.meta);
  }

  snapshotFile(): string {
    return path.join(this.rootAbs, STATE_DIR_NAME, "state", "last-snapshot.json");
  }

  corruptSnapshotFile(): string {
    return path.join(path.dirname(this.snapshotFile()), "last-snapshot.corrupt.json");
  }

  async getLastSnapshot(): Promise<DirectorySnapshot | null> {
    let stored: StoredSnapshot | null;
    try {
      stored = await this.readStored();
    } catch (err) {
      if (!(err instanceof SnapshotStoreError)) throw err;
      logError(this.logger, err, "Last snapshot is unusable, treating this run as the first");
      await this.moveAside();
      return null;
    }
    if (!stored) return null;

    if (stored.clientId !== this.deps.clientId || path.resolve(stored.syncRoot) !== this.rootAbs) {
      this.logger.warn(
        { storedClientId: stored.clientId, storedRoot: stored.syncRoot },
        "Last snapshot belongs to another client or sync root, treating this run as the first"
      );
      return null;
    }

    return { files: stored.files };
  }

  private async readStored(): Promise<StoredSnapshot | null> {
    const file = this.snapshotFile();

    let raw: string;
    try {
      raw = await fs.readFile(file, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new SnapshotStoreError("Failed to read last snapshot", file, err);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new SnapshotStoreError("Last snapshot is not valid JSON", file, err);
    }

    const result = storedSnapshotSchema.safeParse(parsed);
    if (!result.success) {
      throw new SnapshotStoreError(`Last snapshot has an unexpected shape (${describeIssue(result.error)})`, file, result.error);
    }

    // rebuilt from the raw entries so that no path is lost to the prototype
    const files = createPathMap<FileRecord>();
    for (const [key, value] of Object.entries(result.data.files)) {
      const record = fileRecordSchema.safeParse(value);
      if (!record.success) {
        const where = describeIssue(record.error, ["files", key]);
        throw new SnapshotStoreError(`Last snapshot has an unexpected shape (${where})`, file, record.error);
      }
      if (key !== record.data.path) {
        throw new SnapshotStoreError(`Last snapshot key "${key}" does not match record path "${record.data.path}"`, file);
      }
      files[key] = record.data;
    }

    return { ...result.data, files };
  }

  private async moveAside(): Promise<void> {
    const aside = this.corruptSnapshotFile();
    try {
      await fs.rename(this.snapshotFile(), aside);
      this.logger.warn({ movedTo: aside }, "Moved unusable last snapshot aside");
    } catch (err) {
      // the next persisted snapshot replaces it in any case
      this.logger.warn({ err: describeError(err) }, "Could not move unusable last snapshot aside");
    }
  }

  async getLocalMetadata(): Promise<DirectorySnapshot> {
    const files = createPathMap<FileRecord>();
    try {
      await this.walk(this.rootAbs, files);
    } catch (err) {
      throw new SnapshotStoreError(`Failed to scan sync root ${this.rootAbs}`, this.rootAbs, err);
    }
    return { files };
  }

  async createDirectorySnapshot(): Promise<DirectorySnapshot> {
    const snapshot = await this.getLocalMetadata();
    const now = this.deps.now ?? (() => new Date());

    const stored: StoredSnapshot = {
      version: SNAPSHOT_FILE_VERSION,
      clientId: this.deps.clientId,
      syncRoot: this.rootAbs,
      capturedAtIso: now().toISOString(),
      files: snapshot.files,
    };

    const file = this.snapshotFile();
    const tmp = `${file}.tmp`;
    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(stored, null, 2), "utf-8");
      await fs.rename(tmp, file);
    } catch (err) {
      throw new SnapshotStoreError("Failed to persist snapshot", file, err);
    }

    this.logger.debug({ paths: Object.keys(snapshot.files).length }, "Persisted last snapshot");
    return snapshot;
  }

  private async walk(dirAbs: string, out: Record<string, FileRecord>): Promise<void> {
    const entries: Dirent[] = await fs.readdir(dirAbs, { withFileTypes: true });

    for (const entry of entries) {
      const abs = path.join(dirAbs, entry.name);
      if (this.ignore(abs)) continue;
      const rel = toPosix(path.relative(this.rootAbs, abs));

      try {
        if (entry.isDirectory()) {
          const stat = await fs.stat(abs);
          out[rel] = { path: rel, status: "present", kind: "directory", size: 0, mtimeMs: stat.mtimeMs, hash: "" };
          await this.walk(abs, out);
        } else if (entry.isFile()) {
          const stat = await fs.stat(abs);
          const hash = await this.hasher.hashFile(abs);
          out[rel] = { path: rel, status: "present", kind: "file", size: stat.size, mtimeMs: stat.mtimeMs, hash: hash.value };
        }
      } catch (err) {
        // removed between readdir and stat: it is simply not part of this snapshot
        if (isNotFound(err)) {
          this.logger.debug({ path: rel }, "Entry vanished during scan");
          continue;
        }
        throw err;
      }
    }
  }
}
