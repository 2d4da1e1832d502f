import type { NormalizedPath } from "../value-objects/ids";

export type FileHash = string;

export type FileStatus = "present" | "deleted";

export type FileKind = "file" | "directory";

export interface FileRecord {
  path: NormalizedPath;
  status: FileStatus;
  kind: FileKind;

  // directories carry size 0 and an empty hash
  size: number;
  mtimeMs: number;
  hash: FileHash;
}

/**
 * A tombstone only signals that the path was removed. Its metadata is the
 * last one known for the path and is never used for comparison.
 */
export function isTombstone(record: FileRecord): boolean {
  return record.status === "deleted";
}

export function toTombstone(record: FileRecord): FileRecord {
  return { ...record, status: "deleted" };
}
