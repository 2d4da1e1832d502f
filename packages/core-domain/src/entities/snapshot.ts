import { createPathMap, type NormalizedPath } from "../value-objects/ids";
import type { FileRecord } from "./file-record";

export interface DirectorySnapshot {
  files: Record<NormalizedPath, FileRecord>;
}

export function emptySnapshot(): DirectorySnapshot {
  return { files: createPathMap<FileRecord>() };
}

export function snapshotPaths(snapshot: DirectorySnapshot): NormalizedPath[] {
  return Object.keys(snapshot.files).sort();
}

export function hasPath(snapshot: DirectorySnapshot, path: NormalizedPath): boolean {
  return Object.prototype.hasOwnProperty.call(snapshot.files, path);
}
