import {
  emptySnapshot,
  hasPath,
  isTombstone,
  toTombstone,
  type DirectorySnapshot,
} from "@dirsync/core-domain";

/**
 * Merges the last known snapshot with the current one.
 *
 * - paths only in `last` become tombstones carrying `last`'s metadata
 * - every path in `current` is copied verbatim and overrides a tombstone
 *
 * The result's path set is the union of both inputs. Pure: neither input is
 * mutated.
 */
export function reconcile(last: DirectorySnapshot, current: DirectorySnapshot): DirectorySnapshot {
  const merged = emptySnapshot();

  for (const [p, record] of Object.entries(last.files)) {
    if (!hasPath(current, p)) {
      merged.files[p] = toTombstone(record);
    }
  }

  for (const [p, record] of Object.entries(current.files)) {
    merged.files[p] = { ...record };
  }

  return merged;
}

/** First run (no last snapshot) submits `current` unchanged. */
export function buildFinalSnapshot(
  last: DirectorySnapshot | null,
  current: DirectorySnapshot
): DirectorySnapshot {
  return last ? reconcile(last, current) : current;
}

export function countTombstones(snapshot: DirectorySnapshot): number {
  return Object.values(snapshot.files).filter(isTombstone).length;
}
