import type { DirectorySnapshot } from "@dirsync/core-domain";

export interface SnapshotStore {
  /** Last persisted snapshot, or null on first run. Throws when it exists but cannot be read. */
  getLastSnapshot(): Promise<DirectorySnapshot | null>;

  /** Fresh snapshot of the live sync root. */
  getLocalMetadata(): Promise<DirectorySnapshot>;

  /** Captures the live state and persists it as the new last snapshot. */
  createDirectorySnapshot(): Promise<DirectorySnapshot>;
}
