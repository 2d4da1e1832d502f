import type { ClientId, DirectorySnapshot, SyncActionPlan } from "@dirsync/core-domain";

export interface SyncTransport {
  /**
   * Submits the final snapshot and returns the server's plan. `null` means
   * nothing to do. Any failure rejects; callers treat it as fatal.
   */
  submitSnapshot(clientId: ClientId, snapshot: DirectorySnapshot): Promise<SyncActionPlan | null>;
}
