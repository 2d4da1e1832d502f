import type { NormalizedPath } from "../value-objects/ids";

export type FileAction = "upload" | "download" | "mkdir";

export const FILE_ACTIONS: readonly FileAction[] = ["upload", "download", "mkdir"];

export type FileActionDirective =
  | { action: FileAction }
  | { action: "unknown"; rawAction: string };

/** Server-issued corrective actions keyed by path. `null` means already in sync. */
export interface SyncActionPlan {
  files: Record<NormalizedPath, FileActionDirective>;
}

export function isFileAction(value: string): value is FileAction {
  return FILE_ACTIONS.some((a) => a === value);
}

export function toDirective(rawAction: string): FileActionDirective {
  return isFileAction(rawAction) ? { action: rawAction } : { action: "unknown", rawAction };
}
