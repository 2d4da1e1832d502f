import { z } from "zod";
import {
  createPathMap,
  toDirective,
  type ClientId,
  type DirectorySnapshot,
  type FileActionDirective,
  type FileRecord,
  type SyncActionPlan,
} from "@dirsync/core-domain";
import { ProtocolError } from "./errors";

/* ---------------- request ---------------- */

export type WireFileRecord = {
  path: string;
  status: FileRecord["status"];
  kind: FileRecord["kind"];
  size: number;
  mtime_ms: number;
  hash: string;
};

export type SnapshotRequestBody = {
  client_id: ClientId;
  final_snapshot: { files: Record<string, WireFileRecord> };
};

export function toWireRecord(record: FileRecord): WireFileRecord {
  return {
    path: record.path,
    status: record.status,
    kind: record.kind,
    size: record.size,
    mtime_ms: record.mtimeMs,
    hash: record.hash,
  };
}

export function encodeSnapshotRequest(clientId: ClientId, snapshot: DirectorySnapshot): SnapshotRequestBody {
  const files = createPathMap<WireFileRecord>();
  for (const [p, record] of Object.entries(snapshot.files)) {
    files[p] = toWireRecord(record);
  }
  return { client_id: clientId, final_snapshot: { files } };
}

/* ---------------- response ---------------- */

// `action` stays an open string here; unknown values become explicit directives
const fileActionSchema = z.object({ action: z.string() }).passthrough();

// Checked entry by entry in decodeSnapshotResponse: z.record drops a
// `__proto__` key, which is a legal path.
export const pathMapSchema = z.custom<Record<string, unknown>>(
  (value) => typeof value === "object" && value !== null && !Array.isArray(value),
  { message: "Expected an object keyed by path" }
);

const syncActionMetadataSchema = z
  .object({
    files: pathMapSchema.nullish(),
  })
  .passthrough();

export const snapshotResponseSchema = z
  .object({
    sync_action_metadata: syncActionMetadataSchema.nullish(),
  })
  .passthrough();

function describeIssue(error: z.ZodError, prefix: (string | number)[] = []): string {
  const issue = error.issues[0];
  if (!issue) return "unknown issue";
  return `${[...prefix, ...issue.path].join(".") || "<root>"}: ${issue.message}`;
}

/**
 * Decodes the body of a snapshot submission. A missing or null
 * `sync_action_metadata`, or one without entries, means nothing to do.
 */
export function decodeSnapshotResponse(body: string): SyncActionPlan | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new ProtocolError("Snapshot response is not valid JSON", err);
  }

  const result = snapshotResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new ProtocolError(`Snapshot response has an unexpected shape (${describeIssue(result.error)})`, result.error);
  }

  const entries = Object.entries(result.data.sync_action_metadata?.files ?? {});
  if (entries.length === 0) return null;

  const plan: SyncActionPlan = { files: createPathMap<FileActionDirective>() };
  for (const [p, raw] of entries) {
    const directive = fileActionSchema.safeParse(raw);
    if (!directive.success) {
      const where = describeIssue(directive.error, ["sync_action_metadata", "files", p]);
      throw new ProtocolError(`Snapshot response has an unexpected shape (${where})`, directive.error);
    }
    plan.files[p] = toDirective(directive.data.action);
  }
  return plan;
}
