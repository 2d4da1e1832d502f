export class NetworkError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "NetworkError";
  }
}

export class RemoteServerError extends Error {
  constructor(message: string, public statusCode?: number, public cause?: unknown) {
    super(message);
    this.name = "RemoteServerError";
  }
}

/** The server answered, but the body could not be decoded or has the wrong shape. */
export class ProtocolError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "ProtocolError";
  }
}

export class QueueBootstrapError extends Error {
  constructor(message: string, public queueName: string, public cause?: unknown) {
    super(message);
    this.name = "QueueBootstrapError";
  }
}

export class SnapshotStoreError extends Error {
  constructor(message: string, public filePath?: string, public cause?: unknown) {
    super(message);
    this.name = "SnapshotStoreError";
  }
}

export class PathOutsideRootError extends Error {
  constructor(public readonly input: string, public readonly root: string) {
    super(`Path "${input}" does not resolve inside sync root "${root}"`);
    this.name = "PathOutsideRootError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly keys: string[]) {
    super(message);
    this.name = "ConfigError";
  }
}

export type SyncStage = "bootstrap" | "load" | "diff" | "submit" | "execute";

/** Fatal failure of one stage; the cycle stopped before touching persisted state. */
export class SyncStageError extends Error {
  constructor(public readonly stage: SyncStage, public cause: unknown) {
    super(`Sync cycle aborted during ${stage}: ${describeError(cause)}`);
    this.name = "SyncStageError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
