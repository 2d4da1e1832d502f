// Public API of the core-application package: ports, services, Node adapters
// and the ambient pieces (config, errors, logging) an entry point wires up.

// Ports (interfaces)
export * from "./ports/snapshot-store";
export * from "./ports/sync-transport";
export * from "./ports/file-transfer";
export * from "./ports/directory-creator";
export * from "./ports/path-mapper";
export * from "./ports/message-queue";
export type { ContentHash, FileHasher } from "./ports/file-hasher";

// Application
export * from "./application/errors";
export * from "./application/config";
export * from "./application/sync-context";
export * from "./application/sync-wire";

// Services
export * from "./services/sync-diff";
export * from "./services/queue-bootstrap";
export * from "./services/action-executor";
export * from "./services/sync-cycle";

// Node adapters
export * from "./adapters/node-snapshot-store";
export * from "./adapters/node-path-mapper";
export * from "./adapters/node-directory-creator";
export * from "./adapters/node-file-hasher";
export * from "./adapters/sync-ignore";
export * from "./adapters/http-sync-transport";
export * from "./adapters/http-file-transfer";
export * from "./adapters/amqp-message-queue";

// Logging
export * from "./infra/logger";
