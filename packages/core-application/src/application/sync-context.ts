import type { ClientId } from "@dirsync/core-domain";
import type { MessageQueue } from "../ports/message-queue";
import type { SnapshotStore } from "../ports/snapshot-store";
import type { SyncTransport } from "../ports/sync-transport";
import type { FileTransfer } from "../ports/file-transfer";
import type { DirectoryCreator } from "../ports/directory-creator";
import type { PathMapper } from "../ports/path-mapper";
import type { Logger } from "../infra/logger";
import type { ClientConfig } from "./config";

import { AmqpMessageQueue } from "../adapters/amqp-message-queue";
import { NodeSnapshotStore } from "../adapters/node-snapshot-store";
import { HttpSyncTransport } from "../adapters/http-sync-transport";
import { HttpFileTransfer } from "../adapters/http-file-transfer";
import { NodeDirectoryCreator } from "../adapters/node-directory-creator";
import { NodePathMapper } from "../adapters/node-path-mapper";

/**
 * Everything one sync cycle needs, built once per run and passed to every
 * stage. Tests swap any collaborator for an in-memory one.
 */
export type SyncContext = {
  clientId: ClientId;
  queueName: string;
  logger: Logger;

  queue: MessageQueue;
  snapshots: SnapshotStore;
  transport: SyncTransport;
  files: FileTransfer;
  directories: DirectoryCreator;
  paths: PathMapper;
};

export function createNodeSyncContext(
  config: ClientConfig,
  logger: Logger,
  opts: { fetchImpl?: typeof fetch } = {}
): SyncContext {
  const paths = new NodePathMapper(config.syncDirectory);

  return {
    clientId: config.clientId,
    queueName: config.queueName,
    logger,
    queue: new AmqpMessageQueue({ url: config.queueAddress, logger }),
    snapshots: new NodeSnapshotStore({ rootAbs: paths.rootAbs, clientId: config.clientId, logger }),
    transport: new HttpSyncTransport({ serverUrl: config.serverUrl, fetchImpl: opts.fetchImpl }),
    files: new HttpFileTransfer({ serverUrl: config.serverUrl, paths, fetchImpl: opts.fetchImpl }),
    directories: new NodeDirectoryCreator(),
    paths,
  };
}
