import type { MessageQueue } from "../ports/message-queue";
import type { Logger } from "../infra/logger";
import { QueueBootstrapError } from "../application/errors";

/**
 * Makes sure the client's notification queue exists and is empty before a
 * cycle. The snapshot diff is the source of truth for the cycle, so anything
 * queued while the client was offline is dropped. Both steps are fatal on
 * failure.
 */
export async function prepareQueue(queue: MessageQueue, queueName: string, logger: Logger): Promise<number> {
  try {
    await queue.declareQueue(queueName);
  } catch (err) {
    throw new QueueBootstrapError(`Failed to declare queue "${queueName}"`, queueName, err);
  }

  let purged: number;
  try {
    purged = await queue.purgeQueue(queueName);
  } catch (err) {
    throw new QueueBootstrapError(`Failed to purge queue "${queueName}"`, queueName, err);
  }

  logger.info({ queue: queueName, purged }, "Purged stale notifications");
  return purged;
}
