import { connect as amqpConnect } from "amqplib";
import type { MessageQueue } from "../ports/message-queue";
import { childLogger, type Logger } from "../infra/logger";

// Structural slices of amqplib's channel and connection, so tests can hand in fakes.
export interface AmqpChannelLike {
  assertQueue(queue: string, options?: { durable?: boolean; autoDelete?: boolean }): Promise<unknown>;
  purgeQueue(queue: string): Promise<{ messageCount: number }>;
  close(): Promise<void>;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export interface AmqpConnectionLike {
  createChannel(): Promise<AmqpChannelLike>;
  close(): Promise<void>;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export type AmqpConnect = (url: string) => Promise<AmqpConnectionLike>;

export class AmqpMessageQueue implements MessageQueue {
  private connection: AmqpConnectionLike | null = null;
  private channel: AmqpChannelLike | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly opts: {
      url: string;
      logger: Logger;
      connect?: AmqpConnect;
    }
  ) {
    this.logger = childLogger(opts.logger, import.meta);
  }

  private async getChannel(): Promise<AmqpChannelLike> {
    if (this.channel) return this.channel;

    const connect: AmqpConnect = this.opts.connect ?? amqpConnect;
    if (!this.connection) {
      const connection = await connect(this.opts.url);
      connection.on("error", (err) => this.logger.error({ err }, "AMQP connection error"));
      this.connection = connection;
    }

    const channel = await this.connection.createChannel();
    // the server closes a channel on failed operations; the rejected call already reports it
    channel.on("error", (err) => {
      this.logger.warn({ err }, "AMQP channel closed by server");
      this.channel = null;
    });
    this.channel = channel;
    return channel;
  }

  async declareQueue(name: string): Promise<void> {
    const channel = await this.getChannel();
    await channel.assertQueue(name, { durable: true, autoDelete: false });
  }

  async purgeQueue(name: string): Promise<number> {
    const channel = await this.getChannel();
    const { messageCount } = await channel.purgeQueue(name);
    return messageCount;
  }

  async close(): Promise<void> {
    const { channel, connection } = this;
    this.channel = null;
    this.connection = null;

    if (channel) {
      try {
        await channel.close();
      } catch (err) {
        this.logger.debug({ err }, "AMQP channel was already closed");
      }
    }
    if (connection) {
      await connection.close();
    }
  }
}
