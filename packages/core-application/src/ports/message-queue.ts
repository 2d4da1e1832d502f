export interface MessageQueue {
  /** Durable, not auto-deleted. No-op when the queue already exists. */
  declareQueue(name: string): Promise<void>;

  /** Drops every pending message and returns how many were removed. */
  purgeQueue(name: string): Promise<number>;

  close(): Promise<void>;
}
