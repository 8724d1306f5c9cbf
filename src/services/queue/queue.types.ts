// src/services/queue/queue.types.ts

export interface QueueMessage {
  /** Transport-assigned id, stable across redeliveries. */
  id: string;
  body: string;
  enqueuedAt: string;
  /** Opaque handle the transport needs to complete or dead-letter this delivery. */
  lockToken: string;
}

export interface ReceiveOptions {
  maxMessages: number;
  maxWaitMs: number;
}

/**
 * At-least-once queue: a received message stays in flight until it is completed
 * or dead-lettered, and is redelivered if neither happens.
 */
export interface QueueTransport {
  send(body: string): Promise<void>;
  receiveBatch(options: ReceiveOptions): Promise<QueueMessage[]>;
  complete(message: QueueMessage): Promise<void>;
  deadLetter(message: QueueMessage, reason: string): Promise<void>;
  close(): Promise<void>;
}
