import { CollaboratorUnavailableError } from '../../src/errors';
import { QueueMessage, QueueTransport, ReceiveOptions } from '../../src/services/queue/queue.types';

/**
 * At-least-once queue held in memory. Received messages stay in flight until completed
 * or dead-lettered; redeliver() puts one back as a transport would after a lost ack.
 */
export class InMemoryQueueTransport implements QueueTransport {
  readonly pending: QueueMessage[] = [];
  readonly inFlight = new Map<string, QueueMessage>();
  readonly completed: string[] = [];
  readonly deadLettered: Array<{ message: QueueMessage; reason: string }> = [];
  readonly sent: string[] = [];
  /** Number of upcoming receiveBatch calls that fail. */
  failReceives = 0;
  receiveCalls = 0;
  closed = false;

  private seq = 0;
  private waiters: Array<() => void> = [];

  async send(body: string): Promise<void> {
    this.sent.push(body);
    this.enqueue(body);
  }

  enqueue(body: string): QueueMessage {
    const id = `msg_${++this.seq}`;
    const message: QueueMessage = { id, body, enqueuedAt: new Date().toISOString(), lockToken: `lock_${id}` };
    this.pending.push(message);
    this.wake();
    return message;
  }

  redeliver(message: QueueMessage): void {
    this.pending.push({ ...message });
    this.wake();
  }

  async receiveBatch({ maxMessages, maxWaitMs }: ReceiveOptions): Promise<QueueMessage[]> {
    this.receiveCalls++;
    if (this.failReceives > 0) {
      this.failReceives--;
      throw new CollaboratorUnavailableError('queue', 'connection refused');
    }

    if (this.pending.length === 0) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(done, maxWaitMs);
        const waiters = this.waiters;
        function done() {
          clearTimeout(timer);
          resolve();
        }
        waiters.push(done);
      });
    }

    const batch = this.pending.splice(0, maxMessages);
    for (const message of batch) {
      this.inFlight.set(message.lockToken, message);
    }
    return batch;
  }

  async complete(message: QueueMessage): Promise<void> {
    this.inFlight.delete(message.lockToken);
    this.completed.push(message.id);
  }

  async deadLetter(message: QueueMessage, reason: string): Promise<void> {
    this.inFlight.delete(message.lockToken);
    this.deadLettered.push({ message, reason });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((wake) => wake());
  }
}
