// src/services/queue/RedisQueueTransport.ts

import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { BaseService } from '../base/BaseService';
import { Logger } from '../base/types';
import { CollaboratorUnavailableError, errorMessage } from '../../errors';
import { QueueMessage, QueueTransport, ReceiveOptions } from './queue.types';

const envelopeSchema = z.object({
  id: z.string(),
  body: z.string(),
  enqueuedAt: z.string(),
});

type Envelope = z.infer<typeof envelopeSchema>;

/**
 * Reliable queue over Redis lists.
 *
 *   <queue>             pending messages (LPUSH in, right end out)
 *   <queue>:processing  received but not yet completed
 *   <queue>:dead        dead-lettered messages with their reason
 *
 * Receiving moves an envelope atomically into the processing list; completing removes it.
 * Anything left in processing after a crash is pushed back by recoverInFlight().
 */
export class RedisQueueTransport extends BaseService implements QueueTransport {
  private readonly processingKey: string;
  private readonly deadLetterKey: string;
  // Blocking commands hold their connection, so receiving gets its own.
  private readonly receiver: Redis;

  constructor(
    private readonly redis: Redis,
    private readonly queueName: string,
    config: { logger: Logger },
  ) {
    super(config);
    this.processingKey = `${queueName}:processing`;
    this.deadLetterKey = `${queueName}:dead`;
    this.receiver = redis.duplicate();
  }

  async send(body: string): Promise<void> {
    const envelope: Envelope = { id: uuidv4(), body, enqueuedAt: new Date().toISOString() };
    try {
      await this.redis.lpush(this.queueName, JSON.stringify(envelope));
      this.logger.debug('Message sent', { queue: this.queueName, messageId: envelope.id });
    } catch (error) {
      throw new CollaboratorUnavailableError('redis', `send to '${this.queueName}' failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async receiveBatch({ maxMessages, maxWaitMs }: ReceiveOptions): Promise<QueueMessage[]> {
    const raws: string[] = [];
    try {
      const first = await this.receiver.blmove(this.queueName, this.processingKey, 'RIGHT', 'LEFT', maxWaitMs / 1000);
      if (first === null) return [];
      raws.push(first);

      while (raws.length < maxMessages) {
        const next = await this.receiver.lmove(this.queueName, this.processingKey, 'RIGHT', 'LEFT');
        if (next === null) break;
        raws.push(next);
      }
    } catch (error) {
      if (raws.length === 0) {
        throw new CollaboratorUnavailableError('redis', `receive from '${this.queueName}' failed: ${errorMessage(error)}`, { cause: error });
      }
      // The ones already moved are in flight; hand them out rather than strand them.
      this.logFailure('warn', 'Partial receive; returning messages already moved to processing', error, {
        queue: this.queueName,
        received: raws.length,
      });
    }

    return raws.map((raw) => this.toQueueMessage(raw));
  }

  async complete(message: QueueMessage): Promise<void> {
    try {
      await this.redis.lrem(this.processingKey, 1, message.lockToken);
    } catch (error) {
      throw new CollaboratorUnavailableError('redis', `complete of '${message.id}' failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async deadLetter(message: QueueMessage, reason: string): Promise<void> {
    const record = JSON.stringify({ raw: message.lockToken, reason, deadLetteredAt: new Date().toISOString() });
    try {
      await this.redis.multi().lrem(this.processingKey, 1, message.lockToken).lpush(this.deadLetterKey, record).exec();
      this.logger.warn('Message dead-lettered', { queue: this.queueName, messageId: message.id, reason });
    } catch (error) {
      throw new CollaboratorUnavailableError('redis', `dead-letter of '${message.id}' failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Pushes messages left in the processing list by a previous instance back onto the queue.
   */
  async recoverInFlight(): Promise<number> {
    let recovered = 0;
    while ((await this.redis.lmove(this.processingKey, this.queueName, 'RIGHT', 'RIGHT')) !== null) {
      recovered++;
    }
    if (recovered > 0) {
      this.logger.info('Recovered in-flight messages', { queue: this.queueName, recovered });
    }
    return recovered;
  }

  async close(): Promise<void> {
    this.receiver.disconnect();
    await this.redis.quit();
    this.logger.info('Queue transport closed', { queue: this.queueName });
  }

  private toQueueMessage(raw: string): QueueMessage {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      // Not one of our envelopes; the reconciler decides what to do with the body.
      return { id: 'unknown', body: raw, enqueuedAt: '', lockToken: raw };
    }
    const envelope = envelopeSchema.safeParse(parsed);
    if (!envelope.success) {
      return { id: 'unknown', body: raw, enqueuedAt: '', lockToken: raw };
    }
    return { ...envelope.data, lockToken: raw };
  }
}
