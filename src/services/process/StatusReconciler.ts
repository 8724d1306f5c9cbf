// src/services/process/StatusReconciler.ts

import { setTimeout as delay } from 'timers/promises';
import { ExponentialBackoff, RetryPolicy, handleAll, retry } from 'cockatiel';
import { z } from 'zod';
import { BaseService } from '../base/BaseService';
import { Logger } from '../base/types';
import { MalformedEventError, errorMessage } from '../../errors';
import { QueueMessage, QueueTransport } from '../queue/queue.types';
import { ProcessRegistry } from './ProcessRegistry';
import { ProcessStatusEvent, normalizeProcessStatus } from './process.types';
import type { MalformedEventPolicy } from '../../config';

const statusEventSchema = z.object({
  process_id: z.string().min(1),
  status: z.string().min(1),
  message: z.record(z.unknown()).optional().default({}),
});

export interface StatusReconcilerConfig {
  logger: Logger;
  registry: ProcessRegistry;
  transport: QueueTransport;
  maxBatchSize?: number;
  maxWaitMs?: number;
  malformedPolicy?: MalformedEventPolicy;
  retry?: {
    maxAttempts?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
  };
}

export type MessageOutcome = 'applied' | 'ignored' | 'dead-lettered' | 'dropped';

/**
 * Parses a raw queue body into a status event. Throws MalformedEventError.
 */
export function parseStatusEvent(body: string): ProcessStatusEvent {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new MalformedEventError(`Body is not valid JSON: ${errorMessage(error)}`);
  }

  const result = statusEventSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new MalformedEventError(`Invalid status event (${issues.join('; ')})`);
  }

  const status = normalizeProcessStatus(result.data.status);
  if (!status) {
    throw new MalformedEventError(`Unknown process status '${result.data.status}'`);
  }

  return { process_id: result.data.process_id, status, message: result.data.message };
}

/**
 * Background consumer that applies externally reported process status changes to the registry.
 */
export class StatusReconciler extends BaseService {
  private readonly registry: ProcessRegistry;
  private readonly transport: QueueTransport;
  private readonly maxBatchSize: number;
  private readonly maxWaitMs: number;
  private readonly malformedPolicy: MalformedEventPolicy;
  private readonly idleAfterFailureMs: number;
  private readonly receivePolicy: RetryPolicy;

  private loop: Promise<void> | null = null;
  private abortController: AbortController | null = null;

  constructor(config: StatusReconcilerConfig) {
    super(config);
    this.registry = config.registry;
    this.transport = config.transport;
    this.maxBatchSize = config.maxBatchSize ?? 20;
    this.maxWaitMs = config.maxWaitMs ?? 5000;
    this.malformedPolicy = config.malformedPolicy ?? 'dead-letter';
    this.idleAfterFailureMs = config.retry?.maxDelayMs ?? 30000;

    this.receivePolicy = retry(handleAll, {
      maxAttempts: config.retry?.maxAttempts ?? 5,
      backoff: new ExponentialBackoff({
        initialDelay: config.retry?.initialDelayMs ?? 500,
        maxDelay: this.idleAfterFailureMs,
      }),
    });
    this.receivePolicy.onRetry((reason) => {
      this.logger.warn('Queue receive failed, retrying', {
        attempt: reason.attempt,
        delayMs: reason.delay,
        error: 'error' in reason ? errorMessage(reason.error) : undefined,
      });
    });
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;

    const controller = new AbortController();
    this.abortController = controller;
    this.loop = this.consume(controller.signal).finally(() => {
      this.loop = null;
      this.abortController = null;
    });
    this.logger.info('Status reconciler started', { maxBatchSize: this.maxBatchSize, maxWaitMs: this.maxWaitMs });
  }

  /**
   * Stops receiving and resolves once the batch in hand has been applied and acknowledged.
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;

    this.logger.info('Status reconciler stopping; draining in-flight batch');
    this.abortController?.abort();
    await loop;
    this.logger.info('Status reconciler stopped');
  }

  /**
   * Applies one received message and acknowledges it. Never throws for a bad event;
   * throws only when the transport cannot complete or dead-letter it.
   */
  async handleMessage(message: QueueMessage): Promise<MessageOutcome> {
    let event: ProcessStatusEvent;
    try {
      event = parseStatusEvent(message.body);
    } catch (error) {
      return this.handleMalformed(message, error);
    }

    const outcome = this.registry.update(event.process_id, event.status, event.message);
    // Ack strictly after the registry reflects the event; a redelivery after a crash here
    // re-applies the same update.
    await this.transport.complete(message);

    this.logger.info('Status event applied', {
      messageId: message.id,
      processId: event.process_id,
      status: event.status,
      outcome,
    });
    return outcome === 'ignored' ? 'ignored' : 'applied';
  }

  private async handleMalformed(message: QueueMessage, error: unknown): Promise<MessageOutcome> {
    const reason = errorMessage(error);
    this.logger.error('Malformed status event', { messageId: message.id, reason, policy: this.malformedPolicy });

    if (this.malformedPolicy === 'dead-letter') {
      await this.transport.deadLetter(message, reason);
      return 'dead-lettered';
    }
    await this.transport.complete(message);
    return 'dropped';
  }

  private async consume(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let batch: QueueMessage[];
      try {
        batch = await this.receivePolicy.execute(
          () => this.transport.receiveBatch({ maxMessages: this.maxBatchSize, maxWaitMs: this.maxWaitMs }),
          signal,
        );
      } catch (error) {
        if (signal.aborted) break;
        this.logFailure('error', 'Queue receive failed after retries; backing off', error, {
          idleMs: this.idleAfterFailureMs,
        });
        try {
          await delay(this.idleAfterFailureMs, undefined, { signal });
        } catch (idleError) {
          if (!signal.aborted) throw idleError;
        }
        continue;
      }

      // A batch already received is finished even when stop() was called meanwhile.
      for (const message of batch) {
        try {
          await this.handleMessage(message);
        } catch (error) {
          // Left unacknowledged; the transport redelivers it.
          this.logFailure('error', 'Failed to acknowledge status event', error, { messageId: message.id });
        }
      }
    }
  }
}
