// src/services/workflow/ApprovalWorkflowRunner.ts

import { setTimeout as delay } from 'timers/promises';
import { ExponentialBackoff, RetryPolicy, handleAll, retry } from 'cockatiel';
import { BaseService } from '../base/BaseService';
import { Logger } from '../base/types';
import { errorMessage } from '../../errors';
import { QueueTransport } from '../queue/queue.types';
import { ProcessStatusEvent } from '../process/process.types';
import { WorkflowInvoker, WorkflowState } from './workflow.types';

export interface ApprovalRequest {
  processId: string;
  threadId?: string;
  featureSpec: string;
}

export interface ApprovalWorkflowRunnerConfig {
  logger: Logger;
  invoker: WorkflowInvoker;
  transport: QueueTransport;
  workflowName: string;
  pollIntervalMs: number;
  timeoutMs: number;
  publishRetry?: {
    maxAttempts?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
  };
}

/**
 * Runs delegated approval work detached from the chat turn that started it.
 *
 * The only way results get back is a status event on the queue; the Status Reconciler
 * applies it to the registry like any other external update.
 */
export class ApprovalWorkflowRunner extends BaseService {
  private readonly inFlight = new Set<Promise<void>>();
  private readonly publishPolicy: RetryPolicy;

  constructor(private readonly config: ApprovalWorkflowRunnerConfig) {
    super(config);
    this.publishPolicy = retry(handleAll, {
      maxAttempts: config.publishRetry?.maxAttempts ?? 5,
      backoff: new ExponentialBackoff({
        initialDelay: config.publishRetry?.initialDelayMs ?? 500,
        maxDelay: config.publishRetry?.maxDelayMs ?? 30000,
      }),
    });
    this.publishPolicy.onRetry((reason) => {
      this.logger.warn('Publishing process status event failed, retrying', {
        attempt: reason.attempt,
        delayMs: reason.delay,
        error: 'error' in reason ? errorMessage(reason.error) : undefined,
      });
    });
  }

  get activeCount(): number {
    return this.inFlight.size;
  }

  /**
   * Schedules the workflow and returns at once.
   */
  launch(request: ApprovalRequest): void {
    const task = this.run(request)
      .catch((error) => {
        this.logFailure('error', 'Approval workflow task crashed', error, { processId: request.processId });
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  /**
   * Resolves when every launched task has finished. Used by tests and diagnostics;
   * shutdown does not wait for delegated work.
   */
  async settled(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  private async run({ processId, threadId, featureSpec }: ApprovalRequest): Promise<void> {
    const { invoker, workflowName, pollIntervalMs, timeoutMs } = this.config;

    let runId: string;
    try {
      runId = await invoker.invoke(workflowName, { process_id: processId, thread_id: threadId, feature_spec: featureSpec });
    } catch (error) {
      this.logFailure('error', 'Workflow invocation failed', error, { processId, workflowName });
      await this.publish({ process_id: processId, status: 'failed', message: { error: errorMessage(error) } });
      return;
    }

    const deadline = Date.now() + timeoutMs;
    let lastState: WorkflowState = 'running';

    while (Date.now() < deadline) {
      await delay(pollIntervalMs);

      let state: WorkflowState;
      let output: Record<string, unknown>;
      try {
        const status = await invoker.getStatus(workflowName, runId);
        state = status.state;
        output = status.output ?? {};
      } catch (error) {
        this.logFailure('warn', 'Workflow status check failed; will retry', error, { processId, runId });
        continue;
      }

      if (state === lastState) continue;
      lastState = state;

      switch (state) {
        case 'running':
          break;
        case 'requires_action':
          await this.publish({ process_id: processId, status: 'requires_action', message: output });
          break;
        case 'succeeded': {
          const decision = typeof output.decision === 'string' ? output.decision : undefined;
          const summary = decision ? `Your request was ${decision} by approver` : 'Workflow completed';
          await this.publish({ process_id: processId, status: 'completed', message: { ...output, summary } });
          return;
        }
        case 'failed':
          await this.publish({ process_id: processId, status: 'failed', message: output });
          return;
      }
    }

    this.logger.warn('Stopped polling workflow after timeout', { processId, runId, timeoutMs, lastState });
    await this.publish({ process_id: processId, status: 'failed', message: { error: 'workflow timed out', lastState } });
  }

  private async publish(event: ProcessStatusEvent): Promise<void> {
    try {
      const body = JSON.stringify(event);
      await this.publishPolicy.execute(() => this.config.transport.send(body));
      this.logger.info('Published process status event', { processId: event.process_id, status: event.status });
    } catch (error) {
      this.logFailure('error', 'Failed to publish process status event after retries', error, {
        processId: event.process_id,
        status: event.status,
      });
    }
  }
}
