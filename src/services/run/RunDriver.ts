// src/services/run/RunDriver.ts

import { setTimeout as delay } from 'timers/promises';
import { BaseService } from '../base/BaseService';
import { Logger } from '../base/types';
import {
  RunCancelledError,
  RunFailedError,
  RunTimeoutError,
  StalledRunError,
} from '../../errors';
import {
  AgentRuntime,
  ConversationRun,
  TERMINAL_RUN_STATUSES,
  ThreadMessage,
  ToolCallRequest,
  ToolCallResult,
} from '../agent/agent.types';
import { ToolInvocationContext } from '../tool/tool.types';
import { TurnOptions, TurnResult } from './run.types';

export interface ToolCallDispatcher {
  dispatch(call: ToolCallRequest, context: ToolInvocationContext): Promise<ToolCallResult>;
}

export interface RunDriverConfig {
  logger: Logger;
  runtime: AgentRuntime;
  dispatcher: ToolCallDispatcher;
  assistantId: string;
  pollIntervalMs?: number;
  maxPollIntervalMs?: number;
  pollBackoffFactor?: number;
  turnTimeoutMs?: number;
}

/**
 * Drives one conversation turn: posts the user message, starts a run and polls it to a
 * terminal state, answering every requires_action round with a single batch of tool outputs.
 */
export class RunDriver extends BaseService {
  private readonly runtime: AgentRuntime;
  private readonly dispatcher: ToolCallDispatcher;
  private readonly assistantId: string;
  private readonly pollIntervalMs: number;
  private readonly maxPollIntervalMs: number;
  private readonly pollBackoffFactor: number;
  private readonly turnTimeoutMs: number;

  constructor(config: RunDriverConfig) {
    super(config);
    this.runtime = config.runtime;
    this.dispatcher = config.dispatcher;
    this.assistantId = config.assistantId;
    this.pollIntervalMs = config.pollIntervalMs ?? 1000;
    this.maxPollIntervalMs = Math.max(config.maxPollIntervalMs ?? 5000, this.pollIntervalMs);
    this.pollBackoffFactor = config.pollBackoffFactor ?? 1.5;
    this.turnTimeoutMs = config.turnTimeoutMs ?? 120000;
  }

  async runTurn(threadId: string, text: string, options: TurnOptions = {}): Promise<TurnResult> {
    const { signal } = options;
    const startedAt = Date.now();
    const deadline = startedAt + this.turnTimeoutMs;

    await this.runtime.createMessage(threadId, text);
    let run = await this.runtime.createRun(threadId, this.assistantId);
    this.logger.info('Run started', { threadId, runId: run.id, status: run.status });

    const answered = new Set<string>();
    let toolCallCount = 0;
    let interval = this.pollIntervalMs;

    while (!TERMINAL_RUN_STATUSES.has(run.status)) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        await this.cancelQuietly(run, 'timeout');
        throw new RunTimeoutError(run.id, this.turnTimeoutMs);
      }

      try {
        await delay(Math.min(interval, remaining), undefined, { signal });
      } catch (error) {
        if (signal?.aborted) {
          await this.cancelQuietly(run, 'aborted');
          throw new RunCancelledError(run.id);
        }
        throw error;
      }

      run = await this.runtime.getRun(threadId, run.id);
      this.logger.debug('Run polled', { runId: run.id, status: run.status, nextDelayMs: interval });

      if (run.status !== 'requires_action') {
        interval = Math.min(interval * this.pollBackoffFactor, this.maxPollIntervalMs);
        continue;
      }

      if (run.requiredToolCalls.length === 0) {
        this.logger.warn('Run requires action but provided no tool calls; cancelling', { runId: run.id });
        await this.cancelQuietly(run, 'stalled');
        throw new StalledRunError(run.id);
      }

      // The runtime may report the same round again before it has seen our submission.
      const pending = run.requiredToolCalls.filter((call) => !answered.has(call.id));
      if (pending.length === 0) continue;

      const results = await this.resolveToolCalls(run, pending);
      pending.forEach((call) => answered.add(call.id));
      toolCallCount += pending.length;

      if (results.length > 0) {
        await this.runtime.submitToolOutputs(threadId, run.id, results);
        this.logger.info('Tool outputs submitted', { runId: run.id, submitted: results.length, requested: pending.length });
      } else {
        this.logger.warn('No tool outputs to submit; every tool call failed', { runId: run.id, requested: pending.length });
      }
      interval = this.pollIntervalMs;
    }

    if (run.status !== 'completed') {
      this.logger.error('Run ended without completing', { runId: run.id, status: run.status, lastError: run.lastError });
      throw new RunFailedError(run.id, run.status, run.lastError);
    }

    const messages = await this.runtime.listMessages(threadId);
    const response = latestAssistantMessage(messages)?.content ?? '';
    this.logger.info('Run completed', { threadId, runId: run.id, toolCalls: toolCallCount, durationMs: Date.now() - startedAt });

    return { threadId, runId: run.id, status: 'completed', response, toolCallCount };
  }

  /**
   * Dispatches the calls in the order the runtime listed them. A failing call is logged and
   * left out of the batch; it never aborts the turn.
   */
  private async resolveToolCalls(run: ConversationRun, calls: ToolCallRequest[]): Promise<ToolCallResult[]> {
    const context: ToolInvocationContext = { threadId: run.threadId, runId: run.id };
    const results: ToolCallResult[] = [];

    for (const call of calls) {
      try {
        results.push(await this.dispatcher.dispatch(call, context));
      } catch (error) {
        this.logFailure('error', 'Error executing tool call', error, {
          runId: run.id,
          toolCallId: call.id,
          toolName: call.name,
        });
      }
    }
    return results;
  }

  private async cancelQuietly(run: ConversationRun, reason: string): Promise<void> {
    try {
      await this.runtime.cancelRun(run.threadId, run.id);
    } catch (error) {
      this.logFailure('warn', 'Failed to cancel run', error, { runId: run.id, reason });
    }
  }
}

export function latestAssistantMessage(messages: ThreadMessage[]): ThreadMessage | undefined {
  let latest: ThreadMessage | undefined;
  for (const message of messages) {
    if (message.role !== 'assistant') continue;
    if (!latest || message.createdAt >= latest.createdAt) {
      latest = message;
    }
  }
  return latest;
}
