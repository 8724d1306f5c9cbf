// src/services/conversation/ConversationGateway.ts

import { BaseService } from '../base/BaseService';
import { Logger } from '../base/types';
import { NotFoundError } from '../../errors';
import { AgentRuntime, MessageRole } from '../agent/agent.types';
import { ProcessRegistry } from '../process/ProcessRegistry';
import { LongRunningProcess } from '../process/process.types';
import { RunDriver } from '../run/RunDriver';
import { TurnOptions } from '../run/run.types';

export interface ThreadView {
  threadId: string;
  messages: Array<{ role: MessageRole; content: string }>;
}

export interface ConversationGatewayConfig {
  logger: Logger;
  runtime: AgentRuntime;
  driver: RunDriver;
  registry: ProcessRegistry;
}

/**
 * Boundary used by the HTTP layer: threads, chat turns and process listing.
 */
export class ConversationGateway extends BaseService {
  private readonly runtime: AgentRuntime;
  private readonly driver: RunDriver;
  private readonly registry: ProcessRegistry;
  // A thread accepts one run at a time; later turns on the same thread wait their turn.
  private readonly threadTails = new Map<string, Promise<unknown>>();

  constructor(config: ConversationGatewayConfig) {
    super(config);
    this.runtime = config.runtime;
    this.driver = config.driver;
    this.registry = config.registry;
  }

  async createThread(): Promise<ThreadView> {
    const thread = await this.runtime.createThread();
    return this.threadView(thread.id);
  }

  async getThread(threadId: string): Promise<ThreadView> {
    await this.runtime.getThread(threadId);
    return this.threadView(threadId);
  }

  async chat(threadId: string, message: string, options: TurnOptions = {}): Promise<string> {
    await this.runtime.getThread(threadId);

    const previous = this.threadTails.get(threadId) ?? Promise.resolve();
    const turn = previous
      // The previous turn's failure is reported to its own caller.
      .catch(() => undefined)
      .then(() => this.driver.runTurn(threadId, message, options));
    this.threadTails.set(threadId, turn);

    try {
      const result = await turn;
      return result.response;
    } finally {
      if (this.threadTails.get(threadId) === turn) {
        this.threadTails.delete(threadId);
      }
    }
  }

  listProcesses(): LongRunningProcess[] {
    return this.registry.list();
  }

  getProcess(processId: string): LongRunningProcess {
    const entry = this.registry.get(processId);
    if (!entry) {
      throw new NotFoundError('process', processId);
    }
    return entry;
  }

  private async threadView(threadId: string): Promise<ThreadView> {
    const messages = await this.runtime.listMessages(threadId);
    return {
      threadId,
      messages: messages.map(({ role, content }) => ({ role, content })),
    };
  }
}
