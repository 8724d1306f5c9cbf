// src/services/agent/OpenAIAgentRuntime.ts

import OpenAI from 'openai';
import type { Run } from 'openai/resources/beta/threads/runs/runs';
import type { Message } from 'openai/resources/beta/threads/messages';
import { BaseService } from '../base/BaseService';
import { Logger } from '../base/types';
import { CollaboratorUnavailableError, NotFoundError, errorMessage } from '../../errors';
import {
  AgentRuntime,
  AssistantDefinition,
  ConversationRun,
  ThreadMessage,
  ToolCallResult,
} from './agent.types';

/**
 * AgentRuntime backed by the OpenAI Assistants API (threads, messages, runs).
 */
export class OpenAIAgentRuntime extends BaseService implements AgentRuntime {
  constructor(private readonly client: OpenAI, config: { logger: Logger }) {
    super(config);
  }

  async ensureAssistant(definition: AssistantDefinition): Promise<string> {
    if (definition.assistantId) {
      try {
        const existing = await this.client.beta.assistants.retrieve(definition.assistantId);
        this.logger.info('Assistant found', { assistantId: existing.id });
        return existing.id;
      } catch (error) {
        if (!(error instanceof OpenAI.NotFoundError)) {
          throw this.translate(error, 'assistant', definition.assistantId);
        }
        this.logger.warn('Configured assistant not found, creating one', { assistantId: definition.assistantId });
      }
    }

    const created = await this.call('assistant', definition.name, () =>
      this.client.beta.assistants.create({
        model: definition.model,
        name: definition.name,
        instructions: definition.instructions,
        tools: definition.tools.map((tool) => ({
          type: 'function' as const,
          function: { name: tool.name, description: tool.description, parameters: tool.parameters },
        })),
      }),
    );
    this.logger.info('Assistant created', { assistantId: created.id, name: definition.name });
    return created.id;
  }

  async createThread(): Promise<{ id: string }> {
    const thread = await this.call('thread', 'new', () => this.client.beta.threads.create());
    this.logger.info('Thread created', { threadId: thread.id });
    return { id: thread.id };
  }

  async getThread(threadId: string): Promise<{ id: string }> {
    const thread = await this.call('thread', threadId, () => this.client.beta.threads.retrieve(threadId));
    return { id: thread.id };
  }

  async createMessage(threadId: string, content: string): Promise<void> {
    await this.call('thread', threadId, () =>
      this.client.beta.threads.messages.create(threadId, { role: 'user', content }),
    );
  }

  async listMessages(threadId: string): Promise<ThreadMessage[]> {
    return this.call('thread', threadId, async () => {
      const messages: ThreadMessage[] = [];
      for await (const message of this.client.beta.threads.messages.list(threadId, { order: 'asc', limit: 100 })) {
        messages.push(toThreadMessage(message));
      }
      return messages;
    });
  }

  async createRun(threadId: string, assistantId: string): Promise<ConversationRun> {
    const run = await this.call('thread', threadId, () =>
      this.client.beta.threads.runs.create(threadId, { assistant_id: assistantId }),
    );
    this.logger.info('Run created', { threadId, runId: run.id, status: run.status });
    return toConversationRun(run);
  }

  async getRun(threadId: string, runId: string): Promise<ConversationRun> {
    const run = await this.call('run', runId, () => this.client.beta.threads.runs.retrieve(threadId, runId));
    return toConversationRun(run);
  }

  async cancelRun(threadId: string, runId: string): Promise<void> {
    await this.call('run', runId, () => this.client.beta.threads.runs.cancel(threadId, runId));
    this.logger.info('Run cancelled', { threadId, runId });
  }

  async submitToolOutputs(threadId: string, runId: string, results: ToolCallResult[]): Promise<void> {
    await this.call('run', runId, () =>
      this.client.beta.threads.runs.submitToolOutputs(threadId, runId, {
        tool_outputs: results.map((result) => ({ tool_call_id: result.toolCallId, output: result.output })),
      }),
    );
  }

  private async call<T>(resource: string, id: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw this.translate(error, resource, id);
    }
  }

  private translate(error: unknown, resource: string, id: string): Error {
    if (error instanceof OpenAI.NotFoundError) {
      return new NotFoundError(resource, id);
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return new CollaboratorUnavailableError('agent-runtime', errorMessage(error), { cause: error });
    }
    if (error instanceof OpenAI.APIError && (error.status === undefined || error.status >= 500 || error.status === 429)) {
      return new CollaboratorUnavailableError('agent-runtime', errorMessage(error), { cause: error });
    }
    return error instanceof Error ? error : new Error(String(error));
  }
}

export function toConversationRun(run: Run): ConversationRun {
  const toolCalls = run.status === 'requires_action' ? run.required_action?.submit_tool_outputs.tool_calls ?? [] : [];
  return {
    id: run.id,
    threadId: run.thread_id,
    status: run.status,
    requiredToolCalls: toolCalls.map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: call.function.arguments,
    })),
    lastError: run.last_error?.message,
  };
}

export function toThreadMessage(message: Message): ThreadMessage {
  const content = message.content
    .map((block) => (block.type === 'text' ? block.text.value : ''))
    .filter((text) => text.length > 0)
    .join('\n');
  return { id: message.id, role: message.role, content, createdAt: message.created_at };
}
