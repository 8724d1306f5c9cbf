// src/services/agent/agent.types.ts

import { ToolDefinition } from '../tool/tool.types';

export type RunStatus =
  | 'queued'
  | 'in_progress'
  | 'requires_action'
  | 'cancelling'
  | 'cancelled'
  | 'failed'
  | 'completed'
  | 'incomplete'
  | 'expired';

export const TERMINAL_RUN_STATUSES: ReadonlySet<RunStatus> = new Set<RunStatus>([
  'cancelled',
  'failed',
  'completed',
  'incomplete',
  'expired',
]);

export interface ToolCallRequest {
  id: string;
  name: string;
  /** Raw JSON argument string exactly as the runtime produced it. */
  arguments: string;
}

export interface ToolCallResult {
  toolCallId: string;
  output: string;
}

export interface ConversationRun {
  id: string;
  threadId: string;
  status: RunStatus;
  /** Present only while status is requires_action. */
  requiredToolCalls: ToolCallRequest[];
  lastError?: string;
}

export type MessageRole = 'user' | 'assistant';

export interface ThreadMessage {
  id: string;
  role: MessageRole;
  content: string;
  createdAt: number;
}

export interface AssistantDefinition {
  assistantId?: string;
  name: string;
  model: string;
  instructions: string;
  tools: ToolDefinition[];
}

/**
 * What the orchestration core needs from the model-backed agent runtime.
 * getThread and thread-scoped calls reject with NotFoundError for unknown threads.
 */
export interface AgentRuntime {
  ensureAssistant(definition: AssistantDefinition): Promise<string>;
  createThread(): Promise<{ id: string }>;
  getThread(threadId: string): Promise<{ id: string }>;
  createMessage(threadId: string, content: string): Promise<void>;
  /** Oldest first. */
  listMessages(threadId: string): Promise<ThreadMessage[]>;
  createRun(threadId: string, assistantId: string): Promise<ConversationRun>;
  getRun(threadId: string, runId: string): Promise<ConversationRun>;
  cancelRun(threadId: string, runId: string): Promise<void>;
  submitToolOutputs(threadId: string, runId: string, results: ToolCallResult[]): Promise<void>;
}
