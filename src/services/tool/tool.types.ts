// src/services/tool/tool.types.ts

import { ToolCallRequest } from '../agent/agent.types';

export interface ToolDefinition {
  name: string;
  description: string;
  /** JSON schema of the argument object. */
  parameters: Record<string, unknown>;
}

/** Context a handler gets beyond its own arguments. */
export interface ToolInvocationContext {
  threadId: string;
  runId: string;
}

export type ToolArguments = Record<string, unknown>;

export type ToolHandler = (args: ToolArguments, context: ToolInvocationContext) => string | Promise<string>;

export type { ToolCallRequest };
