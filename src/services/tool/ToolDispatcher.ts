// src/services/tool/ToolDispatcher.ts

import { v4 as uuidv4 } from 'uuid';
import { BaseService } from '../base/BaseService';
import { Logger } from '../base/types';
import { ToolExecutionError, errorMessage } from '../../errors';
import { ProcessRegistry } from '../process/ProcessRegistry';
import { ApprovalRequest } from '../workflow/ApprovalWorkflowRunner';
import { ToolCallResult } from '../agent/agent.types';
import { ToolConfigManager } from './ToolConfigManager';
import { ToolArguments, ToolCallRequest, ToolHandler, ToolInvocationContext } from './tool.types';

export const START_PROCESS_TOOL = 'start_long_running_process';
export const CHECK_INBOX_TOOL = 'check_process_inbox';

/** Anything that can take delegated work off the caller's hands without blocking it. */
export interface DelegatedWorkLauncher {
  launch(request: ApprovalRequest): void;
}

export interface ToolDispatcherConfig {
  logger: Logger;
  registry: ProcessRegistry;
  launcher: DelegatedWorkLauncher;
  toolConfigManager: ToolConfigManager;
  generateProcessId?: () => string;
}

/**
 * Routes tool calls either to a synchronous handler or to long-running process registration.
 * The handler map is built once; dispatch never waits on delegated work.
 */
export class ToolDispatcher extends BaseService {
  private readonly registry: ProcessRegistry;
  private readonly launcher: DelegatedWorkLauncher;
  private readonly toolConfigManager: ToolConfigManager;
  private readonly generateProcessId: () => string;
  private readonly handlers: ReadonlyMap<string, ToolHandler>;

  constructor(config: ToolDispatcherConfig) {
    super(config);
    this.registry = config.registry;
    this.launcher = config.launcher;
    this.toolConfigManager = config.toolConfigManager;
    this.generateProcessId = config.generateProcessId ?? (() => uuidv4());

    this.handlers = new Map<string, ToolHandler>([
      [START_PROCESS_TOOL, (args, context) => this.startLongRunningProcess(args, context)],
      [CHECK_INBOX_TOOL, (args) => this.checkProcessInbox(args)],
    ]);

    const unconfigured = Array.from(this.handlers.keys()).filter((name) => !this.toolConfigManager.toolExists(name));
    if (unconfigured.length > 0) {
      throw new Error(`Tool handlers without a tool definition: ${unconfigured.join(', ')}`);
    }
  }

  get toolNames(): string[] {
    return Array.from(this.handlers.keys());
  }

  /**
   * Executes one tool call. Any failure surfaces as ToolExecutionError for the caller to
   * handle per call.
   */
  async dispatch(call: ToolCallRequest, context: ToolInvocationContext): Promise<ToolCallResult> {
    const handler = this.handlers.get(call.name);
    if (!handler) {
      throw new ToolExecutionError(call.name, `Unknown tool '${call.name}'`);
    }

    const args = parseArguments(call);
    try {
      this.toolConfigManager.validateToolArgs(call.name, args);
    } catch (error) {
      throw new ToolExecutionError(call.name, errorMessage(error), { cause: error });
    }

    this.logger.info('Executing tool call', { toolName: call.name, toolCallId: call.id, runId: context.runId });
    try {
      const output = await handler(args, context);
      return { toolCallId: call.id, output };
    } catch (error) {
      throw new ToolExecutionError(call.name, `Tool '${call.name}' failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private startLongRunningProcess(args: ToolArguments, context: ToolInvocationContext): string {
    const featureSpec = String(args.feature_spec);
    const processId = this.generateProcessId();

    const entry = this.registry.create(processId, { threadId: context.threadId });
    this.launcher.launch({ processId, threadId: context.threadId, featureSpec });

    this.logger.info('Started long running process', { processId, threadId: context.threadId });
    return `Started long running process ${processId} (Status: ${entry.status})`;
  }

  private checkProcessInbox(args: ToolArguments): string {
    if (typeof args.process_id === 'string') {
      return JSON.stringify(this.registry.get(args.process_id) ?? null);
    }
    return JSON.stringify(this.registry.list());
  }
}

function parseArguments(call: ToolCallRequest): ToolArguments {
  if (call.arguments.trim() === '') return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(call.arguments);
  } catch (error) {
    throw new ToolExecutionError(call.name, `Arguments are not valid JSON: ${errorMessage(error)}`, { cause: error });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ToolExecutionError(call.name, 'Arguments must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}
