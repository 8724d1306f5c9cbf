// src/index.ts

import { createServer } from 'http';
import Redis from 'ioredis';
import OpenAI from 'openai';

import { AppConfig, loadConfig } from './config';
import { createLogger } from './utils/logger';
import { createApp } from './app';
import { OpenAIAgentRuntime } from './services/agent/OpenAIAgentRuntime';
import { ProcessRegistry } from './services/process/ProcessRegistry';
import { StatusReconciler } from './services/process/StatusReconciler';
import { RedisQueueTransport } from './services/queue/RedisQueueTransport';
import { ToolConfigManager } from './services/tool/ToolConfigManager';
import { ToolDispatcher } from './services/tool/ToolDispatcher';
import { RunDriver } from './services/run/RunDriver';
import { ConversationGateway } from './services/conversation/ConversationGateway';
import { ApprovalWorkflowRunner } from './services/workflow/ApprovalWorkflowRunner';
import { LogicAppWorkflowInvoker } from './services/workflow/LogicAppWorkflowInvoker';
import { SimulatedWorkflowInvoker } from './services/workflow/SimulatedWorkflowInvoker';
import { WorkflowInvoker } from './services/workflow/workflow.types';
import { FEATURE_SPEC_SYSTEM_PROMPT } from './services/conversation/prompts/featureSpecPrompt';

const logger = createLogger('server');

function buildWorkflowInvoker(config: AppConfig): WorkflowInvoker {
  const invokerLogger = createLogger('WorkflowInvoker');
  if (config.WORKFLOW_MODE === 'simulated') {
    return new SimulatedWorkflowInvoker(config.SIMULATED_WORKFLOW_DELAY_MS, { logger: invokerLogger });
  }

  const invoker = new LogicAppWorkflowInvoker({
    logger: invokerLogger,
    subscriptionId: config.AZURE_SUBSCRIPTION_ID,
    resourceGroup: config.AZURE_RESOURCE_GROUP,
    managementToken: config.AZURE_MANAGEMENT_TOKEN,
    approvalActionName: config.APPROVAL_ACTION_NAME,
  });
  invoker.registerWorkflow(config.LOGIC_APP_NAME, config.LOGIC_APP_CALLBACK_URL);
  return invoker;
}

async function main(): Promise<void> {
  const config = loadConfig();

  const redis = new Redis(config.REDIS_URL);
  redis.on('error', (error: Error) => logger.error('Redis connection error', { error: error.message }));
  const transport = new RedisQueueTransport(redis, config.STATUS_QUEUE_NAME, { logger: createLogger('RedisQueueTransport') });
  await transport.recoverInFlight();

  const registry = new ProcessRegistry({ logger: createLogger('ProcessRegistry') });
  const reconciler = new StatusReconciler({
    logger: createLogger('StatusReconciler'),
    registry,
    transport,
    maxBatchSize: config.RECONCILER_BATCH_SIZE,
    maxWaitMs: config.RECONCILER_MAX_WAIT_MS,
    malformedPolicy: config.MALFORMED_EVENT_POLICY,
  });

  const toolConfigManager = new ToolConfigManager(config.TOOL_CONFIG_PATH);
  const runner = new ApprovalWorkflowRunner({
    logger: createLogger('ApprovalWorkflowRunner'),
    invoker: buildWorkflowInvoker(config),
    transport,
    workflowName: config.LOGIC_APP_NAME,
    pollIntervalMs: config.WORKFLOW_POLL_INTERVAL_MS,
    timeoutMs: config.WORKFLOW_TIMEOUT_MS,
  });
  const dispatcher = new ToolDispatcher({
    logger: createLogger('ToolDispatcher'),
    registry,
    launcher: runner,
    toolConfigManager,
  });

  const openai = new OpenAI({ apiKey: config.OPENAI_API_KEY, baseURL: config.OPENAI_BASE_URL || undefined });
  const runtime = new OpenAIAgentRuntime(openai, { logger: createLogger('OpenAIAgentRuntime') });
  const assistantId = await runtime.ensureAssistant({
    assistantId: config.ASSISTANT_ID || undefined,
    name: config.ASSISTANT_NAME,
    model: config.MODEL_NAME,
    instructions: FEATURE_SPEC_SYSTEM_PROMPT,
    tools: toolConfigManager.getToolDefinitions(),
  });

  const driver = new RunDriver({
    logger: createLogger('RunDriver'),
    runtime,
    dispatcher,
    assistantId,
    pollIntervalMs: config.RUN_POLL_INTERVAL_MS,
    maxPollIntervalMs: config.RUN_MAX_POLL_INTERVAL_MS,
    turnTimeoutMs: config.RUN_TIMEOUT_MS,
  });
  const gateway = new ConversationGateway({ logger: createLogger('ConversationGateway'), runtime, driver, registry });

  reconciler.start();

  const server = createServer(createApp({ gateway, logger }));
  server.listen(config.PORT, () => {
    logger.info('Server listening', { port: config.PORT, assistantId, workflowMode: config.WORKFLOW_MODE });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal, activeWorkflows: runner.activeCount });

    await new Promise<void>((resolve) => server.close(() => resolve()));
    await reconciler.stop();
    await transport.close();
    logger.info('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error) => {
          logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
          process.exit(1);
        });
    });
  }
}

main().catch((error) => {
  logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
