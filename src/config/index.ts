// src/config/index.ts
import dotenv from 'dotenv';
import path from 'path';

const nodeEnv = process.env.NODE_ENV || 'development';

// Load the .env file from the project root (two levels up from src/config)
const projectRootEnvPath = path.resolve(__dirname, '../../.env');
const dotenvResult = dotenv.config({ path: projectRootEnvPath });

if (dotenvResult.error && nodeEnv === 'development') {
  console.warn(`[config] .env file not loaded from ${projectRootEnvPath}: ${dotenvResult.error.message}`);
}

// Helper function to get environment variables with defaults and critical checks
const getEnvVar = (key: string, defaultValue?: string, isCritical: boolean = false): string => {
  const value = process.env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    if (isCritical) {
      throw new Error(`[config] CRITICAL ERROR: Environment variable ${key} is missing or empty and has no default. This is required.`);
    }
    return '';
  }
  return value;
};

const getIntEnvVar = (key: string, defaultValue: number): number => {
  const raw = getEnvVar(key, String(defaultValue));
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`[config] Environment variable ${key} must be a non-negative integer, got '${raw}'`);
  }
  return parsed;
};

export type MalformedEventPolicy = 'dead-letter' | 'drop';
export type WorkflowMode = 'simulated' | 'logic-app';

const parseMalformedPolicy = (value: string): MalformedEventPolicy => {
  if (value === 'dead-letter' || value === 'drop') return value;
  throw new Error(`[config] MALFORMED_EVENT_POLICY must be 'dead-letter' or 'drop', got '${value}'`);
};

const parseWorkflowMode = (value: string): WorkflowMode => {
  if (value === 'simulated' || value === 'logic-app') return value;
  throw new Error(`[config] WORKFLOW_MODE must be 'simulated' or 'logic-app', got '${value}'`);
};

export function loadConfig() {
  return {
    NODE_ENV: nodeEnv,
    PORT: getIntEnvVar('PORT', 8000),
    LOG_LEVEL: getEnvVar('LOG_LEVEL', 'info'),

    OPENAI_API_KEY: getEnvVar('OPENAI_API_KEY', undefined, true),
    OPENAI_BASE_URL: getEnvVar('OPENAI_BASE_URL'),
    ASSISTANT_ID: getEnvVar('ASSISTANT_ID'),
    ASSISTANT_NAME: getEnvVar('ASSISTANT_NAME', 'feature-spec-agent'),
    MODEL_NAME: getEnvVar('MODEL_NAME', 'gpt-4o'),

    REDIS_URL: getEnvVar('REDIS_URL', 'redis://localhost:6379'),
    STATUS_QUEUE_NAME: getEnvVar('STATUS_QUEUE_NAME', 'process-status'),
    RECONCILER_BATCH_SIZE: getIntEnvVar('RECONCILER_BATCH_SIZE', 20),
    RECONCILER_MAX_WAIT_MS: getIntEnvVar('RECONCILER_MAX_WAIT_MS', 5000),
    MALFORMED_EVENT_POLICY: parseMalformedPolicy(getEnvVar('MALFORMED_EVENT_POLICY', 'dead-letter')),

    RUN_POLL_INTERVAL_MS: getIntEnvVar('RUN_POLL_INTERVAL_MS', 1000),
    RUN_MAX_POLL_INTERVAL_MS: getIntEnvVar('RUN_MAX_POLL_INTERVAL_MS', 5000),
    RUN_TIMEOUT_MS: getIntEnvVar('RUN_TIMEOUT_MS', 120000),

    WORKFLOW_MODE: parseWorkflowMode(getEnvVar('WORKFLOW_MODE', 'simulated')),
    LOGIC_APP_NAME: getEnvVar('LOGIC_APP_NAME', 'approval-workflow'),
    LOGIC_APP_CALLBACK_URL: getEnvVar('LOGIC_APP_CALLBACK_URL'),
    AZURE_SUBSCRIPTION_ID: getEnvVar('AZURE_SUBSCRIPTION_ID'),
    AZURE_RESOURCE_GROUP: getEnvVar('AZURE_RESOURCE_GROUP'),
    AZURE_MANAGEMENT_TOKEN: getEnvVar('AZURE_MANAGEMENT_TOKEN'),
    APPROVAL_ACTION_NAME: getEnvVar('APPROVAL_ACTION_NAME', 'Send_approval_email'),
    WORKFLOW_POLL_INTERVAL_MS: getIntEnvVar('WORKFLOW_POLL_INTERVAL_MS', 5000),
    WORKFLOW_TIMEOUT_MS: getIntEnvVar('WORKFLOW_TIMEOUT_MS', 24 * 60 * 60 * 1000),
    SIMULATED_WORKFLOW_DELAY_MS: getIntEnvVar('SIMULATED_WORKFLOW_DELAY_MS', 10000),

    TOOL_CONFIG_PATH: getEnvVar('TOOL_CONFIG_PATH', path.join(process.cwd(), 'src', 'config', 'toolConfig.json')),
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;
