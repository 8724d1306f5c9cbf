// src/services/workflow/LogicAppWorkflowInvoker.ts

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { BaseService } from '../base/BaseService';
import { Logger } from '../base/types';
import { CollaboratorUnavailableError, errorMessage } from '../../errors';
import { WorkflowInvoker, WorkflowStatus } from './workflow.types';

const API_VERSION = '2016-06-01';

const RUNNING_STATES = new Set(['Running', 'Waiting', 'Paused', 'Suspended', 'NotSpecified']);

const runSchema = z.object({
  properties: z.object({ status: z.string() }),
});

const actionsSchema = z.object({
  value: z.array(
    z.object({
      name: z.string(),
      properties: z
        .object({ outputsLink: z.object({ uri: z.string() }).optional() })
        .optional(),
    }),
  ),
});

const approvalOutputSchema = z.object({
  body: z.object({ SelectedOption: z.string() }).passthrough(),
});

export interface LogicAppInvokerConfig {
  logger: Logger;
  subscriptionId: string;
  resourceGroup: string;
  /** Bearer token for the management API. */
  managementToken: string;
  /** Name of the action whose output carries the approver's choice. */
  approvalActionName: string;
  managementBaseUrl?: string;
  timeoutMs?: number;
}

/**
 * Invokes Logic App workflows through their HTTP trigger callback URL and reads run
 * status and the approval decision back from the management API.
 */
export class LogicAppWorkflowInvoker extends BaseService implements WorkflowInvoker {
  private readonly callbackUrls = new Map<string, string>();
  private readonly management: AxiosInstance;
  private readonly http: AxiosInstance;

  constructor(private readonly config: LogicAppInvokerConfig) {
    super(config);
    const timeout = config.timeoutMs ?? 30000;
    this.http = axios.create({ timeout });
    this.management = axios.create({
      baseURL: config.managementBaseUrl ?? 'https://management.azure.com',
      timeout,
      headers: { Authorization: `Bearer ${config.managementToken}` },
    });
  }

  registerWorkflow(workflowName: string, callbackUrl: string): void {
    if (!callbackUrl) {
      throw new Error(`No callback URL provided for Logic App '${workflowName}'.`);
    }
    this.callbackUrls.set(workflowName, callbackUrl);
    this.logger.info('Registered Logic App', { workflowName });
  }

  async invoke(workflowName: string, payload: Record<string, unknown>): Promise<string> {
    const url = this.callbackUrls.get(workflowName);
    if (!url) {
      throw new Error(`Logic App '${workflowName}' has not been registered.`);
    }

    try {
      const response = await this.http.post(url, payload);
      const runId = response.headers['x-ms-workflow-run-id'];
      if (typeof runId !== 'string' || runId === '') {
        throw new Error(`Logic App '${workflowName}' accepted the request but returned no run id`);
      }
      this.logger.info('Logic App invoked', { workflowName, runId });
      return runId;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const detail = error.response
          ? `(${error.response.status}): ${JSON.stringify(error.response.data)}`
          : error.message;
        throw new CollaboratorUnavailableError('workflow-invoker', `Error invoking ${workflowName} ${detail}`, { cause: error });
      }
      throw error;
    }
  }

  async getStatus(workflowName: string, runId: string): Promise<WorkflowStatus> {
    const run = runSchema.parse(await this.getManagement(`${this.workflowPath(workflowName)}/runs/${runId}`));
    const status = run.properties.status;

    if (RUNNING_STATES.has(status)) {
      return { state: 'running' };
    }
    if (status !== 'Succeeded') {
      this.logger.warn('Logic App run ended unsuccessfully', { workflowName, runId, status });
      return { state: 'failed', output: { status } };
    }

    const decision = await this.readDecision(workflowName, runId);
    this.logger.info('Logic App run succeeded', { workflowName, runId, decision });
    return { state: 'succeeded', output: decision === undefined ? {} : { decision } };
  }

  private async readDecision(workflowName: string, runId: string): Promise<string | undefined> {
    const actions = actionsSchema.parse(
      await this.getManagement(`${this.workflowPath(workflowName)}/runs/${runId}/actions`),
    );
    const approval = actions.value.find((action) => action.name === this.config.approvalActionName);
    const outputsUri = approval?.properties?.outputsLink?.uri;
    if (!outputsUri) {
      this.logger.warn('Approval action output not found', { workflowName, runId, action: this.config.approvalActionName });
      return undefined;
    }

    const response = await this.http.get(outputsUri);
    const parsed = approvalOutputSchema.safeParse(response.data);
    return parsed.success ? parsed.data.body.SelectedOption : undefined;
  }

  private async getManagement(path: string): Promise<unknown> {
    try {
      const response = await this.management.get(path, { params: { 'api-version': API_VERSION } });
      return response.data;
    } catch (error) {
      throw new CollaboratorUnavailableError('workflow-invoker', `GET ${path} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private workflowPath(workflowName: string): string {
    const { subscriptionId, resourceGroup } = this.config;
    return `/subscriptions/${subscriptionId}/resourceGroups/${resourceGroup}/providers/Microsoft.Logic/workflows/${workflowName}`;
  }
}
