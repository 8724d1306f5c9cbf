// src/services/workflow/SimulatedWorkflowInvoker.ts

import { v4 as uuidv4 } from 'uuid';
import { BaseService } from '../base/BaseService';
import { Logger } from '../base/types';
import { NotFoundError } from '../../errors';
import { WorkflowInvoker, WorkflowStatus } from './workflow.types';

export const SIMULATED_ACTION_REQUEST = {
  step_name: 'Legal department approval',
  send_to: 'User proxy',
  action:
    'Legal department wants to know what country this feature should be deployed in, USA or UK? Get the response from the user',
};

/**
 * Demo stand-in for an approval workflow: stays running for `delayMs`, then asks the
 * user (through the agent) for more information.
 */
export class SimulatedWorkflowInvoker extends BaseService implements WorkflowInvoker {
  private readonly startedAt = new Map<string, number>();

  constructor(private readonly delayMs: number, config: { logger: Logger }) {
    super(config);
  }

  async invoke(workflowName: string, payload: Record<string, unknown>): Promise<string> {
    const runId = `sim-${uuidv4()}`;
    this.startedAt.set(runId, Date.now());
    this.logger.info('Simulating long running workflow', { workflowName, runId, processId: payload.process_id });
    return runId;
  }

  async getStatus(workflowName: string, runId: string): Promise<WorkflowStatus> {
    const started = this.startedAt.get(runId);
    if (started === undefined) {
      throw new NotFoundError(`workflow run of ${workflowName}`, runId);
    }
    if (Date.now() - started < this.delayMs) {
      return { state: 'running' };
    }
    return { state: 'requires_action', output: { ...SIMULATED_ACTION_REQUEST } };
  }
}
