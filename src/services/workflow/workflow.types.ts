// src/services/workflow/workflow.types.ts

export type WorkflowState = 'running' | 'requires_action' | 'succeeded' | 'failed';

export interface WorkflowStatus {
  state: WorkflowState;
  /** Decision or action payload reported by the workflow, when it has one. */
  output?: Record<string, unknown>;
}

export interface WorkflowInvoker {
  /** Triggers the named workflow and returns its correlation (run) id. */
  invoke(workflowName: string, payload: Record<string, unknown>): Promise<string>;
  getStatus(workflowName: string, runId: string): Promise<WorkflowStatus>;
}
