import { WorkflowInvoker, WorkflowStatus } from '../../src/services/workflow/workflow.types';

/**
 * Returns the scripted statuses in order, one per getStatus call; the last one repeats.
 */
export class StubWorkflowInvoker implements WorkflowInvoker {
  readonly invocations: Array<{ workflowName: string; payload: Record<string, unknown> }> = [];
  statusCalls = 0;
  invokeError?: Error;

  constructor(private readonly statuses: Array<WorkflowStatus | Error>) {}

  async invoke(workflowName: string, payload: Record<string, unknown>): Promise<string> {
    if (this.invokeError) throw this.invokeError;
    this.invocations.push({ workflowName, payload });
    return `wf-run-${this.invocations.length}`;
  }

  async getStatus(): Promise<WorkflowStatus> {
    const next = this.statuses[Math.min(this.statusCalls, this.statuses.length - 1)];
    this.statusCalls++;
    if (next instanceof Error) throw next;
    return next;
  }
}
