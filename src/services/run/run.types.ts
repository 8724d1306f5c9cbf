// src/services/run/run.types.ts

export interface TurnOptions {
  /** Aborting cancels the run and ends the turn with RunCancelledError. */
  signal?: AbortSignal;
}

export interface TurnResult {
  threadId: string;
  runId: string;
  status: 'completed';
  /** Text of the most recent assistant message on the thread. */
  response: string;
  toolCallCount: number;
}
