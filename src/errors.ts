// src/errors.ts

export interface ApiError {
  code: string;
  message: string;
  trace_id: string;
}

export function makeError(code: string, message: string, traceId: string): ApiError {
  return { code, message, trace_id: traceId };
}

export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;

  constructor(public readonly resource: string, public readonly id: string) {
    super(`${resource} '${id}' not found`);
  }
}

export class ValidationError extends AppError {
  readonly code = 'INVALID_REQUEST';
  readonly statusCode = 400;
}

export class DuplicateProcessError extends AppError {
  readonly code = 'DUPLICATE_PROCESS';
  readonly statusCode = 409;

  constructor(public readonly processId: string) {
    super(`Process '${processId}' already exists`);
  }
}

export class ToolExecutionError extends AppError {
  readonly code = 'TOOL_EXECUTION_FAILED';
  readonly statusCode = 500;

  constructor(public readonly toolName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class MalformedEventError extends AppError {
  readonly code = 'MALFORMED_EVENT';
  readonly statusCode = 400;
}

export class StalledRunError extends AppError {
  readonly code = 'RUN_STALLED';
  readonly statusCode = 502;

  constructor(public readonly runId: string) {
    super(`Run '${runId}' requested action without any tool calls and was cancelled`);
  }
}

export class RunFailedError extends AppError {
  readonly code = 'RUN_FAILED';
  readonly statusCode = 502;

  constructor(public readonly runId: string, public readonly status: string, reason?: string) {
    super(`Run '${runId}' ended with status '${status}'${reason ? `: ${reason}` : ''}`);
  }
}

export class RunTimeoutError extends AppError {
  readonly code = 'RUN_TIMEOUT';
  readonly statusCode = 504;

  constructor(public readonly runId: string, public readonly timeoutMs: number) {
    super(`Run '${runId}' did not finish within ${timeoutMs}ms`);
  }
}

export class RunCancelledError extends AppError {
  readonly code = 'RUN_CANCELLED';
  readonly statusCode = 499;

  constructor(public readonly runId: string) {
    super(`Turn for run '${runId}' was aborted by the caller`);
  }
}

export class CollaboratorUnavailableError extends AppError {
  readonly code = 'COLLABORATOR_UNAVAILABLE';
  readonly statusCode = 503;

  constructor(public readonly collaborator: string, message: string, options?: { cause?: unknown }) {
    super(`${collaborator}: ${message}`, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
