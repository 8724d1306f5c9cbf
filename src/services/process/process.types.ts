// src/services/process/process.types.ts

export const PROCESS_STATUSES = ['running', 'requires_action', 'completed', 'failed'] as const;

export type ProcessStatus = (typeof PROCESS_STATUSES)[number];

export const TERMINAL_STATUSES: ReadonlySet<ProcessStatus> = new Set<ProcessStatus>(['completed', 'failed']);

export type ProcessMessage = Record<string, unknown>;

export interface LongRunningProcess {
  processId: string;
  status: ProcessStatus;
  message: ProcessMessage;
  threadId?: string;
  createdAt: string;
  updatedAt: string;
}

export type UpdateOutcome = 'created' | 'updated' | 'ignored';

/**
 * Status-update event as published on the status queue by delegated workflows.
 */
export interface ProcessStatusEvent {
  process_id: string;
  status: ProcessStatus;
  message: ProcessMessage;
}

export function isTerminalStatus(status: ProcessStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * Maps the spellings workflows send ("requires action", "Requires-Action", "COMPLETED")
 * onto the canonical status. Returns undefined for anything else.
 */
export function normalizeProcessStatus(raw: string): ProcessStatus | undefined {
  const canonical = raw.trim().toLowerCase().replace(/[\s-]+/g, '_');
  return PROCESS_STATUSES.find((status) => status === canonical);
}
