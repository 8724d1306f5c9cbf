// src/services/process/ProcessRegistry.ts

import { isDeepStrictEqual } from 'util';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { DuplicateProcessError } from '../../errors';
import {
  LongRunningProcess,
  ProcessMessage,
  ProcessStatus,
  UpdateOutcome,
  isTerminalStatus,
} from './process.types';

/**
 * In-memory source of truth for long-running process state.
 *
 * Every operation is synchronous, so it runs to completion before any other task
 * touches the map: readers see an entry either before or after a write, never half of one.
 * Callers only ever receive copies.
 */
export class ProcessRegistry extends BaseService {
  private readonly processes = new Map<string, LongRunningProcess>();

  constructor(config: ServiceConfig) {
    super(config);
  }

  create(processId: string, init: { threadId?: string } = {}): LongRunningProcess {
    if (this.processes.has(processId)) {
      throw new DuplicateProcessError(processId);
    }

    const now = new Date().toISOString();
    const entry: LongRunningProcess = {
      processId,
      status: 'running',
      message: {},
      threadId: init.threadId,
      createdAt: now,
      updatedAt: now,
    };
    this.processes.set(processId, entry);
    this.logger.info('Process registered', { processId, threadId: init.threadId });
    return snapshot(entry);
  }

  update(processId: string, status: ProcessStatus, message: ProcessMessage): UpdateOutcome {
    const existing = this.processes.get(processId);
    const now = new Date().toISOString();

    if (!existing) {
      // Update arrived before (or without) this instance creating the entry.
      this.processes.set(processId, {
        processId,
        status,
        message: structuredClone(message),
        createdAt: now,
        updatedAt: now,
      });
      this.logger.info('Process created from status update', { processId, status });
      return 'created';
    }

    if (isTerminalStatus(existing.status)) {
      this.logger.warn('Ignoring update for process in terminal state', {
        processId,
        currentStatus: existing.status,
        incomingStatus: status,
      });
      return 'ignored';
    }

    // A redelivered event leaves the entry as a single delivery would, updatedAt included.
    if (existing.status === status && isDeepStrictEqual(existing.message, message)) {
      this.logger.debug('Ignoring duplicate process status update', { processId, status });
      return 'ignored';
    }

    this.processes.set(processId, {
      ...existing,
      status,
      message: structuredClone(message),
      updatedAt: now,
    });
    this.logger.info('Process status updated', { processId, from: existing.status, to: status });
    return 'updated';
  }

  get(processId: string): LongRunningProcess | undefined {
    const entry = this.processes.get(processId);
    return entry ? snapshot(entry) : undefined;
  }

  has(processId: string): boolean {
    return this.processes.has(processId);
  }

  list(): LongRunningProcess[] {
    return Array.from(this.processes.values(), snapshot);
  }

  get size(): number {
    return this.processes.size;
  }
}

function snapshot(entry: LongRunningProcess): LongRunningProcess {
  return { ...entry, message: structuredClone(entry.message) };
}
