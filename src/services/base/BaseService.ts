// src/services/base/BaseService.ts
import { errorMessage } from '../../errors';
import { ServiceConfig, Logger } from './types';

export abstract class BaseService {
  protected readonly logger: Logger;

  constructor(config: ServiceConfig) {
    this.logger = config.logger;
  }

  /**
   * Logs a caught error that the service handles itself instead of rethrowing.
   */
  protected logFailure(level: 'warn' | 'error', message: string, error: unknown, meta: Record<string, unknown> = {}): void {
    this.logger[level](message, { ...meta, error: errorMessage(error) });
  }
}
