import type { Logger } from 'pino';

import type { Awaitable } from '../../../domain/sprite-export/index.js';
import { createChildLogger } from '../../../shared/logger/pino.js';

interface DeferredCleanup {
  readonly label: string;
  readonly dispose: () => Awaitable<void>;
}

export interface CleanupReport {
  readonly completed: readonly string[];
  readonly failed: readonly string[];
}

/**
 * Runs a unit of work and then every registered cleanup step in reverse
 * registration order, whatever the outcome of the work. Cleanup failures
 * are logged and never replace the work's own result or error.
 */
export class CleanupCoordinator {
  private readonly logger: Logger;

  private readonly pending: DeferredCleanup[] = [];

  public constructor(jobId: string) {
    this.logger = createChildLogger({ module: 'CleanupCoordinator', jobId });
  }

  public defer(label: string, dispose: () => Awaitable<void>): void {
    this.pending.push({ label, dispose });
  }

  public async run<T>(work: (scope: CleanupCoordinator) => Promise<T>): Promise<T> {
    try {
      return await work(this);
    } finally {
      await this.cleanup();
    }
  }

  public async cleanup(): Promise<CleanupReport> {
    const completed: string[] = [];
    const failed: string[] = [];

    while (this.pending.length > 0) {
      const step = this.pending.pop();
      if (!step) {
        break;
      }

      try {
        await step.dispose();
        completed.push(step.label);
      } catch (error) {
        failed.push(step.label);
        this.logger.warn({ error, step: step.label }, 'Cleanup step failed');
      }
    }

    this.logger.debug({ completed, failed }, 'Cleanup finished');
    return { completed, failed };
  }
}
