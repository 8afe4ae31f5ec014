/**
 * BACKGROUND TASKS
 * ================
 *
 * Supervisor for detached work (best-effort persistence). A task's lifetime is
 * decoupled from the request that spawned it: it runs under its own timeout,
 * its failure is logged and never rethrown, and shutdown can drain whatever is
 * still pending.
 */

import { type Logger, noopLogger } from '../../../common/runtime.types.js';
import { errorMessage } from '../../../common/errors.js';
import { withTimeout } from './timeout.js';

export interface BackgroundTasksConfig {
  defaultTimeoutMs?: number;
  logger?: Logger;
}

export interface DrainResult {
  drained: boolean;
  pending: number;
}

export class BackgroundTasks {
  private readonly pending = new Set<Promise<void>>();
  private readonly defaultTimeoutMs: number;
  private readonly logger: Logger;
  private completed = 0;
  private failed = 0;

  constructor(config: BackgroundTasksConfig = {}) {
    this.defaultTimeoutMs = config.defaultTimeoutMs ?? 5_000;
    this.logger = config.logger ?? noopLogger;
  }

  /**
   * Start a detached task. Returns immediately.
   */
  spawn(name: string, task: () => Promise<void>, timeoutMs = this.defaultTimeoutMs): void {
    const tracked = withTimeout(Promise.resolve().then(task), timeoutMs, name)
      .then(() => {
        this.completed++;
      })
      .catch((err: unknown) => {
        this.failed++;
        this.logger.warn({ task: name, err: errorMessage(err) }, 'Background task failed');
      })
      .finally(() => {
        this.pending.delete(tracked);
      });

    this.pending.add(tracked);
  }

  /**
   * Wait for every pending task, or until timeoutMs elapses.
   */
  async drain(timeoutMs = 10_000): Promise<DrainResult> {
    if (this.pending.size === 0) {
      return { drained: true, pending: 0 };
    }

    try {
      await withTimeout(Promise.all([...this.pending]), timeoutMs, 'drain');
      return { drained: true, pending: this.pending.size };
    } catch {
      this.logger.warn({ pending: this.pending.size }, 'Background drain timed out');
      return { drained: false, pending: this.pending.size };
    }
  }

  size(): number {
    return this.pending.size;
  }

  stats(): { pending: number; completed: number; failed: number } {
    return { pending: this.pending.size, completed: this.completed, failed: this.failed };
  }
}
