import type { Logger } from '../infra/logger.js';
import { describeError, isEngineError } from './engine-error.js';

type Compensation = () => Promise<void>;

interface Step {
  name: string;
  compensate: Compensation;
}

/**
 * All-or-nothing boundary for the pre-commit part of a flow. Each completed
 * step may register a compensation; on failure they run newest first and the
 * original error is rethrown. A committed engine error means funds already left
 * custody, so nothing is compensated.
 */
export class UnitOfWork {
  private readonly logger: Logger;
  private readonly completed: Step[] = [];

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async step<T>(name: string, action: () => Promise<T>, compensate?: Compensation): Promise<T> {
    const result = await action();
    if (compensate) {
      this.completed.push({ name, compensate });
    }
    return result;
  }

  async run<T>(body: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    try {
      const result = await body(this);
      this.completed.length = 0;
      return result;
    } catch (err) {
      if (isEngineError(err) && err.committed) {
        this.discard(err);
      } else {
        await this.rollback(err);
      }
      throw err;
    }
  }

  private discard(reason: unknown): void {
    const steps = this.completed.splice(0);
    if (steps.length === 0) return;
    this.logger.error(
      { reason: describeError(reason), steps: steps.map((s) => s.name) },
      'Unit of work failed after commit, compensations discarded',
    );
  }

  private async rollback(reason: unknown): Promise<void> {
    const steps = this.completed.splice(0).reverse();
    if (steps.length === 0) return;

    this.logger.warn(
      { reason: describeError(reason), steps: steps.map((s) => s.name) },
      'Rolling back unit of work',
    );

    for (const step of steps) {
      try {
        await step.compensate();
      } catch (err) {
        // Keep unwinding; the custody imbalance must be fixed by an administrator.
        this.logger.fatal({ err, step: step.name }, 'Compensation failed');
      }
    }
  }
}
