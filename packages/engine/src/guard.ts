import { EngineError } from './errors';
import type { ConversionState, PoolKind } from './types';

/**
 * Mutual exclusion for conversions. Unlike the rest of the engine state the
 * guard is never rolled back: `run` always releases it on the way out.
 */
export class ConversionGuard {
  private active: ConversionState = 'idle';

  get state(): ConversionState {
    return this.active;
  }

  get busy(): boolean {
    return this.active !== 'idle';
  }

  async run<T>(kind: PoolKind, fn: () => Promise<T>): Promise<T> {
    if (this.active !== 'idle') {
      throw new EngineError({
        code: 'CONVERSION_IN_PROGRESS',
        message: `cannot start ${kind} conversion while ${this.active} conversion is running`,
        details: { requested: kind, active: this.active },
      });
    }

    this.active = kind;
    try {
      return await fn();
    } finally {
      this.active = 'idle';
    }
  }
}
