import type { Checkpointable } from '@tollgate/shared';

import type { EngineSettingsState } from './types';

/** Thresholds, recipients, the swap switch and slippage tolerances. */
export class EngineSettings implements Checkpointable {
  private state: EngineSettingsState;

  constructor(initial: EngineSettingsState) {
    this.state = { ...initial };
  }

  get current(): EngineSettingsState {
    return { ...this.state };
  }

  /** Replaces the settings wholesale and returns the previous ones. */
  replace(next: EngineSettingsState): EngineSettingsState {
    const previous = this.state;
    this.state = { ...next };
    return { ...previous };
  }

  checkpoint(): () => void {
    const saved = this.state;
    return () => {
      this.state = saved;
    };
  }
}
