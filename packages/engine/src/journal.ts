import { AsyncLocalStorage } from 'node:async_hooks';

import type { Checkpointable } from '@tollgate/shared';

import type { AppLogger } from './obs/logger';
import type { EngineEvent } from './types';

type Frame = {
  operation: string;
  depth: number;
  events: EngineEvent[];
};

export type RequestJournalOptions = {
  participants: readonly Checkpointable[];
  /** Receives the events of each committed top-level request, in order. */
  deliver: (events: readonly EngineEvent[]) => void;
  logger: AppLogger;
};

/**
 * All-or-nothing requests.
 *
 * Top-level requests run one at a time in arrival order. A request started
 * while another is on the stack (an exchange calling back into the token) runs
 * as a nested frame of it. Each frame checkpoints every participant and
 * restores them if it throws; events are held until the top-level request
 * commits, and a failed frame's events are dropped with its state.
 */
export class RequestJournal {
  private readonly storage = new AsyncLocalStorage<Frame>();
  private readonly participants: Checkpointable[];
  private readonly deliver: (events: readonly EngineEvent[]) => void;
  private readonly logger: AppLogger;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RequestJournalOptions) {
    this.participants = [...options.participants];
    this.deliver = options.deliver;
    this.logger = options.logger;
  }

  /** Nesting depth of the caller; 0 outside any request. */
  get depth(): number {
    return this.storage.getStore()?.depth ?? 0;
  }

  run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const parent = this.storage.getStore();
    if (parent) {
      return this.runFrame(operation, fn, parent);
    }

    const turn = this.tail.then(() => this.runFrame(operation, fn, null));
    this.tail = turn.then(
      () => undefined,
      () => undefined,
    );
    return turn;
  }

  emit(event: EngineEvent): void {
    const frame = this.storage.getStore();
    if (!frame) {
      throw new Error(`event ${event.type} emitted outside a request`);
    }
    frame.events.push(event);
  }

  private async runFrame<T>(operation: string, fn: () => Promise<T>, parent: Frame | null): Promise<T> {
    const frame: Frame = { operation, depth: (parent?.depth ?? 0) + 1, events: [] };
    const restores = this.participants.map((participant) => participant.checkpoint());

    let result: T;
    try {
      result = await this.storage.run(frame, fn);
    } catch (error) {
      for (const restore of restores.reverse()) restore();
      this.logger.debug({ operation, depth: frame.depth, err: error }, 'request rolled back');
      throw error;
    }

    if (parent) {
      parent.events.push(...frame.events);
    } else {
      this.deliver(frame.events);
    }
    return result;
  }
}
