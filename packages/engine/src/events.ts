import { logError, toLogFields, type AppLogger } from './obs/logger';
import type { EngineEvent } from './types';

export type EngineEventListener = (event: EngineEvent) => void;

/** Fans committed events out to subscribers. */
export class EventBus {
  private readonly listeners = new Set<EngineEventListener>();
  private readonly logger: AppLogger;

  constructor(logger: AppLogger) {
    this.logger = logger;
  }

  /** Returns a function that removes the listener. */
  on(listener: EngineEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  deliver(events: readonly EngineEvent[]): void {
    for (const event of events) {
      const { type, ...fields } = event;
      this.logger.info({ event: type, ...toLogFields(fields) }, type);
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (error) {
          // The request has already committed; a failing subscriber cannot undo it.
          logError(this.logger, error, { eventType: event.type });
        }
      }
    }
  }
}
