import type { SessionRealtimeEvent } from '../@types';
import { logger } from '../shared/logger';

type RealtimeListener = (event: SessionRealtimeEvent) => void;

export class SessionRealtimeBus {
  private readonly listeners = new Set<RealtimeListener>();

  public subscribe(listener: RealtimeListener): () => void {
    this.listeners.add(listener);

    return () => {
      this.listeners.delete(listener);
    };
  }

  public publish(event: SessionRealtimeEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error: unknown) {
        logger.warn('realtime_listener_failed', {
          error: error instanceof Error ? error.message : String(error),
          eventType: event.type,
          sessionId: event.sessionId,
        });
      }
    }
  }
}

export const sessionRealtimeBus = new SessionRealtimeBus();
