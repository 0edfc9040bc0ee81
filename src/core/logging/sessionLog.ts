import type { SessionMessageEvent, SessionSystemEvent } from '../@types';
import type { SessionRealtimeBus } from '../realtime/sessionRealtimeBus';
import { logger } from '../shared/logger';

/** Append-only record of what was said in a session and what the engine decided. */
export interface SessionLogSink {
  message(event: SessionMessageEvent): void;
  event(event: SessionSystemEvent): void;
}

const WARN_EVENTS = new Set<SessionSystemEvent['type']>([
  'provider_error',
  'control_block_rejected',
  'grading_output_rejected',
  'learner_message_missing',
  'tick_failed',
]);

export class StructuredSessionLog implements SessionLogSink {
  public constructor(private readonly bus: SessionRealtimeBus) {}

  public message(event: SessionMessageEvent): void {
    logger.info('session_message', {
      sessionId: event.sessionId,
      speaker: event.speaker,
      phase: event.phase,
      length: event.text.length,
    });

    this.bus.publish({ type: 'session_message', sessionId: event.sessionId, message: event });
  }

  public event(event: SessionSystemEvent): void {
    const write = WARN_EVENTS.has(event.type) ? logger.warn : logger.info;
    write(event.type, { sessionId: event.sessionId, ...event.payload });

    this.bus.publish({ type: 'session_event', sessionId: event.sessionId, event });
  }
}
