import type { SessionState } from '../@types';
import { AppError } from '../shared/errors/app-error';

export interface SessionMemoryStore {
  save(state: SessionState): void;
  getSession(sessionId: string): SessionState | undefined;
  mustGetSession(sessionId: string): SessionState;
  acquire(sessionId: string): () => void;
  isBusy(sessionId: string): boolean;
}

/**
 * Process-local session store. It also serialises work per session: a caller
 * must `acquire` the session before driving it and release it afterwards.
 */
export class SessionMemory implements SessionMemoryStore {
  private readonly sessions = new Map<string, SessionState>();
  private readonly inFlight = new Set<string>();

  public save(state: SessionState): void {
    this.sessions.set(state.sessionId, state);
  }

  public getSession(sessionId: string): SessionState | undefined {
    return this.sessions.get(sessionId);
  }

  public mustGetSession(sessionId: string): SessionState {
    const session = this.getSession(sessionId);

    if (!session) {
      throw new AppError(404, `Session ${sessionId} not found.`, 'SESSION_NOT_FOUND');
    }

    return session;
  }

  public acquire(sessionId: string): () => void {
    if (this.inFlight.has(sessionId)) {
      throw new AppError(409, `Session ${sessionId} is already processing a turn.`, 'SESSION_BUSY');
    }

    this.inFlight.add(sessionId);
    let released = false;

    return () => {
      if (!released) {
        released = true;
        this.inFlight.delete(sessionId);
      }
    };
  }

  public isBusy(sessionId: string): boolean {
    return this.inFlight.has(sessionId);
  }
}
