import type {
  CreateSessionRequest,
  PostTurnRequest,
  SessionSummary,
  SessionTurnResponse,
} from '../../core/@types';
import type { TutoringOrchestrator } from '../../core/orchestrator';
import { orchestrator } from '../../core/runtime';

export class SessionsService {
  public constructor(private readonly orchestrator: TutoringOrchestrator) {}

  public createSession(payload: CreateSessionRequest): Promise<SessionTurnResponse> {
    return this.orchestrator.startSession(payload);
  }

  public getSession(sessionId: string): SessionSummary {
    return this.orchestrator.getSessionSummary(sessionId);
  }

  public postTurn(sessionId: string, payload: PostTurnRequest): Promise<SessionTurnResponse> {
    return this.orchestrator.processLearnerTurn(sessionId, payload.message);
  }

  public requestExit(sessionId: string): Promise<SessionTurnResponse> {
    return this.orchestrator.requestExit(sessionId);
  }
}

export const sessionsService = new SessionsService(orchestrator);
