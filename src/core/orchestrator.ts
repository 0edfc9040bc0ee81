import { randomUUID } from 'node:crypto';

import type {
  CreateSessionRequest,
  PhaseKind,
  SessionState,
  SessionSummary,
  SessionTurnResponse,
} from './@types';
import type { EngineContext } from './engine/context';
import { SessionDriver, type DriverOutcome } from './engine/driver';
import {
  appendTurn,
  createSessionState,
  isAtObjectiveBoundary,
  isAwaitingLearner,
  phaseLabel,
} from './engine/sessionState';
import type { SessionMemoryStore } from './memory/sessionMemory';
import type { SessionRealtimeBus } from './realtime/sessionRealtimeBus';
import { AppError } from './shared/errors/app-error';
import { logger } from './shared/logger';
import { redactLearnerInput } from './tools/safety';

export const toSessionSummary = (state: SessionState): SessionSummary => ({
  sessionId: state.sessionId,
  projectId: state.projectId,
  nodeId: state.nodeId,
  nodeTitle: state.nodeTitle,
  phase: state.phase,
  objectiveIndex: state.objectiveIndex,
  objectivesToTeach: state.objectivesToTeach,
  completedObjectiveIds: state.completedObjectiveIds,
  prerequisiteStrategy: state.prerequisiteStrategy,
  awaitingLearner: isAwaitingLearner(state),
  exitRequested: state.exitRequested,
  history: state.history,
  testQuestionCount: state.testQuestions.length,
  testAnswerCount: state.testAnswers.length,
  gradedQuestions: state.gradedQuestions,
  objectiveScores: state.objectiveScores,
  finalScore: state.finalScore,
  startedAt: state.startedAt,
  endedAt: state.endedAt,
});

const PREREQUISITE_PHASES: ReadonlySet<PhaseKind> = new Set(['intro', 'prerequisite_check', 'recap', 'quiz']);

export const exitTakesEffectNow = (state: SessionState): boolean => {
  return (
    PREREQUISITE_PHASES.has(state.phase.kind) ||
    isAtObjectiveBoundary(state) ||
    (state.phase.kind === 'testing' && state.testQuestions.length > 0)
  );
};

/**
 * Owns the session lifecycle around the driver: it is the only writer of the
 * session store and persists after every tick the driver reports.
 */
export class TutoringOrchestrator {
  private readonly driver: SessionDriver;

  public constructor(
    private readonly memory: SessionMemoryStore,
    private readonly context: EngineContext,
    private readonly realtimeBus: SessionRealtimeBus,
    private readonly createSessionId: () => string = randomUUID,
  ) {
    this.driver = new SessionDriver(context);
  }

  public async startSession(input: CreateSessionRequest): Promise<SessionTurnResponse> {
    const state = createSessionState(
      {
        sessionId: this.createSessionId(),
        projectId: input.projectId,
        nodeId: input.nodeId,
      },
      this.context.now().toISOString(),
    );

    const release = this.memory.acquire(state.sessionId);
    try {
      const outcome = await this.runDriver(state, 0);

      if (!this.memory.getSession(state.sessionId)) {
        const failure = outcome.ok ? undefined : outcome.failure;
        throw new AppError(
          503,
          failure?.message ?? 'Session could not be started.',
          failure?.code ?? 'SESSION_START_FAILED',
        );
      }

      return this.toResponse(outcome, 0);
    } finally {
      release();
    }
  }

  public getSessionSummary(sessionId: string): SessionSummary {
    return toSessionSummary(this.memory.mustGetSession(sessionId));
  }

  public async processLearnerTurn(sessionId: string, message: string): Promise<SessionTurnResponse> {
    const state = this.mustGetOpenSession(sessionId);
    const release = this.memory.acquire(sessionId);

    try {
      const redaction = redactLearnerInput(message);
      if (!redaction.cleanedText) {
        throw new AppError(400, 'message cannot be empty.', 'EMPTY_MESSAGE');
      }

      if (redaction.flags.length > 0) {
        this.context.sessionLog.event({
          sessionId,
          timestamp: this.context.now().toISOString(),
          type: 'learner_message_redacted',
          payload: { flags: redaction.flags, phase: phaseLabel(state.phase) },
        });
      }

      const createdAt = this.context.now().toISOString();
      const withLearnerTurn = appendTurn(state, 'learner', redaction.cleanedText, createdAt);
      this.context.sessionLog.message({
        sessionId,
        timestamp: createdAt,
        speaker: 'learner',
        text: redaction.cleanedText,
        phase: phaseLabel(state.phase),
      });

      await this.persist(withLearnerTurn, state.history.length);
      const outcome = await this.runDriver(withLearnerTurn, withLearnerTurn.history.length);

      return this.toResponse(outcome, state.history.length);
    } finally {
      release();
    }
  }

  /**
   * Flags the session for an early exit. The driver runs right away when the
   * session rests in prerequisite review, at an objective boundary or inside
   * the final test; mid-objective the flag takes effect at the next boundary.
   * A second request only counts when it stops a test started after the first.
   */
  public async requestExit(sessionId: string): Promise<SessionTurnResponse> {
    const state = this.mustGetOpenSession(sessionId);
    const release = this.memory.acquire(sessionId);

    try {
      const stopsTest = state.phase.kind === 'testing' && state.exitRequestedDuring !== 'testing';
      if (state.exitRequested && !stopsTest) {
        return { session: toSessionSummary(state), newTurns: [], ticks: 0 };
      }

      const flagged: SessionState = {
        ...state,
        exitRequested: true,
        exitRequestedDuring: state.phase.kind,
      };

      this.context.sessionLog.event({
        sessionId,
        timestamp: this.context.now().toISOString(),
        type: 'exit_requested',
        payload: { phase: phaseLabel(state.phase), completedObjectives: state.completedObjectiveIds.length },
      });
      await this.persist(flagged, state.history.length);

      if (!exitTakesEffectNow(flagged)) {
        this.publishUpdate(flagged);
        return { session: toSessionSummary(flagged), newTurns: [], ticks: 0 };
      }

      const outcome = await this.runDriver(flagged, flagged.history.length);
      return this.toResponse(outcome, state.history.length);
    } finally {
      release();
    }
  }

  private mustGetOpenSession(sessionId: string): SessionState {
    const state = this.memory.mustGetSession(sessionId);

    if (state.phase.kind === 'completed') {
      throw new AppError(409, `Session ${sessionId} is already completed.`, 'SESSION_COMPLETED');
    }

    return state;
  }

  private async runDriver(state: SessionState, persistedTurns: number): Promise<DriverOutcome> {
    let savedTurns = persistedTurns;

    const outcome = await this.driver.run(state, {
      onTick: async (next) => {
        await this.persist(next, savedTurns);
        savedTurns = next.history.length;
      },
    });

    const latest = this.memory.getSession(state.sessionId);
    if (latest) {
      this.publishUpdate(latest);
    }

    logger.info('session_driver_finished', {
      sessionId: state.sessionId,
      ok: outcome.ok,
      ticks: outcome.ticks,
      phase: phaseLabel(outcome.state.phase),
    });

    return outcome;
  }

  private async persist(state: SessionState, persistedTurns: number): Promise<void> {
    const newTurns = state.history.slice(persistedTurns);

    if (newTurns.length > 0) {
      await this.context.knowledgeStore.appendTranscript(state.sessionId, persistedTurns, newTurns);
    }

    this.memory.save(state);
  }

  private publishUpdate(state: SessionState): void {
    this.realtimeBus.publish({
      type: 'session_updated',
      sessionId: state.sessionId,
      session: toSessionSummary(state),
    });
  }

  private toResponse(outcome: DriverOutcome, historyLengthBefore: number): SessionTurnResponse {
    const current = this.memory.mustGetSession(outcome.state.sessionId);
    const response: SessionTurnResponse = {
      session: toSessionSummary(current),
      newTurns: current.history.slice(historyLengthBefore),
      ticks: outcome.ticks,
    };

    if (!outcome.ok) {
      response.failure = outcome.failure;
    }

    return response;
  }
}
