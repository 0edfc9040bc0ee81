import type { PhaseKind, SessionState } from '../@types';
import { AppError } from '../shared/errors/app-error';
import {
  ContextNotFoundError,
  describeError,
  SessionInvariantError,
  TickLimitExceededError,
} from '../shared/errors/engine-errors';
import { logger } from '../shared/logger';
import { emitEvent, type EngineContext, type PhaseHandler } from './context';
import { PHASE_HANDLERS } from './handlers';
import { assertTransition } from './phases';
import { phaseLabel } from './sessionState';

export interface DriverFailure {
  code: string;
  message: string;
  phase: string;
}

export type DriverOutcome =
  | { ok: true; state: SessionState; ticks: number }
  | { ok: false; state: SessionState; ticks: number; failure: DriverFailure };

export interface RunOptions {
  /** Receives every state a tick produced, before the next tick starts. */
  onTick?: (state: SessionState) => void | Promise<void>;
}

/** Checks what every tick must preserve; throws SessionInvariantError or IllegalPhaseTransitionError. */
export const checkTickInvariants = (before: SessionState, after: SessionState): void => {
  assertTransition(before.phase, after.phase);

  if (after.objectiveIndex < before.objectiveIndex) {
    throw new SessionInvariantError('objectiveIndex moved backwards.', {
      before: before.objectiveIndex,
      after: after.objectiveIndex,
    });
  }

  const historyIntact =
    after.history.length >= before.history.length &&
    before.history.every((turn, index) => after.history[index] === turn);
  if (!historyIntact) {
    throw new SessionInvariantError('Conversation history was rewritten.');
  }

  const taughtIds = new Set(after.objectivesToTeach.map((objective) => objective.id));
  const stray = after.completedObjectiveIds.filter((objectiveId) => !taughtIds.has(objectiveId));
  if (stray.length > 0 || new Set(after.completedObjectiveIds).size !== after.completedObjectiveIds.length) {
    throw new SessionInvariantError('Completed objectives must be unique objectives of this session.', { stray });
  }

  const outOfRange = [...after.objectivesToTeach, ...after.objectivesKnown].filter(
    (objective) => !(objective.mastery >= 0 && objective.mastery <= 1),
  );
  if (outOfRange.length > 0) {
    throw new SessionInvariantError('Objective mastery outside [0, 1].', {
      objectiveIds: outOfRange.map((objective) => objective.id),
    });
  }
};

const failureCode = (error: unknown): string => {
  return error instanceof AppError && error.code ? error.code : 'TICK_FAILED';
};

/**
 * Dispatches ticks by phase until the session waits for the learner or
 * completes. The driver never edits state itself; handlers return new values.
 */
export class SessionDriver {
  public constructor(
    private readonly context: EngineContext,
    private readonly handlers: Readonly<Record<PhaseKind, PhaseHandler>> = PHASE_HANDLERS,
  ) {}

  public async run(initial: SessionState, options: RunOptions = {}): Promise<DriverOutcome> {
    const limit = this.context.settings.tickLimit;
    let state = initial;
    let ticks = 0;

    for (;;) {
      if (ticks >= limit) {
        return this.fail(state, ticks, new TickLimitExceededError(limit, phaseLabel(state.phase)));
      }

      ticks += 1;
      const handler = this.handlers[state.phase.kind];

      let next: SessionState;
      try {
        next = await handler(state, this.context);
        checkTickInvariants(state, next);
        await options.onTick?.(next);
      } catch (error: unknown) {
        if (error instanceof ContextNotFoundError) {
          throw error;
        }

        return this.fail(state, ticks, error);
      }

      if (next.phase.kind !== state.phase.kind) {
        emitEvent(this.context, next, 'phase_changed', {
          from: phaseLabel(state.phase),
          to: phaseLabel(next.phase),
        });
      }

      state = next;

      if (!state.autoAdvance || state.phase.kind === 'completed') {
        return { ok: true, state, ticks };
      }
    }
  }

  private fail(state: SessionState, ticks: number, error: unknown): DriverOutcome {
    const failure: DriverFailure = {
      code: failureCode(error),
      message: describeError(error),
      phase: phaseLabel(state.phase),
    };

    logger.error('session_tick_failed', { sessionId: state.sessionId, ticks, ...failure });
    emitEvent(this.context, state, 'tick_failed', { ...failure });

    return { ok: false, state, ticks, failure };
  }
}
