import type { SessionState } from '../../@types';
import { isProviderError } from '../../shared/errors/engine-errors';
import { buildWrapUpSystemPrompt } from '../../shared/prompts';
import { formatPercent } from '../../shared/text';
import { stripControlBlocks } from '../../tools/controlSignals';
import { isKnown } from '../../tools/mastery';
import { emitEvent, sayAsTutor, timestamp, waitForLearner, type EngineContext, type PhaseHandler } from '../context';

export interface WrapUpSummary {
  finalScore: number | null;
  durationMinutes: number;
  objectivesCovered: number;
  comment: string | null;
}

export const sessionDurationMinutes = (startedAt: string, endedAt: string): number => {
  const elapsed = Date.parse(endedAt) - Date.parse(startedAt);
  return Number.isFinite(elapsed) && elapsed > 0 ? Math.round(elapsed / 6_000) / 10 : 0;
};

export const buildWrapUpMessage = (summary: WrapUpSummary): string => {
  const verdict =
    summary.finalScore !== null && isKnown(summary.finalScore)
      ? "Great job! You've shown solid understanding of the material."
      : "Keep practicing! You're making progress.";

  return [
    '## Session Complete!',
    '',
    `**Final Score:** ${summary.finalScore === null ? 'not graded' : formatPercent(summary.finalScore)}`,
    `**Duration:** ${Math.round(summary.durationMinutes)} minutes`,
    `**Objectives Covered:** ${summary.objectivesCovered}`,
    '',
    verdict,
    ...(summary.comment ? ['', summary.comment] : []),
    '',
    'See you next time!',
  ].join('\n');
};

const requestComment = async (state: SessionState, context: EngineContext): Promise<string | null> => {
  try {
    const response = await context.llm.invoke(
      buildWrapUpSystemPrompt(state.nodeTitle, state.finalScore),
      [],
      { purpose: 'wrap_up', temperature: 0.7, maxTokens: 200 },
    );
    return stripControlBlocks(response.text) || null;
  } catch (error: unknown) {
    if (isProviderError(error)) {
      emitEvent(context, state, 'provider_error', { kind: error.kind, error: error.message });
      return null;
    }

    throw error;
  }
};

/** Closes the session record and posts the summary. A failed model call only drops the commentary. */
export const handleWrapUp: PhaseHandler = async (state, context): Promise<SessionState> => {
  const comment = await requestComment(state, context);
  const endedAt = timestamp(context);
  const durationMinutes = sessionDurationMinutes(state.startedAt, endedAt);

  await context.knowledgeStore.completeSession(state.sessionId, state.finalScore);

  emitEvent(context, state, 'session_completed', {
    finalScore: state.finalScore,
    durationMinutes,
    objectivesCovered: state.completedObjectiveIds.length,
  });

  const message = buildWrapUpMessage({
    finalScore: state.finalScore,
    durationMinutes,
    objectivesCovered: state.completedObjectiveIds.length,
    comment,
  });

  return waitForLearner(sayAsTutor(context, state, message), { phase: { kind: 'completed' }, endedAt });
};
