import type { Objective, SessionState } from '../../@types';
import { buildIntroSystemPrompt } from '../../shared/prompts';
import { stripTrailingPunctuation } from '../../shared/text';
import {
  continueWith,
  sayAsTutor,
  waitForLearner,
  withProviderFallback,
  type PhaseHandler,
} from '../context';

const LISTED_OBJECTIVES = 3;

export const buildDeterministicIntro = (nodeTitle: string, objectives: Objective[]): string => {
  const listed = objectives.slice(0, LISTED_OBJECTIVES).map((objective) => stripTrailingPunctuation(objective.description));
  const remaining = objectives.length - listed.length;
  const opening = `Today we'll explore ${nodeTitle}.`;

  if (listed.length === 0) {
    return `${opening} Every objective here is already marked as known.\n\nLet's begin.`;
  }

  const more = remaining > 0 ? ` and ${remaining} more` : '';
  return `${opening} We'll cover: ${listed.join(', ')}${more}.\n\nLet's begin.`;
};

/**
 * Without prerequisites the lesson starts right away. Otherwise the learner is
 * asked whether to review them with a quiz or a summary. A pending exit
 * request skips the introduction.
 */
export const handleIntro: PhaseHandler = async (state, context): Promise<SessionState> => {
  if (state.exitRequested) {
    return continueWith(state, { phase: { kind: 'teaching', step: 'probe_ask' }, objectiveIndex: 0 });
  }

  if (state.prerequisiteObjectives.length === 0) {
    const introduced = sayAsTutor(context, state, buildDeterministicIntro(state.nodeTitle, state.objectivesToTeach));
    return continueWith(introduced, { phase: { kind: 'teaching', step: 'probe_ask' }, objectiveIndex: 0 });
  }

  return withProviderFallback(context, state, async () => {
    const response = await context.llm.invoke(
      buildIntroSystemPrompt({
        nodeTitle: state.nodeTitle,
        prerequisites: state.prerequisiteObjectives,
        objectives: state.objectivesToTeach,
      }),
      [],
      { purpose: 'intro', temperature: 0.7, maxTokens: 300 },
    );

    return waitForLearner(sayAsTutor(context, state, response.text), { phase: { kind: 'prerequisite_check' } });
  });
};
