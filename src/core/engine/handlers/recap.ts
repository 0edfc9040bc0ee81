import type { SessionState } from '../../@types';
import { buildRecapSystemPrompt } from '../../shared/prompts';
import {
  continueWith,
  sayAsTutor,
  toChatHistory,
  waitForLearner,
  withProviderFallback,
  type PhaseHandler,
} from '../context';
import { readCompletionFlag } from '../controlFlags';

/**
 * Recap loop: repeats until the model signals that the prerequisites are
 * covered. A pending exit request hands over to the teaching boundary.
 */
export const handleRecap: PhaseHandler = async (state, context): Promise<SessionState> => {
  if (state.exitRequested) {
    return continueWith(state, { phase: { kind: 'teaching', step: 'probe_ask' }, objectiveIndex: 0 });
  }

  const recapObjectives = [...state.prerequisiteObjectives, ...state.objectivesKnown];

  if (recapObjectives.length === 0) {
    return continueWith(state, { phase: { kind: 'teaching', step: 'probe_ask' }, objectiveIndex: 0 });
  }

  return withProviderFallback(context, state, async () => {
    const response = await context.llm.invoke(
      buildRecapSystemPrompt(recapObjectives, state.objectivesToTeach[0], state.referenceMaterials),
      toChatHistory(state),
      { purpose: 'recap', temperature: 0.5, maxTokens: 500 },
    );

    const complete = readCompletionFlag(context, state, response.text, 'prereq_complete');
    const replied = sayAsTutor(context, state, response.text);

    if (complete) {
      return continueWith(replied, { phase: { kind: 'teaching', step: 'probe_ask' }, objectiveIndex: 0 });
    }

    return waitForLearner(replied);
  });
};
