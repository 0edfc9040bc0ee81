import type { PrerequisiteStrategy, SessionState } from '../../@types';
import { continueWith, emitEvent, sayAsTutor, waitForLearner, type PhaseHandler } from '../context';
import { lastLearnerMessage } from '../sessionState';

const QUIZ_WORDS = /\b(quiz|test|check)\b/i;
const SUMMARY_WORDS = /\b(summary|summari[sz]e|recap|review)\b/i;

export const CLARIFY_CHOICE_MESSAGE =
  'Would you like a quick quiz on the prerequisites, or a short summary of them? Reply with "quiz" or "summary".';

export const parsePrerequisiteChoice = (message: string): PrerequisiteStrategy | null => {
  if (QUIZ_WORDS.test(message)) {
    return 'quiz';
  }

  if (SUMMARY_WORDS.test(message)) {
    return 'summary';
  }

  return null;
};

export const handlePrerequisiteCheck: PhaseHandler = (state, context): Promise<SessionState> => {
  if (state.exitRequested) {
    return Promise.resolve(
      continueWith(state, { phase: { kind: 'teaching', step: 'probe_ask' }, objectiveIndex: 0 }),
    );
  }

  const message = lastLearnerMessage(state);

  if (message === null) {
    emitEvent(context, state, 'learner_message_missing');
    return Promise.resolve(waitForLearner(state));
  }

  const choice = parsePrerequisiteChoice(message);
  if (!choice) {
    return Promise.resolve(waitForLearner(sayAsTutor(context, state, CLARIFY_CHOICE_MESSAGE)));
  }

  emitEvent(context, state, 'prerequisite_choice', { choice });

  return Promise.resolve(
    continueWith(state, {
      prerequisiteStrategy: choice,
      phase: choice === 'quiz' ? { kind: 'quiz' } : { kind: 'recap' },
    }),
  );
};
