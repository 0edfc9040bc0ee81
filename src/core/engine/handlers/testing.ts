import type { SessionState } from '../../@types';
import { buildFinalTest, formatTestQuestion } from '../../tools/testBuilder';
import {
  continueWith,
  emitEvent,
  sayAsTutor,
  timestamp,
  waitForLearner,
  withProviderFallback,
  type EngineContext,
  type PhaseHandler,
} from '../context';
import { lastLearnerMessage, objectivesForTesting } from '../sessionState';

export const NOTHING_TO_TEST_MESSAGE = "We didn't complete any objectives this time, so there is nothing to test. Let's wrap up.";
export const LAST_ANSWER_MESSAGE = 'Thanks, that was the last question. Let me grade your answers.';

const startTest = (state: SessionState, context: EngineContext): Promise<SessionState> => {
  const objectives = objectivesForTesting(state);

  if (objectives.length === 0) {
    return Promise.resolve(
      continueWith(sayAsTutor(context, state, NOTHING_TO_TEST_MESSAGE), { phase: { kind: 'wrap_up' } }),
    );
  }

  return withProviderFallback(context, state, async () => {
    const built = await buildFinalTest(context.llm, objectives, context.settings.finalTestQuestionCount);
    const first = built.questions[0];

    emitEvent(context, state, 'final_test_built', {
      questionCount: built.questions.length,
      objectiveIds: objectives.map((objective) => objective.id),
      model: built.model,
    });

    if (!first) {
      return continueWith(state, { phase: { kind: 'wrap_up' } });
    }

    const count = built.questions.length;
    const text = [
      `Time for a short final test: ${count} question${count === 1 ? '' : 's'}. Answer each one in your own words.`,
      formatTestQuestion(first, 0, count),
    ].join('\n\n');

    return waitForLearner(sayAsTutor(context, { ...state, testQuestions: built.questions }, text));
  });
};

/**
 * Builds the final test on first entry, then records one answer per tick.
 * An exit request during the test sends the collected answers to grading.
 */
export const handleTesting: PhaseHandler = (state, context): Promise<SessionState> => {
  if (state.testQuestions.length === 0) {
    return startTest(state, context);
  }

  const total = state.testQuestions.length;
  const answered = state.testAnswers.length;

  if (answered >= total) {
    return Promise.resolve(continueWith(state, { phase: { kind: 'grading' } }));
  }

  if (state.exitRequestedDuring === 'testing') {
    const text = `Stopping the test here. I'll grade the ${answered} answer${answered === 1 ? '' : 's'} you gave.`;
    return Promise.resolve(continueWith(sayAsTutor(context, state, text), { phase: { kind: 'grading' } }));
  }

  const message = lastLearnerMessage(state);
  if (message === null) {
    emitEvent(context, state, 'learner_message_missing', { questionIndex: answered });
    return Promise.resolve(waitForLearner(state));
  }

  const recorded: SessionState = {
    ...state,
    testAnswers: [...state.testAnswers, { questionIndex: answered, text: message, answeredAt: timestamp(context) }],
  };
  emitEvent(context, recorded, 'test_answer_recorded', { questionIndex: answered, total });

  const next = state.testQuestions[answered + 1];
  if (next) {
    return Promise.resolve(waitForLearner(sayAsTutor(context, recorded, formatTestQuestion(next, answered + 1, total))));
  }

  return Promise.resolve(
    continueWith(sayAsTutor(context, recorded, LAST_ANSWER_MESSAGE), { phase: { kind: 'grading' } }),
  );
};
