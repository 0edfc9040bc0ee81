import type { QuizQuestion, SessionState } from '../../@types';
import { logger } from '../../shared/logger';
import { buildQuizFeedbackSystemPrompt, buildQuizQuestionsSystemPrompt } from '../../shared/prompts';
import { bulletList } from '../../shared/text';
import {
  buildFallbackPrerequisiteQuestions,
  parsePrerequisiteQuizQuestions,
} from '../../tools/quizQuestions';
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
import { lastLearnerMessage } from '../sessionState';

export const formatPrerequisiteQuestion = (question: QuizQuestion, index: number, total: number): string => {
  return `**Prerequisite question ${index + 1}/${total}:** ${question.prompt}`;
};

const generateQuestions = async (state: SessionState, context: EngineContext): Promise<SessionState> => {
  const limit = context.settings.prerequisiteQuizQuestionCount;
  const response = await context.llm.invoke(
    buildQuizQuestionsSystemPrompt(limit),
    [
      {
        role: 'user',
        content: `Prerequisite objectives:\n${bulletList(state.prerequisiteObjectives.map((objective) => objective.description))}`,
      },
    ],
    { purpose: 'prerequisite_quiz_questions', temperature: 0.4, maxTokens: 600 },
  );

  const parsed = parsePrerequisiteQuizQuestions(response.text, state.prerequisiteObjectives, limit);
  if (!parsed) {
    logger.warn('prerequisite_quiz_fallback', { sessionId: state.sessionId, model: response.model });
  }

  const questions = parsed ?? buildFallbackPrerequisiteQuestions(state.prerequisiteObjectives, limit);
  const first = questions[0];

  emitEvent(context, state, 'prerequisite_quiz_generated', {
    questionCount: questions.length,
    source: parsed ? 'model' : 'fallback',
  });

  if (!first) {
    return continueWith(state, { phase: { kind: 'teaching', step: 'probe_ask' }, objectiveIndex: 0 });
  }

  const withQuestions: SessionState = { ...state, prerequisiteQuizQuestions: questions };
  const text = [
    `Let's check the prerequisites with ${questions.length} quick question${questions.length === 1 ? '' : 's'}.`,
    formatPrerequisiteQuestion(first, 0, questions.length),
  ].join('\n\n');

  return waitForLearner(sayAsTutor(context, withQuestions, text));
};

/**
 * Asks the prerequisite questions one per tick, recording each answer with a
 * short piece of feedback, then hands over to teaching.
 */
export const handlePrerequisiteQuiz: PhaseHandler = async (state, context): Promise<SessionState> => {
  if (state.exitRequested) {
    return continueWith(state, { phase: { kind: 'teaching', step: 'probe_ask' }, objectiveIndex: 0 });
  }

  if (state.prerequisiteQuizQuestions.length === 0) {
    return withProviderFallback(context, state, () => generateQuestions(state, context));
  }

  const questions = state.prerequisiteQuizQuestions;
  const answeredCount = state.prerequisiteQuizAnswers.length;
  const question = questions[answeredCount];

  if (!question) {
    return continueWith(state, { phase: { kind: 'teaching', step: 'probe_ask' }, objectiveIndex: 0 });
  }

  const message = lastLearnerMessage(state);
  if (message === null) {
    emitEvent(context, state, 'learner_message_missing', { questionIndex: answeredCount });
    return waitForLearner(state);
  }

  return withProviderFallback(context, state, async () => {
    const response = await context.llm.invoke(
      buildQuizFeedbackSystemPrompt(question),
      [{ role: 'user', content: message }],
      { purpose: 'prerequisite_quiz_feedback', temperature: 0.3, maxTokens: 200 },
    );

    const recorded: SessionState = {
      ...state,
      prerequisiteQuizAnswers: [
        ...state.prerequisiteQuizAnswers,
        { questionIndex: answeredCount, text: message, answeredAt: timestamp(context) },
      ],
    };
    const next = questions[answeredCount + 1];

    if (next) {
      const text = `${response.text}\n\n${formatPrerequisiteQuestion(next, answeredCount + 1, questions.length)}`;
      return waitForLearner(sayAsTutor(context, recorded, text));
    }

    emitEvent(context, recorded, 'prerequisite_quiz_completed', { answered: questions.length });
    const text = `${response.text}\n\nThat completes the prerequisite check: ${questions.length} of ${questions.length} answered. Now let's move on to ${state.nodeTitle}.`;

    return continueWith(sayAsTutor(context, recorded, text), {
      phase: { kind: 'teaching', step: 'probe_ask' },
      objectiveIndex: 0,
    });
  });
};
