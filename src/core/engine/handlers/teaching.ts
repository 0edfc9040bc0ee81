import type { MicroQuizRecord, Objective, SessionState, TeachingStep } from '../../@types';
import { SessionInvariantError } from '../../shared/errors/engine-errors';
import { logger } from '../../shared/logger';
import {
  buildExplainResponseSystemPrompt,
  buildExplainSystemPrompt,
  buildMicroQuizSystemPrompt,
  buildProbeResponseSystemPrompt,
  buildProbeSystemPrompt,
  buildQuizFeedbackSystemPrompt,
  type TeachingPromptInput,
} from '../../shared/prompts';
import { buildFallbackMicroQuizQuestion, parseMicroQuizQuestion } from '../../tools/quizQuestions';
import {
  continueWith,
  emitEvent,
  sayAsTutor,
  timestamp,
  toChatHistory,
  waitForLearner,
  withProviderFallback,
  type EngineContext,
  type PhaseHandler,
} from '../context';
import { readCompletionFlag } from '../controlFlags';
import { currentObjective, lastLearnerMessage, markObjectiveCompleted } from '../sessionState';

export const EXIT_ACKNOWLEDGEMENT = "Understood, let's stop the lesson here and check what we covered.";
export const ALL_OBJECTIVES_DONE_MESSAGE =
  "Great job! You've worked through every objective for this concept. Let's move on to the final test.";

const atStep = (step: TeachingStep): Pick<SessionState, 'phase'> => ({ phase: { kind: 'teaching', step } });

const promptInput = (state: SessionState, objective: Objective): TeachingPromptInput => {
  const completed = new Set(state.completedObjectiveIds);

  return {
    nodeTitle: state.nodeTitle,
    objective,
    recentObjectives: [
      ...state.objectivesKnown,
      ...state.objectivesToTeach.filter((candidate) => completed.has(candidate.id)),
    ],
    remainingObjectives: state.objectivesToTeach.slice(state.objectiveIndex + 1),
    references: state.referenceMaterials,
  };
};

const latestMicroQuizIndex = (state: SessionState, objectiveId: string): number => {
  for (let index = state.microQuizzes.length - 1; index >= 0; index -= 1) {
    if (state.microQuizzes[index]?.objectiveId === objectiveId) {
      return index;
    }
  }

  return -1;
};

const probeAsk = async (state: SessionState, context: EngineContext): Promise<SessionState> => {
  if (state.exitRequested) {
    return continueWith(sayAsTutor(context, state, EXIT_ACKNOWLEDGEMENT), { phase: { kind: 'testing' } });
  }

  const objective = currentObjective(state);
  if (!objective) {
    return continueWith(state, { phase: { kind: 'testing' } });
  }

  return withProviderFallback(context, state, async () => {
    const response = await context.llm.invoke(
      buildProbeSystemPrompt(promptInput(state, objective)),
      toChatHistory(state),
      { purpose: 'probe', temperature: 0.7, maxTokens: 300 },
    );

    return waitForLearner(sayAsTutor(context, state, response.text), atStep('probe_respond'));
  });
};

const probeRespond = async (
  state: SessionState,
  context: EngineContext,
  objective: Objective,
): Promise<SessionState> => {
  if (lastLearnerMessage(state) === null) {
    emitEvent(context, state, 'learner_message_missing', { objectiveId: objective.id });
    return continueWith(state, atStep('explain_present'));
  }

  return withProviderFallback(context, state, async () => {
    const response = await context.llm.invoke(
      buildProbeResponseSystemPrompt(promptInput(state, objective)),
      toChatHistory(state),
      { purpose: 'probe_response', temperature: 0.5, maxTokens: 300 },
    );

    const demonstrated = readCompletionFlag(context, state, response.text, 'objective_complete');
    const replied = sayAsTutor(context, state, response.text);

    if (demonstrated) {
      emitEvent(context, replied, 'explanation_skipped', { objectiveId: objective.id });
      return continueWith(replied, atStep('quiz_ask'));
    }

    return continueWith(replied, atStep('explain_present'));
  });
};

const explainPresent = (state: SessionState, context: EngineContext, objective: Objective): Promise<SessionState> => {
  return withProviderFallback(context, state, async () => {
    const response = await context.llm.invoke(
      buildExplainSystemPrompt(promptInput(state, objective)),
      toChatHistory(state),
      { purpose: 'explain', temperature: 0.5, maxTokens: 500 },
    );

    return waitForLearner(sayAsTutor(context, state, response.text), atStep('explain_respond'));
  });
};

const explainRespond = async (
  state: SessionState,
  context: EngineContext,
  objective: Objective,
): Promise<SessionState> => {
  if (lastLearnerMessage(state) === null) {
    emitEvent(context, state, 'learner_message_missing', { objectiveId: objective.id });
    return continueWith(state, atStep('quiz_ask'));
  }

  return withProviderFallback(context, state, async () => {
    const response = await context.llm.invoke(
      buildExplainResponseSystemPrompt(promptInput(state, objective)),
      toChatHistory(state),
      { purpose: 'explain_response', temperature: 0.5, maxTokens: 300 },
    );

    return continueWith(sayAsTutor(context, state, response.text), atStep('quiz_ask'));
  });
};

const quizAsk = (state: SessionState, context: EngineContext, objective: Objective): Promise<SessionState> => {
  return withProviderFallback(context, state, async () => {
    const response = await context.llm.invoke(
      buildMicroQuizSystemPrompt(promptInput(state, objective)),
      toChatHistory(state),
      { purpose: 'micro_quiz_question', temperature: 0.4, maxTokens: 300 },
    );

    const parsed = parseMicroQuizQuestion(response.text, objective);
    if (!parsed) {
      logger.warn('micro_quiz_fallback', { sessionId: state.sessionId, objectiveId: objective.id });
    }

    const question = parsed ?? buildFallbackMicroQuizQuestion(objective);
    const record: MicroQuizRecord = { objectiveId: objective.id, question, askedAt: timestamp(context) };
    const recorded: SessionState = { ...state, microQuizzes: [...state.microQuizzes, record] };

    return waitForLearner(sayAsTutor(context, recorded, `**Quick check:** ${question.prompt}`), atStep('quiz_evaluate'));
  });
};

/** Closes the current objective: marks it completed and moves the index past it. */
const completeObjective = (state: SessionState, context: EngineContext, objective: Objective): SessionState => {
  const completed: SessionState = {
    ...markObjectiveCompleted(state, objective.id),
    objectiveIndex: state.objectiveIndex + 1,
  };

  emitEvent(context, completed, 'objective_completed', {
    objectiveId: objective.id,
    completedCount: completed.completedObjectiveIds.length,
    remaining: completed.objectivesToTeach.length - completed.objectiveIndex,
  });

  const next = currentObjective(completed);
  if (next && completed.exitRequested) {
    return continueWith(completed, atStep('probe_ask'));
  }

  if (next) {
    const announced = sayAsTutor(context, completed, `Let's move to the next objective: ${next.description}`);
    return waitForLearner(announced, atStep('probe_ask'));
  }

  return continueWith(sayAsTutor(context, completed, ALL_OBJECTIVES_DONE_MESSAGE), { phase: { kind: 'testing' } });
};

const quizEvaluate = async (
  state: SessionState,
  context: EngineContext,
  objective: Objective,
): Promise<SessionState> => {
  const answer = lastLearnerMessage(state);

  if (answer === null) {
    emitEvent(context, state, 'learner_message_missing', { objectiveId: objective.id });
    return completeObjective(state, context, objective);
  }

  const quizIndex = latestMicroQuizIndex(state, objective.id);
  const record = state.microQuizzes[quizIndex];
  const question = record?.question ?? buildFallbackMicroQuizQuestion(objective);

  return withProviderFallback(context, state, async () => {
    const response = await context.llm.invoke(
      buildQuizFeedbackSystemPrompt(question),
      [{ role: 'user', content: answer }],
      { purpose: 'micro_quiz_feedback', temperature: 0.3, maxTokens: 200 },
    );

    const microQuizzes = record
      ? state.microQuizzes.map((item, index) =>
          index === quizIndex ? { ...item, answer, feedback: response.text } : item,
        )
      : state.microQuizzes;

    const reviewed = sayAsTutor(context, { ...state, microQuizzes }, response.text);
    return completeObjective(reviewed, context, objective);
  });
};

/**
 * Per-objective micro-cycle. `step` names the action this tick performs; the
 * ask steps wait for the learner, the respond steps consume the latest reply.
 */
export const handleTeaching: PhaseHandler = (state, context): Promise<SessionState> => {
  if (state.phase.kind !== 'teaching') {
    throw new SessionInvariantError(`Teaching handler invoked in phase ${state.phase.kind}.`);
  }

  const step = state.phase.step;
  if (step === 'probe_ask') {
    return probeAsk(state, context);
  }

  const objective = currentObjective(state);
  if (!objective) {
    throw new SessionInvariantError(`No objective at index ${state.objectiveIndex} for step ${step}.`, {
      objectiveIndex: state.objectiveIndex,
      objectiveCount: state.objectivesToTeach.length,
    });
  }

  switch (step) {
    case 'probe_respond':
      return probeRespond(state, context, objective);
    case 'explain_present':
      return explainPresent(state, context, objective);
    case 'explain_respond':
      return explainRespond(state, context, objective);
    case 'quiz_ask':
      return quizAsk(state, context, objective);
    case 'quiz_evaluate':
      return quizEvaluate(state, context, objective);
  }
};
