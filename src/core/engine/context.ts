import type { SessionEventType, SessionState } from '../@types';
import type { KnowledgeStore } from '../knowledge/knowledgeStore';
import type { SessionLogSink } from '../logging/sessionLog';
import { stripControlBlocks } from '../tools/controlSignals';
import { Grader } from '../tools/grader';
import type { ChatMessage, LlmTool } from '../tools/llm';
import { MasteryAggregator } from '../tools/mastery';
import { isProviderError, type ProviderError } from '../shared/errors/engine-errors';
import { appendTurn, phaseLabel } from './sessionState';

export interface EngineSettings {
  finalTestQuestionCount: number;
  prerequisiteQuizQuestionCount: number;
  tickLimit: number;
}

/** Everything a phase handler may touch besides the state it is given. */
export interface EngineContext {
  llm: LlmTool;
  knowledgeStore: KnowledgeStore;
  sessionLog: SessionLogSink;
  mastery: MasteryAggregator;
  grader: Grader;
  settings: EngineSettings;
  now: () => Date;
}

export interface EngineContextInput {
  llm: LlmTool;
  knowledgeStore: KnowledgeStore;
  sessionLog: SessionLogSink;
  settings: EngineSettings;
  now?: () => Date;
}

export const createEngineContext = (input: EngineContextInput): EngineContext => ({
  llm: input.llm,
  knowledgeStore: input.knowledgeStore,
  sessionLog: input.sessionLog,
  mastery: new MasteryAggregator(input.knowledgeStore),
  grader: new Grader(input.llm),
  settings: input.settings,
  now: input.now ?? (() => new Date()),
});

export type PhaseHandler = (state: SessionState, context: EngineContext) => Promise<SessionState>;

export const PROVIDER_FALLBACK_MESSAGE =
  "I'm having trouble reaching the tutoring service right now. Send your last message again to retry, or end the session to go straight to the final test.";

export const continueWith = (state: SessionState, patch: Partial<SessionState> = {}): SessionState => ({
  ...state,
  ...patch,
  autoAdvance: true,
});

export const waitForLearner = (state: SessionState, patch: Partial<SessionState> = {}): SessionState => ({
  ...state,
  ...patch,
  autoAdvance: false,
});

export const timestamp = (context: EngineContext): string => context.now().toISOString();

export const emitEvent = (
  context: EngineContext,
  state: SessionState,
  type: SessionEventType,
  payload: Record<string, unknown> = {},
): void => {
  context.sessionLog.event({
    sessionId: state.sessionId,
    timestamp: timestamp(context),
    type,
    payload: { phase: phaseLabel(state.phase), ...payload },
  });
};

/**
 * Appends a tutor turn. The transcript keeps the learner-visible text; the log
 * receives the raw model output including any control block.
 */
export const sayAsTutor = (context: EngineContext, state: SessionState, rawText: string): SessionState => {
  const createdAt = timestamp(context);
  const visible = stripControlBlocks(rawText);

  context.sessionLog.message({
    sessionId: state.sessionId,
    timestamp: createdAt,
    speaker: 'tutor',
    text: rawText,
    phase: phaseLabel(state.phase),
  });

  return appendTurn(state, 'tutor', visible, createdAt);
};

export const toChatHistory = (state: SessionState): ChatMessage[] => {
  return state.history.map((turn): ChatMessage => ({
    role: turn.role === 'learner' ? 'user' : 'assistant',
    content: turn.content,
  }));
};

export const recoverFromProviderError = (
  context: EngineContext,
  state: SessionState,
  error: ProviderError,
): SessionState => {
  emitEvent(context, state, 'provider_error', {
    kind: error.kind,
    retryable: error.retryable,
    error: error.message,
  });

  return waitForLearner(sayAsTutor(context, state, PROVIDER_FALLBACK_MESSAGE));
};

/**
 * Runs a content-generating step. A failed model call leaves phase and step as
 * they were and parks the session on a fallback message; other errors propagate.
 */
export const withProviderFallback = async (
  context: EngineContext,
  state: SessionState,
  work: () => Promise<SessionState>,
): Promise<SessionState> => {
  try {
    return await work();
  } catch (error: unknown) {
    if (isProviderError(error)) {
      return recoverFromProviderError(context, state, error);
    }

    throw error;
  }
};
