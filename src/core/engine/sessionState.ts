import {
  SESSION_STATE_VERSION,
  type ConversationTurn,
  type Objective,
  type SessionIdentifiers,
  type SessionPhase,
  type SessionState,
  type TurnRole,
} from '../@types';

export const createSessionState = (identifiers: SessionIdentifiers, startedAt: string): SessionState => ({
  version: SESSION_STATE_VERSION,
  sessionId: identifiers.sessionId,
  projectId: identifiers.projectId,
  nodeId: identifiers.nodeId,
  nodeTitle: '',
  referenceMaterials: [],
  objectivesToTeach: [],
  objectivesKnown: [],
  prerequisiteObjectives: [],
  completedObjectiveIds: [],
  history: [],
  phase: { kind: 'load_context' },
  objectiveIndex: 0,
  prerequisiteStrategy: null,
  prerequisiteQuizQuestions: [],
  prerequisiteQuizAnswers: [],
  microQuizzes: [],
  testQuestions: [],
  testAnswers: [],
  gradedQuestions: [],
  objectiveScores: {},
  finalScore: null,
  exitRequested: false,
  exitRequestedDuring: null,
  autoAdvance: false,
  startedAt,
  endedAt: null,
});

export const phaseLabel = (phase: SessionPhase): string => {
  return phase.kind === 'teaching' ? `teaching:${phase.step}` : phase.kind;
};

export const appendTurn = (
  state: SessionState,
  role: TurnRole,
  content: string,
  createdAt: string,
): SessionState => {
  const turn: ConversationTurn = { role, content, phase: phaseLabel(state.phase), createdAt };
  return { ...state, history: [...state.history, turn] };
};

/** The learner message a tick may consume: the last turn, and only if the learner wrote it. */
export const lastLearnerMessage = (state: SessionState): string | null => {
  const last = state.history[state.history.length - 1];
  return last?.role === 'learner' ? last.content : null;
};

export const currentObjective = (state: SessionState): Objective | undefined => {
  return state.objectivesToTeach[state.objectiveIndex];
};

export const markObjectiveCompleted = (state: SessionState, objectiveId: string): SessionState => {
  const isTaught = state.objectivesToTeach.some((objective) => objective.id === objectiveId);

  if (!isTaught || state.completedObjectiveIds.includes(objectiveId)) {
    return state;
  }

  return { ...state, completedObjectiveIds: [...state.completedObjectiveIds, objectiveId] };
};

/**
 * Objectives the final test covers: all objectives to teach, or only the
 * completed ones (in completion order) when the learner ended the session early.
 */
export const objectivesForTesting = (state: SessionState): Objective[] => {
  if (!state.exitRequested) {
    return state.objectivesToTeach;
  }

  const byId = new Map(state.objectivesToTeach.map((objective) => [objective.id, objective]));
  return state.completedObjectiveIds
    .map((objectiveId) => byId.get(objectiveId))
    .filter((objective): objective is Objective => objective !== undefined);
};

export const isAwaitingLearner = (state: SessionState): boolean => {
  return !state.autoAdvance && state.phase.kind !== 'completed';
};

/** The teaching boundary between objectives, the only place an exit request takes effect mid-lesson. */
export const isAtObjectiveBoundary = (state: SessionState): boolean => {
  return state.phase.kind === 'teaching' && state.phase.step === 'probe_ask';
};
