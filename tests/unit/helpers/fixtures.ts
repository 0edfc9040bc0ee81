import type { Objective, SessionState } from '../../../src/core/@types';
import { createEngineContext, type EngineContext, type EngineSettings } from '../../../src/core/engine/context';
import { appendTurn, createSessionState } from '../../../src/core/engine/sessionState';
import { InMemoryKnowledgeStore } from './inMemoryKnowledgeStore';
import { RecordingSessionLog } from './recordingSessionLog';
import { ScriptedLlmTool } from './scriptedLlm';

export const PROJECT_ID = 'project-1';
export const NODE_ID = 'node-recursion';
export const PREREQUISITE_NODE_ID = 'node-functions';
export const FIXED_NOW = '2026-03-02T10:00:00.000Z';

export const RECURSION_OBJECTIVES = [
  { id: 'obj-base-case', description: 'Identify the base case of a recursive function' },
  { id: 'obj-recursive-step', description: 'Write the recursive step' },
  { id: 'obj-call-stack', description: 'Trace the call stack' },
];

export const FUNCTION_OBJECTIVES = [
  { id: 'obj-parameters', description: 'Pass parameters to a function' },
  { id: 'obj-return', description: 'Return a value from a function' },
];

export interface SeedOptions {
  objectives?: Array<{ id: string; description: string; mastery?: number }>;
  withPrerequisites?: boolean;
}

export const seedStore = (options: SeedOptions = {}): InMemoryKnowledgeStore => {
  const store = new InMemoryKnowledgeStore().addProject(PROJECT_ID, 'Programming basics');

  if (options.withPrerequisites) {
    store.addNode({
      id: PREREQUISITE_NODE_ID,
      projectId: PROJECT_ID,
      title: 'Functions',
      objectives: FUNCTION_OBJECTIVES,
    });
  }

  return store.addNode({
    id: NODE_ID,
    projectId: PROJECT_ID,
    title: 'Recursion',
    objectives: options.objectives ?? RECURSION_OBJECTIVES,
    prerequisiteNodeIds: options.withPrerequisites ? [PREREQUISITE_NODE_ID] : [],
  });
};

export interface TestHarness {
  context: EngineContext;
  llm: ScriptedLlmTool;
  store: InMemoryKnowledgeStore;
  log: RecordingSessionLog;
}

export interface HarnessOptions {
  llm?: ScriptedLlmTool;
  store?: InMemoryKnowledgeStore;
  settings?: Partial<EngineSettings>;
}

export const createHarness = (options: HarnessOptions = {}): TestHarness => {
  const llm = options.llm ?? new ScriptedLlmTool();
  const store = options.store ?? seedStore();
  const log = new RecordingSessionLog();

  const context = createEngineContext({
    llm,
    knowledgeStore: store,
    sessionLog: log,
    settings: {
      tickLimit: 32,
      finalTestQuestionCount: 6,
      prerequisiteQuizQuestionCount: 4,
      ...options.settings,
    },
    now: () => new Date(FIXED_NOW),
  });

  return { context, llm, store, log };
};

export const newSession = (sessionId = 'session-1'): SessionState => {
  return createSessionState({ sessionId, projectId: PROJECT_ID, nodeId: NODE_ID }, FIXED_NOW);
};

export const withLearnerTurn = (state: SessionState, message: string): SessionState => {
  return appendTurn(state, 'learner', message, FIXED_NOW);
};

export const objective = (id: string, description: string, mastery = 0, nodeId = NODE_ID): Objective => ({
  id,
  description,
  mastery,
  nodeId,
});
