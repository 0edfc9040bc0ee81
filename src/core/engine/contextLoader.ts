import type { Objective, SessionState } from '../@types';
import { ContextNotFoundError } from '../shared/errors/engine-errors';
import { isKnown } from '../tools/mastery';
import { continueWith, emitEvent, type PhaseHandler } from './context';

export const partitionObjectives = (objectives: Objective[]): { toTeach: Objective[]; known: Objective[] } => {
  return {
    toTeach: objectives.filter((objective) => !isKnown(objective.mastery)),
    known: objectives.filter((objective) => isKnown(objective.mastery)),
  };
};

/**
 * Fills a fresh session from the knowledge store. A missing node (or a node of
 * another project) raises ContextNotFoundError before anything is written.
 */
export const loadContext: PhaseHandler = async (state, context): Promise<SessionState> => {
  const node = await context.knowledgeStore.loadNode(state.nodeId);

  if (!node || node.projectId !== state.projectId) {
    throw new ContextNotFoundError(state.nodeId);
  }

  const { toTeach, known } = partitionObjectives(node.objectives);
  const prerequisiteObjectives = await context.knowledgeStore.loadPrerequisiteObjectives(node.projectId, node.id);
  const referenceMaterials = await context.knowledgeStore.loadReferenceMaterials(node.projectId);

  await context.knowledgeStore.openSession({
    sessionId: state.sessionId,
    projectId: node.projectId,
    nodeId: node.id,
    startedAt: state.startedAt,
  });

  const loaded: SessionState = {
    ...state,
    nodeTitle: node.title,
    referenceMaterials,
    objectivesToTeach: toTeach,
    objectivesKnown: known,
    prerequisiteObjectives,
  };

  emitEvent(context, loaded, 'session_started', {
    nodeTitle: node.title,
    objectivesToTeach: toTeach.length,
    objectivesKnown: known.length,
    prerequisiteObjectives: prerequisiteObjectives.length,
    referenceMaterials: referenceMaterials.length,
  });

  return continueWith(loaded, { phase: { kind: 'intro' } });
};
