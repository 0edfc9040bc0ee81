import type { Objective } from '../@types';
import type { KnowledgeStore, ProjectGraphNode } from '../knowledge/knowledgeStore';
import { logger } from '../shared/logger';

export const MASTERY_THRESHOLD = 0.7;
export const NEXT_NODE_LIMIT = 2;

const round = (value: number): number => Number(value.toFixed(4));

export const clampMastery = (value: number): number => {
  if (!Number.isFinite(value)) {
    return 0;
  }

  return Math.min(1, Math.max(0, value));
};

/** One-step running average of the stored value and the freshly observed score. */
export const blendMastery = (previous: number, observed: number): number => {
  return round(clampMastery((clampMastery(previous) + clampMastery(observed)) / 2));
};

export const calculateNodeMastery = (masteries: number[]): number => {
  if (masteries.length === 0) {
    return 0;
  }

  const total = masteries.reduce((sum, value) => sum + clampMastery(value), 0);
  return round(clampMastery(total / masteries.length));
};

export const isKnown = (mastery: number): boolean => mastery >= MASTERY_THRESHOLD;

export interface MasteryUpdateResult {
  objectives: Objective[];
  changed: Array<{ objectiveId: string; previous: number; observed: number; next: number }>;
  nodeMastery: number;
}

/**
 * Folds per-objective session scores into the durable mastery values of a node.
 * Objectives without a score keep their stored mastery but still count towards
 * the node mean.
 */
export class MasteryAggregator {
  public constructor(private readonly knowledgeStore: KnowledgeStore) {}

  public async applyObjectiveScores(
    nodeId: string,
    nodeObjectives: Objective[],
    objectiveScores: Record<string, number>,
  ): Promise<MasteryUpdateResult> {
    const changed: MasteryUpdateResult['changed'] = [];
    const objectives: Objective[] = [];

    for (const objective of nodeObjectives) {
      const observed = objectiveScores[objective.id];

      if (observed === undefined) {
        objectives.push(objective);
        continue;
      }

      const next = blendMastery(objective.mastery, observed);
      await this.knowledgeStore.updateMastery(objective.id, next);
      changed.push({ objectiveId: objective.id, previous: objective.mastery, observed, next });
      objectives.push({ ...objective, mastery: next });
    }

    const nodeMastery = calculateNodeMastery(objectives.map((objective) => objective.mastery));
    await this.knowledgeStore.setNodeMastery(nodeId, nodeMastery);

    logger.info('mastery_updated', {
      nodeId,
      updatedObjectives: changed.length,
      nodeMastery,
    });

    return { objectives, changed, nodeMastery };
  }
}

/**
 * A node is unlocked when every prerequisite node is known. Unlocked nodes are
 * suggested lowest mastery first.
 */
export const selectNextNodes = (
  nodes: ProjectGraphNode[],
  limit = NEXT_NODE_LIMIT,
): ProjectGraphNode[] => {
  const masteryById = new Map(nodes.map((node) => [node.id, node.mastery]));

  return nodes
    .filter((node) =>
      node.prerequisiteNodeIds.every((prerequisiteId) => isKnown(masteryById.get(prerequisiteId) ?? 0)),
    )
    .sort((left, right) => left.mastery - right.mastery)
    .slice(0, limit);
};
