import { In, type DataSource } from 'typeorm';
import { z } from 'zod';

import { KnowledgeNode } from '../../database/entities/KnowledgeNode';
import { LearningObjective } from '../../database/entities/LearningObjective';
import { PrerequisiteEdge } from '../../database/entities/PrerequisiteEdge';
import { Project } from '../../database/entities/Project';
import { TranscriptEntry } from '../../database/entities/TranscriptEntry';
import { TutoringSession, TutoringSessionStatus } from '../../database/entities/TutoringSession';
import type { ConversationTurn, Objective, ReferenceMaterial } from '../@types';
import { logger } from '../shared/logger';
import { clampMastery } from '../tools/mastery';
import type {
  KnowledgeNodeRecord,
  KnowledgeStore,
  OpenSessionInput,
  ProjectGraph,
} from './knowledgeStore';

const optionalText = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .optional();

const referenceMaterialSchema = z.object({
  rid: z.string().trim().min(1),
  title: z.string().trim().min(1),
  location: optionalText,
  kind: optionalText,
  year: optionalText,
  url: optionalText,
});

/** Drops malformed entries instead of failing the whole list. */
export const parseReferenceMaterials = (raw: unknown): ReferenceMaterial[] => {
  if (!Array.isArray(raw)) {
    return [];
  }

  const materials: ReferenceMaterial[] = [];
  for (const entry of raw) {
    const parsed = referenceMaterialSchema.safeParse(entry);
    if (!parsed.success) {
      continue;
    }

    const { rid, title, location, kind, year, url } = parsed.data;
    materials.push({
      rid,
      title,
      ...(location ? { location } : {}),
      ...(kind ? { kind } : {}),
      ...(year ? { year } : {}),
      ...(url ? { url } : {}),
    });
  }

  return materials;
};

const toObjective = (row: LearningObjective): Objective => ({
  id: row.id,
  description: row.description,
  mastery: clampMastery(row.mastery),
  nodeId: row.nodeId,
});

export class TypeOrmKnowledgeStore implements KnowledgeStore {
  public constructor(private readonly dataSource: DataSource) {}

  public async loadNode(nodeId: string): Promise<KnowledgeNodeRecord | null> {
    const node = await this.dataSource.getRepository(KnowledgeNode).findOneBy({ id: nodeId });
    if (!node) {
      return null;
    }

    const [objectives, edges] = await Promise.all([
      this.dataSource.getRepository(LearningObjective).find({
        where: { nodeId },
        order: { position: 'ASC' },
      }),
      this.dataSource.getRepository(PrerequisiteEdge).find({
        where: { targetNodeId: nodeId, projectId: node.projectId },
      }),
    ]);

    return {
      id: node.id,
      projectId: node.projectId,
      title: node.title,
      summary: node.summary,
      objectives: objectives.map(toObjective),
      prerequisiteNodeIds: edges.map((edge) => edge.sourceNodeId),
    };
  }

  public async loadPrerequisiteObjectives(projectId: string, nodeId: string): Promise<Objective[]> {
    const edges = await this.dataSource.getRepository(PrerequisiteEdge).find({
      where: { targetNodeId: nodeId, projectId },
    });

    if (edges.length === 0) {
      return [];
    }

    const sources = await this.dataSource.getRepository(KnowledgeNode).find({
      where: { id: In(edges.map((edge) => edge.sourceNodeId)) },
      relations: { objectives: true },
      order: { title: 'ASC', objectives: { position: 'ASC' } },
    });

    return sources.flatMap((source) => source.objectives.map(toObjective));
  }

  public async loadReferenceMaterials(projectId: string): Promise<ReferenceMaterial[]> {
    const project = await this.dataSource.getRepository(Project).findOneBy({ id: projectId });
    if (!project) {
      return [];
    }

    const materials = parseReferenceMaterials(project.referenceMaterials);
    const rawCount = Array.isArray(project.referenceMaterials) ? project.referenceMaterials.length : 0;
    if (materials.length < rawCount) {
      logger.warn('reference_materials_skipped', {
        projectId,
        skipped: rawCount - materials.length,
      });
    }

    return materials;
  }

  public async loadProjectGraph(projectId: string): Promise<ProjectGraph | null> {
    const project = await this.dataSource.getRepository(Project).findOneBy({ id: projectId });
    if (!project) {
      return null;
    }

    const [nodes, edges] = await Promise.all([
      this.dataSource.getRepository(KnowledgeNode).find({
        where: { projectId },
        order: { title: 'ASC' },
      }),
      this.dataSource.getRepository(PrerequisiteEdge).find({ where: { projectId } }),
    ]);

    return {
      projectId,
      topic: project.topic,
      nodes: nodes.map((node) => ({
        id: node.id,
        title: node.title,
        mastery: clampMastery(node.mastery),
        prerequisiteNodeIds: edges
          .filter((edge) => edge.targetNodeId === node.id)
          .map((edge) => edge.sourceNodeId),
      })),
    };
  }

  public async openSession(input: OpenSessionInput): Promise<void> {
    const repository = this.dataSource.getRepository(TutoringSession);
    const session = repository.create({
      id: input.sessionId,
      projectId: input.projectId,
      nodeId: input.nodeId,
      status: TutoringSessionStatus.Active,
      startedAt: new Date(input.startedAt),
      endedAt: null,
      finalScore: null,
    });

    await repository.save(session);
  }

  public async appendTranscript(
    sessionId: string,
    firstTurnIndex: number,
    turns: ConversationTurn[],
  ): Promise<void> {
    if (turns.length === 0) {
      return;
    }

    const repository = this.dataSource.getRepository(TranscriptEntry);
    const entries = turns.map((turn, offset) =>
      repository.create({
        sessionId,
        turnIndex: firstTurnIndex + offset,
        role: turn.role,
        content: turn.content,
        phase: turn.phase,
        createdAt: new Date(turn.createdAt),
      }),
    );

    await repository.insert(entries);
  }

  public async updateMastery(objectiveId: string, mastery: number): Promise<void> {
    await this.dataSource
      .getRepository(LearningObjective)
      .update({ id: objectiveId }, { mastery: clampMastery(mastery) });
  }

  public async setNodeMastery(nodeId: string, mastery: number): Promise<void> {
    await this.dataSource
      .getRepository(KnowledgeNode)
      .update({ id: nodeId }, { mastery: clampMastery(mastery) });
  }

  public async completeSession(sessionId: string, finalScore: number | null): Promise<void> {
    await this.dataSource.getRepository(TutoringSession).update(
      { id: sessionId },
      {
        status: TutoringSessionStatus.Completed,
        endedAt: new Date(),
        finalScore,
      },
    );
  }
}
