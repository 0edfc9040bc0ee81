import type { NextNodesResponse } from '../../core/@types';
import type { KnowledgeStore } from '../../core/knowledge/knowledgeStore';
import { knowledgeStore } from '../../core/runtime';
import { AppError } from '../../core/shared/errors/app-error';
import { NEXT_NODE_LIMIT, selectNextNodes } from '../../core/tools/mastery';

export class ProjectsService {
  public constructor(private readonly store: KnowledgeStore) {}

  public async getNextNodes(projectId: string, limit = NEXT_NODE_LIMIT): Promise<NextNodesResponse> {
    const graph = await this.store.loadProjectGraph(projectId);

    if (!graph) {
      throw new AppError(404, `Project with id ${projectId} was not found.`, 'PROJECT_NOT_FOUND');
    }

    return {
      projectId,
      nodes: selectNextNodes(graph.nodes, limit).map((node) => ({
        nodeId: node.id,
        title: node.title,
        mastery: node.mastery,
      })),
    };
  }
}

export const projectsService = new ProjectsService(knowledgeStore);
