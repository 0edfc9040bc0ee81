import type { ConversationTurn, Objective, ReferenceMaterial } from '../@types';

export interface KnowledgeNodeRecord {
  id: string;
  projectId: string;
  title: string;
  summary: string | null;
  objectives: Objective[];
  prerequisiteNodeIds: string[];
}

export interface ProjectGraphNode {
  id: string;
  title: string;
  mastery: number;
  prerequisiteNodeIds: string[];
}

export interface ProjectGraph {
  projectId: string;
  topic: string;
  nodes: ProjectGraphNode[];
}

export interface OpenSessionInput {
  sessionId: string;
  projectId: string;
  nodeId: string;
  startedAt: string;
}

/**
 * Persistence boundary of the tutoring engine. The engine only ever reads the
 * graph and writes mastery values, session rows and transcript lines through it.
 */
export interface KnowledgeStore {
  loadNode(nodeId: string): Promise<KnowledgeNodeRecord | null>;
  loadPrerequisiteObjectives(projectId: string, nodeId: string): Promise<Objective[]>;
  loadReferenceMaterials(projectId: string): Promise<ReferenceMaterial[]>;
  loadProjectGraph(projectId: string): Promise<ProjectGraph | null>;
  openSession(input: OpenSessionInput): Promise<void>;
  appendTranscript(sessionId: string, firstTurnIndex: number, turns: ConversationTurn[]): Promise<void>;
  updateMastery(objectiveId: string, mastery: number): Promise<void>;
  setNodeMastery(nodeId: string, mastery: number): Promise<void>;
  completeSession(sessionId: string, finalScore: number | null): Promise<void>;
}
