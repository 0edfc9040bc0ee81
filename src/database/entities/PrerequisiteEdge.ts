import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryColumn } from 'typeorm';
import { KnowledgeNode } from './KnowledgeNode';

/** `source` must be understood before `target`. */
@Entity({ name: 'prerequisite_edges' })
export class PrerequisiteEdge {
  @PrimaryColumn({ name: 'source_node_id', type: 'uuid' })
  sourceNodeId!: string;

  @PrimaryColumn({ name: 'target_node_id', type: 'uuid' })
  targetNodeId!: string;

  @Index()
  @Column({ name: 'project_id', type: 'uuid' })
  projectId!: string;

  @ManyToOne(() => KnowledgeNode, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'source_node_id' })
  source!: KnowledgeNode;

  @ManyToOne(() => KnowledgeNode, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'target_node_id' })
  target!: KnowledgeNode;

  @Column({ type: 'real', nullable: true })
  confidence!: number | null;

  @Column({ type: 'text', nullable: true })
  rationale!: string | null;
}
