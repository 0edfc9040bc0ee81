import { Check, Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { KnowledgeNode } from './KnowledgeNode';

@Entity({ name: 'learning_objectives' })
@Check(`"mastery" BETWEEN 0 AND 1`)
export class LearningObjective {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ name: 'node_id', type: 'uuid' })
  nodeId!: string;

  @ManyToOne(() => KnowledgeNode, (node) => node.objectives, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'node_id' })
  node!: KnowledgeNode;

  @Column({ type: 'text' })
  description!: string;

  @Column({ type: 'smallint', default: 0 })
  position!: number;

  @Column({ type: 'real', default: 0 })
  mastery!: number;
}
