import { Check, Column, Entity, Index, JoinColumn, ManyToOne, OneToMany, PrimaryGeneratedColumn } from 'typeorm';
import { LearningObjective } from './LearningObjective';
import { Project } from './Project';

@Entity({ name: 'knowledge_nodes' })
@Check(`"mastery" BETWEEN 0 AND 1`)
export class KnowledgeNode {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ name: 'project_id', type: 'uuid' })
  projectId!: string;

  @ManyToOne(() => Project, (project) => project.nodes, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'project_id' })
  project!: Project;

  @Column({ type: 'varchar', length: 200 })
  title!: string;

  @Column({ type: 'text', nullable: true })
  summary!: string | null;

  @Column({ type: 'real', default: 0 })
  mastery!: number;

  @OneToMany(() => LearningObjective, (objective) => objective.node)
  objectives!: LearningObjective[];
}
