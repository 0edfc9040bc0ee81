import { Column, CreateDateColumn, Entity, OneToMany, PrimaryGeneratedColumn } from 'typeorm';
import { KnowledgeNode } from './KnowledgeNode';

@Entity({ name: 'projects' })
export class Project {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 200 })
  topic!: string;

  // Raw reference list as produced by the research pipeline; validated on read.
  @Column({ name: 'reference_materials', type: 'jsonb', default: () => "'[]'" })
  referenceMaterials!: unknown;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @OneToMany(() => KnowledgeNode, (node) => node.project)
  nodes!: KnowledgeNode[];
}
