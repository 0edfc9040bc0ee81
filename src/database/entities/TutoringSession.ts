import { Column, Entity, Index, OneToMany, PrimaryColumn } from 'typeorm';
import { TranscriptEntry } from './TranscriptEntry';

export enum TutoringSessionStatus {
  Active = 'active',
  Completed = 'completed',
}

@Entity({ name: 'tutoring_sessions' })
export class TutoringSession {
  @PrimaryColumn({ type: 'uuid' })
  id!: string;

  @Column({ name: 'project_id', type: 'uuid' })
  projectId!: string;

  @Index()
  @Column({ name: 'node_id', type: 'uuid' })
  nodeId!: string;

  @Column({
    type: 'enum',
    enum: TutoringSessionStatus,
    default: TutoringSessionStatus.Active,
  })
  status!: TutoringSessionStatus;

  @Column({ name: 'started_at', type: 'timestamptz' })
  startedAt!: Date;

  @Column({ name: 'ended_at', type: 'timestamptz', nullable: true })
  endedAt!: Date | null;

  @Column({ name: 'final_score', type: 'real', nullable: true })
  finalScore!: number | null;

  @OneToMany(() => TranscriptEntry, (entry) => entry.session)
  transcript!: TranscriptEntry[];
}
