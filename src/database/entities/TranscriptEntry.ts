import { Column, Entity, JoinColumn, ManyToOne, PrimaryColumn } from 'typeorm';
import { TutoringSession } from './TutoringSession';

@Entity({ name: 'transcript_entries' })
export class TranscriptEntry {
  @PrimaryColumn({ name: 'session_id', type: 'uuid' })
  sessionId!: string;

  @PrimaryColumn({ name: 'turn_index', type: 'integer' })
  turnIndex!: number;

  @ManyToOne(() => TutoringSession, (session) => session.transcript, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'session_id' })
  session!: TutoringSession;

  @Column({ type: 'varchar', length: 10 })
  role!: string;

  @Column({ type: 'text' })
  content!: string;

  @Column({ type: 'varchar', length: 40 })
  phase!: string;

  @Column({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
