import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Pipeline } from './pipeline.entity';
import type { SerializedPipelineResult } from '../../executor/stage-result.serializer';

/**
 * One execution of a pipeline. Queued as 'pending', claimed by a worker as
 * 'running', then holds the terminal status text (OK, BuildError, ...) and the
 * serialized PipelineResult.
 */
@Entity('pipeline_runs')
@Index(['status', 'created_at'])
export class PipelineRun {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  pipeline_id!: string;

  @ManyToOne(() => Pipeline, (p) => p.runs, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'pipeline_id' })
  pipeline!: Pipeline;

  @Column({ length: 50, default: 'manual' })
  trigger_type!: string;

  @Column({ length: 50, default: 'pending' })
  status!: string;

  @Column({ type: 'varchar', length: 100, nullable: true })
  claimed_by!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  volume_name!: string | null;

  /** Serialized PipelineResult; null until the run reaches the executor and finishes. */
  @Column('jsonb', { nullable: true })
  result!: SerializedPipelineResult | null;

  @Column({ type: 'text', nullable: true })
  error_message!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;
}
