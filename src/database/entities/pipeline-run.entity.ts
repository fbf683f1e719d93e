import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  OneToMany,
} from 'typeorm';
import { Pipeline } from './pipeline.entity';
import { Job } from './job.entity';

/**
 * One activation of a pipeline (git push or manual).
 * Status is derived from its jobs by a database trigger:
 * pending → running → success | failed | cancelled.
 */
@Entity('pipeline_runs')
export class PipelineRun {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  pipeline_id!: string;

  @ManyToOne(() => Pipeline, (p) => p.runs, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'pipeline_id' })
  pipeline!: Pipeline;

  @Column({ length: 50 })
  trigger_type!: string;

  @Column('jsonb', { nullable: true })
  trigger_metadata!: Record<string, unknown> | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  branch!: string | null;

  @Column({ type: 'varchar', length: 64, nullable: true })
  commit_sha!: string | null;

  @Column({ length: 50, default: 'pending' })
  status!: string;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @OneToMany(() => Job, (job) => job.pipeline_run)
  jobs!: Job[];
}
