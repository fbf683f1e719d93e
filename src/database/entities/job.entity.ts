import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { PipelineRun } from './pipeline-run.entity';
import { JobStep } from './job-step.entity';
import { JobLog } from './job-log.entity';

/**
 * Job queue: one expanded JobSpec (variant × matrix combination) per row.
 * Workers claim via FOR UPDATE SKIP LOCKED, filtered on runs_on;
 * claimed_by/heartbeat_at let a reclaim loop fail jobs of dead workers.
 */
@Entity('jobs')
@Index(['status', 'runs_on', 'created_at'])
@Index(['pipeline_run_id', 'matrix_index'])
@Index(['heartbeat_at'])
export class Job {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  pipeline_run_id!: string;

  @ManyToOne(() => PipelineRun, (run) => run.jobs, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'pipeline_run_id' })
  pipeline_run!: PipelineRun;

  /** JobSpec id, e.g. "test-1" for the second matrix combination of "test". */
  @Column({ length: 255 })
  job_key!: string;

  @Column({ length: 255 })
  variant_id!: string;

  @Column({ length: 255 })
  name!: string;

  @Column({ length: 255 })
  runs_on!: string;

  @Column('jsonb', { default: () => `'{}'::jsonb` })
  matrix!: Record<string, string>;

  /** Position in expansion order (0-based) across the whole run. */
  @Column({ type: 'int', default: 0 })
  matrix_index!: number;

  @Column({ length: 50, default: 'pending' })
  status!: string;

  @Column({ type: 'varchar', length: 50, nullable: true })
  failure_kind!: string | null;

  @Column({ type: 'text', nullable: true })
  failure_message!: string | null;

  @Column({ type: 'int', nullable: true })
  failed_step!: number | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  claimed_by!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  claimed_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  heartbeat_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @OneToMany(() => JobStep, (step) => step.job)
  steps!: JobStep[];

  @OneToMany(() => JobLog, (log) => log.job)
  logs!: JobLog[];
}
