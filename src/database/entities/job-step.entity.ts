import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Index } from 'typeorm';
import { Job } from './job.entity';

/** One step of a job, in declaration order. Commands are stored already interpolated. */
@Entity('job_steps')
@Index(['job_id', 'step_order'], { unique: true })
export class JobStep {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  job_id!: string;

  @ManyToOne(() => Job, (job) => job.steps, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'job_id' })
  job!: Job;

  @Column({ type: 'int' })
  step_order!: number;

  @Column({ length: 255 })
  name!: string;

  @Column({ length: 50 })
  kind!: string;

  @Column('text')
  command!: string;

  @Column('jsonb', { default: () => `'{}'::jsonb` })
  env!: Record<string, string>;

  @Column({ length: 50, default: 'pending' })
  status!: string;

  @Column({ type: 'int', nullable: true })
  exit_code!: number | null;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;
}
