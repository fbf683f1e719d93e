/**
 * Database entities: pipelines, runs, jobs, job_steps, job_logs.
 */
export { Pipeline } from './pipeline.entity';
export { PipelineRun } from './pipeline-run.entity';
export { Job } from './job.entity';
export { JobStep } from './job-step.entity';
export { JobLog } from './job-log.entity';
