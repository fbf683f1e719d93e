import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';

export type LogLevel = 'info' | 'warn' | 'error';

export interface JobLogLine {
  id: string;
  step_order: number | null;
  log_line: string;
  log_level: LogLevel;
  timestamp: Date;
}

/**
 * Job output persisted line by line. `step_order` is null for job-level
 * lines (provisioning, summary).
 */
@Injectable()
export class JobLogService {
  constructor(private readonly dataSource: DataSource) {}

  async appendLog(
    jobId: string,
    logLine: string,
    logLevel: LogLevel = 'info',
    stepOrder: number | null = null,
  ): Promise<{ id: string }> {
    const result: { id: string }[] = await this.dataSource.query(
      `INSERT INTO job_logs (job_id, log_line, log_level, step_order) VALUES ($1, $2, $3, $4) RETURNING id`,
      [jobId, logLine, logLevel, stepOrder],
    );
    return { id: String(result[0]?.id ?? '') };
  }

  async findByJob(jobId: string): Promise<JobLogLine[]> {
    return this.dataSource.query(
      `
      SELECT id, step_order, log_line, log_level, timestamp
      FROM job_logs
      WHERE job_id = $1
      ORDER BY id ASC
      `,
      [jobId],
    );
  }
}
