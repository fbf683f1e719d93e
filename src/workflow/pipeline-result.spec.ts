import { summarizePipeline } from './pipeline-result';
import type { JobResult } from './workflow.types';

function job(jobId: string, status: JobResult['status']): JobResult {
  return { jobId, name: jobId, runsOn: 'ubuntu-latest', matrix: {}, status, steps: [] };
}

describe('summarizePipeline', () => {
  it('succeeds when every job succeeded', () => {
    const result = summarizePipeline([job('a', 'success'), job('b', 'success')]);
    expect(result).toMatchObject({ status: 'success', total: 2, succeeded: 2, failed: 0, skipped: 0 });
  });

  it('fails when any job failed', () => {
    const result = summarizePipeline([job('a', 'success'), job('b', 'failed'), job('c', 'skipped')]);
    expect(result).toMatchObject({ status: 'failed', total: 3, succeeded: 1, failed: 1, skipped: 1 });
  });

  it('is cancelled when jobs were skipped but none failed', () => {
    expect(summarizePipeline([job('a', 'success'), job('b', 'skipped')]).status).toBe('cancelled');
  });

  it('succeeds vacuously with no jobs', () => {
    expect(summarizePipeline([])).toEqual({ status: 'success', total: 0, succeeded: 0, failed: 0, skipped: 0, jobs: [] });
  });
});
