import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

const BooleanString = z.enum(['true', 'false']);

/**
 * Process environment. API processes run with SYNC_DATABASE=true; workers
 * with RUN_WORKER_LOOP=true and SYNC_DATABASE=false.
 */
export const EnvSchema = z
  .object({
    DATABASE_URL: z.string().min(1),
    PORT: z.coerce.number().int().positive().default(3000),
    SWAGGER_PATH: z.string().min(1).default('docs'),
    SYNC_DATABASE: BooleanString.default('true'),
    RUN_WORKER_LOOP: BooleanString.default('false'),
    WORKER_ID: z.string().min(1).optional(),
    /** Comma-separated runner labels, e.g. "ubuntu-latest,linux". */
    WORKER_LABELS: z.string().optional(),
    WORKSPACE_ROOT: z.string().min(1).default(join(tmpdir(), 'matrix-ci')),
    WORKER_POLL_MS: z.coerce.number().int().positive().default(1000),
    HEARTBEAT_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),
    HEARTBEAT_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(30),
  })
  .refine((env) => env.HEARTBEAT_INTERVAL_MS < env.HEARTBEAT_TIMEOUT_SECONDS * 1000, {
    // A running job must heartbeat at least once per reclaim timeout.
    message: 'must be shorter than HEARTBEAT_TIMEOUT_SECONDS',
    path: ['HEARTBEAT_INTERVAL_MS'],
  });

export type AppEnv = z.infer<typeof EnvSchema>;

/** `ConfigModule.forRoot({ validate })` hook; throws with every problem listed. */
export function validateEnv(config: Record<string, unknown>): AppEnv {
  const parsed = EnvSchema.safeParse(config);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment: ${problems.join('; ')}`);
  }
  return parsed.data;
}
