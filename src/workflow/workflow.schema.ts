/**
 * Workflow document schema
 *
 * The on-disk / stored shape of a workflow, close to a GitHub Actions file:
 *
 *   name: test
 *   on:
 *     push:
 *       branches: [master, develop]
 *   jobs:
 *     test:
 *       name: Test on ${{ matrix.os }}
 *       runs-on: ${{ matrix.os }}
 *       strategy:
 *         matrix:
 *           os: [ubuntu-latest, windows-latest]
 *       steps:
 *         - uses: actions/checkout@v1
 *         - name: Test
 *           run: npm test
 *     build_alt:
 *       enabled: false
 *       ...
 */
import { z } from 'zod';

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));

const EnvSchema = z.record(z.string(), ScalarSchema).default({});

export const StepDocumentSchema = z.object({
  name: z.string().min(1).optional(),
  uses: z.string().min(1).optional(),
  run: z.string().min(1).optional(),
  kind: z.enum(['checkout', 'toolchain-setup', 'shell']).optional(),
  env: EnvSchema,
});
export type StepDocument = z.infer<typeof StepDocumentSchema>;

export const JobDocumentSchema = z.object({
  name: z.string().min(1).optional(),
  'runs-on': z.string().min(1),
  enabled: z.boolean().default(true),
  strategy: z
    .object({
      matrix: z.record(z.string(), z.array(ScalarSchema)),
    })
    .optional(),
  env: EnvSchema,
  steps: z.array(StepDocumentSchema).min(1),
});
export type JobDocument = z.infer<typeof JobDocumentSchema>;

export const WorkflowDocumentSchema = z.object({
  name: z.string().min(1),
  on: z.object({
    push: z.object({
      branches: z.array(z.string().min(1)).min(1),
    }),
  }),
  env: EnvSchema,
  jobs: z
    .record(z.string(), JobDocumentSchema)
    .refine((jobs) => Object.keys(jobs).length > 0, { message: 'at least one job is required' }),
});
export type WorkflowDocument = z.infer<typeof WorkflowDocumentSchema>;
