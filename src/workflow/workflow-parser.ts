import { readFile } from 'node:fs/promises';
import { parse as parseYamlDocument } from 'yaml';
import { WorkflowValidationError } from './errors';
import { expandJobs } from './matrix-expander';
import { templateIssues } from './template';
import { createTriggerRule } from './trigger-rule';
import {
  type JobDocument,
  type StepDocument,
  type WorkflowDocument,
  WorkflowDocumentSchema,
} from './workflow.schema';
import type { Axis, JobVariant, StepDefinition, StepKind, Workflow } from './workflow.types';

const CHECKOUT_ACTION = /(^|\/)checkout(@[\w.-]+)?$/;

export type WorkflowParseResult =
  | { ok: true; workflow: Workflow }
  | { ok: false; issues: string[] };

export function safeParseWorkflow(document: unknown): WorkflowParseResult {
  const parsed = WorkflowDocumentSchema.safeParse(document);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    };
  }

  const issues: string[] = [];
  const jobs = Object.entries(parsed.data.jobs).map(([id, job]) => toVariant(id, job, parsed.data, issues));
  if (issues.length === 0) issues.push(...jobIdIssues(jobs));
  if (issues.length > 0) return { ok: false, issues };

  return {
    ok: true,
    workflow: {
      name: parsed.data.name,
      trigger: createTriggerRule(parsed.data.on.push.branches),
      jobs,
    },
  };
}

/** @throws WorkflowValidationError */
export function parseWorkflow(document: unknown): Workflow {
  const result = safeParseWorkflow(document);
  if (!result.ok) throw new WorkflowValidationError(result.issues);
  return result.workflow;
}

/** YAML or JSON source text (JSON is valid YAML). */
export function parseWorkflowYaml(source: string): Workflow {
  return parseWorkflow(readYaml(source));
}

export function readYaml(source: string): unknown {
  try {
    return parseYamlDocument(source);
  } catch (err) {
    if (err instanceof Error) throw new WorkflowValidationError([`invalid YAML: ${err.message}`]);
    throw err;
  }
}

export async function loadWorkflowFile(path: string): Promise<Workflow> {
  const source = await readFile(path, 'utf8');
  return parseWorkflowYaml(source);
}

/** Expanded job ids must be unique, disabled variants included. */
function jobIdIssues(jobs: readonly JobVariant[]): string[] {
  const owners = new Map<string, string>();
  const issues: string[] = [];
  for (const spec of expandJobs(jobs.map((job) => ({ ...job, enabled: true })))) {
    const owner = owners.get(spec.id);
    if (owner === undefined) owners.set(spec.id, spec.variantId);
    else issues.push(`jobs.${spec.variantId}: job id '${spec.id}' is also produced by jobs.${owner}`);
  }
  return issues;
}

function toVariant(id: string, job: JobDocument, workflow: WorkflowDocument, issues: string[]): JobVariant {
  const at = `jobs.${id}`;
  const axes = toAxes(job, at, issues);
  const axisNames = axes.map((axis) => axis.name);

  if (job.name !== undefined) issues.push(...templateIssues(job.name, axisNames, `${at}.name`));
  issues.push(...templateIssues(job['runs-on'], axisNames, `${at}.runs-on`));

  const jobEnv = { ...workflow.env, ...job.env };
  const steps = job.steps.map((step, index) =>
    toStep(step, jobEnv, axisNames, `${at}.steps.${index}`, issues),
  );

  return {
    id,
    name: job.name ?? null,
    runsOn: job['runs-on'],
    enabled: job.enabled,
    axes,
    steps,
  };
}

function toAxes(job: JobDocument, at: string, issues: string[]): Axis[] {
  const matrix = job.strategy?.matrix ?? {};
  return Object.entries(matrix).map(([name, values]) => {
    const seen = new Set<string>();
    for (const value of values) {
      if (seen.has(value)) issues.push(`${at}.strategy.matrix.${name}: duplicate value '${value}'`);
      seen.add(value);
    }
    return { name, values };
  });
}

function toStep(
  step: StepDocument,
  jobEnv: Record<string, string>,
  axisNames: string[],
  at: string,
  issues: string[],
): StepDefinition {
  const kind = resolveStepKind(step, at, issues);
  const run = step.run ?? '';
  const env = { ...jobEnv, ...step.env };

  if (step.name !== undefined) issues.push(...templateIssues(step.name, axisNames, `${at}.name`));
  issues.push(...templateIssues(run, axisNames, `${at}.run`));
  for (const [key, value] of Object.entries(env)) {
    issues.push(...templateIssues(value, axisNames, `${at}.env.${key}`));
  }

  return {
    name: step.name ?? defaultStepName(kind, run),
    kind,
    run,
    env,
  };
}

function resolveStepKind(step: StepDocument, at: string, issues: string[]): StepKind {
  if (step.uses !== undefined) {
    if (!CHECKOUT_ACTION.test(step.uses)) issues.push(`${at}.uses: unsupported action '${step.uses}'`);
    if (step.run !== undefined) issues.push(`${at}: a step takes either 'uses' or 'run', not both`);
    if (step.kind !== undefined && step.kind !== 'checkout') {
      issues.push(`${at}.kind: '${step.kind}' does not match action '${step.uses}'`);
    }
    return 'checkout';
  }

  if (step.kind === 'checkout') {
    if (step.run !== undefined) issues.push(`${at}: checkout steps take no 'run'`);
    return 'checkout';
  }

  if (step.run === undefined) issues.push(`${at}: a step needs 'run' or 'uses'`);
  return step.kind ?? 'shell';
}

function defaultStepName(kind: StepKind, run: string): string {
  if (kind === 'checkout') return 'Checkout';
  const firstLine = run.split(/\r?\n/)[0].trim();
  return `Run ${firstLine}`;
}
