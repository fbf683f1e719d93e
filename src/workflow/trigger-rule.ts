import type { PushEvent, TriggerRule } from './workflow.types';

const BRANCH_REF_PREFIX = 'refs/heads/';

export function createTriggerRule(branches: Iterable<string>): TriggerRule {
  const set = new Set(branches);
  if (set.size === 0) {
    throw new Error('A trigger rule needs at least one branch');
  }
  return { branches: set };
}

/** Exact match; `feature/*` is the literal branch name, not a pattern. */
export function matchesTrigger(rule: TriggerRule, event: PushEvent): boolean {
  return rule.branches.has(event.branch);
}

/**
 * Branch name from a push payload: an explicit branch wins, otherwise
 * `refs/heads/<name>`. Tag refs and anything else yield null.
 */
export function branchFromPush(branch: unknown, ref: unknown): string | null {
  if (typeof branch === 'string' && branch.length > 0) return branch;
  if (typeof ref === 'string' && ref.startsWith(BRANCH_REF_PREFIX)) {
    const name = ref.slice(BRANCH_REF_PREFIX.length);
    return name.length > 0 ? name : null;
  }
  return null;
}
