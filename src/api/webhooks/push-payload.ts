import { branchFromPush } from '../../workflow/trigger-rule';
import type { PushEvent } from '../../workflow/workflow.types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: unknown, key: string): string | null {
  if (!isRecord(source)) return null;
  const value = source[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * Extract repo identifier from GitHub/GitLab-style webhook payloads.
 * Pipelines are matched by pipelines.repository (e.g. full URL or "owner/repo").
 */
export function getRepoFromPayload(body: Record<string, unknown>): string | null {
  return (
    stringField(body, 'repo') ??
    // GitHub: repository.full_name (owner/repo) or repository.clone_url
    stringField(body.repository, 'full_name') ??
    stringField(body.repository, 'clone_url') ??
    // GitLab: project.path_with_namespace or project.web_url
    stringField(body.project, 'path_with_namespace') ??
    stringField(body.project, 'web_url')
  );
}

/** Pushed commit: `commit`, GitHub's `after` or GitLab's `checkout_sha`. */
export function getCommitFromPayload(body: Record<string, unknown>): string | null {
  return stringField(body, 'commit') ?? stringField(body, 'after') ?? stringField(body, 'checkout_sha');
}

/** Push event for a branch push; null for tag pushes and payloads without a ref. */
export function toPushEvent(body: Record<string, unknown>, repository: string): PushEvent | null {
  const branch = branchFromPush(body.branch, body.ref);
  if (!branch) return null;

  const commit = getCommitFromPayload(body);
  return { type: 'push', branch, repository, ...(commit ? { commit } : {}) };
}
