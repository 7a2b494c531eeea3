import { GitHubApiError } from './github.types';

/**
 * Type guard: checks if an error is an Octokit RequestError (duck-typing).
 * Avoids runtime import of ESM-only @octokit/request-error.
 */
export function isOctokitRequestError(error: unknown): error is Error & { status: number } {
  return error instanceof Error && 'status' in error && typeof error.status === 'number';
}

/**
 * Maps Octokit RequestError (and unknown errors) to GitHubApiError.
 */
export function mapOctokitError(error: unknown, context: string): GitHubApiError {
  if (isOctokitRequestError(error)) {
    const status = error.status;

    if (status === 401 || status === 403) {
      return new GitHubApiError(`Permission denied: ${context}`, 'PERMISSION_DENIED', status);
    }
    if (status === 404) {
      return new GitHubApiError(`Not found: ${context}`, 'NOT_FOUND', status);
    }
    if (status === 422) {
      return new GitHubApiError(`Validation failed: ${context}`, 'VALIDATION_FAILED', status);
    }
    if (status >= 500) {
      return new GitHubApiError(`Server error (${status}): ${context}`, 'SERVER_ERROR', status);
    }

    return new GitHubApiError(`GitHub API error (${status}): ${context}`, 'SERVER_ERROR', status);
  }

  // Network / unknown errors
  const message = error instanceof Error ? error.message : String(error);
  return new GitHubApiError(`Network error: ${message}`, 'NETWORK_ERROR');
}

const GITHUB_REMOTE_PATTERNS = [
  /^git@github\.com:([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/,
  /^(?:https?|ssh|git):\/\/(?:[^@/\s]+@)?github\.com(?::\d+)?\/([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/,
];

/**
 * Extracts `owner/repo` from a GitHub remote URL (SSH or HTTPS).
 * Returns null for anything else.
 */
export function parseGitHubSlug(remoteUrl: string): string | null {
  const url = remoteUrl.trim();
  for (const pattern of GITHUB_REMOTE_PATTERNS) {
    const match = pattern.exec(url);
    const owner = match?.[1];
    const repo = match?.[2];
    if (owner && repo) {
      return `${owner}/${repo}`;
    }
  }
  return null;
}

const SLUG_PATTERN = /^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)$/;

/**
 * Splits `owner/repo`. Returns null when the value is not a slug.
 */
export function splitRepositorySlug(slug: string): { owner: string; repo: string } | null {
  const match = SLUG_PATTERN.exec(slug.trim());
  const owner = match?.[1];
  const repo = match?.[2];
  return owner && repo ? { owner, repo } : null;
}
