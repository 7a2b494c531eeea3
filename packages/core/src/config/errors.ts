/**
 * Error thrown when no owner/repo is known for commit links
 */
export class RepositoryNotConfiguredError extends Error {
  constructor(message: string = 'Repository not configured: pass --repository, set GITHUB_REPOSITORY or add a GitHub origin remote') {
    super(message);
    this.name = 'RepositoryNotConfiguredError';
    Object.setPrototypeOf(this, RepositoryNotConfiguredError.prototype);
  }
}
