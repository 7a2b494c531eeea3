/**
 * Custom Error Classes for GitModule
 *
 * These errors provide typed exceptions for better error handling
 * and diagnostics in the Git module operations.
 */

/**
 * Base error class for all Git-related errors
 */
export class GitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitError';
    Object.setPrototypeOf(this, GitError.prototype);
  }
}

/**
 * Error thrown when a Git command fails
 */
export class GitCommandError extends GitError {
  public readonly stderr: string;
  public readonly stdout?: string | undefined;
  public readonly command?: string | undefined;

  constructor(message: string, stderr: string = '', command?: string, stdout?: string) {
    super(message);
    this.name = 'GitCommandError';
    this.stderr = stderr;
    this.stdout = stdout;
    this.command = command;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

/**
 * Error thrown when a tag, branch or commit reference cannot be resolved
 */
export class RefNotFoundError extends GitError {
  public readonly ref: string;

  constructor(ref: string) {
    super(`Reference not found: ${ref}`);
    this.name = 'RefNotFoundError';
    this.ref = ref;
    Object.setPrototypeOf(this, RefNotFoundError.prototype);
  }
}
