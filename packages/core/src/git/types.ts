/**
 * Type Definitions for GitModule
 *
 * These types define the contracts for Git operations,
 * dependencies, and data structures used throughout the module.
 */

/**
 * Options for executing shell commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
};

/**
 * Result of executing a shell command
 */
export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error output */
  stderr: string;
};

/**
 * Function that runs a command and resolves with its outcome.
 * Must resolve (not reject) when the command exits non-zero.
 */
export type ExecCommandFn = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

/**
 * Dependencies required by LocalGitModule
 *
 * This module uses dependency injection to allow testing with mocks
 * and support different execution environments.
 */
export type GitModuleDependencies = {
  /** Path to the Git repository root (optional, auto-detected if not provided) */
  repoRoot?: string;
  /** Function to execute shell commands (required) */
  execCommand: ExecCommandFn;
};

/**
 * One entry of the commit log between two references
 */
export type CommitRecord = {
  /** Abbreviated commit hash */
  hash: string;
  /** Author name */
  authorName: string;
  /** Author email */
  authorEmail: string;
  /** First line of the commit message */
  subject: string;
};

/**
 * Read-only Git queries needed to resolve tags and build changelogs.
 */
export interface IGitModule {
  /** Absolute path of the repository root */
  getRepoRoot(): Promise<string>;
  /** All tag names, in no particular order */
  listTags(): Promise<string[]>;
  /** Whether `ancestor` is reachable from `descendant` (a ref counts as its own ancestor) */
  isAncestor(ancestor: string, descendant: string): Promise<boolean>;
  /** Commits reachable from `to` but not from `from`, newest first */
  getCommitLog(from: string, to: string): Promise<CommitRecord[]>;
  /** Hash of the oldest parentless commit reachable from HEAD */
  getRootCommit(): Promise<string>;
  /** URL of a remote, or null when the remote is not configured */
  getRemoteUrl(remoteName: string): Promise<string | null>;
}
