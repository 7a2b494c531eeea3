/**
 * LocalGitModule - Git queries over the git CLI
 *
 * Exposes semantic read operations (tags, ancestry, commit ranges) instead
 * of raw Git commands, with typed errors for every failure.
 *
 * @module git/local
 */

import type {
  ExecCommandFn,
  ExecOptions,
  ExecResult,
  GitModuleDependencies,
  CommitRecord,
  IGitModule,
} from '../types';
import { GitCommandError, RefNotFoundError } from '../errors';
import { createLogger } from '../../logger/logger';

const logger = createLogger('[GitModule] ');

/** Unit/record separators for `git log`; subjects may contain any printable character */
const FIELD_SEPARATOR = '\x1f';
const RECORD_SEPARATOR = '\x1e';
const COMMIT_LOG_FORMAT = '--pretty=format:%h%x1f%an%x1f%ae%x1f%s%x1e';

/**
 * LocalGitModule class providing read-only Git operations
 *
 * All operations are async and use dependency injection for testability.
 * Errors are transformed into typed exceptions for better handling.
 */
export class LocalGitModule implements IGitModule {
  private repoRoot: string;
  private readonly execCommand: ExecCommandFn;

  /**
   * @param dependencies - Required execCommand and optional repoRoot
   */
  constructor(dependencies: GitModuleDependencies) {
    this.execCommand = dependencies.execCommand;
    this.repoRoot = dependencies.repoRoot ?? '';
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Ensures that repoRoot is set, auto-detecting it if necessary
   *
   * @throws GitCommandError if not in a Git repository
   */
  private async ensureRepoRoot(): Promise<string> {
    if (!this.repoRoot) {
      const result = await this.execCommand('git', ['rev-parse', '--show-toplevel']);
      if (result.exitCode !== 0) {
        throw new GitCommandError('Not in a Git repository', result.stderr, 'git rev-parse --show-toplevel');
      }
      this.repoRoot = result.stdout.trim();
    }
    return this.repoRoot;
  }

  /**
   * Executes a Git command inside the repository root
   */
  private async execGit(args: string[], options?: ExecOptions): Promise<ExecResult> {
    const cwd = options?.cwd ?? await this.ensureRepoRoot();
    logger.debug(`git ${args.join(' ')}`);
    return await this.execCommand('git', args, { ...options, cwd });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // READ OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Returns the absolute path to the current Git repository root
   *
   * @throws GitCommandError if not in a Git repository
   *
   * @example
   * const repoRoot = await gitModule.getRepoRoot();
   * // => "/home/user/example-plugin"
   */
  async getRepoRoot(): Promise<string> {
    return await this.ensureRepoRoot();
  }

  /**
   * Lists every tag of the repository
   *
   * @throws GitCommandError if operation fails
   *
   * @example
   * const tags = await gitModule.listTags();
   * // => ["2024.10.0", "2025.4.0.dev0"]
   */
  async listTags(): Promise<string[]> {
    const result = await this.execGit(['tag', '-l']);

    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to list tags', result.stderr, 'git tag -l');
    }

    return result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  /**
   * Checks whether `ancestor` is an ancestor of `descendant`
   *
   * `git merge-base --is-ancestor` exits 0 for yes and 1 for no; anything
   * else (unknown ref, corrupt repo) is an error.
   *
   * @throws GitCommandError if git cannot answer
   *
   * @example
   * await gitModule.isAncestor("2024.10.0", "2025.4.0.dev1");
   * // => true
   */
  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    const args = ['merge-base', '--is-ancestor', ancestor, descendant];
    const result = await this.execGit(args);

    if (result.exitCode === 0) {
      return true;
    }
    if (result.exitCode === 1) {
      return false;
    }

    throw new GitCommandError(
      `Failed to check ancestry between ${ancestor} and ${descendant}`,
      result.stderr,
      `git ${args.join(' ')}`
    );
  }

  /**
   * Retrieves the commits in `from..to` (from exclusive, to inclusive)
   *
   * @returns Commits ordered from newest to oldest, as git log prints them
   * @throws RefNotFoundError if either reference is unknown
   * @throws GitCommandError if operation fails
   *
   * @example
   * const commits = await gitModule.getCommitLog("2024.5.0", "2024.10.0");
   * // => [{ hash: "a1b2c3d", authorName: "Jane", authorEmail: "jane@example.com", subject: "ENH: add widget" }]
   */
  async getCommitLog(from: string, to: string): Promise<CommitRecord[]> {
    const range = `${from}..${to}`;
    const result = await this.execGit(['log', COMMIT_LOG_FORMAT, range]);

    if (result.exitCode !== 0) {
      for (const ref of [from, to]) {
        if (!(await this.refExists(ref))) {
          throw new RefNotFoundError(ref);
        }
      }
      throw new GitCommandError(`Failed to get commit log for ${range}`, result.stderr, `git log ${range}`);
    }

    return result.stdout
      .split(RECORD_SEPARATOR)
      .map((record) => record.replace(/^\n/, ''))
      .filter((record) => record.length > 0)
      .map((record) => {
        const [hash, authorName, authorEmail, ...subjectParts] = record.split(FIELD_SEPARATOR);
        if (!hash || authorName === undefined || authorEmail === undefined || subjectParts.length === 0) {
          throw new GitCommandError('Invalid git log output format', record);
        }
        return {
          hash,
          authorName,
          authorEmail,
          subject: subjectParts.join(FIELD_SEPARATOR),
        };
      });
  }

  /**
   * Returns the repository's first commit (the oldest parentless commit of HEAD)
   *
   * @throws GitCommandError if the repository has no commits
   *
   * @example
   * const root = await gitModule.getRootCommit();
   * // => "9fceb02d0ae598e95dc970b74767f19372d61af8"
   */
  async getRootCommit(): Promise<string> {
    const result = await this.execGit(['rev-list', '--max-parents=0', 'HEAD']);

    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to find root commit', result.stderr, 'git rev-list --max-parents=0 HEAD');
    }

    // rev-list prints newest first; several roots exist only after unrelated-history merges
    const roots = result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    const oldest = roots[roots.length - 1];

    if (!oldest) {
      throw new GitCommandError('Repository has no commits', result.stderr, 'git rev-list --max-parents=0 HEAD');
    }

    logger.debug(`Root commit: ${oldest.substring(0, 8)}...`);
    return oldest;
  }

  /**
   * Returns the configured URL of a remote
   *
   * @returns Remote URL, or null if the remote does not exist
   *
   * @example
   * await gitModule.getRemoteUrl("origin");
   * // => "git@github.com:example-org/example-plugin.git"
   */
  async getRemoteUrl(remoteName: string): Promise<string | null> {
    const result = await this.execGit(['remote', 'get-url', remoteName]);

    if (result.exitCode !== 0) {
      logger.debug(`Remote ${remoteName} not configured: ${result.stderr.trim()}`);
      return null;
    }

    const url = result.stdout.trim();
    return url.length > 0 ? url : null;
  }

  /**
   * Checks whether a reference resolves to a commit
   */
  private async refExists(ref: string): Promise<boolean> {
    const result = await this.execGit(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`]);
    return result.exitCode === 0;
  }
}
