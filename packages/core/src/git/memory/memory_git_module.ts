/**
 * MemoryGitModule - In-memory Git implementation for tests
 *
 * Keeps a small commit graph (commits with parents), tags and remotes in
 * memory. No filesystem or process access.
 *
 * Test Helpers:
 * - addCommit(commit): Append a commit (parents default to the current HEAD)
 * - setTag(name, ref): Point a tag at a commit
 * - setHead(ref): Move HEAD
 * - setRemote(name, url): Configure a remote URL
 * - failAncestryChecks(error): Make isAncestor reject
 * - clear(): Reset all state
 *
 * @module git/memory
 */

import type { IGitModule, CommitRecord } from '../types';
import { GitCommandError, RefNotFoundError } from '../errors';

/**
 * Commit as given to addCommit()
 */
export type MemoryCommitInput = {
  hash: string;
  subject: string;
  authorName?: string;
  authorEmail?: string;
  /** Parent hashes or tags; defaults to the current HEAD (none for the first commit) */
  parents?: string[];
};

interface MemoryCommit extends CommitRecord {
  parents: string[];
  /** Insertion order, used as commit time */
  order: number;
}

interface MemoryGitState {
  repoRoot: string;
  commits: Map<string, MemoryCommit>;
  tags: Map<string, string>;
  remotes: Map<string, string>;
  head: string | null;
  ancestryFailure: Error | null;
}

/**
 * MemoryGitModule - In-memory Git stand-in for unit tests
 */
export class MemoryGitModule implements IGitModule {
  private state: MemoryGitState;

  constructor(repoRoot: string = '/test/repo') {
    this.state = MemoryGitModule.emptyState(repoRoot);
  }

  private static emptyState(repoRoot: string): MemoryGitState {
    return {
      repoRoot,
      commits: new Map(),
      tags: new Map(),
      remotes: new Map(),
      head: null,
      ancestryFailure: null,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Appends a commit and moves HEAD to it.
   */
  addCommit(commit: MemoryCommitInput): void {
    const parents = commit.parents
      ? commit.parents.map((parent) => this.resolveRef(parent))
      : this.state.head ? [this.state.head] : [];

    this.state.commits.set(commit.hash, {
      hash: commit.hash,
      subject: commit.subject,
      authorName: commit.authorName ?? 'Test User',
      authorEmail: commit.authorEmail ?? 'test@example.com',
      parents,
      order: this.state.commits.size,
    });
    this.state.head = commit.hash;
  }

  /**
   * Appends a linear series of commits, oldest first.
   */
  addCommits(commits: MemoryCommitInput[]): void {
    for (const commit of commits) {
      this.addCommit(commit);
    }
  }

  setTag(name: string, ref: string): void {
    this.state.tags.set(name, this.resolveRef(ref));
  }

  setHead(ref: string): void {
    this.state.head = this.resolveRef(ref);
  }

  setRemote(name: string, url: string): void {
    this.state.remotes.set(name, url);
  }

  failAncestryChecks(error: Error | null = new GitCommandError('merge-base failed', 'fatal: bad object')): void {
    this.state.ancestryFailure = error;
  }

  clear(): void {
    this.state = MemoryGitModule.emptyState(this.state.repoRoot);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // IGitModule
  // ═══════════════════════════════════════════════════════════════════════

  async getRepoRoot(): Promise<string> {
    return this.state.repoRoot;
  }

  async listTags(): Promise<string[]> {
    return [...this.state.tags.keys()];
  }

  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    if (this.state.ancestryFailure) {
      throw this.state.ancestryFailure;
    }
    const ancestorHash = this.resolveRef(ancestor);
    return this.reachableFrom(this.resolveRef(descendant)).has(ancestorHash);
  }

  async getCommitLog(from: string, to: string): Promise<CommitRecord[]> {
    const excluded = this.reachableFrom(this.resolveRef(from));
    const included = this.reachableFrom(this.resolveRef(to));

    return [...included]
      .filter((hash) => !excluded.has(hash))
      .map((hash) => this.getCommit(hash))
      .sort((a, b) => b.order - a.order)
      .map(({ hash, authorName, authorEmail, subject }) => ({ hash, authorName, authorEmail, subject }));
  }

  async getRootCommit(): Promise<string> {
    if (!this.state.head) {
      throw new GitCommandError('Repository has no commits', "fatal: ambiguous argument 'HEAD'");
    }

    const roots = [...this.reachableFrom(this.state.head)]
      .map((hash) => this.getCommit(hash))
      .filter((commit) => commit.parents.length === 0)
      .sort((a, b) => a.order - b.order);
    const oldest = roots[0];

    if (!oldest) {
      throw new GitCommandError('Repository has no commits', '');
    }
    return oldest.hash;
  }

  async getRemoteUrl(remoteName: string): Promise<string | null> {
    return this.state.remotes.get(remoteName) ?? null;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  private resolveRef(ref: string): string {
    if (ref === 'HEAD' && this.state.head) {
      return this.state.head;
    }
    const tagged = this.state.tags.get(ref);
    if (tagged) {
      return tagged;
    }
    if (this.state.commits.has(ref)) {
      return ref;
    }
    throw new RefNotFoundError(ref);
  }

  private getCommit(hash: string): MemoryCommit {
    const commit = this.state.commits.get(hash);
    if (!commit) {
      throw new RefNotFoundError(hash);
    }
    return commit;
  }

  private reachableFrom(hash: string): Set<string> {
    const seen = new Set<string>();
    const pending = [hash];

    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined || seen.has(current)) {
        continue;
      }
      seen.add(current);
      pending.push(...this.getCommit(current).parents);
    }
    return seen;
  }
}
