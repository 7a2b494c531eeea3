import type { IGitModule } from '../git';
import type { Logger } from '../logger';
import type { LatestTags, TagLineage } from '../release_tag';

/**
 * How the previous reference was chosen
 *
 * - explicit: supplied by the caller, no resolution ran
 * - previous-dev: latest other dev tag (dev release)
 * - latest-stable: latest stable tag (dev release)
 * - previous-stable: latest stable tag below the release (stable release)
 * - root-commit: no suitable tag, first commit of the repository
 */
export type ResolutionStrategy =
  | 'explicit'
  | 'previous-dev'
  | 'latest-stable'
  | 'previous-stable'
  | 'root-commit';

/**
 * Result of resolving the reference a changelog is diffed against
 */
export type ResolvedPreviousTag = {
  releaseTag: string;
  /** Tag name or commit hash */
  previousTag: string;
  strategy: ResolutionStrategy;
  lineage: TagLineage;
};

/**
 * TagResolver Dependencies
 */
export type TagResolverDependencies = {
  git: IGitModule;
  /** Defaults to a module logger prefixed with [TagResolver] */
  logger?: Logger;
};

/**
 * TagResolver Interface - previous-version lookup within a release lineage
 */
export interface ITagResolver {
  /**
   * Returns the reference to diff `releaseTag` against.
   * A non-empty `previousTag` is returned verbatim without querying git.
   */
  resolvePreviousTag(releaseTag: string, previousTag?: string): Promise<ResolvedPreviousTag>;

  /**
   * Latest dev and stable tags of the repository.
   */
  getLatestTags(): Promise<LatestTags>;
}
