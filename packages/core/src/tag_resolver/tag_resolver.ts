import type { IGitModule } from '../git';
import { GitError } from '../git';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import {
  compareVersions,
  findHighestTag,
  getLatestTags,
  getTagLineage,
  isDevTag,
  InvalidReleaseTagError,
} from '../release_tag';
import type { LatestTags } from '../release_tag';
import type {
  ITagResolver,
  ResolvedPreviousTag,
  TagResolverDependencies,
} from './tag_resolver.types';

/**
 * TagResolver - Finds the previous version within a release lineage
 *
 * Dev releases diff against the newer of the previous dev tag and the latest
 * stable tag, where "newer" is decided by commit ancestry rather than version
 * numbers. Stable releases diff against the previous stable tag. Without any
 * candidate the repository's root commit is used.
 */
export class TagResolver implements ITagResolver {
  private readonly git: IGitModule;
  private readonly logger: Logger;

  constructor(dependencies: TagResolverDependencies) {
    this.git = dependencies.git;
    this.logger = dependencies.logger ?? createLogger('[TagResolver] ');
  }

  /**
   * [EARS-A1] Explicit previous tag short-circuits resolution.
   * [EARS-B1..B7] Dev lineage.
   * [EARS-C1..C3] Stable lineage.
   * [EARS-D1] Root commit fallback.
   */
  async resolvePreviousTag(releaseTag: string, previousTag?: string): Promise<ResolvedPreviousTag> {
    if (!releaseTag) {
      throw new InvalidReleaseTagError('No release tag provided', releaseTag);
    }

    const lineage = getTagLineage(releaseTag);

    if (previousTag) {
      this.logger.debug(`Using explicit previous tag: ${previousTag}`);
      return { releaseTag, previousTag, strategy: 'explicit', lineage };
    }

    const tags = await this.git.listTags();

    if (lineage === 'dev') {
      this.logger.info('Current tag is a development tag');
      const resolved = await this.resolveForDevRelease(releaseTag, tags);
      if (resolved) {
        return resolved;
      }
    } else {
      this.logger.info('Current tag is a production tag');
      const previousStable = findHighestTag(
        tags,
        (tag) => !isDevTag(tag) && compareVersions(tag, releaseTag) < 0
      );
      if (previousStable) {
        this.logger.info(`Previous prod tag: ${previousStable}`);
        return { releaseTag, previousTag: previousStable, strategy: 'previous-stable', lineage };
      }
    }

    const rootCommit = await this.git.getRootCommit();
    this.logger.info(`No previous tag found, using first commit: ${rootCommit}`);
    return { releaseTag, previousTag: rootCommit, strategy: 'root-commit', lineage };
  }

  /**
   * Latest dev and stable tags of the repository.
   */
  async getLatestTags(): Promise<LatestTags> {
    return getLatestTags(await this.git.listTags());
  }

  private async resolveForDevRelease(
    releaseTag: string,
    tags: string[]
  ): Promise<ResolvedPreviousTag | null> {
    const previousDev = findHighestTag(tags, (tag) => isDevTag(tag) && tag !== releaseTag);
    const latestStable = findHighestTag(tags, (tag) => !isDevTag(tag));

    if (previousDev && latestStable) {
      if (await this.stableIsAncestorOfDev(latestStable, previousDev)) {
        this.logger.info(`Using previous dev tag: ${previousDev}`);
        return { releaseTag, previousTag: previousDev, strategy: 'previous-dev', lineage: 'dev' };
      }
      this.logger.info(`Using latest prod tag (more recent than previous dev): ${latestStable}`);
      return { releaseTag, previousTag: latestStable, strategy: 'latest-stable', lineage: 'dev' };
    }

    if (previousDev) {
      this.logger.info(`Using previous dev tag: ${previousDev}`);
      return { releaseTag, previousTag: previousDev, strategy: 'previous-dev', lineage: 'dev' };
    }

    if (latestStable) {
      this.logger.info(`No previous dev tag found, using latest prod tag: ${latestStable}`);
      return { releaseTag, previousTag: latestStable, strategy: 'latest-stable', lineage: 'dev' };
    }

    this.logger.info('No previous dev tag or prod tag found');
    return null;
  }

  /**
   * A dev tag on a branch cut before the latest stable release must not win,
   * so ancestry decides. Git failures count as "not an ancestor".
   */
  private async stableIsAncestorOfDev(stableTag: string, devTag: string): Promise<boolean> {
    try {
      return await this.git.isAncestor(stableTag, devTag);
    } catch (error) {
      if (error instanceof GitError) {
        this.logger.warn(`Ancestry check ${stableTag} -> ${devTag} failed, preferring stable tag: ${error.message}`);
        return false;
      }
      throw error;
    }
  }
}
