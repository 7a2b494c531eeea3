import { createLogger } from '../logger';
import { GitHubApiError } from './github.types';
import type { GitHubTagSourceDependencies, GitHubTagsClient, ITagSource } from './github.types';
import { mapOctokitError, splitRepositorySlug } from './github.utils';

const logger = createLogger('[GitHubTagSource] ');

const DEFAULT_PER_PAGE = 100;

/**
 * GitHubTagSource - Lists a repository's tags through the GitHub REST API
 *
 * For jobs that need the tags of a repository they have not cloned.
 * Pages through repos.listTags until a short page comes back.
 */
export class GitHubTagSource implements ITagSource {
  private readonly octokit: GitHubTagsClient;
  private readonly owner: string;
  private readonly repo: string;
  private readonly perPage: number;

  constructor(deps: GitHubTagSourceDependencies) {
    const slug = splitRepositorySlug(deps.repository);
    if (!slug) {
      throw new GitHubApiError(`Invalid repository "${deps.repository}", expected owner/repo`, 'INVALID_ID');
    }

    this.octokit = deps.octokit;
    this.owner = slug.owner;
    this.repo = slug.repo;
    this.perPage = deps.perPage ?? DEFAULT_PER_PAGE;
  }

  async listTags(): Promise<string[]> {
    const tags: string[] = [];

    for (let page = 1; ; page++) {
      let data: Array<{ name: string }>;
      try {
        ({ data } = await this.octokit.rest.repos.listTags({
          owner: this.owner,
          repo: this.repo,
          per_page: this.perPage,
          page,
        }));
      } catch (error) {
        throw mapOctokitError(error, `listTags ${this.owner}/${this.repo}`);
      }

      if (!Array.isArray(data)) {
        throw new GitHubApiError(`Unexpected listTags response for ${this.owner}/${this.repo}`, 'INVALID_RESPONSE');
      }

      tags.push(...data.map((tag) => tag.name));
      if (data.length < this.perPage) {
        break;
      }
    }

    logger.debug(`Fetched ${tags.length} tags from ${this.owner}/${this.repo}`);
    return tags;
  }
}
