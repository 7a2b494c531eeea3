import { createLogger } from '../logger';
import { GitHubApiError, InvalidDueDateError } from './github.types';
import type {
  GitHubMilestoneManagerDependencies,
  GitHubMilestonesClient,
  IMilestoneManager,
  MilestoneData,
  MilestonePayload,
  MilestoneRequest,
  MilestoneResult,
} from './github.types';
import { mapOctokitError, splitRepositorySlug } from './github.utils';

const logger = createLogger('[GitHubMilestoneManager] ');

const DEFAULT_PER_PAGE = 100;

const DUE_DATE_PATTERN = /^\d{14}$/;

/**
 * Converts a YYYYMMDDhhmmss due date to the ISO timestamp the API takes.
 * The value is read as UTC.
 */
export function parseMilestoneDueDate(value: string): string {
  if (!DUE_DATE_PATTERN.test(value)) {
    throw new InvalidDueDateError(value);
  }

  const iso = `${value.slice(0, 4)}-${value.slice(4, 6)}-${value.slice(6, 8)}`
    + `T${value.slice(8, 10)}:${value.slice(10, 12)}:${value.slice(12, 14)}Z`;

  // Rejects out-of-range fields that Date would roll over (Feb 30, hour 24)
  const date = new Date(iso);
  if (Number.isNaN(date.getTime()) || date.toISOString() !== iso.replace('Z', '.000Z')) {
    throw new InvalidDueDateError(value);
  }

  return iso;
}

/**
 * GitHubMilestoneManager - Creates, edits and closes milestones by title
 *
 * Used to open the milestone of an upcoming release across a set of
 * repositories, and to move or close it later. Edits and closes look the
 * milestone up by title; a missing milestone is reported, not created.
 */
export class GitHubMilestoneManager implements IMilestoneManager {
  private readonly octokit: GitHubMilestonesClient;
  private readonly perPage: number;

  constructor(deps: GitHubMilestoneManagerDependencies) {
    this.octokit = deps.octokit;
    this.perPage = deps.perPage ?? DEFAULT_PER_PAGE;
  }

  async apply(repository: string, request: MilestoneRequest): Promise<MilestoneResult> {
    const slug = splitRepositorySlug(repository);
    if (!slug) {
      throw new GitHubApiError(`Invalid repository "${repository}", expected owner/repo`, 'INVALID_ID');
    }

    if (request.edit || request.close) {
      return this.update(slug.owner, slug.repo, request);
    }
    return this.create(slug.owner, slug.repo, request);
  }

  private async create(owner: string, repo: string, request: MilestoneRequest): Promise<MilestoneResult> {
    const repository = `${owner}/${repo}`;
    const payload: MilestonePayload = { title: request.title };
    if (request.dueOn) payload.due_on = request.dueOn;
    if (request.description) payload.description = request.description;

    const httpRequest = { method: 'POST' as const, path: `/repos/${repository}/milestones`, payload };

    if (request.dryRun) {
      logger.info(`[DRY RUN] Would POST ${httpRequest.path} with payload ${JSON.stringify(payload)}`);
      return { repository, title: request.title, action: 'dry-run', request: httpRequest };
    }

    let data: MilestoneData;
    try {
      ({ data } = await this.octokit.rest.issues.createMilestone({ owner, repo, ...payload, title: request.title }));
    } catch (error) {
      throw mapOctokitError(error, `createMilestone ${repository}`);
    }

    logger.info(`Created milestone "${request.title}" (#${data.number}) in ${repository}`);
    return { repository, title: request.title, action: 'created', number: data.number, request: httpRequest };
  }

  private async update(owner: string, repo: string, request: MilestoneRequest): Promise<MilestoneResult> {
    const repository = `${owner}/${repo}`;
    const existing = await this.findByTitle(owner, repo, request.title);

    if (!existing) {
      logger.warn(`Milestone "${request.title}" not found in ${repository}`);
      return { repository, title: request.title, action: 'not-found' };
    }

    // Due date and description only change on an edit
    const payload: MilestonePayload = {};
    if (request.edit) {
      if (request.dueOn) payload.due_on = request.dueOn;
      if (request.description) payload.description = request.description;
    }
    if (request.close) {
      payload.state = 'closed';
    }

    const httpRequest = {
      method: 'PATCH' as const,
      path: `/repos/${repository}/milestones/${existing.number}`,
      payload,
    };

    if (request.dryRun) {
      logger.info(`[DRY RUN] Would PATCH ${httpRequest.path} with payload ${JSON.stringify(payload)}`);
      return { repository, title: request.title, action: 'dry-run', number: existing.number, request: httpRequest };
    }

    try {
      await this.octokit.rest.issues.updateMilestone({
        owner,
        repo,
        milestone_number: existing.number,
        ...(payload.due_on ? { due_on: payload.due_on } : {}),
        ...(payload.description ? { description: payload.description } : {}),
        ...(payload.state ? { state: payload.state } : {}),
      });
    } catch (error) {
      throw mapOctokitError(error, `updateMilestone ${repository}#${existing.number}`);
    }

    const action = request.close ? 'closed' : 'updated';
    logger.info(`Milestone "${request.title}" (#${existing.number}) ${action} in ${repository}`);
    return { repository, title: request.title, action, number: existing.number, request: httpRequest };
  }

  /**
   * Pages through open and closed milestones until the title matches
   */
  private async findByTitle(owner: string, repo: string, title: string): Promise<MilestoneData | null> {
    for (let page = 1; ; page++) {
      let data: MilestoneData[];
      try {
        ({ data } = await this.octokit.rest.issues.listMilestones({
          owner,
          repo,
          state: 'all',
          per_page: this.perPage,
          page,
        }));
      } catch (error) {
        throw mapOctokitError(error, `listMilestones ${owner}/${repo}`);
      }

      if (!Array.isArray(data)) {
        throw new GitHubApiError(`Unexpected listMilestones response for ${owner}/${repo}`, 'INVALID_RESPONSE');
      }

      const match = data.find((milestone) => milestone.title === title);
      if (match) {
        return match;
      }
      if (data.length < this.perPage) {
        return null;
      }
    }
  }
}
