/**
 * Shared types for the @relkit/core/github export path.
 */

/**
 * Error codes for GitHub API errors.
 * Semantic codes that abstract HTTP status codes.
 */
export type GitHubApiErrorCode =
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'VALIDATION_FAILED'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR'
  | 'INVALID_ID'
  | 'INVALID_RESPONSE';

/**
 * Typed error for GitHub API operations.
 */
export class GitHubApiError extends Error {
  constructor(
    message: string,
    /** Semantic error code */
    public readonly code: GitHubApiErrorCode,
    /** HTTP status code (if applicable) */
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'GitHubApiError';
    Object.setPrototypeOf(this, GitHubApiError.prototype);
  }
}

/**
 * Parameters of the repos.listTags endpoint used here.
 */
export type ListTagsParams = {
  owner: string;
  repo: string;
  per_page: number;
  page: number;
};

/**
 * The slice of Octokit the tag source calls. A full `Octokit` instance
 * satisfies it.
 */
export type GitHubTagsClient = {
  rest: {
    repos: {
      listTags(params: ListTagsParams): Promise<{ data: Array<{ name: string }> }>;
    };
  };
};

export type GitHubTagSourceDependencies = {
  octokit: GitHubTagsClient;
  /** owner/repo */
  repository: string;
  /** Page size, max 100 */
  perPage?: number;
};

export interface ITagSource {
  listTags(): Promise<string[]>;
}

/**
 * Raised for a milestone due date that is not YYYYMMDDhhmmss.
 */
export class InvalidDueDateError extends Error {
  constructor(public readonly value: string) {
    super(`Due date must be in format YYYYMMDDhhmmss, got "${value}"`);
    this.name = 'InvalidDueDateError';
    Object.setPrototypeOf(this, InvalidDueDateError.prototype);
  }
}

export type MilestoneState = 'open' | 'closed';

/**
 * Fields of a milestone response read here.
 */
export type MilestoneData = {
  number: number;
  title: string;
  state: string;
};

export type ListMilestonesParams = {
  owner: string;
  repo: string;
  state: MilestoneState | 'all';
  per_page: number;
  page: number;
};

export type CreateMilestoneParams = {
  owner: string;
  repo: string;
  title: string;
  /** ISO 8601 timestamp */
  due_on?: string;
  description?: string;
};

export type UpdateMilestoneParams = {
  owner: string;
  repo: string;
  milestone_number: number;
  due_on?: string;
  description?: string;
  state?: MilestoneState;
};

/**
 * The slice of Octokit the milestone manager calls. A full `Octokit`
 * instance satisfies it.
 */
export type GitHubMilestonesClient = {
  rest: {
    issues: {
      listMilestones(params: ListMilestonesParams): Promise<{ data: MilestoneData[] }>;
      createMilestone(params: CreateMilestoneParams): Promise<{ data: MilestoneData }>;
      updateMilestone(params: UpdateMilestoneParams): Promise<{ data: MilestoneData }>;
    };
  };
};

export type GitHubMilestoneManagerDependencies = {
  octokit: GitHubMilestonesClient;
  /** Page size when looking a milestone up by title, max 100 */
  perPage?: number;
};

/**
 * What to do with the milestone named `title`. Without `edit` or `close`
 * the milestone is created.
 */
export type MilestoneRequest = {
  title: string;
  /** ISO 8601 timestamp, see parseMilestoneDueDate */
  dueOn?: string;
  description?: string;
  /** Update the due date and description of an existing milestone */
  edit?: boolean;
  /** Close an existing milestone */
  close?: boolean;
  /** Report the request instead of sending it */
  dryRun?: boolean;
};

/**
 * Body sent to the milestones endpoint.
 */
export type MilestonePayload = {
  title?: string;
  due_on?: string;
  description?: string;
  state?: MilestoneState;
};

export type MilestoneAction = 'created' | 'updated' | 'closed' | 'not-found' | 'dry-run';

export type MilestoneResult = {
  /** owner/repo */
  repository: string;
  title: string;
  action: MilestoneAction;
  /** Set once the milestone exists */
  number?: number;
  /** The request sent, or on a dry run the one that would be */
  request?: {
    method: 'POST' | 'PATCH';
    path: string;
    payload: MilestonePayload;
  };
};

export interface IMilestoneManager {
  apply(repository: string, request: MilestoneRequest): Promise<MilestoneResult>;
}
