/**
 * GitHub API implementations for @relkit/core/github
 *
 * For jobs that query a repository without a local clone.
 *
 * Usage:
 *   import { GitHubTagSource, GitHubMilestoneManager } from '@relkit/core/github';
 *
 * Each implementation receives an `Octokit` instance for testability and shared auth/base-URL config.
 */

// ==================== Re-exports: Octokit (types only) ====================

export type { Octokit } from '@octokit/rest';

// ==================== Module Exports ====================

export {
  GitHubApiError,
  GitHubMilestoneManager,
  GitHubTagSource,
  InvalidDueDateError,
  isOctokitRequestError,
  mapOctokitError,
  parseGitHubSlug,
  parseMilestoneDueDate,
  splitRepositorySlug,
} from './github/index';
export type {
  GitHubApiErrorCode,
  GitHubTagsClient,
  GitHubTagSourceDependencies,
  ITagSource,
  ListTagsParams,
  CreateMilestoneParams,
  GitHubMilestoneManagerDependencies,
  GitHubMilestonesClient,
  IMilestoneManager,
  ListMilestonesParams,
  MilestoneAction,
  MilestoneData,
  MilestonePayload,
  MilestoneRequest,
  MilestoneResult,
  MilestoneState,
  UpdateMilestoneParams,
} from './github/index';
