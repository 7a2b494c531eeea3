export { GitHubApiError, InvalidDueDateError } from './github.types';
export type {
  GitHubApiErrorCode,
  ListTagsParams,
  GitHubTagsClient,
  GitHubTagSourceDependencies,
  ITagSource,
  MilestoneState,
  MilestoneData,
  ListMilestonesParams,
  CreateMilestoneParams,
  UpdateMilestoneParams,
  GitHubMilestonesClient,
  GitHubMilestoneManagerDependencies,
  MilestoneRequest,
  MilestonePayload,
  MilestoneAction,
  MilestoneResult,
  IMilestoneManager,
} from './github.types';
export { isOctokitRequestError, mapOctokitError, parseGitHubSlug, splitRepositorySlug } from './github.utils';
export { GitHubTagSource } from './github_tag_source';
export { GitHubMilestoneManager, parseMilestoneDueDate } from './github_milestones';
