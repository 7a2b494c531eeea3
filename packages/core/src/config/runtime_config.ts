import type { IGitModule } from '../git';
import { parseGitHubSlug } from '../github/github.utils';
import { isLogLevel } from '../logger';
import { RepositoryNotConfiguredError } from './errors';
import type { EnvSource, RuntimeConfig } from './runtime_config.types';

export const DEFAULT_SERVER_URL = 'https://github.com';

const TAG_REF_PREFIX = 'refs/tags/';

function readVar(env: EnvSource, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Builds the RuntimeConfig from an environment map (process.env by default).
 */
export function loadRuntimeConfig(env: EnvSource = process.env): RuntimeConfig {
  const githubRef = readVar(env, 'GITHUB_REF');
  const refTag = githubRef?.startsWith(TAG_REF_PREFIX)
    ? githubRef.slice(TAG_REF_PREFIX.length) || undefined
    : undefined;
  const logLevel = readVar(env, 'LOG_LEVEL');

  const config: RuntimeConfig = {
    serverUrl: readVar(env, 'GITHUB_SERVER_URL') ?? DEFAULT_SERVER_URL,
    actions: {},
  };

  const releaseTag = readVar(env, 'RELEASE_TAG') ?? refTag;
  const previousTag = readVar(env, 'PREVIOUS_TAG');
  const repository = readVar(env, 'GITHUB_REPOSITORY');
  const githubToken = readVar(env, 'GITHUB_TOKEN');
  const output = readVar(env, 'GITHUB_OUTPUT');
  const stepSummary = readVar(env, 'GITHUB_STEP_SUMMARY');
  const envFile = readVar(env, 'GITHUB_ENV');

  if (releaseTag) config.releaseTag = releaseTag;
  if (previousTag) config.previousTag = previousTag;
  if (repository) config.repository = repository;
  if (githubToken) config.githubToken = githubToken;
  if (output) config.actions.output = output;
  if (stepSummary) config.actions.stepSummary = stepSummary;
  if (envFile) config.actions.env = envFile;
  if (isLogLevel(logLevel)) config.logLevel = logLevel;

  return config;
}

/**
 * owner/repo for commit links: explicit value, then GITHUB_REPOSITORY, then
 * the GitHub slug of the origin remote.
 */
export async function resolveRepository(
  explicit: string | undefined,
  config: RuntimeConfig,
  git: Pick<IGitModule, 'getRemoteUrl'>
): Promise<string> {
  const configured = explicit?.trim() || config.repository;
  if (configured) {
    return configured;
  }

  const remoteUrl = await git.getRemoteUrl('origin');
  const slug = remoteUrl ? parseGitHubSlug(remoteUrl) : null;
  if (!slug) {
    throw new RepositoryNotConfiguredError();
  }
  return slug;
}
