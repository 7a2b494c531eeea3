import type { LogLevel } from '../logger';
import type { ActionsOutputPaths } from '../actions_output';

export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Process environment, read once per invocation. Empty values are unset.
 */
export type RuntimeConfig = {
  /** RELEASE_TAG, else the tag of GITHUB_REF=refs/tags/<tag> */
  releaseTag?: string;
  /** PREVIOUS_TAG */
  previousTag?: string;
  /** GITHUB_REPOSITORY (owner/repo) */
  repository?: string;
  /** GITHUB_SERVER_URL, default https://github.com */
  serverUrl: string;
  /** GITHUB_TOKEN */
  githubToken?: string;
  actions: ActionsOutputPaths;
  /** LOG_LEVEL, when it names a level */
  logLevel?: LogLevel;
};
