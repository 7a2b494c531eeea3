/**
 * GitModule - Read-only Git queries
 *
 * Business-agnostic access to tags, ancestry and commit logs.
 *
 * @module git
 */

export { LocalGitModule } from './local';

export type {
  IGitModule,
  GitModuleDependencies,
  ExecCommandFn,
  ExecOptions,
  ExecResult,
  CommitRecord,
} from './types';

export {
  GitError,
  GitCommandError,
  RefNotFoundError,
} from './errors';
