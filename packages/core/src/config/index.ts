export { loadRuntimeConfig, resolveRepository, DEFAULT_SERVER_URL } from './runtime_config';
export { RepositoryNotConfiguredError } from './errors';
export type { RuntimeConfig, EnvSource } from './runtime_config.types';
