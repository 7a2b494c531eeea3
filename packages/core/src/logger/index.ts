export { createLogger, setDefaultLogLevel, isLogLevel } from './logger';
export type { Logger, LogLevel } from './logger';
