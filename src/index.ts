export * from './scanner';
export * from './git';
export * from './config';
export * from './installer';
export { SetupError, ConfigError, CommandError, StagedContentError } from './common/errors';
export { Logger, getLogger, configureLogger } from './common/logger';
export type { LogLevel, LogFormat, LoggerOptions } from './common/logger';
