// Package entry point: the pure engine API plus the Node-side helpers
// (configuration, logging, configured Reversi engine).

export * from './shared/engine';

export { config, loadConfig, buildConfig, parseEnv } from './node/config';
export type { AppConfig, RawEnv, EnvValidationResult } from './node/config';
export { logger, createLogger } from './node/utils/logger';
export type { LogMeta } from './node/utils/logger';
export { createLoggingSearchObserver } from './node/search/loggingObserver';
export type { SearchLogSink, LoggingObserverOptions } from './node/search/loggingObserver';
export { createReversiEngine } from './node/search/createReversiEngine';
export type { ReversiEngine, CreateReversiEngineOptions } from './node/search/createReversiEngine';
