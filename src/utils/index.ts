export { createLogger, setLogLevel } from './logger';
export type { Logger, LogLevel } from './logger';
export { loadAppConfig } from './config';
export type { AppConfig } from './config';
export { ConfigError, InsufficientHistoryError, errorMessage } from './errors';
