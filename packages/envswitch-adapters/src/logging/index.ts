export { logger, parseLogLevel } from './logger';
export type { LogLevel } from './logger';
