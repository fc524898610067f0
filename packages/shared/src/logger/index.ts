export { ConsoleLogger, ScopedLogger, SilentLogger } from './consoleLogger';
export { JsonlLogger } from './jsonlLogger';
export type { Logger, MaybePromise } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';
