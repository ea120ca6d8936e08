export type { Logger, MaybePromise } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';
export { ConsoleLogger } from './consoleLogger';
export { JsonlLogger } from './jsonlLogger';
export { NoopLogger } from './noopLogger';
