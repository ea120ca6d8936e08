import type { Logger } from './types';

/**
 * Discards everything. The default when a component is built without a logger.
 */
export class NoopLogger implements Logger {
  log(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}
