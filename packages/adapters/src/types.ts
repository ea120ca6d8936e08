import type { Logger } from '@evalkit/shared';

/**
 * Context passed to adapter methods for each request.
 */
export interface AdapterContext {
  /** Identifier of the evaluation run issuing the request */
  runId: string;
  /** Logger instance for this request */
  logger: Logger;
}
