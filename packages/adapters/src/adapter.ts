import type { ModelRequest, ModelResponse, ProviderCapabilities } from '@evalkit/shared';
import type { AdapterContext } from './types';

/**
 * Interface for LLM provider adapters.
 * The judge and the chat pipeline only ever see this interface, so a test can
 * hand them a scripted adapter instead of a network client.
 *
 * @example
 * ```typescript
 * class MyAdapter implements ProviderAdapter {
 *   id() { return 'my-adapter'; }
 *   capabilities() { return { supportsJsonMode: true }; }
 *   async generate(req, ctx) { return { text: '{"score": 90}' }; }
 * }
 * ```
 */
export interface ProviderAdapter {
  /**
   * Returns the unique identifier for this adapter instance.
   */
  id(): string;
  /**
   * Returns the capabilities of this provider.
   */
  capabilities(): ProviderCapabilities;
  /**
   * Generate a response from the model.
   * Rejects with an `AppError` subclass (`ExternalCallError`, `RateLimitError`,
   * `TimeoutError`, `ConfigError`) when the provider call fails.
   */
  generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse>;
}
