import { ConfigError, type Config, type ProviderConfig } from '@evalkit/shared';
import { FakeAdapter, OpenAIAdapter, type ProviderAdapter } from '@evalkit/adapters';

/**
 * Factory function type for creating provider adapters.
 */
export type AdapterFactory = (config: ProviderConfig) => ProviderAdapter;

/**
 * Registry for LLM provider adapters.
 * Maps provider types to factories and caches one adapter per configured provider id.
 *
 * @example
 * ```typescript
 * const registry = ProviderRegistry.withDefaults(config);
 * const judgeAdapter = registry.getAdapter(config.judge.provider);
 * ```
 */
export class ProviderRegistry {
  private factories = new Map<string, AdapterFactory>();
  private adapters = new Map<string, ProviderAdapter>();

  constructor(
    private config: Config,
    private env: NodeJS.ProcessEnv = process.env,
  ) {}

  /** A registry with the built-in `openai` and `fake` provider types. */
  static withDefaults(config: Config, env?: NodeJS.ProcessEnv): ProviderRegistry {
    const registry = new ProviderRegistry(config, env);
    registry.registerFactory('openai', (cfg) => new OpenAIAdapter(cfg));
    registry.registerFactory('fake', (cfg) => FakeAdapter.fromConfig(cfg));
    return registry;
  }

  /**
   * Register a factory for creating adapters of a specific type.
   * @param type - The provider type identifier (e.g., 'openai', 'fake')
   */
  registerFactory(type: string, factory: AdapterFactory): void {
    this.factories.set(type, factory);
  }

  /**
   * Get the adapter for a configured provider id, creating it on first use.
   * @throws ConfigError if the provider is not configured, its type has no factory,
   * or the environment variable holding its API key is unset
   */
  getAdapter(providerId: string): ProviderAdapter {
    const cached = this.adapters.get(providerId);
    if (cached) {
      return cached;
    }

    const providerConfig = this.config.providers[providerId];
    if (!providerConfig) {
      const known = Object.keys(this.config.providers);
      throw new ConfigError(
        `Provider '${providerId}' not found${known.length > 0 ? `. Configured providers: ${known.join(', ')}` : ''}`,
      );
    }

    const factory = this.factories.get(providerConfig.type);
    if (!factory) {
      throw new ConfigError(
        `Unknown provider type '${providerConfig.type}' for provider '${providerId}'`,
      );
    }

    let resolvedConfig = providerConfig;
    if (providerConfig.api_key_env && !providerConfig.api_key) {
      const fromEnv = this.env[providerConfig.api_key_env];
      if (!fromEnv) {
        throw new ConfigError(
          `Missing environment variable '${providerConfig.api_key_env}' for provider '${providerId}'`,
        );
      }
      resolvedConfig = { ...providerConfig, api_key: fromEnv };
    }

    const adapter = factory(resolvedConfig);
    this.adapters.set(providerId, adapter);
    return adapter;
  }
}
