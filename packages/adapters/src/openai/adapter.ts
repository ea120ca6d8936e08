import OpenAI, { APIError, APIConnectionTimeoutError } from 'openai';
import {
  ConfigError,
  type ChatMessage,
  type ModelRequest,
  type ModelResponse,
  type ProviderCapabilities,
  type ProviderConfig,
} from '@evalkit/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';
import { BaseProviderAdapter, type ErrorTypeConfig } from '../base-adapter';

export class OpenAIAdapter extends BaseProviderAdapter implements ProviderAdapter {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly timeoutMs?: number;

  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIError => error instanceof APIError,
    isTimeoutError: (error: unknown) => error instanceof APIConnectionTimeoutError,
  };

  constructor(config: ProviderConfig) {
    super();
    const apiKey = config.api_key || (config.api_key_env && process.env[config.api_key_env]);
    if (!apiKey) {
      throw new ConfigError(
        `Missing API Key for OpenAI provider. Checked config.api_key and env var ${config.api_key_env}`,
      );
    }
    this.model = config.model;
    this.timeoutMs = config.timeoutMs;
    this.client = new OpenAI({
      apiKey,
      baseURL: config.baseUrl,
    });
  }

  id(): string {
    return 'openai';
  }

  capabilities(): ProviderCapabilities {
    return { supportsJsonMode: true };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: req.messages.map(toOpenAIMessage),
          max_tokens: req.maxTokens,
          temperature: req.temperature ?? 0.2,
          response_format: req.jsonMode ? { type: 'json_object' } : undefined,
        },
        { timeout: this.timeoutMs },
      );

      if (completion.usage) {
        await ctx.logger.debug(
          `openai ${this.model}: ${completion.usage.prompt_tokens} prompt + ${completion.usage.completion_tokens} completion tokens`,
        );
      }

      return { text: completion.choices[0]?.message.content || undefined };
    } catch (error) {
      throw this.mapError(error, 'openai');
    }
  }
}

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}
