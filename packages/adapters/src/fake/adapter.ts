import type {
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
  ProviderConfig,
} from '@evalkit/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';

/** One scripted reply: text to return, or an error to reject with. */
export type FakeReply = string | Error;

export interface FakeAdapterOptions {
  /** Replies handed out in order, one per `generate` call */
  responses?: FakeReply[];
  /** Computes a reply from the request; used once `responses` runs out */
  responder?: (request: ModelRequest) => FakeReply | Promise<FakeReply>;
  /** Default: true */
  supportsJsonMode?: boolean;
}

const DEFAULT_JUDGMENT = JSON.stringify({
  score: 75,
  passed: true,
  feedback: 'Fake judgment.',
});

const DEFAULT_RESPONSE = 'This is a fake response.';

/**
 * Scripted adapter for tests and offline runs. Records every request it receives.
 */
export class FakeAdapter implements ProviderAdapter {
  readonly requests: ModelRequest[] = [];
  private readonly queue: FakeReply[];
  private readonly responder?: FakeAdapterOptions['responder'];
  private readonly supportsJsonMode: boolean;

  constructor(options: FakeAdapterOptions = {}) {
    this.queue = [...(options.responses ?? [])];
    this.responder = options.responder;
    this.supportsJsonMode = options.supportsJsonMode ?? true;
  }

  static fromConfig(config: ProviderConfig): FakeAdapter {
    return new FakeAdapter({ responses: config.responses });
  }

  id(): string {
    return 'fake';
  }

  capabilities(): ProviderCapabilities {
    return { supportsJsonMode: this.supportsJsonMode };
  }

  async generate(request: ModelRequest, _context: AdapterContext): Promise<ModelResponse> {
    this.requests.push(request);

    const reply = await this.nextReply(request);
    if (reply instanceof Error) {
      throw reply;
    }
    return { text: reply };
  }

  private async nextReply(request: ModelRequest): Promise<FakeReply> {
    const scripted = this.queue.shift();
    if (scripted !== undefined) {
      return scripted;
    }
    if (this.responder) {
      return this.responder(request);
    }
    return request.jsonMode ? DEFAULT_JUDGMENT : DEFAULT_RESPONSE;
  }
}
