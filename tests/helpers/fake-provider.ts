/**
 * In-process provider adapter
 *
 * Stands in for HttpProviderAdapter so engine and registry tests control
 * replies, latency and failures without HTTP.
 */

import type { ProviderAdapter } from '../../src/services/providers';
import type { ProviderRequest, ProviderResponse, TokenUsage } from '../../src/types';

export interface FakeReply {
  content: string;
  usage?: TokenUsage;
}

export type FakeBehavior = (
  request: ProviderRequest,
  modelClass: string,
  signal: AbortSignal,
) => FakeReply | Promise<FakeReply>;

export const DEFAULT_USAGE: TokenUsage = { prompt_tokens: 20, completion_tokens: 10, total_tokens: 30 };

export class FakeProvider implements ProviderAdapter {
  readonly calls: Array<{ request: ProviderRequest; modelClass: string }> = [];
  probes = 0;
  probeError: Error | null = null;
  private behavior: FakeBehavior;

  constructor(
    readonly name: string,
    readonly modelClasses: readonly string[] = ['fast', 'smart'],
    behavior?: FakeBehavior,
  ) {
    this.behavior = behavior ?? (() => ({ content: `reply from ${name}` }));
  }

  respondWith(behavior: FakeBehavior): this {
    this.behavior = behavior;
    return this;
  }

  replyWith(content: string, usage?: TokenUsage): this {
    return this.respondWith(() => ({ content, usage }));
  }

  failWith(message: string): this {
    return this.respondWith(() => {
      throw new Error(message);
    });
  }

  /** Never settles on its own; only the signal ends it */
  hang(): this {
    return this.respondWith(
      (_request, _modelClass, signal) =>
        new Promise<FakeReply>((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        }),
    );
  }

  async invoke(request: ProviderRequest, modelClass: string, signal: AbortSignal): Promise<ProviderResponse> {
    this.calls.push({ request, modelClass });
    const reply = await this.behavior(request, modelClass, signal);
    return {
      provider: this.name,
      model: `${this.name}-${modelClass}`,
      content: reply.content,
      usage: reply.usage ?? DEFAULT_USAGE,
      latency_ms: 1,
    };
  }

  async probe(): Promise<void> {
    this.probes++;
    if (this.probeError) throw this.probeError;
  }
}
