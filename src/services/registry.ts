/**
 * Provider Registry
 *
 * Process-wide health table for the configured provider adapters plus
 * selection and failover. Health is advisory: a stale entry costs at most one
 * extra failed attempt, which failover absorbs. Each record is replaced whole,
 * never mutated in place, so readers always see a consistent entry.
 */

import {
  AllProvidersExhaustedError,
  NoProviderAvailableError,
  RequestAbortedError,
  describeError,
} from '../errors';
import type { ModelClass, ProviderRequest, ProviderResponse } from '../types';
import type { ProviderAdapter } from './providers';

export interface HealthRecord {
  provider: string;
  healthy: boolean;
  /** Exponential moving average; null until the first sample */
  latency_ms: number | null;
  last_checked_at: string | null;
  last_error: string | null;
  consecutive_failures: number;
}

export interface ProviderAttempt {
  provider: string;
  outcome: 'success' | 'error' | 'timeout';
  latency_ms: number;
  error?: string;
}

export interface FailoverResult {
  response: ProviderResponse;
  attempts: ProviderAttempt[];
}

export interface RegistryOptions {
  timeoutMs: number;
  /** Extra attempts after the first one */
  maxFailover: number;
  /** EWMA smoothing factor for latency samples */
  alpha?: number;
}

export class ProviderRegistry {
  private readonly adapters: ProviderAdapter[] = [];
  private readonly health = new Map<string, HealthRecord>();
  private readonly alpha: number;

  constructor(
    adapters: ProviderAdapter[],
    private readonly options: RegistryOptions,
  ) {
    this.alpha = options.alpha ?? 0.3;
    for (const adapter of adapters) {
      this.register(adapter);
    }
  }

  register(adapter: ProviderAdapter): void {
    if (this.health.has(adapter.name)) {
      throw new Error(`Provider ${adapter.name} is already registered`);
    }
    this.adapters.push(adapter);
    this.health.set(adapter.name, {
      provider: adapter.name,
      healthy: true,
      latency_ms: null,
      last_checked_at: null,
      last_error: null,
      consecutive_failures: 0,
    });
  }

  list(): readonly ProviderAdapter[] {
    return this.adapters;
  }

  // ===========================================================================
  // HEALTH
  // ===========================================================================

  reportHealth(providerName: string, healthy: boolean, latencyMs?: number, error?: string): void {
    const previous = this.health.get(providerName);
    if (!previous) {
      console.warn(`[REGISTRY] Health report for unknown provider ${providerName}`);
      return;
    }

    let latency = previous.latency_ms;
    if (latencyMs !== undefined && Number.isFinite(latencyMs) && latencyMs >= 0) {
      latency = latency === null ? latencyMs : this.alpha * latencyMs + (1 - this.alpha) * latency;
    }

    const next: HealthRecord = {
      provider: providerName,
      healthy,
      latency_ms: latency,
      last_checked_at: new Date().toISOString(),
      last_error: healthy ? null : (error ?? 'unhealthy'),
      consecutive_failures: healthy ? 0 : previous.consecutive_failures + 1,
    };
    this.health.set(providerName, next);

    if (previous.healthy !== healthy) {
      console.log(`[REGISTRY] ${providerName} is now ${healthy ? 'healthy' : 'unhealthy'}`);
    }
  }

  getHealth(providerName: string): HealthRecord | undefined {
    return this.health.get(providerName);
  }

  snapshot(): HealthRecord[] {
    return this.adapters.flatMap((adapter) => {
      const record = this.health.get(adapter.name);
      return record ? [record] : [];
    });
  }

  // ===========================================================================
  // SELECTION
  // ===========================================================================

  /**
   * Healthy, capable providers ordered by latency. Providers without a
   * latency sample come after measured ones; ties keep registration order.
   */
  candidates(modelClass: ModelClass, exclude: ReadonlySet<string> = new Set()): ProviderAdapter[] {
    return this.adapters
      .map((adapter, index) => ({ adapter, index, record: this.health.get(adapter.name) }))
      .filter(
        ({ adapter, record }) =>
          record?.healthy === true && adapter.modelClasses.includes(modelClass) && !exclude.has(adapter.name),
      )
      .sort((a, b) => {
        const la = a.record?.latency_ms ?? null;
        const lb = b.record?.latency_ms ?? null;
        if (la !== null && lb !== null && la !== lb) return la - lb;
        if (la === null && lb !== null) return 1;
        if (la !== null && lb === null) return -1;
        return a.index - b.index;
      })
      .map(({ adapter }) => adapter);
  }

  selectProvider(modelClass: ModelClass, exclude: ReadonlySet<string> = new Set()): ProviderAdapter {
    const [best] = this.candidates(modelClass, exclude);
    if (!best) {
      throw new NoProviderAvailableError(modelClass);
    }
    return best;
  }

  // ===========================================================================
  // EXECUTION
  // ===========================================================================

  /**
   * Call the best provider; on failure or timeout mark it unhealthy and try
   * the next best, up to 1 + maxFailover attempts. A caller abort stops
   * immediately without blaming the provider.
   */
  async executeWithFailover(
    request: ProviderRequest,
    modelClass: ModelClass,
    signal?: AbortSignal,
  ): Promise<FailoverResult> {
    const maxAttempts = 1 + this.options.maxFailover;
    const attempts: ProviderAttempt[] = [];
    const tried = new Set<string>();

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw new RequestAbortedError('provider call');
      }

      const adapter = attempts.length === 0 ? this.selectProvider(modelClass) : this.candidates(modelClass, tried)[0];
      if (!adapter) break;
      tried.add(adapter.name);

      const started = Date.now();
      const deadline = withDeadline(signal, this.options.timeoutMs);
      try {
        const response = await raceAbort(adapter.invoke(request, modelClass, deadline.signal), deadline.signal);
        const latency = Date.now() - started;
        this.reportHealth(adapter.name, true, latency);
        attempts.push({ provider: adapter.name, outcome: 'success', latency_ms: latency });
        if (attempts.length > 1) {
          console.log(`[REGISTRY] ${modelClass} served by ${adapter.name} after ${attempts.length - 1} failover(s)`);
        }
        return { response, attempts };
      } catch (error) {
        const latency = Date.now() - started;
        if (signal?.aborted) {
          throw new RequestAbortedError('provider call');
        }

        const timedOut = deadline.timedOut();
        const message = timedOut ? `timed out after ${this.options.timeoutMs}ms` : describeError(error);
        this.reportHealth(adapter.name, false, undefined, message);
        attempts.push({
          provider: adapter.name,
          outcome: timedOut ? 'timeout' : 'error',
          latency_ms: latency,
          error: message,
        });
        console.warn(`[REGISTRY] ${adapter.name} failed for ${modelClass}: ${message}`);
      } finally {
        deadline.dispose();
      }
    }

    throw new AllProvidersExhaustedError(
      modelClass,
      attempts.map(({ provider, error }) => ({ provider, error: error ?? 'unknown' })),
    );
  }
}

// =============================================================================
// DEADLINES
// =============================================================================

interface Deadline {
  signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
}

/**
 * Child signal that aborts on the parent's abort or after `timeoutMs`.
 */
export function withDeadline(parent: AbortSignal | undefined, timeoutMs: number): Deadline {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts, whichever is
 * first. Enforces deadlines on adapters that ignore their signal.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
