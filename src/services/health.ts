/**
 * Health Monitor
 *
 * Probes every adapter that supports it on a fixed interval and feeds the
 * outcome to the registry. This is also how a provider marked unhealthy by a
 * failed call becomes selectable again.
 */

import { describeError } from '../errors';
import { withDeadline, raceAbort, type ProviderRegistry } from './registry';

export interface HealthMonitorOptions {
  intervalMs: number;
  timeoutMs: number;
}

export class HealthMonitor {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;

  constructor(
    private readonly registry: ProviderRegistry,
    private readonly options: HealthMonitorOptions,
  ) {}

  start(): void {
    if (this.timer || this.options.intervalMs <= 0) return;
    this.timer = setInterval(() => {
      this.tick();
    }, this.options.intervalMs);
    this.timer.unref();
    console.log(`[HEALTH] Probing providers every ${this.options.intervalMs}ms`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Probe all providers once. Resolves when every probe has reported.
   */
  async probeAll(): Promise<void> {
    const probes = this.registry.list().map(async (adapter) => {
      if (!adapter.probe) return;

      const started = Date.now();
      const deadline = withDeadline(undefined, this.options.timeoutMs);
      try {
        await raceAbort(adapter.probe(deadline.signal), deadline.signal);
        this.registry.reportHealth(adapter.name, true, Date.now() - started);
      } catch (error) {
        const message = deadline.timedOut() ? `probe timed out after ${this.options.timeoutMs}ms` : describeError(error);
        this.registry.reportHealth(adapter.name, false, undefined, message);
      } finally {
        deadline.dispose();
      }
    });
    await Promise.all(probes);
  }

  // One probe round at a time; a slow round is not stacked
  private tick(): void {
    if (this.running) return;
    this.running = this.probeAll()
      .catch((error: unknown) => {
        console.error('[HEALTH] Probe round failed:', error);
      })
      .finally(() => {
        this.running = null;
      });
  }
}
