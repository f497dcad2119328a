import { ConfigError, silentLogger } from '@quotawatch/core';
import type { KpiSnapshot, Logger } from '@quotawatch/core';
import type { KpiEngine, RefreshOutcome } from './engine.js';

export interface SchedulerOptions {
  engine: Pick<KpiEngine, 'peek' | 'refresh'>;
  /** Redraw cadence; only reads the current snapshot. */
  tickMs: number;
  /** Data cadence; runs a full refresh. */
  refreshMs: number;
  onTick: (snapshot: KpiSnapshot | null, now: Date) => void;
  onRefresh?: (outcome: RefreshOutcome) => void;
  logger?: Logger;
  clock?: () => Date;
}

/**
 * Two timers over one engine: a fast tick that redraws from `peek()` and a
 * slow one that refreshes data. A failed refresh is logged and the loop keeps
 * going with the previous snapshot.
 */
export class DualCadenceScheduler {
  private options: SchedulerOptions;
  private log: Logger;
  private clock: () => Date;
  private tickTimer: ReturnType<typeof setInterval> | null = null;
  private refreshTimer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(options: SchedulerOptions) {
    for (const key of ['tickMs', 'refreshMs'] as const) {
      const ms = options[key];
      if (!Number.isFinite(ms) || ms <= 0) {
        throw new ConfigError(`${key} must be a positive number of milliseconds, got ${ms}`);
      }
    }
    this.options = options;
    this.log = (options.logger ?? silentLogger()).child({ component: 'scheduler' });
    this.clock = options.clock ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Refresh once, draw, then start both timers. */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.log.info({ tickMs: this.options.tickMs, refreshMs: this.options.refreshMs }, 'scheduler started');

    await this.refreshOnce();
    if (!this.running) return;

    this.tick();
    this.tickTimer = setInterval(() => this.tick(), this.options.tickMs);
    this.refreshTimer = setInterval(() => {
      void this.refreshOnce();
    }, this.options.refreshMs);
  }

  stop(): void {
    if (this.tickTimer) clearInterval(this.tickTimer);
    if (this.refreshTimer) clearInterval(this.refreshTimer);
    this.tickTimer = null;
    this.refreshTimer = null;
    if (this.running) this.log.info('scheduler stopped');
    this.running = false;
  }

  /** Never rejects. */
  async refreshOnce(): Promise<RefreshOutcome | null> {
    try {
      const outcome = await this.options.engine.refresh();
      if (outcome.status === 'source-unavailable') {
        this.log.warn({ err: outcome.error }, 'refresh failed; showing previous snapshot');
      }
      this.options.onRefresh?.(outcome);
      return outcome;
    } catch (err) {
      this.log.error({ err }, 'refresh threw');
      return null;
    }
  }

  private tick(): void {
    try {
      this.options.onTick(this.options.engine.peek(), this.clock());
    } catch (err) {
      this.log.error({ err }, 'tick handler threw');
    }
  }
}
