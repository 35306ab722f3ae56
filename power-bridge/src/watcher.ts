import { errorMessage } from './errors.js';
import type { InhibitorLock } from './inhibitor.js';
import type { Logger } from './logger.js';
import { withTimeout } from './timeout.js';
import type { HostSignalPort, ShutdownSignalSubscription } from './types.js';

export type ShutdownReporter = (preparing: boolean) => Promise<void>;

export interface ShutdownSignalWatcherOptions {
  lock: InhibitorLock;
  signals: HostSignalPort;
  logger: Logger;
  report?: ShutdownReporter;
  reportTimeoutMs: number;
}

/**
 * Signal loop: reacts to logind's PrepareForShutdown.
 *
 * Releasing the inhibitor is what lets the host continue, so the status
 * report before it is bounded by `reportTimeoutMs` and never fails the
 * release.
 */
export class ShutdownSignalWatcher {
  private subscription: ShutdownSignalSubscription | null = null;
  private preparing = false;
  private stopped = false;

  constructor(private readonly opts: ShutdownSignalWatcherOptions) {}

  /** True between PrepareForShutdown(true) and a cancelling PrepareForShutdown(false). */
  get preparingForShutdown(): boolean {
    return this.preparing;
  }

  async run(): Promise<void> {
    if (this.stopped) return;
    this.subscription = await this.opts.signals.subscribe();
    // stop() may have been called while subscribing
    if (this.stopped) this.subscription.close();
    for await (const starting of this.subscription) {
      await this.handle(starting);
    }
    this.opts.logger.debug('shutdown signal loop finished');
  }

  stop(): void {
    this.stopped = true;
    this.subscription?.close();
  }

  async handle(starting: boolean): Promise<void> {
    const { lock, logger } = this.opts;
    if (starting) {
      if (this.preparing) {
        logger.debug('already preparing for shutdown, ignoring repeated signal');
        return;
      }
      this.preparing = true;
      logger.info('system preparing for shutdown');
      await this.report(true);
      await lock.release();
      return;
    }
    this.preparing = false;
    logger.info('system shutdown cancelled');
    await this.report(false);
    await lock.acquire();
  }

  private async report(preparing: boolean): Promise<void> {
    const { report, reportTimeoutMs, logger } = this.opts;
    if (!report) return;
    try {
      await withTimeout(report(preparing), reportTimeoutMs, 'shutdown report');
    } catch (e) {
      logger.warn(`failed to report preparing-for-shutdown=${preparing}: ${errorMessage(e)}`);
    }
  }
}
