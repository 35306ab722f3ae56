import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';

/** Route SIGINT/SIGTERM into `stop`. A second signal while stopping forces exit. */
export function registerShutdown(stop: () => Promise<void>, logger: Logger, onExit: (code: number) => void = process.exit): void {
  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) {
      logger.warn(`received ${signal} while stopping, exiting now`);
      onExit(1);
      return;
    }
    stopping = true;
    logger.info(`received ${signal}, shutting down...`);
    stop().catch((e: unknown) => {
      logger.error(`shutdown failed: ${errorMessage(e)}`);
      onExit(1);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
