import { INHIBITOR_WHO, INHIBITOR_WHY } from './config.js';
import { errorMessage, LockError, UnauthorizedError } from './errors.js';
import type { Logger } from './logger.js';
import type { HostControlPort, ShutdownLock } from './types.js';

export type LockResult = { ok: true } | { ok: false; error: LockError };

type LockState = { kind: 'free' } | { kind: 'held'; lock: ShutdownLock };

/**
 * Owns the single shutdown-delay inhibitor taken from logind.
 *
 * acquire() and release() run one at a time: each waits for the previous
 * transition to settle before looking at the state.
 */
export class InhibitorLock {
  private state: LockState = { kind: 'free' };
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly host: Pick<HostControlPort, 'inhibit' | 'releaseLock'>,
    private readonly logger: Logger,
    private readonly who: string = INHIBITOR_WHO,
    private readonly why: string = INHIBITOR_WHY,
  ) {}

  get held(): boolean {
    return this.state.kind === 'held';
  }

  acquire(): Promise<LockResult> {
    return this.exclusive<LockResult>(async () => {
      if (this.state.kind === 'held') return { ok: true };
      try {
        const lock = await this.host.inhibit('shutdown', this.who, this.why, 'delay');
        this.state = { kind: 'held', lock };
        this.logger.debug(`acquired shutdown inhibitor lock (fd=${lock.fd})`);
        return { ok: true };
      } catch (e) {
        const error = e instanceof UnauthorizedError
          ? new LockError('denied_by_policy', `shutdown inhibitor denied: ${e.message}`)
          : new LockError('host_unavailable', `failed to acquire shutdown inhibitor: ${errorMessage(e)}`);
        this.logger.error(`${error.message}; shutdown will not be delayed`);
        return { ok: false, error };
      }
    });
  }

  release(): Promise<LockResult> {
    return this.exclusive<LockResult>(async () => {
      if (this.state.kind === 'free') return { ok: true };
      const { lock } = this.state;
      this.state = { kind: 'free' };
      try {
        this.host.releaseLock(lock);
        this.logger.debug('released shutdown inhibitor lock');
        return { ok: true };
      } catch (e) {
        const error = new LockError('host_unavailable', `failed to release shutdown inhibitor: ${errorMessage(e)}`);
        this.logger.error(error.message);
        return { ok: false, error };
      }
    });
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.catch(() => undefined);
    return run;
  }
}
