import { ActionError, ConfigurationError, errorMessage, UnauthorizedError } from './errors.js';
import type { Logger } from './logger.js';
import type { HostControlPort, ShutdownAction, UnitControlPort, UnitOperation } from './types.js';

export interface ActionDescriptor {
  readonly name: string;
  readonly description: string;
  invoke(payload: Buffer): Promise<void>;
}

export class ActionRegistry {
  private readonly entries: ReadonlyMap<string, ActionDescriptor>;

  constructor(entries: Iterable<readonly [string, ActionDescriptor]>) {
    this.entries = new Map(entries);
  }

  resolve(topicSuffix: string): ActionDescriptor | undefined {
    return this.entries.get(topicSuffix);
  }

  suffixes(): string[] {
    return Array.from(this.entries.keys());
  }
}

export interface ActionRegistryOptions {
  host: HostControlPort;
  units?: UnitControlPort;
  logger: Logger;
  poweroffDelayMs: number;
  controlledSystemUnits?: readonly string[];
  now?: () => Date;
}

const DURATION_PART = /(\d+)\s*(h|m|s)/g;

/**
 * Parse a relative delay: bare seconds (`90`) or unit groups (`30s`, `5m`, `1h30m`).
 * Empty input means zero.
 */
export function parseDuration(text: string): number | null {
  const trimmed = text.trim();
  if (trimmed === '') return 0;
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  if (!/^(\d+\s*[hms]\s*)+$/.test(trimmed)) return null;
  let ms = 0;
  for (const [, amount, unit] of trimmed.matchAll(DURATION_PART)) {
    const factor = unit === 'h' ? 3_600_000 : unit === 'm' ? 60_000 : 1000;
    ms += Number(amount) * factor;
  }
  return ms;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatLocalTime(time: Date): string {
  return `${time.getFullYear()}-${pad(time.getMonth() + 1)}-${pad(time.getDate())} ` +
    `${pad(time.getHours())}:${pad(time.getMinutes())}:${pad(time.getSeconds())}`;
}

/** Debug-only listing of shutdown inhibitors. Failures are logged and swallowed. */
export async function logShutdownInhibitors(host: HostControlPort, logger: Logger): Promise<void> {
  if (!logger.isLevelEnabled('debug')) return;
  let found = false;
  try {
    for (const { what, who, why, mode, uid, pid } of await host.listInhibitors()) {
      if (!what.includes('shutdown')) continue;
      found = true;
      logger.debug(`detected shutdown inhibitor ${who} (pid=${pid}, uid=${uid}, mode=${mode}): ${why}`);
    }
  } catch (e) {
    logger.warn(`failed to fetch shutdown inhibitors: ${errorMessage(e)}`);
    return;
  }
  if (!found) logger.debug('no shutdown inhibitor locks found');
}

async function scheduleShutdown(opts: ActionRegistryOptions, action: ShutdownAction, delayMs: number): Promise<void> {
  const { host, logger } = opts;
  const time = new Date((opts.now?.() ?? new Date()).getTime() + delayMs);
  logger.info(`scheduling ${action} for ${formatLocalTime(time)}`);
  try {
    await host.scheduleShutdown(action, time);
  } catch (e) {
    if (e instanceof UnauthorizedError) {
      logger.error(`failed to schedule ${action}: unauthorized; missing polkit authorization rules?`);
    } else {
      logger.error(`failed to schedule ${action}: ${errorMessage(e)}`);
    }
  }
  await logShutdownInhibitors(host, logger);
}

function unitAction(units: UnitControlPort, logger: Logger, operation: UnitOperation, unit: string): ActionDescriptor {
  return {
    name: `unit/system/${unit}/${operation}`,
    description: `${operation} system unit ${unit}`,
    async invoke() {
      logger.info(`${operation} system unit ${unit}`);
      const job = await units.controlUnit(operation, unit);
      logger.debug(`queued job ${job} for ${unit}`);
    },
  };
}

/** Build the fixed action table plus one start/stop/restart triple per controlled unit. */
export function createActionRegistry(opts: ActionRegistryOptions): ActionRegistry {
  const { host, logger } = opts;
  const delaySeconds = opts.poweroffDelayMs / 1000;

  const scheduled = (action: ShutdownAction): ActionDescriptor => ({
    name: `schedule-${action}`,
    description: `schedule ${action} after the delay given in the payload`,
    async invoke(payload) {
      const delayMs = parseDuration(payload.toString('utf8'));
      if (delayMs === null) {
        throw new ActionError(`schedule-${action}`, `invalid delay "${payload.toString('utf8')}"`);
      }
      await scheduleShutdown(opts, action, delayMs);
    },
  });

  const entries: Array<[string, ActionDescriptor]> = [
    ['poweroff', {
      name: 'poweroff',
      description: `schedule poweroff in ${delaySeconds}s`,
      invoke: () => scheduleShutdown(opts, 'poweroff', opts.poweroffDelayMs),
    }],
    ['reboot', {
      name: 'reboot',
      description: `schedule reboot in ${delaySeconds}s`,
      invoke: () => scheduleShutdown(opts, 'reboot', opts.poweroffDelayMs),
    }],
    ['suspend', {
      name: 'suspend',
      description: 'suspend system',
      async invoke() {
        logger.info('suspending system');
        await host.suspend();
      },
    }],
    ['lock-all-sessions', {
      name: 'lock-all-sessions',
      description: 'lock all sessions',
      async invoke() {
        logger.info('instruct all sessions to activate screen locks');
        await host.lockAllSessions();
      },
    }],
    ['schedule-poweroff', scheduled('poweroff')],
    ['schedule-reboot', scheduled('reboot')],
    ['cancel-scheduled-shutdown', {
      name: 'cancel-scheduled-shutdown',
      description: 'cancel scheduled shutdown',
      async invoke() {
        const cancelled = await host.cancelScheduledShutdown();
        logger.info(cancelled ? 'cancelled scheduled shutdown' : 'no scheduled shutdown to cancel');
      },
    }],
  ];

  const unitNames = opts.controlledSystemUnits ?? [];
  if (unitNames.length > 0) {
    const { units } = opts;
    if (!units) throw new ConfigurationError('controlled system units require a systemd manager');
    for (const unit of unitNames) {
      for (const operation of ['start', 'stop', 'restart'] as const) {
        entries.push([`unit/system/${unit}/${operation}`, unitAction(units, logger, operation, unit)]);
      }
    }
  }

  return new ActionRegistry(entries);
}
