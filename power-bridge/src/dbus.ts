import dbus from 'dbus-next';
import { closeSync } from 'fs';
import { AsyncChannel } from './channel.js';
import { errorMessage, HostError, UnauthorizedError } from './errors.js';
import type { Logger } from './logger.js';
import { TimeoutError, withTimeout } from './timeout.js';
import type {
  HostControlPort,
  HostSignalPort,
  InhibitMode,
  Inhibitor,
  ShutdownAction,
  ShutdownLock,
  ShutdownSignalSubscription,
  UnitControlPort,
  UnitOperation,
} from './types.js';

// https://www.freedesktop.org/software/systemd/man/latest/org.freedesktop.login1.html
const LOGIN_BUS_NAME = 'org.freedesktop.login1';
const LOGIN_OBJECT_PATH = '/org/freedesktop/login1';
const LOGIN_IFACE_NAME = 'org.freedesktop.login1.Manager';

// https://www.freedesktop.org/software/systemd/man/latest/org.freedesktop.systemd1.html
const SYSTEMD_BUS_NAME = 'org.freedesktop.systemd1';
const SYSTEMD_OBJECT_PATH = '/org/freedesktop/systemd1';
const SYSTEMD_IFACE_NAME = 'org.freedesktop.systemd1.Manager';

const UNAUTHORIZED_ERRORS = new Set([
  'org.freedesktop.DBus.Error.InteractiveAuthorizationRequired',
  'org.freedesktop.DBus.Error.AccessDenied',
]);

const UNIT_METHODS: Record<UnitOperation, string> = {
  start: 'StartUnit',
  stop: 'StopUnit',
  restart: 'RestartUnit',
};

// Inhibit hands back a unix fd; the bus must negotiate fd passing or logind drops us
type SystemBusOptions = { busAddress?: string; negotiateUnixFd: boolean };
type MessageBus = ReturnType<typeof dbus.systemBus>;
const openSystemBus: (options: SystemBusOptions) => MessageBus = dbus.systemBus;

let bus: MessageBus | null = null;

function getBus(): MessageBus {
  if (!bus) {
    bus = openSystemBus({ negotiateUnixFd: true });
  }
  return bus;
}

export function closeBus(): void {
  if (!bus) return;
  bus.disconnect();
  bus = null;
}

/** D-Bus error name of a failed call, e.g. org.freedesktop.DBus.Error.AccessDenied. */
export function dbusErrorName(error: unknown): string | undefined {
  if (error instanceof Error && 'type' in error && typeof error.type === 'string') return error.type;
  return undefined;
}

export function toHostError(member: string, error: unknown): HostError {
  if (error instanceof HostError) return error;
  const name = dbusErrorName(error);
  const text = error instanceof Error ? error.message : String(error);
  if (name && UNAUTHORIZED_ERRORS.has(name)) {
    return new UnauthorizedError(`${member}: ${text}`, name);
  }
  return new HostError(`${member}: ${text}`, { dbusName: name });
}

export function isInhibitorRow(value: unknown): value is [string, string, string, string, number, number] {
  return (
    Array.isArray(value) &&
    value.length === 6 &&
    typeof value[0] === 'string' &&
    typeof value[1] === 'string' &&
    typeof value[2] === 'string' &&
    typeof value[3] === 'string' &&
    typeof value[4] === 'number' &&
    typeof value[5] === 'number'
  );
}

export function parseInhibitors(value: unknown): Inhibitor[] {
  if (!Array.isArray(value)) throw new HostError('ListInhibitors: unexpected reply');
  return value.filter(isInhibitorRow).map(([what, who, why, mode, uid, pid]) => ({ what, who, why, mode, uid, pid }));
}

async function getInterface(busName: string, objectPath: string, interfaceName: string) {
  const obj = await getBus().getProxyObject(busName, objectPath);
  return obj.getInterface(interfaceName);
}

interface CallOptions {
  timeoutMs: number;
  // sees a reply that arrives after the timeout has already failed the call
  onLateReply?: (reply: unknown) => void;
}

async function callDbusMethod(
  options: CallOptions,
  busName: string,
  objectPath: string,
  interfaceName: string,
  member: string,
  ...args: unknown[]
): Promise<unknown> {
  let pending: Promise<unknown> | undefined;
  try {
    const iface = await getInterface(busName, objectPath, interfaceName);
    const method: unknown = iface[member];
    if (typeof method !== 'function') throw new HostError(`${interfaceName} has no method ${member}`);
    const reply: Promise<unknown> = Promise.resolve(method.apply(iface, args));
    pending = reply;
    return await withTimeout(reply, options.timeoutMs, member);
  } catch (error) {
    const { onLateReply } = options;
    if (error instanceof TimeoutError && pending && onLateReply) {
      // a late failure was already reported as the timeout
      void pending.then(onLateReply, () => undefined);
    }
    throw toHostError(member, error);
  }
}

/** logind Manager: power actions, inhibitor locks and the PrepareForShutdown signal. */
export class LoginManager implements HostControlPort, HostSignalPort {
  private readonly openLocks = new Set<number>();

  constructor(
    private readonly logger: Logger,
    private readonly timeoutMs: number,
    private readonly closeFd: (fd: number) => void = closeSync,
  ) {}

  private call(member: string, ...args: unknown[]): Promise<unknown> {
    return callDbusMethod({ timeoutMs: this.timeoutMs }, LOGIN_BUS_NAME, LOGIN_OBJECT_PATH, LOGIN_IFACE_NAME, member, ...args);
  }

  async scheduleShutdown(action: ShutdownAction, at: Date): Promise<void> {
    // ScheduleShutdown(s type, t usec)
    await this.call('ScheduleShutdown', action, BigInt(at.getTime()) * 1000n);
  }

  async cancelScheduledShutdown(): Promise<boolean> {
    return (await this.call('CancelScheduledShutdown')) === true;
  }

  async suspend(): Promise<void> {
    await this.call('Suspend', false);
  }

  async lockAllSessions(): Promise<void> {
    await this.call('LockSessions');
  }

  async listInhibitors(): Promise<Inhibitor[]> {
    return parseInhibitors(await this.call('ListInhibitors'));
  }

  async inhibit(what: string, who: string, why: string, mode: InhibitMode): Promise<ShutdownLock> {
    const fd = await callDbusMethod(
      { timeoutMs: this.timeoutMs, onLateReply: (reply) => this.closeLateLock(reply) },
      LOGIN_BUS_NAME,
      LOGIN_OBJECT_PATH,
      LOGIN_IFACE_NAME,
      'Inhibit',
      what,
      who,
      why,
      mode,
    );
    if (typeof fd !== 'number') throw new HostError('Inhibit: no file descriptor in reply');
    this.openLocks.add(fd);
    return { fd };
  }

  releaseLock(lock: ShutdownLock): void {
    if (!this.openLocks.delete(lock.fd)) return;
    this.closeFd(lock.fd);
  }

  // logind granted a lock after Inhibit timed out; nothing owns it, so it must not outlive the call
  private closeLateLock(reply: unknown): void {
    if (typeof reply !== 'number') return;
    try {
      this.closeFd(reply);
      this.logger.warn(`closed inhibitor fd ${reply} granted after Inhibit timed out`);
    } catch (e) {
      this.logger.error(`failed to close late inhibitor fd ${reply}: ${errorMessage(e)}`);
    }
  }

  async subscribe(): Promise<ShutdownSignalSubscription> {
    const iface = await getInterface(LOGIN_BUS_NAME, LOGIN_OBJECT_PATH, LOGIN_IFACE_NAME).catch((error: unknown) => {
      throw toHostError('PrepareForShutdown', error);
    });
    const channel = new AsyncChannel<boolean>();
    const onSignal = (start: unknown) => {
      if (typeof start === 'boolean') channel.push(start);
      else this.logger.warn(`ignoring malformed PrepareForShutdown signal: ${String(start)}`);
    };
    // dbus-next adds the match rule with the first listener and drops it with the last
    iface.on('PrepareForShutdown', onSignal);
    this.logger.debug('listening for PrepareForShutdown');

    return {
      [Symbol.asyncIterator]: () => channel[Symbol.asyncIterator](),
      close: () => {
        if (channel.isClosed) return;
        iface.removeListener('PrepareForShutdown', onSignal);
        channel.close();
      },
    };
  }
}

/** systemd Manager: unit jobs for the controlled system units. */
export class SystemdManager implements UnitControlPort {
  constructor(private readonly timeoutMs: number) {}

  async controlUnit(operation: UnitOperation, unit: string): Promise<string> {
    const job = await callDbusMethod(
      { timeoutMs: this.timeoutMs },
      SYSTEMD_BUS_NAME,
      SYSTEMD_OBJECT_PATH,
      SYSTEMD_IFACE_NAME,
      UNIT_METHODS[operation],
      unit,
      'replace',
    );
    if (typeof job !== 'string') throw new HostError(`${UNIT_METHODS[operation]}: unexpected reply`);
    return job;
  }
}
