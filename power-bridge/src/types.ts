// Ports between the bridge core and the host / broker adapters

export type ShutdownAction = 'poweroff' | 'reboot';

export type InhibitMode = 'block' | 'delay';

/** One row of logind's ListInhibitors. */
export interface Inhibitor {
  what: string;
  who: string;
  why: string;
  mode: string;
  uid: number;
  pid: number;
}

/** Opaque handle of a granted inhibitor; the fd logind passed back over the bus. */
export interface ShutdownLock {
  readonly fd: number;
}

export interface HostControlPort {
  scheduleShutdown(action: ShutdownAction, at: Date): Promise<void>;
  cancelScheduledShutdown(): Promise<boolean>;
  suspend(): Promise<void>;
  lockAllSessions(): Promise<void>;
  listInhibitors(): Promise<Inhibitor[]>;
  inhibit(what: string, who: string, why: string, mode: InhibitMode): Promise<ShutdownLock>;
  /** Closes the handle. Releasing the same handle twice is a no-op. */
  releaseLock(lock: ShutdownLock): void;
}

export type UnitOperation = 'start' | 'stop' | 'restart';

export interface UnitControlPort {
  /** Queue a systemd job for `unit`; resolves with the job object path. */
  controlUnit(operation: UnitOperation, unit: string): Promise<string>;
}

/** Stream of PrepareForShutdown values: true = shutdown starting, false = cancelled. */
export interface ShutdownSignalSubscription extends AsyncIterable<boolean> {
  close(): void;
}

export interface HostSignalPort {
  subscribe(): Promise<ShutdownSignalSubscription>;
}

export interface InboundMessage {
  topic: string;
  payload: Buffer;
  retained: boolean;
}

export type QoS = 0 | 1 | 2;

export interface BrokerConnection {
  onConnect(listener: () => void): void;
  onMessage(listener: (message: InboundMessage) => void): void;
  subscribe(topic: string, qos: QoS): void;
  publish(topic: string, payload: string, options: { qos: QoS; retain: boolean }): Promise<void>;
  end(): Promise<void>;
}

export type BridgeState = 'connecting' | 'subscribing' | 'running' | 'terminating' | 'stopped';
