import { EventEmitter } from 'eventemitter3';
import { createActionRegistry, type ActionRegistry } from './actions.js';
import { AsyncChannel } from './channel.js';
import { validateCredentials, type BridgeConfig } from './config.js';
import { MessageDispatcher } from './dispatcher.js';
import { errorMessage, normalizeError, type AppError } from './errors.js';
import { InhibitorLock } from './inhibitor.js';
import type { Logger } from './logger.js';
import type {
  BridgeState,
  BrokerConnection,
  HostControlPort,
  HostSignalPort,
  InboundMessage,
  UnitControlPort,
} from './types.js';
import { ShutdownSignalWatcher } from './watcher.js';

export const STATUS_TOPIC_SUFFIX = 'preparing-for-shutdown';

export interface BridgeRuntimeEvents {
  state: (state: BridgeState) => void;
}

export interface BridgeRuntimeOptions {
  config: BridgeConfig;
  host: HostControlPort;
  signals: HostSignalPort;
  units?: UnitControlPort;
  logger: Logger;
  connectBroker: (config: BridgeConfig, logger: Logger) => BrokerConnection;
}

type NetworkEvent = { type: 'connect' } | { type: 'message'; message: InboundMessage };

/**
 * Runs the network loop (broker connect/message events, in delivery order)
 * and the signal loop (PrepareForShutdown) side by side, and tears both down
 * on stop(). The InhibitorLock is the only state the two loops share.
 */
export class BridgeRuntime extends EventEmitter<BridgeRuntimeEvents> {
  readonly registry: ActionRegistry;
  readonly lock: InhibitorLock;

  private currentState: BridgeState = 'stopped';
  private readonly network = new AsyncChannel<NetworkEvent>();
  private broker: BrokerConnection | null = null;
  private watcher: ShutdownSignalWatcher | null = null;
  private networkLoop: Promise<void> = Promise.resolve();
  private signalLoop: Promise<void> = Promise.resolve();
  private stopPromise: Promise<void> | null = null;
  private signalLoopError: AppError | null = null;

  constructor(private readonly opts: BridgeRuntimeOptions) {
    super();
    this.registry = createActionRegistry({
      host: opts.host,
      units: opts.units,
      logger: opts.logger,
      poweroffDelayMs: opts.config.poweroffDelayMs,
      controlledSystemUnits: opts.config.controlledSystemUnits,
    });
    this.lock = new InhibitorLock(opts.host, opts.logger);
  }

  get state(): BridgeState {
    return this.currentState;
  }

  /** Connect and start both loops. Throws ConfigurationError before any connection attempt. */
  start(): void {
    if (this.broker || this.stopPromise) throw new Error('bridge runtime already started');
    const { config, logger, signals } = this.opts;
    validateCredentials(config);

    this.setState('connecting');
    logger.info(`connecting to MQTT broker ${config.mqttHost}:${config.mqttPort}`);
    const broker = this.opts.connectBroker(config, logger);
    this.broker = broker;

    const watcher = new ShutdownSignalWatcher({
      lock: this.lock,
      signals,
      logger,
      reportTimeoutMs: config.reportTimeoutMs,
      report: (preparing) =>
        broker.publish(`${config.topicPrefix}/${STATUS_TOPIC_SUFFIX}`, preparing ? 'true' : 'false', { qos: 1, retain: true }),
    });
    this.watcher = watcher;
    const dispatcher = new MessageDispatcher({
      registry: this.registry,
      lock: this.lock,
      broker,
      logger,
      topicPrefix: config.topicPrefix,
      // the inhibitor stays released until the host cancels the shutdown
      shouldHoldLock: () => !watcher.preparingForShutdown,
    });

    broker.onConnect(() => this.network.push({ type: 'connect' }));
    broker.onMessage((message) => this.network.push({ type: 'message', message }));

    this.networkLoop = this.runNetworkLoop(dispatcher);
    this.signalLoop = this.runSignalLoop(watcher);
  }

  /**
   * start(), then wait until the runtime has stopped (stop() or the signal loop ending).
   * Rejects with the signal loop's error when that loop failed.
   */
  async run(): Promise<void> {
    this.start();
    await this.signalLoop;
    await this.stop();
    if (this.signalLoopError) throw this.signalLoopError;
  }

  stop(): Promise<void> {
    this.stopPromise ??= this.shutdown();
    return this.stopPromise;
  }

  private async shutdown(): Promise<void> {
    const { logger } = this.opts;
    if (!this.broker) {
      this.setState('stopped');
      return;
    }
    this.setState('terminating');
    logger.info('stopping bridge');
    this.network.close();
    await this.networkLoop;
    await this.broker.end();
    this.watcher?.stop();
    await this.signalLoop;
    await this.lock.release();
    this.setState('stopped');
    logger.info('bridge stopped');
  }

  private async runNetworkLoop(dispatcher: MessageDispatcher): Promise<void> {
    const { config, logger } = this.opts;
    for await (const event of this.network) {
      if (this.isStopping()) break;
      try {
        if (event.type === 'connect') {
          this.setState('subscribing');
          logger.debug(`connected to MQTT broker ${config.mqttHost}:${config.mqttPort}`);
          await dispatcher.onConnect();
          if (!this.isStopping()) this.setState('running');
        } else {
          await dispatcher.onMessage(event.message);
        }
      } catch (e) {
        logger.error(`network loop: failed handling ${event.type} event: ${errorMessage(e)}`);
      }
    }
    logger.debug('network loop finished');
  }

  private async runSignalLoop(watcher: ShutdownSignalWatcher): Promise<void> {
    const { logger } = this.opts;
    try {
      await watcher.run();
    } catch (e) {
      this.signalLoopError = normalizeError(e);
      logger.error(`shutdown signal loop failed: ${errorMessage(e)}`);
    }
    if (!this.isStopping()) logger.warn('shutdown signal loop ended, stopping bridge');
  }

  private isStopping(): boolean {
    return this.currentState === 'terminating' || this.currentState === 'stopped';
  }

  private setState(state: BridgeState): void {
    if (this.currentState === state) return;
    this.currentState = state;
    this.emit('state', state);
  }
}
