import type { ActionRegistry } from './actions.js';
import { errorMessage } from './errors.js';
import type { InhibitorLock } from './inhibitor.js';
import type { Logger } from './logger.js';
import type { BrokerConnection, InboundMessage, QoS } from './types.js';

// No delivery state to persist across restarts
export const ACTION_QOS: QoS = 0;

const ESCAPES: Record<number, string> = { 0x5c: '\\\\', 0x27: "\\'", 0x09: '\\t', 0x0a: '\\n', 0x0d: '\\r' };

/** Render payload bytes as a `b'...'` literal for the receipt log. */
export function formatPayload(payload: Buffer): string {
  let out = '';
  for (const byte of payload) {
    const escaped = ESCAPES[byte];
    if (escaped !== undefined) out += escaped;
    else if (byte >= 0x20 && byte < 0x7f) out += String.fromCharCode(byte);
    else out += `\\x${byte.toString(16).padStart(2, '0')}`;
  }
  return `b'${out}'`;
}

export interface MessageDispatcherOptions {
  registry: ActionRegistry;
  lock: InhibitorLock;
  broker: Pick<BrokerConnection, 'subscribe'>;
  logger: Logger;
  topicPrefix: string;
  /** Consulted before taking the inhibitor on connect; defaults to always. */
  shouldHoldLock?: () => boolean;
}

export class MessageDispatcher {
  constructor(private readonly opts: MessageDispatcherOptions) {}

  topicFor(suffix: string): string {
    return `${this.opts.topicPrefix}/${suffix}`;
  }

  /** Subscribe every action topic, then take the inhibitor lock. */
  async onConnect(): Promise<void> {
    const { registry, broker, logger, lock, shouldHoldLock } = this.opts;
    for (const suffix of registry.suffixes()) {
      const topic = this.topicFor(suffix);
      const action = registry.resolve(suffix);
      logger.info(`subscribing to ${topic}`);
      broker.subscribe(topic, ACTION_QOS);
      logger.debug(`registered MQTT callback for topic ${topic} triggering ${action?.description ?? suffix}`);
    }
    if (shouldHoldLock && !shouldHoldLock()) {
      logger.debug('system preparing for shutdown, not taking the inhibitor lock');
      return;
    }
    await lock.acquire();
  }

  async onMessage(msg: InboundMessage): Promise<void> {
    const { registry, logger, topicPrefix } = this.opts;
    logger.debug(`received topic=${msg.topic} payload=${formatPayload(msg.payload)}`);
    // broker replays the last retained value on subscribe; never act on it
    if (msg.retained) {
      logger.info('ignoring retained message');
      return;
    }
    const prefix = `${topicPrefix}/`;
    const action = msg.topic.startsWith(prefix) ? registry.resolve(msg.topic.slice(prefix.length)) : undefined;
    if (!action) {
      logger.warn(`no action registered for topic ${msg.topic}`);
      return;
    }
    logger.debug(`executing action ${action.name} (${action.description})`);
    try {
      await action.invoke(msg.payload);
    } catch (e) {
      logger.error(`action ${action.name} failed: ${errorMessage(e)}`);
    }
    logger.debug(`completed action ${action.name} (${action.description})`);
  }
}
