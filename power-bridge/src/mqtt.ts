import { connect, type IClientOptions } from 'mqtt';
import { existsSync, readFileSync } from 'fs';
import type { BridgeConfig } from './config.js';
import type { Logger } from './logger.js';
import type { BrokerConnection, InboundMessage, QoS } from './types.js';

/** The slice of mqtt's MqttClient the bridge drives. */
export interface MqttClientLike {
  on(event: 'connect', listener: () => void): unknown;
  on(event: 'reconnect', listener: () => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'message', listener: (topic: string, payload: Buffer, packet: { retain: boolean }) => void): unknown;
  subscribe(topic: string, options: { qos: QoS }, callback: (err: Error | null) => void): unknown;
  publish(topic: string, payload: string, options: { qos: QoS; retain: boolean }, callback: (err?: Error) => void): unknown;
  end(force: boolean, options: Record<string, never>, callback: () => void): unknown;
}

export type MqttConnect = (url: string, options: IClientOptions) => MqttClientLike;

export function brokerUrl(config: Pick<BridgeConfig, 'mqttHost' | 'mqttPort' | 'mqttDisableTls'>): string {
  const scheme = config.mqttDisableTls ? 'mqtt' : 'mqtts';
  return `${scheme}://${config.mqttHost}:${config.mqttPort}`;
}

export function buildClientOptions(config: BridgeConfig, logger: Logger): IClientOptions {
  // Only consider TLS materials when TLS is on to avoid accidental TLS on mqtt://
  const usingTls = !config.mqttDisableTls;
  const ca = usingTls && config.mqttTlsCa && existsSync(config.mqttTlsCa) ? readFileSync(config.mqttTlsCa) : undefined;
  if (usingTls && config.mqttTlsCa && !ca) logger.warn(`WARNING: MQTT_TLS_CA path set but file not found: ${config.mqttTlsCa}`);

  return {
    username: config.mqttUsername,
    password: config.mqttPassword,
    reconnectPeriod: 2000,
    clean: true,
    ca,
    // node:tls checks the certificate chain and the host name together
    rejectUnauthorized: config.mqttTlsRejectUnauthorized,
  };
}

/** Wrap the mqtt client as the bridge's BrokerConnection. */
export function wrapMqttClient(client: MqttClientLike, logger: Logger): BrokerConnection {
  client.on('error', (err) => logger.error(`mqtt error: ${err.message}`));
  client.on('reconnect', () => logger.info('mqtt reconnecting...'));
  client.on('close', () => logger.warn('mqtt connection closed'));

  return {
    onConnect(listener) {
      client.on('connect', () => listener());
    },
    onMessage(listener) {
      client.on('message', (topic, payload, packet) => {
        const message: InboundMessage = { topic, payload, retained: packet.retain };
        listener(message);
      });
    },
    subscribe(topic, qos) {
      client.subscribe(topic, { qos }, (err) => {
        if (err) logger.error(`subscribe error for ${topic}: ${err.message}`);
      });
    },
    publish(topic, payload, options) {
      return new Promise((resolve, reject) => {
        client.publish(topic, payload, options, (err) => (err ? reject(err) : resolve()));
      });
    },
    end() {
      return new Promise((resolve) => {
        client.end(false, {}, () => resolve());
      });
    },
  };
}

export function connectBroker(config: BridgeConfig, logger: Logger, connectFn: MqttConnect = connect): BrokerConnection {
  const url = brokerUrl(config);
  const options = buildClientOptions(config, logger);
  // Log effective MQTT settings for diagnostics (avoid secrets)
  logger.debug(
    `MQTT config: url=${url} ca=${config.mqttTlsCa || 'unset'} user=${config.mqttUsername || 'unset'} rejectUnauthorized=${config.mqttTlsRejectUnauthorized}`,
  );
  return wrapMqttClient(connectFn(url, options), logger);
}
