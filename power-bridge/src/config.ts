import { existsSync, readFileSync } from 'fs';
import os from 'os';
import { ConfigurationError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';

export const SERVICE = 'power-bridge';

// Inhibitor identity as shown by `systemd-inhibit --list`
export const INHIBITOR_WHO = SERVICE;
export const INHIBITOR_WHY = 'Report shutdown via MQTT';

export interface BridgeConfig {
  mqttHost: string;
  mqttPort: number;
  mqttDisableTls: boolean;
  mqttTlsCa?: string;
  // certificate chain + host name verification
  mqttTlsRejectUnauthorized: boolean;
  mqttUsername?: string;
  mqttPassword?: string;
  topicPrefix: string;
  poweroffDelayMs: number;
  controlledSystemUnits: string[];
  logLevel: LogLevel;
  reportTimeoutMs: number;
  hostCallTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;
  const normalized = raw.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigurationError(`${name} must be a boolean, got "${raw}"`);
}

function readNumber(env: Env, name: string, fallback: number, min = 0): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < min) {
    throw new ConfigurationError(`${name} must be a number >= ${min}, got "${raw}"`);
  }
  return parsed;
}

function readPassword(env: Env): string | undefined {
  const path = readString(env, 'MQTT_PASSWORD_FILE');
  if (!path) return env.MQTT_PASSWORD || undefined;
  if (!existsSync(path)) throw new ConfigurationError(`MQTT_PASSWORD_FILE not found: ${path}`);
  return readFileSync(path, 'utf8').replace(/\r?\n$/, '');
}

/** Parse the bridge settings from the environment. Throws ConfigurationError on malformed values. */
export function loadConfig(env: Env = process.env): BridgeConfig {
  const mqttHost = readString(env, 'MQTT_HOST');
  if (!mqttHost) throw new ConfigurationError('MQTT_HOST is required');

  const mqttDisableTls = readBoolean(env, 'MQTT_DISABLE_TLS', false);
  const mqttPort = readNumber(env, 'MQTT_PORT', mqttDisableTls ? 1883 : 8883, 1);
  if (!Number.isInteger(mqttPort) || mqttPort > 65535) {
    throw new ConfigurationError(`MQTT_PORT out of range: ${mqttPort}`);
  }

  const logLevel = (readString(env, 'LOG_LEVEL') ?? 'info').toLowerCase();
  if (!isLogLevel(logLevel)) throw new ConfigurationError(`LOG_LEVEL must be debug, info, warn or error, got "${logLevel}"`);

  const topicPrefix = (readString(env, 'MQTT_TOPIC_PREFIX') ?? `systemctl/${os.hostname()}`).replace(/\/+$/, '');
  if (!topicPrefix) throw new ConfigurationError('MQTT_TOPIC_PREFIX must not be empty');

  return {
    mqttHost,
    mqttPort,
    mqttDisableTls,
    mqttTlsCa: readString(env, 'MQTT_TLS_CA'),
    mqttTlsRejectUnauthorized: readBoolean(env, 'MQTT_TLS_REJECT_UNAUTHORIZED', true),
    mqttUsername: readString(env, 'MQTT_USERNAME'),
    mqttPassword: readPassword(env),
    topicPrefix,
    poweroffDelayMs: readNumber(env, 'POWEROFF_DELAY_SECONDS', 4) * 1000,
    controlledSystemUnits: (readString(env, 'CONTROLLED_SYSTEM_UNITS') ?? '')
      .split(',')
      .map((unit) => unit.trim())
      .filter((unit) => unit.length > 0),
    logLevel,
    reportTimeoutMs: readNumber(env, 'REPORT_TIMEOUT_MS', 2000, 1),
    hostCallTimeoutMs: readNumber(env, 'HOST_CALL_TIMEOUT_MS', 10_000, 1),
  };
}

/** Broker credentials: a password is meaningless without a username. */
export function validateCredentials(config: Pick<BridgeConfig, 'mqttUsername' | 'mqttPassword'>): void {
  if (config.mqttPassword !== undefined && config.mqttUsername === undefined) {
    throw new ConfigurationError('MQTT password given without username');
  }
}
