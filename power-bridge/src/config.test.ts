import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, it, expect } from 'vitest';
import { loadConfig, validateCredentials } from './config.js';
import { ConfigurationError } from './errors.js';

describe('loadConfig', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });

  function passwordFile(content: string): string {
    const dir = mkdtempSync(path.join(os.tmpdir(), 'power-bridge-'));
    dirs.push(dir);
    const file = path.join(dir, 'password');
    writeFileSync(file, content);
    return file;
  }

  it('fills in defaults', () => {
    expect(loadConfig({ MQTT_HOST: 'broker.test' })).toEqual({
      mqttHost: 'broker.test',
      mqttPort: 8883,
      mqttDisableTls: false,
      mqttTlsCa: undefined,
      mqttTlsRejectUnauthorized: true,
      mqttUsername: undefined,
      mqttPassword: undefined,
      topicPrefix: `systemctl/${os.hostname()}`,
      poweroffDelayMs: 4000,
      controlledSystemUnits: [],
      logLevel: 'info',
      reportTimeoutMs: 2000,
      hostCallTimeoutMs: 10_000,
    });
  });

  it('defaults to the plain port without TLS', () => {
    expect(loadConfig({ MQTT_HOST: 'broker.test', MQTT_DISABLE_TLS: 'yes' }).mqttPort).toBe(1883);
  });

  it('requires a broker host', () => {
    expect(() => loadConfig({ MQTT_HOST: '  ' })).toThrow('MQTT_HOST is required');
  });

  it('rejects malformed booleans', () => {
    expect(() => loadConfig({ MQTT_HOST: 'broker.test', MQTT_DISABLE_TLS: 'maybe' })).toThrow(
      'MQTT_DISABLE_TLS must be a boolean, got "maybe"',
    );
  });

  it('validates the port', () => {
    expect(() => loadConfig({ MQTT_HOST: 'broker.test', MQTT_PORT: 'abc' })).toThrow('MQTT_PORT must be a number >= 1, got "abc"');
    expect(() => loadConfig({ MQTT_HOST: 'broker.test', MQTT_PORT: '70000' })).toThrow('MQTT_PORT out of range: 70000');
    expect(loadConfig({ MQTT_HOST: 'broker.test', MQTT_PORT: '1884' }).mqttPort).toBe(1884);
  });

  it('validates the log level', () => {
    expect(loadConfig({ MQTT_HOST: 'broker.test', LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
    expect(() => loadConfig({ MQTT_HOST: 'broker.test', LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
  });

  it('strips trailing slashes from the topic prefix', () => {
    expect(loadConfig({ MQTT_HOST: 'broker.test', MQTT_TOPIC_PREFIX: 'home/pc//' }).topicPrefix).toBe('home/pc');
    expect(() => loadConfig({ MQTT_HOST: 'broker.test', MQTT_TOPIC_PREFIX: '/' })).toThrow('MQTT_TOPIC_PREFIX must not be empty');
  });

  it('parses the poweroff delay and controlled units', () => {
    const config = loadConfig({
      MQTT_HOST: 'broker.test',
      POWEROFF_DELAY_SECONDS: '1.5',
      CONTROLLED_SYSTEM_UNITS: ' backup.service, ,ddclient.service',
    });
    expect(config.poweroffDelayMs).toBe(1500);
    expect(config.controlledSystemUnits).toEqual(['backup.service', 'ddclient.service']);
  });

  it('reads the password from a file without its trailing newline', () => {
    const file = passwordFile('test-secret\n');
    const config = loadConfig({ MQTT_HOST: 'broker.test', MQTT_USERNAME: 'bridge', MQTT_PASSWORD: 'ignored', MQTT_PASSWORD_FILE: file });
    expect(config.mqttPassword).toBe('test-secret');
  });

  it('fails on a missing password file', () => {
    expect(() => loadConfig({ MQTT_HOST: 'broker.test', MQTT_PASSWORD_FILE: '/nonexistent/password' })).toThrow(
      'MQTT_PASSWORD_FILE not found: /nonexistent/password',
    );
  });

  it('takes the password from the environment otherwise', () => {
    expect(loadConfig({ MQTT_HOST: 'broker.test', MQTT_PASSWORD: 'test-secret' }).mqttPassword).toBe('test-secret');
  });
});

describe('validateCredentials', () => {
  it('rejects a password without a username', () => {
    expect(() => validateCredentials({ mqttPassword: 'test-secret' })).toThrow('MQTT password given without username');
  });

  it('accepts a username alone or with a password', () => {
    expect(() => validateCredentials({ mqttUsername: 'bridge' })).not.toThrow();
    expect(() => validateCredentials({ mqttUsername: 'bridge', mqttPassword: 'test-secret' })).not.toThrow();
  });
});
