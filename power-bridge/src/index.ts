/**
 * Power Bridge
 * ---------------------------------------------
 * Purpose
 * - Let MQTT clients trigger host power actions and observe host shutdowns.
 *
 * Responsibilities
 * - Subscribe to `<prefix>/poweroff`, `/reboot`, `/suspend`, `/lock-all-sessions`,
 *   `/schedule-poweroff`, `/schedule-reboot`, `/cancel-scheduled-shutdown`
 *   and `/unit/system/<unit>/{start,stop,restart}` for controlled units
 * - Call org.freedesktop.login1.Manager / org.freedesktop.systemd1.Manager
 * - Publish `<prefix>/preparing-for-shutdown` (retained) on PrepareForShutdown
 *
 * Environment & Dependencies
 * - MQTT_HOST, MQTT_PORT, MQTT_DISABLE_TLS, MQTT_TLS_CA, MQTT_TLS_REJECT_UNAUTHORIZED
 * - MQTT_USERNAME, MQTT_PASSWORD or MQTT_PASSWORD_FILE
 * - MQTT_TOPIC_PREFIX (default systemctl/<hostname>), POWEROFF_DELAY_SECONDS (default 4)
 * - CONTROLLED_SYSTEM_UNITS, LOG_LEVEL, REPORT_TIMEOUT_MS, HOST_CALL_TIMEOUT_MS
 *
 * Operational Notes
 * - Retained messages on action topics are ignored so a stale poweroff is never replayed.
 * - Needs polkit rules for ScheduleShutdown / Suspend / Inhibit when not running as root.
 */
import dotenv from 'dotenv';
import { loadConfig, SERVICE } from './config.js';
import { closeBus, LoginManager, SystemdManager } from './dbus.js';
import { ConfigurationError, normalizeError } from './errors.js';
import { createLogger } from './logger.js';
import { connectBroker } from './mqtt.js';
import { BridgeRuntime } from './runtime.js';
import { registerShutdown } from './shutdown.js';

dotenv.config();

async function main() {
  const config = loadConfig();
  const logger = createLogger(SERVICE, config.logLevel);
  logger.info('starting...');

  const login = new LoginManager(logger, config.hostCallTimeoutMs);
  const runtime = new BridgeRuntime({
    config,
    host: login,
    signals: login,
    units: config.controlledSystemUnits.length > 0 ? new SystemdManager(config.hostCallTimeoutMs) : undefined,
    logger,
    connectBroker,
  });
  runtime.on('state', (state) => logger.debug(`state -> ${state}`));

  registerShutdown(() => runtime.stop(), logger);
  try {
    await runtime.run();
  } finally {
    closeBus();
  }
}

main().catch((e) => {
  const error = normalizeError(e);
  const prefix = error instanceof ConfigurationError ? 'invalid configuration' : 'fatal';
  console.error(`[${SERVICE}] ${prefix}: ${error.message} (${error.code})`);
  process.exitCode = 1;
});
