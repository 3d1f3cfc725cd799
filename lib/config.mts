/**
 * Process configuration
 *
 * Read once from the environment at startup (main loads an optional .env
 * through dotenv first) and frozen.
 */

import { randomBytes } from 'node:crypto';
import { CLIENT_CONFIG, PROTOCOL_CONFIG } from './LeapProtocol.mjs';
import { ConfigError } from './errors.mjs';
import { isLogLevel } from './utils/Logger.mjs';
import type { BridgeConfig } from './types.mjs';

type Env = Record<string, string | undefined>;

const DEFAULT_MQTT_URL = 'mqtt://127.0.0.1:1883';
const DEFAULT_TOPIC_PREFIX = 'leap';

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function required(env: Env, name: string): string {
  const value = optional(env, name);
  if (value === undefined) {
    throw new ConfigError(`${name} is required`);
  }
  return value;
}

function integer(env: Env, name: string, fallback: number, min: number = 1): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be a whole number, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min) {
    throw new ConfigError(`${name} must be at least ${min}, got ${value}`);
  }
  return value;
}

function flag(env: Env, name: string, fallback: boolean): boolean {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigError(`${name} must be true or false, got "${raw}"`);
  }
}

function topicPrefix(env: Env): string {
  const prefix = optional(env, 'TOPIC_PREFIX') ?? DEFAULT_TOPIC_PREFIX;
  if (/[+#]/.test(prefix) || prefix.split('/').some((level) => level.length === 0)) {
    throw new ConfigError(`TOPIC_PREFIX must not contain wildcards or empty levels, got "${prefix}"`);
  }
  return prefix;
}

function mqttUrl(env: Env): string {
  const url = optional(env, 'MQTT_URL') ?? DEFAULT_MQTT_URL;
  let protocol: string;
  try {
    protocol = new URL(url).protocol;
  } catch {
    throw new ConfigError(`MQTT_URL is not a valid URL: "${url}"`);
  }
  if (!['mqtt:', 'mqtts:', 'ws:', 'wss:', 'tcp:', 'ssl:'].includes(protocol)) {
    throw new ConfigError(`MQTT_URL has unsupported protocol "${protocol}"`);
  }
  return url;
}

/**
 * Build the configuration from environment variables
 *
 * @throws ConfigError on a missing or invalid value
 */
export function loadConfig(env: Env = process.env): BridgeConfig {
  const logLevel = optional(env, 'LOG_LEVEL')?.toLowerCase() ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
  }

  const backoffBase = integer(env, 'BACKOFF_BASE_MS', PROTOCOL_CONFIG.BACKOFF.BASE);
  const backoffMax = integer(env, 'BACKOFF_MAX_MS', PROTOCOL_CONFIG.BACKOFF.MAX);
  if (backoffMax < backoffBase) {
    throw new ConfigError('BACKOFF_MAX_MS must not be smaller than BACKOFF_BASE_MS');
  }

  const config: BridgeConfig = {
    hub: {
      host: required(env, 'HUB_HOST'),
      port: integer(env, 'HUB_PORT', PROTOCOL_CONFIG.DEFAULT_PORT),
      clientCertPath: required(env, 'HUB_CLIENT_CERT'),
      clientKeyPath: required(env, 'HUB_CLIENT_KEY'),
      caCertPath: required(env, 'HUB_CA_CERT'),
      verifyHostname: flag(env, 'HUB_VERIFY_HOSTNAME', false),
    },
    broker: {
      url: mqttUrl(env),
      clientId:
        optional(env, 'MQTT_CLIENT_ID') ??
        `${CLIENT_CONFIG.CLIENT_ID_PREFIX}-${randomBytes(4).toString('hex')}`,
      username: optional(env, 'MQTT_USERNAME'),
      password: optional(env, 'MQTT_PASSWORD'),
      tlsCaPath: optional(env, 'MQTT_TLS_CA'),
      tlsCertPath: optional(env, 'MQTT_TLS_CERT'),
      tlsKeyPath: optional(env, 'MQTT_TLS_KEY'),
      rejectUnauthorized: flag(env, 'MQTT_TLS_REJECT_UNAUTHORIZED', true),
    },
    topicPrefix: topicPrefix(env),
    logLevel,
    timing: {
      commandTimeout: integer(env, 'COMMAND_TIMEOUT_MS', PROTOCOL_CONFIG.TIMEOUTS.COMMAND),
      connectTimeout: integer(env, 'CONNECT_TIMEOUT_MS', PROTOCOL_CONFIG.TIMEOUTS.CONNECTION),
      keepaliveInterval: integer(env, 'KEEPALIVE_INTERVAL_MS', PROTOCOL_CONFIG.TIMEOUTS.KEEPALIVE),
      backoffBase,
      backoffMax,
      doublePressWindow: integer(
        env,
        'DOUBLE_PRESS_WINDOW_MS',
        PROTOCOL_CONFIG.BUTTONS.DOUBLE_PRESS_WINDOW
      ),
      longPressMax: integer(env, 'LONG_PRESS_MAX_MS', PROTOCOL_CONFIG.BUTTONS.LONG_PRESS_MAX),
    },
  };

  return Object.freeze({
    ...config,
    hub: Object.freeze(config.hub),
    broker: Object.freeze(config.broker),
    timing: Object.freeze(config.timing),
  });
}

/**
 * Keepalive ping timeout: half the interval, at most PING_MAX
 */
export function pingTimeout(keepaliveInterval: number): number {
  return Math.min(PROTOCOL_CONFIG.TIMEOUTS.PING_MAX, Math.floor(keepaliveInterval / 2));
}
