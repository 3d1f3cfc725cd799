/**
 * MQTT transport
 *
 * Adapts an mqtt.js client to the small interface the broker session uses.
 * Automatic reconnection is disabled: the session supervisor owns retries.
 */

import { existsSync, readFileSync } from 'node:fs';
import { connectAsync, type IClientOptions, type MqttClient } from 'mqtt';
import { TransportError, describeError } from '../errors.mjs';
import { createLogger } from '../utils/Logger.mjs';
import type { BrokerConfig } from '../types.mjs';

const logger = createLogger('MqttTransport');

// ============================================================================
// Transport Contract
// ============================================================================

export type QoS = 0 | 1 | 2;

export interface PublishOptions {
  qos: QoS;
  retain: boolean;
}

export interface WillMessage {
  topic: string;
  payload: string;
  retain: boolean;
}

export type OnBrokerMessageFn = (topic: string, payload: Buffer) => void;
export type OnBrokerCloseFn = () => void;

/**
 * What the broker session needs from an MQTT client
 */
export interface BrokerTransport {
  publish(topic: string, payload: string, options: PublishOptions): Promise<void>;
  subscribe(filter: string, qos: QoS): Promise<void>;
  setOnMessage(callback: OnBrokerMessageFn): void;
  setOnClose(callback: OnBrokerCloseFn): void;
  end(): Promise<void>;
}

export type BrokerTransportFactory = (will: WillMessage) => Promise<BrokerTransport>;

// ============================================================================
// mqtt.js Adapter
// ============================================================================

function readOptionalFile(path: string | undefined, label: string): Buffer | undefined {
  if (!path) return undefined;
  if (!existsSync(path)) {
    logger.warn(`WARNING: ${label} path set but file not found: ${path}`);
    return undefined;
  }
  return readFileSync(path);
}

/**
 * Build the mqtt.js options for a broker configuration
 */
export function buildClientOptions(config: BrokerConfig, will: WillMessage): IClientOptions {
  const usingTls = /^(mqtts|wss|ssl):/.test(config.url);
  const options: IClientOptions = {
    clientId: config.clientId,
    username: config.username,
    password: config.password,
    reconnectPeriod: 0,
    clean: true,
    will: { topic: will.topic, payload: Buffer.from(will.payload), qos: 1, retain: will.retain },
  };

  if (usingTls) {
    options.ca = readOptionalFile(config.tlsCaPath, 'MQTT_TLS_CA');
    options.cert = readOptionalFile(config.tlsCertPath, 'MQTT_TLS_CERT');
    options.key = readOptionalFile(config.tlsKeyPath, 'MQTT_TLS_KEY');
    options.rejectUnauthorized = config.rejectUnauthorized;
  }
  return options;
}

/**
 * Factory producing connected mqtt.js transports
 */
export function createMqttTransport(config: BrokerConfig): BrokerTransportFactory {
  return async (will) => {
    logger.info(`Connecting to ${config.url} as ${config.clientId}`);

    let client: MqttClient;
    try {
      client = await connectAsync(config.url, buildClientOptions(config, will), false);
    } catch (error) {
      throw new TransportError(`MQTT connection failed: ${describeError(error)}`, error);
    }

    let onMessage: OnBrokerMessageFn | undefined;
    let onClose: OnBrokerCloseFn | undefined;

    client.on('message', (topic, payload) => onMessage?.(topic, payload));
    client.on('error', (error) => logger.error(`mqtt error: ${error.message}`));
    client.on('close', () => onClose?.());

    return {
      async publish(topic, payload, options) {
        await client.publishAsync(topic, payload, options);
      },
      async subscribe(filter, qos) {
        const grants = await client.subscribeAsync(filter, { qos });
        if (grants.some((grant) => grant.qos === 128)) {
          throw new TransportError(`Broker refused subscription to ${filter}`);
        }
      },
      setOnMessage(callback) {
        onMessage = callback;
      },
      setOnClose(callback) {
        onClose = callback;
      },
      async end() {
        await client.endAsync();
      },
    };
  };
}
