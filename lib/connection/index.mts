/**
 * Connection - Public API
 *
 * Barrel exports for the hub and broker sessions and their transports.
 */

export {
  HubSession,
  type DeviceDirectory,
  type HubSessionOptions,
  type OnDegradedFn,
} from './HubSession.mjs';

export {
  LeapConnection,
  classifyHubError,
  encodeLeapMessage,
  parseLeapLine,
  type LeapTransport,
  type LeapTransportFactory,
  type OnLeapCloseFn,
  type OnLeapMessageFn,
} from './LeapConnection.mjs';

export { BrokerSession } from './BrokerSession.mjs';

export {
  buildClientOptions,
  createMqttTransport,
  type BrokerTransport,
  type BrokerTransportFactory,
  type PublishOptions,
  type QoS,
  type WillMessage,
} from './MqttTransport.mjs';
