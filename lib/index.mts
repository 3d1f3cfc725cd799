/**
 * LEAP MQTT Bridge Library - Public API
 *
 * Import from here to embed the bridge or reuse its pieces.
 */

// =============================================================================
// Types (from central types.mts)
// =============================================================================
export type {
  // Configuration
  BridgeConfig,
  BrokerConfig,
  HubConfig,
  TimingConfig,
  LogLevel,
  // Wire
  LeapHeader,
  LeapMessage,
  // Devices
  Channel,
  ChannelKind,
  ChannelRef,
  Device,
  DeviceType,
  // State
  ButtonValue,
  ChannelState,
  ChannelValue,
  InboundHubEvent,
  OccupancyValue,
  // Commands
  BrokerCommand,
  CommandAck,
  CommandValue,
  OutboundCommand,
  ShadeMotion,
  // Connection
  ConnectionHealth,
  SessionState,
  // Diagnostics
  ButtonGesture,
  Diagnostic,
  DiagnosticCallback,
  DiagnosticCode,
} from './types.mjs';

// =============================================================================
// Constants
// =============================================================================
export {
  BODY_TYPES,
  CLIENT_CONFIG,
  COMMAND_TYPES,
  COMMUNIQUE_TYPES,
  DEVICE_TYPE_TABLE,
  ERROR_CODES,
  PROTOCOL_CONFIG,
  URLS,
} from './LeapProtocol.mjs';

// =============================================================================
// Errors & configuration
// =============================================================================
export {
  AuthError,
  BridgeError,
  CommandRejected,
  CommandTimeout,
  ConfigError,
  RegistryLoadError,
  TransportError,
} from './errors.mjs';
export { loadConfig } from './config.mjs';

// =============================================================================
// Modules
// =============================================================================
export { EventBridge, type BridgeHealth, type EventBridgeDependencies } from './EventBridge.mjs';
export * from './connection/index.mjs';
export * from './crypto/index.mjs';
export * from './messaging/index.mjs';
export * from './registry/index.mjs';
export * from './router/index.mjs';
export * from './state/index.mjs';
export * from './supervisor/index.mjs';
export * from './utils/index.mjs';
