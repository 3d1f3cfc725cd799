/**
 * LEAP MQTT Bridge - Shared TypeScript Interfaces
 *
 * This file contains all shared type definitions used across the application.
 * All modules should import types from here to avoid duplication.
 */

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Hub connection settings
 */
export interface HubConfig {
  host: string;
  port: number;
  /** Paths to the PEM files issued when pairing with the hub */
  clientCertPath: string;
  clientKeyPath: string;
  caCertPath: string;
  verifyHostname: boolean;
}

/**
 * Broker connection settings
 */
export interface BrokerConfig {
  url: string;
  clientId: string;
  username?: string;
  password?: string;
  tlsCaPath?: string;
  tlsCertPath?: string;
  tlsKeyPath?: string;
  rejectUnauthorized: boolean;
}

/**
 * Timing configuration, all values in ms
 */
export interface TimingConfig {
  commandTimeout: number;
  connectTimeout: number;
  keepaliveInterval: number;
  backoffBase: number;
  backoffMax: number;
  doublePressWindow: number;
  longPressMax: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Complete process configuration, immutable once loaded
 */
export interface BridgeConfig {
  hub: HubConfig;
  broker: BrokerConfig;
  topicPrefix: string;
  logLevel: LogLevel;
  timing: TimingConfig;
}

// =============================================================================
// LEAP Wire Types
// =============================================================================

export interface LeapHeader {
  Url?: string;
  ClientTag?: string;
  /** e.g. "200 OK" */
  StatusCode?: string;
  MessageBodyType?: string;
}

/**
 * One communique, as framed on a single line
 */
export interface LeapMessage {
  CommuniqueType: string;
  Header: LeapHeader;
  Body?: Record<string, unknown>;
}

// =============================================================================
// Device Types
// =============================================================================

export type DeviceType = 'switch' | 'dimmer' | 'shade' | 'button' | 'sensor';

export type ChannelKind = 'switch' | 'level' | 'shade' | 'button' | 'occupancy';

/**
 * One controllable or observable sub-element of a device
 */
export interface Channel {
  index: number;
  kind: ChannelKind;
  /** Hub resource the channel maps to (zone, button or occupancy group) */
  href: string;
  controllable: boolean;
}

/**
 * Device as known to the registry
 */
export interface Device {
  id: string;
  name: string;
  type: DeviceType;
  area: string;
  /** Raw DeviceType reported by the hub */
  hubType: string;
  channels: readonly Channel[];
}

/**
 * Channel located on a device, resolved from a hub href
 */
export interface ChannelRef {
  deviceId: string;
  channel: number;
  kind: ChannelKind;
}

// =============================================================================
// State Types
// =============================================================================

export type ButtonValue = 'PRESS' | 'RELEASE';
export type OccupancyValue = 'OCCUPIED' | 'UNOCCUPIED';

/** Switch state, level/position percentage, or enumerated position */
export type ChannelValue = boolean | number | ButtonValue | OccupancyValue;

/**
 * Last-known-good state of one channel
 */
export interface ChannelState {
  deviceId: string;
  channel: number;
  value: ChannelValue;
  updatedAt: number;
}

export type HubEventSource = 'hub-push' | 'command-ack';

/**
 * Normalized notification from the hub
 */
export interface InboundHubEvent {
  deviceId: string;
  channel: number;
  value: ChannelValue;
  source: HubEventSource;
  observedAt: number;
}

// =============================================================================
// Command Types
// =============================================================================

export type ShadeMotion = 'OPEN' | 'CLOSE' | 'STOP' | 'RAISE' | 'LOWER';

/** Value requested on a command topic */
export type CommandValue = boolean | number | ShadeMotion;

/**
 * Command parsed from a broker message
 */
export interface BrokerCommand {
  topic: string;
  area: string;
  deviceId: string;
  channel: number;
  value: CommandValue;
}

export type CommandOrigin = 'mqtt-command' | 'internal';

/**
 * Control request handed to the hub session
 */
export interface OutboundCommand {
  deviceId: string;
  channel: number;
  value: CommandValue;
  originating: CommandOrigin;
}

/**
 * Acknowledgement of an issued command
 */
export interface CommandAck {
  deviceId: string;
  channel: number;
  statusCode: number;
}

// =============================================================================
// Connection Types
// =============================================================================

/**
 * Supervised session states
 */
export type SessionState =
  | 'disconnected'
  | 'connecting'
  | 'authenticated'
  | 'ready'
  | 'degraded';

/**
 * Health record kept per session
 */
export interface ConnectionHealth {
  state: SessionState;
  lastActivity: number | null;
  consecutiveFailures: number;
}

// =============================================================================
// Diagnostics
// =============================================================================

export type DiagnosticCode =
  | 'MALFORMED_COMMAND'
  | 'UNKNOWN_DEVICE_COMMAND'
  | 'COMMAND_TIMEOUT'
  | 'COMMAND_FAILED';

/**
 * Non-fatal condition reported while routing events
 */
export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  topic?: string;
  deviceId?: string;
}

export type DiagnosticCallback = (diagnostic: Diagnostic) => void;

/**
 * Button gestures derived from press/release sequences
 */
export type ButtonGesture = 'single' | 'double' | 'long_press' | 'long_release';
