/**
 * LEAP Protocol Constants
 *
 * This module defines the communique types, resource URLs, device type table
 * and timing defaults used in the LEAP hub communication.
 */

import { existsSync } from 'node:fs';
import { createRequire } from 'node:module';
import { fileURLToPath } from 'node:url';
import type { ChannelKind, DeviceType } from './types.mjs';

const require = createRequire(import.meta.url);

// Source tree keeps package.json one level up, the compiled tree two.
const manifestPath = ['../package.json', '../../package.json']
  .map((candidate) => fileURLToPath(new URL(candidate, import.meta.url)))
  .find((candidate) => existsSync(candidate));

interface PackageManifest {
  name: string;
  version: string;
  leapBridge?: {
    clientIdPrefix?: string;
    clientTagPrefix?: string;
  };
}

const packageJson: PackageManifest = manifestPath
  ? (require(manifestPath) as PackageManifest)
  : { name: 'leap-mqtt-bridge', version: '0.0.0' };

/**
 * Communique types for LEAP requests and responses
 */
export const COMMUNIQUE_TYPES = {
  READ_REQUEST: 'ReadRequest',
  READ_RESPONSE: 'ReadResponse',
  CREATE_REQUEST: 'CreateRequest',
  CREATE_RESPONSE: 'CreateResponse',
  SUBSCRIBE_REQUEST: 'SubscribeRequest',
  SUBSCRIBE_RESPONSE: 'SubscribeResponse',
  UPDATE_RESPONSE: 'UpdateResponse',
  EXCEPTION_RESPONSE: 'ExceptionResponse',
} as const;

export type CommuniqueType = (typeof COMMUNIQUE_TYPES)[keyof typeof COMMUNIQUE_TYPES];

/** Request communique types */
export type RequestType =
  | typeof COMMUNIQUE_TYPES.READ_REQUEST
  | typeof COMMUNIQUE_TYPES.CREATE_REQUEST
  | typeof COMMUNIQUE_TYPES.SUBSCRIBE_REQUEST;

/**
 * Message body types carried in Header.MessageBodyType
 */
export const BODY_TYPES = {
  ONE_ZONE_STATUS: 'OneZoneStatus',
  MULTIPLE_ZONE_STATUS: 'MultipleZoneStatus',
  ONE_BUTTON_STATUS_EVENT: 'OneButtonStatusEvent',
  MULTIPLE_OCCUPANCY_GROUP_STATUS: 'MultipleOccupancyGroupStatus',
  ONE_PING_RESPONSE: 'OnePingResponse',
  EXCEPTION_DETAIL: 'ExceptionDetail',
} as const;

/**
 * Resource URLs
 */
export const URLS = {
  PING: '/server/1/status/ping',
  DEVICES: '/device',
  AREAS: '/area',
  BUTTONS: '/button',
  OCCUPANCY_GROUPS: '/occupancygroup',
  OCCUPANCY_GROUP_STATUS: '/occupancygroup/status',
  zoneStatus: (zoneHref: string) => `${zoneHref}/status`,
  buttonEvents: (buttonHref: string) => `${buttonHref}/status/event`,
  commandProcessor: (zoneHref: string) => `${zoneHref}/commandprocessor`,
} as const;

/**
 * Zone command types
 */
export const COMMAND_TYPES = {
  GO_TO_LEVEL: 'GoToLevel',
  RAISE: 'Raise',
  LOWER: 'Lower',
  STOP: 'Stop',
} as const;

export type CommandType = (typeof COMMAND_TYPES)[keyof typeof COMMAND_TYPES];

/**
 * Button event types
 */
export const BUTTON_EVENTS = {
  PRESS: 'Press',
  RELEASE: 'Release',
} as const;

/**
 * Occupancy status values
 */
export const OCCUPANCY_STATUS = {
  OCCUPIED: 'Occupied',
  UNOCCUPIED: 'Unoccupied',
} as const;

/**
 * Hub DeviceType → bridge device type. Types missing here are not bridged.
 */
export const DEVICE_TYPE_TABLE: Readonly<Record<string, DeviceType>> = {
  WallSwitch: 'switch',
  PlugInSwitch: 'switch',
  OutdoorPlugInSwitch: 'switch',
  WallDimmer: 'dimmer',
  PlugInDimmer: 'dimmer',
  InLineDimmer: 'dimmer',
  DivaSmartDimmer: 'dimmer',
  WallDimmerWithPreset: 'dimmer',
  SerenaRollerShade: 'shade',
  SerenaHoneycombShade: 'shade',
  TriathlonRollerShade: 'shade',
  TriathlonHoneycombShade: 'shade',
  QsWirelessShade: 'shade',
  Pico1Button: 'button',
  Pico2Button: 'button',
  Pico3Button: 'button',
  Pico3ButtonRaiseLower: 'button',
  Pico4Button: 'button',
  Pico4ButtonScene: 'button',
  RPSOccupancySensor: 'sensor',
  RPSCeilingMountedOccupancySensor: 'sensor',
};

/**
 * Channel kind carried by each device type
 */
export const CHANNEL_KINDS: Readonly<Record<DeviceType, ChannelKind>> = {
  switch: 'switch',
  dimmer: 'level',
  shade: 'shade',
  button: 'button',
  sensor: 'occupancy',
};

/**
 * Client Configuration - from package.json
 */
export const CLIENT_CONFIG = {
  NAME: packageJson.name,
  VERSION: packageJson.version,
  CLIENT_ID_PREFIX: packageJson.leapBridge?.clientIdPrefix ?? packageJson.name,
  CLIENT_TAG_PREFIX: packageJson.leapBridge?.clientTagPrefix ?? 'leap',
} as const;

/**
 * Protocol Configuration
 */
export const PROTOCOL_CONFIG = {
  DEFAULT_PORT: 8081,
  LINE_TERMINATOR: '\r\n',
  TIMEOUTS: {
    CONNECTION: 30000, // 30 seconds
    REQUEST: 5000, // 5 seconds
    COMMAND: 5000, // 5 seconds
    KEEPALIVE: 30000, // 30 seconds
    PING_MAX: 5000, // 5 seconds
  },
  KEEPALIVE_MAX_MISSES: 2,
  BACKOFF: {
    BASE: 1000, // 1 second
    MAX: 60000, // 1 minute
  },
  BUTTONS: {
    DOUBLE_PRESS_WINDOW: 500,
    LONG_PRESS_MAX: 5000,
  },
  LIMITS: {
    LEVEL_MIN: 0,
    LEVEL_MAX: 100,
  },
} as const;

/**
 * Error Codes
 */
export const ERROR_CODES = {
  AUTHENTICATION_FAILED: 'AUTHENTICATION_FAILED',
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
  REQUEST_TIMEOUT: 'REQUEST_TIMEOUT',
  COMMAND_TIMEOUT: 'COMMAND_TIMEOUT',
  COMMAND_REJECTED: 'COMMAND_REJECTED',
  REGISTRY_LOAD_FAILED: 'REGISTRY_LOAD_FAILED',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Error Messages
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ERROR_CODES.AUTHENTICATION_FAILED]: 'Hub rejected the client credentials',
  [ERROR_CODES.TRANSPORT_ERROR]: 'Transport failure',
  [ERROR_CODES.REQUEST_TIMEOUT]: 'Hub did not answer the request in time',
  [ERROR_CODES.COMMAND_TIMEOUT]: 'Hub did not acknowledge the command in time',
  [ERROR_CODES.COMMAND_REJECTED]: 'Hub rejected the command',
  [ERROR_CODES.REGISTRY_LOAD_FAILED]: 'Device enumeration failed',
  [ERROR_CODES.INVALID_CONFIG]: 'Invalid configuration',
};

/**
 * Parse the numeric part of a LEAP status line ("200 OK" → 200)
 */
export function parseStatusCode(status: string | undefined): number | undefined {
  if (!status) return undefined;
  const code = parseInt(status, 10);
  return Number.isNaN(code) ? undefined : code;
}

/**
 * Last path segment of a LEAP href ("/device/12" → "12")
 */
export function idFromHref(href: string): string {
  const parts = href.split('/').filter((part) => part.length > 0);
  return parts[parts.length - 1] ?? href;
}
