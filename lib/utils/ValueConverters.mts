/**
 * Value Converters for hub ↔ MQTT
 *
 * The hub reports zone levels as 0-100 (shades: 100 is fully open).
 * MQTT payloads use ON/OFF for switches, integer percentages for levels
 * and upper-case tokens for enumerated positions.
 */

import { COMMAND_TYPES, PROTOCOL_CONFIG, type CommandType } from '../LeapProtocol.mjs';
import type { ChannelKind, ChannelValue, CommandValue, ShadeMotion } from '../types.mjs';

const SHADE_MOTIONS: readonly ShadeMotion[] = ['OPEN', 'CLOSE', 'STOP', 'RAISE', 'LOWER'];

/**
 * Level command for a zone, or a motion command for shades
 */
export type HubAction =
  | { command: typeof COMMAND_TYPES.GO_TO_LEVEL; level: number }
  | { command: Exclude<CommandType, typeof COMMAND_TYPES.GO_TO_LEVEL> };

/**
 * Validate that a level is within the hub's range
 */
export function isValidLevel(value: number): boolean {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    return false;
  }
  return value >= PROTOCOL_CONFIG.LIMITS.LEVEL_MIN && value <= PROTOCOL_CONFIG.LIMITS.LEVEL_MAX;
}

/**
 * Clamp and round a level to 0-100
 */
export function clampLevel(value: number): number {
  if (Number.isNaN(value)) {
    throw new TypeError('Level must be a number');
  }
  return Math.max(
    PROTOCOL_CONFIG.LIMITS.LEVEL_MIN,
    Math.min(PROTOCOL_CONFIG.LIMITS.LEVEL_MAX, Math.round(value))
  );
}

/**
 * Convert a zone status to the channel value for its kind
 *
 * @param switchedLevel - "On"/"Off", reported by some switches instead of a level
 * @returns undefined when the status carries nothing usable for the kind
 */
export function zoneStatusToValue(
  kind: ChannelKind,
  level: number | undefined,
  switchedLevel?: string
): ChannelValue | undefined {
  if (kind === 'switch') {
    if (switchedLevel !== undefined) return switchedLevel.toLowerCase() === 'on';
    return level === undefined ? undefined : level > 0;
  }
  if (kind === 'level' || kind === 'shade') {
    return level === undefined ? undefined : clampLevel(level);
  }
  return undefined;
}

/**
 * Encode a channel value as an MQTT payload
 *
 * @example
 * encodePayload(true) // 'ON'
 * encodePayload(42.4) // '42'
 * encodePayload('PRESS') // 'PRESS'
 */
export function encodePayload(value: ChannelValue): string {
  if (typeof value === 'boolean') return value ? 'ON' : 'OFF';
  if (typeof value === 'number') return String(Math.round(value));
  return value;
}

/**
 * Decode a command payload. Total: anything unrecognised yields undefined.
 *
 * @example
 * decodeCommandPayload('on')   // true
 * decodeCommandPayload('75')   // 75
 * decodeCommandPayload('Stop') // 'STOP'
 * decodeCommandPayload('101')  // undefined
 */
export function decodeCommandPayload(payload: string): CommandValue | undefined {
  const token = payload.trim().toUpperCase();
  if (token === 'ON') return true;
  if (token === 'OFF') return false;
  if (/^\d{1,3}$/.test(token)) {
    const level = parseInt(token, 10);
    return isValidLevel(level) ? level : undefined;
  }
  return SHADE_MOTIONS.find((motion) => motion === token);
}

/**
 * Map a requested value onto the hub command for a channel kind.
 * Returns undefined when the value makes no sense for the channel.
 */
export function toHubAction(kind: ChannelKind, value: CommandValue): HubAction | undefined {
  const goTo = (level: number): HubAction => ({ command: COMMAND_TYPES.GO_TO_LEVEL, level });

  switch (kind) {
    case 'switch':
      if (typeof value === 'boolean') return goTo(value ? 100 : 0);
      if (typeof value === 'number') return goTo(value > 0 ? 100 : 0);
      return undefined;
    case 'level':
      if (typeof value === 'boolean') return goTo(value ? 100 : 0);
      if (typeof value === 'number') return goTo(clampLevel(value));
      return undefined;
    case 'shade':
      if (typeof value === 'number') return goTo(clampLevel(value));
      if (value === 'OPEN') return goTo(100);
      if (value === 'CLOSE') return goTo(0);
      if (value === 'STOP') return { command: COMMAND_TYPES.STOP };
      if (value === 'RAISE') return { command: COMMAND_TYPES.RAISE };
      if (value === 'LOWER') return { command: COMMAND_TYPES.LOWER };
      return undefined;
    case 'button':
    case 'occupancy':
      return undefined;
  }
}
