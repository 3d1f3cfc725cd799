/**
 * Topic Codec
 *
 * Topic layout:
 *   <prefix>/<area>/<device>/<channel>/state    retained channel value
 *   <prefix>/<area>/<device>/<channel>/set      command (subscribed)
 *   <prefix>/<area>/<device>/<button>/action    button gesture
 *   <prefix>/bridge/availability                online/offline
 *   <prefix>/bridge/hub                         hub session online/offline
 *
 * Parsing is total: every topic/payload pair yields a command or a reason.
 */

import { decodeCommandPayload } from '../utils/ValueConverters.mjs';
import type { BrokerCommand } from '../types.mjs';

export type ParseResult = { ok: true; command: BrokerCommand } | { ok: false; reason: string };

/**
 * Area label as a topic level
 *
 * @example
 * topicSegment('Living Room') // 'living-room'
 */
export function topicSegment(label: string): string {
  const slug = label.toLowerCase().replace(/[^a-z0-9_-]+/g, '-');
  return slug.length > 0 ? slug : '-';
}

export function stateTopic(prefix: string, area: string, deviceId: string, channel: number): string {
  return `${prefix}/${topicSegment(area)}/${deviceId}/${channel}/state`;
}

export function actionTopic(prefix: string, area: string, deviceId: string, button: number): string {
  return `${prefix}/${topicSegment(area)}/${deviceId}/${button}/action`;
}

export function commandSubscription(prefix: string): string {
  return `${prefix}/+/+/+/set`;
}

export function availabilityTopic(prefix: string): string {
  return `${prefix}/bridge/availability`;
}

export function hubStatusTopic(prefix: string): string {
  return `${prefix}/bridge/hub`;
}

/**
 * Parse a command message
 */
export function parseCommand(prefix: string, topic: string, payload: string): ParseResult {
  if (!topic.startsWith(`${prefix}/`)) {
    return { ok: false, reason: `topic outside prefix ${prefix}` };
  }

  const levels = topic.slice(prefix.length + 1).split('/');
  if (levels.length !== 4 || levels[3] !== 'set') {
    return { ok: false, reason: 'expected <area>/<device>/<channel>/set' };
  }

  const [area, deviceId, channelLevel] = levels;
  if (!area || !deviceId) {
    return { ok: false, reason: 'empty area or device level' };
  }
  if (!channelLevel || !/^\d+$/.test(channelLevel)) {
    return { ok: false, reason: `invalid channel "${channelLevel ?? ''}"` };
  }

  const value = decodeCommandPayload(payload);
  if (value === undefined) {
    return { ok: false, reason: `unrecognised payload "${payload.slice(0, 32)}"` };
  }

  return {
    ok: true,
    command: { topic, area, deviceId, channel: parseInt(channelLevel, 10), value },
  };
}
