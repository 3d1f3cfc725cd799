/**
 * Message Handler for LEAP status communiques
 *
 * Converts zone, button and occupancy status bodies into normalized
 * InboundHubEvents. Hrefs the registry does not know are dropped.
 */

import {
  BODY_TYPES,
  BUTTON_EVENTS,
  OCCUPANCY_STATUS,
} from '../LeapProtocol.mjs';
import { readHref, readNumber, readRecord, readRecords, readString, type JsonRecord } from '../utils/guards.mjs';
import { createLogger } from '../utils/Logger.mjs';
import { zoneStatusToValue } from '../utils/ValueConverters.mjs';
import type {
  ChannelRef,
  ChannelValue,
  HubEventSource,
  InboundHubEvent,
  LeapMessage,
} from '../types.mjs';

const logger = createLogger('MessageHandler');

// ============================================================================
// Module-specific Types
// ============================================================================

/**
 * Looks up the channels behind a hub href (zone, button or occupancy group)
 */
export interface ChannelResolver {
  resolveHref(href: string): readonly ChannelRef[];
}

// ============================================================================
// MessageHandler Class
// ============================================================================

export class MessageHandler {
  private resolver: ChannelResolver;
  private now: () => number;

  constructor(resolver: ChannelResolver, now: () => number = Date.now) {
    this.resolver = resolver;
    this.now = now;
  }

  /**
   * Convert a status communique into events. Anything that is not a status
   * body yields an empty list.
   */
  toEvents(message: LeapMessage, source: HubEventSource = 'hub-push'): InboundHubEvent[] {
    const body = message.Body;
    if (!body) return [];

    switch (message.Header.MessageBodyType) {
      case BODY_TYPES.ONE_ZONE_STATUS: {
        const status = readRecord(body, 'ZoneStatus');
        return status ? this.zoneEvents(status, source) : [];
      }
      case BODY_TYPES.MULTIPLE_ZONE_STATUS:
        return readRecords(body, 'ZoneStatuses').flatMap((status) => this.zoneEvents(status, source));
      case BODY_TYPES.ONE_BUTTON_STATUS_EVENT: {
        const status = readRecord(body, 'ButtonStatus');
        return status ? this.buttonEvents(status, source) : [];
      }
      case BODY_TYPES.MULTIPLE_OCCUPANCY_GROUP_STATUS:
        return readRecords(body, 'OccupancyGroupStatuses').flatMap((status) =>
          this.occupancyEvents(status, source)
        );
      default:
        return [];
    }
  }

  // ============================================================================
  // Body Handlers
  // ============================================================================

  private zoneEvents(status: JsonRecord, source: HubEventSource): InboundHubEvent[] {
    const href = readHref(status, 'Zone');
    if (!href) return [];

    const level = readNumber(status, 'Level');
    const switchedLevel = readString(status, 'SwitchedLevel');
    return this.emit(href, source, (ref) => zoneStatusToValue(ref.kind, level, switchedLevel));
  }

  private buttonEvents(status: JsonRecord, source: HubEventSource): InboundHubEvent[] {
    const href = readHref(status, 'Button');
    const eventType = readString(readRecord(status, 'ButtonEvent') ?? {}, 'EventType');
    if (!href) return [];

    let value: ChannelValue;
    if (eventType === BUTTON_EVENTS.PRESS) {
      value = 'PRESS';
    } else if (eventType === BUTTON_EVENTS.RELEASE) {
      value = 'RELEASE';
    } else {
      logger.debug(`Ignoring button event ${eventType ?? 'without type'} on ${href}`);
      return [];
    }
    return this.emit(href, source, (ref) => (ref.kind === 'button' ? value : undefined));
  }

  private occupancyEvents(status: JsonRecord, source: HubEventSource): InboundHubEvent[] {
    const href = readHref(status, 'OccupancyGroup');
    const occupancy = readString(status, 'OccupancyStatus');
    if (!href) return [];

    let value: ChannelValue;
    if (occupancy === OCCUPANCY_STATUS.OCCUPIED) {
      value = 'OCCUPIED';
    } else if (occupancy === OCCUPANCY_STATUS.UNOCCUPIED) {
      value = 'UNOCCUPIED';
    } else {
      return [];
    }
    return this.emit(href, source, (ref) => (ref.kind === 'occupancy' ? value : undefined));
  }

  private emit(
    href: string,
    source: HubEventSource,
    valueFor: (ref: ChannelRef) => ChannelValue | undefined
  ): InboundHubEvent[] {
    const refs = this.resolver.resolveHref(href);
    if (refs.length === 0) {
      logger.debug(`No registered channel for ${href}`);
      return [];
    }

    const observedAt = this.now();
    const events: InboundHubEvent[] = [];
    for (const ref of refs) {
      const value = valueFor(ref);
      if (value === undefined) continue;
      events.push({ deviceId: ref.deviceId, channel: ref.channel, value, source, observedAt });
    }
    return events;
  }
}
