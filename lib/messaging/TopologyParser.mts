/**
 * Topology Parser
 *
 * Turns the hub's enumeration bodies (/device, /area, /button,
 * /occupancygroup) into the device list held by the registry. Pure: no I/O.
 */

import { CHANNEL_KINDS, DEVICE_TYPE_TABLE, idFromHref } from '../LeapProtocol.mjs';
import { readHref, readNumber, readRecords, readString, type JsonRecord } from '../utils/guards.mjs';
import { createLogger } from '../utils/Logger.mjs';
import type { Channel, Device } from '../types.mjs';

const logger = createLogger('TopologyParser');

export const UNASSIGNED_AREA = 'unassigned';

/**
 * Raw ReadResponse bodies, as returned by the hub
 */
export interface TopologyBodies {
  devices: JsonRecord;
  areas: JsonRecord;
  buttons: JsonRecord;
  occupancyGroups: JsonRecord;
}

function hrefsOf(record: JsonRecord, key: string): string[] {
  return readRecords(record, key)
    .map((ref) => readString(ref, 'href'))
    .filter((href): href is string => href !== undefined);
}

function areaNames(body: JsonRecord): Map<string, string> {
  const names = new Map<string, string>();
  for (const area of readRecords(body, 'Areas')) {
    const href = readString(area, 'href');
    const name = readString(area, 'Name');
    if (href && name) names.set(href, name);
  }
  return names;
}

/**
 * Buttons grouped by owning device href. A button's parent is either the
 * device itself or one of the device's button groups.
 */
function buttonsByDevice(body: JsonRecord, groupOwners: Map<string, string>): Map<string, JsonRecord[]> {
  const grouped = new Map<string, JsonRecord[]>();
  for (const button of readRecords(body, 'Buttons')) {
    const parent = readHref(button, 'Parent');
    if (!parent) continue;
    const owner = groupOwners.get(parent) ?? parent;
    const list = grouped.get(owner) ?? [];
    list.push(button);
    grouped.set(owner, list);
  }
  return grouped;
}

/**
 * Occupancy group href for each occupancy sensor href
 */
function occupancyGroupsBySensor(body: JsonRecord): Map<string, string> {
  const groups = new Map<string, string>();
  for (const group of readRecords(body, 'OccupancyGroups')) {
    const groupHref = readString(group, 'href');
    if (!groupHref) continue;
    for (const associated of readRecords(group, 'AssociatedSensors')) {
      const sensorHref = readHref(associated, 'OccupancySensor');
      if (sensorHref) groups.set(sensorHref, groupHref);
    }
  }
  return groups;
}

function resolveArea(device: JsonRecord, areas: Map<string, string>): string {
  const areaHref = readHref(device, 'AssociatedArea');
  const named = areaHref ? areas.get(areaHref) : undefined;
  if (named) return named;

  const qualified = device.FullyQualifiedName;
  if (Array.isArray(qualified) && qualified.length > 1 && typeof qualified[0] === 'string') {
    return qualified[0];
  }
  return UNASSIGNED_AREA;
}

/**
 * Build the device list from the enumeration bodies
 *
 * @throws Error when the device body carries no Devices array
 */
export function parseTopology(bodies: TopologyBodies): Device[] {
  if (!Array.isArray(bodies.devices.Devices)) {
    throw new Error('Device enumeration body has no Devices list');
  }

  const areas = areaNames(bodies.areas);
  const rawDevices = readRecords(bodies.devices, 'Devices');

  const groupOwners = new Map<string, string>();
  for (const device of rawDevices) {
    const href = readString(device, 'href');
    if (!href) continue;
    for (const group of hrefsOf(device, 'ButtonGroups')) groupOwners.set(group, href);
  }

  const buttons = buttonsByDevice(bodies.buttons, groupOwners);
  const sensorGroups = occupancyGroupsBySensor(bodies.occupancyGroups);
  const devices: Device[] = [];

  for (const raw of rawDevices) {
    const href = readString(raw, 'href');
    const hubType = readString(raw, 'DeviceType') ?? 'Unknown';
    const type = DEVICE_TYPE_TABLE[hubType];
    if (!href || !type) {
      logger.debug(`Skipping ${href ?? 'device without href'} of type ${hubType}`);
      continue;
    }

    const kind = CHANNEL_KINDS[type];
    let channels: Channel[] = [];

    switch (type) {
      case 'switch':
      case 'dimmer':
      case 'shade':
        channels = hrefsOf(raw, 'LocalZones').map((zoneHref, i) => ({
          index: i + 1,
          kind,
          href: zoneHref,
          controllable: true,
        }));
        break;
      case 'button':
        for (const button of buttons.get(href) ?? []) {
          const buttonHref = readString(button, 'href');
          const number = readNumber(button, 'ButtonNumber');
          if (!buttonHref || number === undefined) continue;
          channels.push({ index: number, kind, href: buttonHref, controllable: false });
        }
        channels.sort((a, b) => a.index - b.index);
        break;
      case 'sensor': {
        const groupHref = hrefsOf(raw, 'OccupancySensors')
          .map((sensorHref) => sensorGroups.get(sensorHref))
          .find((group) => group !== undefined);
        if (groupHref) {
          channels = [{ index: 1, kind, href: groupHref, controllable: false }];
        }
        break;
      }
    }

    if (channels.length === 0) {
      logger.debug(`Skipping device ${href} (${hubType}): no channels`);
      continue;
    }

    devices.push({
      id: idFromHref(href),
      name: readString(raw, 'Name') ?? idFromHref(href),
      type,
      area: resolveArea(raw, areas),
      hubType,
      channels,
    });
  }

  return devices;
}
