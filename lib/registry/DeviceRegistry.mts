/**
 * Device Registry
 *
 * Holds the device snapshot enumerated from the hub. A load builds a
 * complete new snapshot before swapping it in; readers holding the previous
 * snapshot keep a consistent view of it.
 */

import { AuthError, describeError, RegistryLoadError } from '../errors.mjs';
import type { ChannelResolver } from '../messaging/MessageHandler.mjs';
import { parseTopology, type TopologyBodies } from '../messaging/TopologyParser.mjs';
import { createLogger } from '../utils/Logger.mjs';
import type { Channel, ChannelRef, Device } from '../types.mjs';

const logger = createLogger('DeviceRegistry');

/**
 * Anything able to enumerate the hub topology (the hub session)
 */
export interface DeviceSource {
  readTopology(): Promise<TopologyBodies>;
}

export type LookupResult = { found: true; device: Device } | { found: false };

/**
 * Immutable registry snapshot
 */
export interface RegistrySnapshot {
  readonly version: number;
  readonly devices: ReadonlyMap<string, Device>;
  readonly hrefs: ReadonlyMap<string, readonly ChannelRef[]>;
}

const EMPTY_SNAPSHOT: RegistrySnapshot = {
  version: 0,
  devices: new Map(),
  hrefs: new Map(),
};

function buildSnapshot(devices: readonly Device[], version: number): RegistrySnapshot {
  const byId = new Map<string, Device>();
  const hrefs = new Map<string, ChannelRef[]>();

  for (const device of devices) {
    if (byId.has(device.id)) {
      throw new RegistryLoadError(`Duplicate device id ${device.id}`);
    }
    const frozen: Device = Object.freeze({
      ...device,
      channels: Object.freeze(device.channels.map((channel) => Object.freeze({ ...channel }))),
    });
    byId.set(device.id, frozen);

    for (const channel of frozen.channels) {
      const refs = hrefs.get(channel.href) ?? [];
      refs.push({ deviceId: device.id, channel: channel.index, kind: channel.kind });
      hrefs.set(channel.href, refs);
    }
  }

  return Object.freeze({ version, devices: byId, hrefs });
}

export class DeviceRegistry implements ChannelResolver {
  private snapshot: RegistrySnapshot = EMPTY_SNAPSHOT;

  /**
   * Enumerate the hub and swap in the new snapshot
   *
   * @throws RegistryLoadError on any failure; the previous snapshot stays active
   * @param signal - once aborted, the enumerated snapshot is discarded
   * @throws AuthError unchanged when the hub rejects the session
   */
  async load(source: DeviceSource, signal?: AbortSignal): Promise<RegistrySnapshot> {
    let devices: Device[];
    try {
      devices = parseTopology(await source.readTopology());
    } catch (error) {
      if (error instanceof RegistryLoadError || error instanceof AuthError) throw error;
      throw new RegistryLoadError(`Device enumeration failed: ${describeError(error)}`, error);
    }

    if (devices.length === 0) {
      throw new RegistryLoadError('Hub reported no supported devices');
    }

    const next = buildSnapshot(devices, this.snapshot.version + 1);
    signal?.throwIfAborted();
    this.snapshot = next;
    logger.info(`Loaded ${next.devices.size} devices (registry version ${next.version})`);
    return next;
  }

  current(): RegistrySnapshot {
    return this.snapshot;
  }

  get version(): number {
    return this.snapshot.version;
  }

  get size(): number {
    return this.snapshot.devices.size;
  }

  lookup(deviceId: string): LookupResult {
    const device = this.snapshot.devices.get(deviceId);
    return device ? { found: true, device } : { found: false };
  }

  resolveHref(href: string): readonly ChannelRef[] {
    return this.snapshot.hrefs.get(href) ?? [];
  }

  resolveChannel(deviceId: string, channel: number): Channel | undefined {
    return this.snapshot.devices.get(deviceId)?.channels.find((c) => c.index === channel);
  }

  deviceIds(): string[] {
    return [...this.snapshot.devices.keys()];
  }

  devices(): Device[] {
    return [...this.snapshot.devices.values()];
  }
}
