/**
 * State Cache
 *
 * Last-known-good value per (device, channel). Only the event router
 * mutates it. Nothing is persisted; the first full sync after a hub
 * connection rebuilds it.
 */

import type { ChannelState, ChannelValue, InboundHubEvent } from '../types.mjs';

// ============================================================================
// Module-specific Types
// ============================================================================

export type ApplyResult =
  | { status: 'changed'; previous: ChannelState | undefined; current: ChannelState }
  | { status: 'unchanged'; current: ChannelState };

interface CacheEntry {
  state: ChannelState;
  refreshDue: boolean;
}

function keyOf(deviceId: string, channel: number): string {
  return `${deviceId}:${channel}`;
}

function sameValue(a: ChannelValue, b: ChannelValue): boolean {
  return a === b;
}

// ============================================================================
// StateCache Class
// ============================================================================

export class StateCache {
  private states: Map<string, CacheEntry> = new Map();

  /**
   * Apply an observation. Unchanged when the value equals the cached one or
   * the observation is older than the cached change.
   */
  apply(event: InboundHubEvent): ApplyResult {
    const key = keyOf(event.deviceId, event.channel);
    const entry = this.states.get(key);

    if (entry) {
      if (sameValue(entry.state.value, event.value) || event.observedAt < entry.state.updatedAt) {
        return { status: 'unchanged', current: entry.state };
      }
    }

    const current: ChannelState = Object.freeze({
      deviceId: event.deviceId,
      channel: event.channel,
      value: event.value,
      updatedAt: event.observedAt,
    });
    this.states.set(key, { state: current, refreshDue: false });
    return { status: 'changed', previous: entry?.state, current };
  }

  /**
   * Mark every entry due for republish. Values are left alone.
   *
   * @returns number of entries marked
   */
  forceRefreshAll(): number {
    for (const entry of this.states.values()) {
      entry.refreshDue = true;
    }
    return this.states.size;
  }

  /**
   * Return the states marked due and clear their marks
   */
  takeRefreshDue(): ChannelState[] {
    const due: ChannelState[] = [];
    for (const entry of this.states.values()) {
      if (entry.refreshDue) {
        entry.refreshDue = false;
        due.push(entry.state);
      }
    }
    return due;
  }

  /**
   * Drop every entry whose device no longer exists
   *
   * @returns number of entries removed
   */
  prune(isKnown: (deviceId: string) => boolean): number {
    let removed = 0;
    for (const [key, entry] of this.states) {
      if (!isKnown(entry.state.deviceId)) {
        this.states.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get(deviceId: string, channel: number): ChannelState | undefined {
    return this.states.get(keyOf(deviceId, channel))?.state;
  }

  entries(): ChannelState[] {
    return Array.from(this.states.values(), (entry) => entry.state);
  }

  get size(): number {
    return this.states.size;
  }
}
