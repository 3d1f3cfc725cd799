/**
 * Button Tracker
 *
 * Derives gestures from the raw press/release events of remote buttons.
 *
 *   PRESS → RELEASE, window elapses               → single
 *   PRESS → RELEASE → PRESS → RELEASE in window   → double
 *   PRESS held past the window                    → long_press
 *     ... then RELEASE                            → long_release
 *
 * Tracking of one sequence is abandoned after longPressMax.
 */

import { PROTOCOL_CONFIG } from '../LeapProtocol.mjs';
import { createLogger } from '../utils/Logger.mjs';
import type { ButtonGesture, ButtonValue } from '../types.mjs';

const logger = createLogger('ButtonTracker');

export type GestureCallback = (deviceId: string, button: number, gesture: ButtonGesture) => void;

export interface ButtonTrackerOptions {
  doublePressWindow?: number;
  longPressMax?: number;
}

type Phase = 'pressed' | 'released' | 'second-pressed' | 'held';

interface Sequence {
  deviceId: string;
  button: number;
  phase: Phase;
  windowTimer: NodeJS.Timeout;
  maxTimer: NodeJS.Timeout;
}

export class ButtonTracker {
  private sequences: Map<string, Sequence> = new Map();
  private doublePressWindow: number;
  private longPressMax: number;
  private onGesture?: GestureCallback;

  constructor(options: ButtonTrackerOptions = {}) {
    this.doublePressWindow = options.doublePressWindow ?? PROTOCOL_CONFIG.BUTTONS.DOUBLE_PRESS_WINDOW;
    this.longPressMax = options.longPressMax ?? PROTOCOL_CONFIG.BUTTONS.LONG_PRESS_MAX;
  }

  setOnGesture(callback: GestureCallback): void {
    this.onGesture = callback;
  }

  get activeCount(): number {
    return this.sequences.size;
  }

  /**
   * Feed one raw button event
   */
  handle(deviceId: string, button: number, value: ButtonValue): void {
    const key = `${deviceId}:${button}`;
    const sequence = this.sequences.get(key);

    if (!sequence) {
      if (value === 'PRESS') {
        this.start(key, deviceId, button);
      } else {
        logger.debug(`Release without press on ${key}, ignored`);
      }
      return;
    }

    switch (`${sequence.phase}:${value}`) {
      case 'pressed:RELEASE':
        sequence.phase = 'released';
        return;
      case 'released:PRESS':
        sequence.phase = 'second-pressed';
        return;
      case 'second-pressed:RELEASE':
        this.finish(key, 'double');
        return;
      case 'held:RELEASE':
        this.finish(key, 'long_release');
        return;
      default:
        logger.debug(`Unexpected ${value} while ${sequence.phase} on ${key}, restarting`);
        this.clear(key);
        if (value === 'PRESS') this.start(key, deviceId, button);
    }
  }

  /**
   * Cancel all timers
   */
  dispose(): void {
    for (const key of [...this.sequences.keys()]) {
      this.clear(key);
    }
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private start(key: string, deviceId: string, button: number): void {
    this.sequences.set(key, {
      deviceId,
      button,
      phase: 'pressed',
      windowTimer: setTimeout(() => this.windowElapsed(key), this.doublePressWindow),
      maxTimer: setTimeout(() => {
        logger.debug(`Tracking of ${key} timed out`);
        this.clear(key);
      }, this.longPressMax),
    });
  }

  private windowElapsed(key: string): void {
    const sequence = this.sequences.get(key);
    if (!sequence) return;

    if (sequence.phase === 'released') {
      this.finish(key, 'single');
    } else if (sequence.phase === 'pressed') {
      sequence.phase = 'held';
      this.emit(sequence, 'long_press');
    }
  }

  private finish(key: string, gesture: ButtonGesture): void {
    const sequence = this.sequences.get(key);
    if (!sequence) return;
    this.clear(key);
    this.emit(sequence, gesture);
  }

  private emit(sequence: Sequence, gesture: ButtonGesture): void {
    logger.debug(`Button ${sequence.button} of device ${sequence.deviceId}: ${gesture}`);
    try {
      this.onGesture?.(sequence.deviceId, sequence.button, gesture);
    } catch (error) {
      logger.error(`Error in gesture callback for device ${sequence.deviceId}:`, error);
    }
  }

  private clear(key: string): void {
    const sequence = this.sequences.get(key);
    if (!sequence) return;
    clearTimeout(sequence.windowTimer);
    clearTimeout(sequence.maxTimer);
    this.sequences.delete(key);
  }
}
