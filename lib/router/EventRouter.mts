/**
 * Event Router
 *
 * The only mutator of the state cache and the only component that acts
 * across sessions. Hub events update the cache and publish changed values;
 * broker commands are validated against the registry and sent to the hub.
 * Registry and cache reads and writes happen under one mutex. Command
 * acknowledgements are awaited outside it.
 *
 * The cache is never updated from a command: only events confirmed by the
 * hub change it.
 */

import { CommandTimeout, describeError } from '../errors.mjs';
import type { LookupResult } from '../registry/DeviceRegistry.mjs';
import type { ButtonTracker } from '../state/ButtonTracker.mjs';
import type { StateCache } from '../state/StateCache.mjs';
import { createLogger } from '../utils/Logger.mjs';
import { Mutex } from '../utils/Mutex.mjs';
import { encodePayload, toHubAction } from '../utils/ValueConverters.mjs';
import { actionTopic, stateTopic, topicSegment } from './TopicCodec.mjs';
import type {
  BrokerCommand,
  ButtonGesture,
  ChannelState,
  CommandAck,
  Diagnostic,
  DiagnosticCallback,
  InboundHubEvent,
  OutboundCommand,
} from '../types.mjs';

const logger = createLogger('EventRouter');

// ============================================================================
// Collaborator Contracts
// ============================================================================

export interface DeviceLookup {
  lookup(deviceId: string): LookupResult;
}

export interface CommandSink {
  sendCommand(command: OutboundCommand): Promise<CommandAck>;
}

export interface StatePublisher {
  publish(topic: string, payload: string, retained: boolean): void;
}

export interface EventRouterOptions {
  registry: DeviceLookup;
  cache: StateCache;
  hub: CommandSink;
  broker: StatePublisher;
  topicPrefix: string;
  buttonTracker?: ButtonTracker;
}

export interface SynchronizeOptions {
  forceRefresh: boolean;
}

type DispatchResult = { ok: true; ack: CommandAck } | { ok: false; error: unknown };

// ============================================================================
// EventRouter Class
// ============================================================================

export class EventRouter {
  private registry: DeviceLookup;
  private cache: StateCache;
  private hub: CommandSink;
  private broker: StatePublisher;
  private prefix: string;
  private buttonTracker?: ButtonTracker;

  private mutex: Mutex = new Mutex();
  private inFlight: Set<Promise<unknown>> = new Set();
  private onDiagnostic?: DiagnosticCallback;

  constructor(options: EventRouterOptions) {
    this.registry = options.registry;
    this.cache = options.cache;
    this.hub = options.hub;
    this.broker = options.broker;
    this.prefix = options.topicPrefix;
    this.buttonTracker = options.buttonTracker;
    this.buttonTracker?.setOnGesture((deviceId, button, gesture) =>
      this.publishGesture(deviceId, button, gesture)
    );
  }

  /**
   * Set callback for diagnostics (malformed, unknown, failed commands)
   */
  setOnDiagnostic(callback: DiagnosticCallback): void {
    this.onDiagnostic = callback;
  }

  /**
   * Apply one hub event; publish it when the cached value changed
   */
  handleHubEvent(event: InboundHubEvent): Promise<void> {
    return this.track(
      this.mutex.runExclusive(() => {
        const result = this.cache.apply(event);
        if (result.status === 'unchanged') {
          logger.debug(`Unchanged ${event.deviceId}/${event.channel} = ${String(event.value)}`);
          return;
        }
        this.publishState(result.current);
        if (event.value === 'PRESS' || event.value === 'RELEASE') {
          this.buttonTracker?.handle(event.deviceId, event.channel, event.value);
        }
      })
    );
  }

  /**
   * Validate a broker command and send it to the hub. Resolves once the
   * hub acknowledged, refused or timed out; failures become diagnostics.
   */
  handleBrokerCommand(command: BrokerCommand): Promise<void> {
    return this.track(this.dispatchCommand(command));
  }

  /**
   * Apply a full-sync batch under one lock hold. With forceRefresh every
   * cached value is published exactly once, changed or not.
   *
   * @returns number of publishes
   */
  synchronize(events: readonly InboundHubEvent[], options: SynchronizeOptions): Promise<number> {
    return this.track(
      this.mutex.runExclusive(() => {
        const changed: ChannelState[] = [];
        for (const event of events) {
          const result = this.cache.apply(event);
          if (result.status === 'changed') changed.push(result.current);
        }

        let toPublish = changed;
        if (options.forceRefresh) {
          this.cache.forceRefreshAll();
          toPublish = this.cache.takeRefreshDue();
        }
        for (const state of toPublish) this.publishState(state);

        logger.info(
          `Synchronized ${events.length} values: ${changed.length} changed, ${toPublish.length} published`
        );
        return toPublish.length;
      })
    );
  }

  /**
   * Publish every cached value (broker reached Ready)
   */
  republishAll(): Promise<number> {
    return this.track(
      this.mutex.runExclusive(() => {
        this.cache.forceRefreshAll();
        const due = this.cache.takeRefreshDue();
        for (const state of due) this.publishState(state);
        logger.info(`Republished ${due.length} cached values`);
        return due.length;
      })
    );
  }

  /**
   * Forget cached values of devices the current registry no longer holds
   *
   * @returns number of entries removed
   */
  pruneUnregistered(): Promise<number> {
    return this.track(
      this.mutex.runExclusive(() => {
        const removed = this.cache.prune((deviceId) => this.registry.lookup(deviceId).found);
        if (removed > 0) logger.info(`Pruned ${removed} cached values of removed devices`);
        return removed;
      })
    );
  }

  /**
   * Resolves once nothing is in flight
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
    await this.mutex.drain();
  }

  dispose(): void {
    this.buttonTracker?.dispose();
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async dispatchCommand(command: BrokerCommand): Promise<void> {
    // Acknowledgement is awaited after the lock is released
    const dispatch = await this.mutex.runExclusive((): { pending: Promise<DispatchResult> } | null => {
      const result = this.registry.lookup(command.deviceId);
      if (!result.found || topicSegment(result.device.area) !== command.area) {
        this.emitDiagnostic({
          code: 'UNKNOWN_DEVICE_COMMAND',
          message: `No device ${command.deviceId} in area ${command.area}`,
          topic: command.topic,
          deviceId: command.deviceId,
        });
        return null;
      }

      const channel = result.device.channels.find((c) => c.index === command.channel);
      if (!channel) {
        this.emitDiagnostic({
          code: 'UNKNOWN_DEVICE_COMMAND',
          message: `Device ${command.deviceId} has no channel ${command.channel}`,
          topic: command.topic,
          deviceId: command.deviceId,
        });
        return null;
      }

      if (!channel.controllable || !toHubAction(channel.kind, command.value)) {
        this.emitDiagnostic({
          code: 'MALFORMED_COMMAND',
          message: `${String(command.value)} does not apply to ${channel.kind} channel ${command.channel}`,
          topic: command.topic,
          deviceId: command.deviceId,
        });
        return null;
      }

      logger.info(`Command ${command.deviceId}/${command.channel} = ${String(command.value)}`);
      const pending = this.hub
        .sendCommand({
          deviceId: command.deviceId,
          channel: command.channel,
          value: command.value,
          originating: 'mqtt-command',
        })
        .then(
          (ack): DispatchResult => ({ ok: true, ack }),
          (error: unknown): DispatchResult => ({ ok: false, error })
        );
      return { pending };
    });

    if (!dispatch) return;
    const outcome = await dispatch.pending;

    if (outcome.ok) {
      logger.debug(`Hub acknowledged ${command.deviceId}/${command.channel} (${outcome.ack.statusCode})`);
      return;
    }
    this.emitDiagnostic({
      code: outcome.error instanceof CommandTimeout ? 'COMMAND_TIMEOUT' : 'COMMAND_FAILED',
      message: describeError(outcome.error),
      topic: command.topic,
      deviceId: command.deviceId,
    });
  }

  private publishState(state: ChannelState): void {
    const result = this.registry.lookup(state.deviceId);
    if (!result.found) {
      logger.debug(`Device ${state.deviceId} no longer registered, not publishing`);
      return;
    }
    this.broker.publish(
      stateTopic(this.prefix, result.device.area, state.deviceId, state.channel),
      encodePayload(state.value),
      true
    );
  }

  private publishGesture(deviceId: string, button: number, gesture: ButtonGesture): void {
    const result = this.registry.lookup(deviceId);
    if (!result.found) return;
    this.broker.publish(actionTopic(this.prefix, result.device.area, deviceId, button), gesture, false);
  }

  private emitDiagnostic(diagnostic: Diagnostic): void {
    logger.warn(`${diagnostic.code}: ${diagnostic.message}`);
    try {
      this.onDiagnostic?.(diagnostic);
    } catch (error) {
      logger.error('Error in diagnostic callback:', error);
    }
  }

  private track<T>(promise: Promise<T>): Promise<T> {
    this.inFlight.add(promise);
    const settle = () => {
      this.inFlight.delete(promise);
    };
    promise.then(settle, settle);
    return promise;
  }
}
