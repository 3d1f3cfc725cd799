/**
 * Event Bridge - Composition Root
 *
 * Wires the registry, cache, both sessions and the router together and
 * supervises the two sessions independently: a hub reconnect never tears
 * down the broker session and vice versa.
 */

import { BrokerSession } from './connection/BrokerSession.mjs';
import { HubSession } from './connection/HubSession.mjs';
import type { LeapTransportFactory } from './connection/LeapConnection.mjs';
import type { BrokerTransportFactory } from './connection/MqttTransport.mjs';
import type { AuthError } from './errors.mjs';
import { DeviceRegistry } from './registry/DeviceRegistry.mjs';
import { EventRouter } from './router/EventRouter.mjs';
import { ButtonTracker } from './state/ButtonTracker.mjs';
import { StateCache } from './state/StateCache.mjs';
import { SessionSupervisor } from './supervisor/SessionSupervisor.mjs';
import { createLogger } from './utils/Logger.mjs';
import type {
  BridgeConfig,
  BrokerCommand,
  ConnectionHealth,
  DiagnosticCallback,
  InboundHubEvent,
} from './types.mjs';

const logger = createLogger('EventBridge');

export interface EventBridgeDependencies {
  hubTransportFactory: LeapTransportFactory;
  brokerTransportFactory: BrokerTransportFactory;
  /** Jitter source for backoff */
  random?: () => number;
}

export interface BridgeHealth {
  hub: ConnectionHealth;
  broker: ConnectionHealth;
}

// ============================================================================
// EventBridge Class
// ============================================================================

export class EventBridge {
  readonly registry: DeviceRegistry;
  readonly cache: StateCache;
  readonly hub: HubSession;
  readonly broker: BrokerSession;
  readonly router: EventRouter;

  private hubSupervisor: SessionSupervisor<InboundHubEvent>;
  private brokerSupervisor: SessionSupervisor<BrokerCommand>;
  private started: boolean = false;

  private onDiagnostic?: DiagnosticCallback;
  private onFatal?: (error: AuthError) => void;

  constructor(config: BridgeConfig, dependencies: EventBridgeDependencies) {
    const { timing } = config;
    const backoff = { baseDelay: timing.backoffBase, maxDelay: timing.backoffMax };

    this.registry = new DeviceRegistry();
    this.cache = new StateCache();
    this.hub = new HubSession(dependencies.hubTransportFactory, this.registry, {
      commandTimeout: timing.commandTimeout,
      keepaliveInterval: timing.keepaliveInterval,
    });
    this.broker = new BrokerSession(dependencies.brokerTransportFactory, config.topicPrefix);
    this.router = new EventRouter({
      registry: this.registry,
      cache: this.cache,
      hub: this.hub,
      broker: this.broker,
      topicPrefix: config.topicPrefix,
      buttonTracker: new ButtonTracker({
        doublePressWindow: timing.doublePressWindow,
        longPressMax: timing.longPressMax,
      }),
    });

    this.hubSupervisor = new SessionSupervisor<InboundHubEvent>({
      name: 'hub',
      connect: async (report, signal) => {
        await this.hub.connect();
        signal.throwIfAborted();
        report('authenticated');
        await this.registry.load(this.hub, signal);
        await this.router.pruneUnregistered();
        signal.throwIfAborted();
        await this.hub.subscribeAll(this.registry.deviceIds());
      },
      stream: () => this.hub.notifications(),
      disconnect: () => this.hub.disconnect(),
      onItem: (event) => this.router.handleHubEvent(event),
      onReady: async (isReconnect) => {
        const events = await this.hub.readCurrentState();
        await this.router.synchronize(events, { forceRefresh: isReconnect });
        this.broker.publishHubStatus(true);
      },
      onDown: () => this.broker.publishHubStatus(false),
      backoff,
      connectTimeout: timing.connectTimeout,
      random: dependencies.random,
    });

    this.brokerSupervisor = new SessionSupervisor<BrokerCommand>({
      name: 'broker',
      connect: () => this.broker.connect(),
      stream: () => this.broker.commands(),
      disconnect: () => this.broker.disconnect(),
      onItem: (command) => this.router.handleBrokerCommand(command),
      onReady: async () => {
        await this.router.republishAll();
        this.broker.publishHubStatus(this.hubSupervisor.getHealth().state === 'ready');
      },
      backoff,
      connectTimeout: timing.connectTimeout,
      random: dependencies.random,
    });

    this.hub.setOnDegraded((reason) => {
      this.hubSupervisor.reportDegraded(reason);
    });
    this.router.setOnDiagnostic((diagnostic) => this.onDiagnostic?.(diagnostic));
    this.broker.setOnDiagnostic((diagnostic) => this.onDiagnostic?.(diagnostic));
    this.hubSupervisor.setOnFatal((error) => {
      logger.error(`Fatal: ${error.message}`);
      this.onFatal?.(error);
    });
  }

  /**
   * Set callback for routing diagnostics
   */
  setOnDiagnostic(callback: DiagnosticCallback): void {
    this.onDiagnostic = callback;
  }

  /**
   * Set callback for unrecoverable errors; the process should exit
   */
  setOnFatal(callback: (error: AuthError) => void): void {
    this.onFatal = callback;
  }

  /**
   * Start both supervisors
   */
  start(): void {
    if (this.started) return;
    this.started = true;
    logger.info('Starting hub and broker sessions');
    this.brokerSupervisor.start();
    this.hubSupervisor.start();
  }

  /**
   * Graceful shutdown: stop the hub side, let in-flight routing finish,
   * then close the broker session (which announces offline)
   */
  async stop(): Promise<void> {
    logger.info('Shutting down');
    await this.hubSupervisor.stop();
    await this.router.drain();
    this.broker.publishHubStatus(false);
    await this.brokerSupervisor.stop();
    this.router.dispose();
    this.started = false;
    logger.info('Stopped');
  }

  getHealth(): BridgeHealth {
    return {
      hub: this.hubSupervisor.getHealth(),
      broker: this.brokerSupervisor.getHealth(),
    };
  }
}
