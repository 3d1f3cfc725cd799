/**
 * Hub Session
 *
 * Owns one LEAP connection at a time: connect and prove the session with a
 * ping, enumerate topology, subscribe to status pushes, read current state,
 * send zone commands and watch liveness with a keepalive ping.
 *
 * Each connect creates a fresh notification stream; the stream ends when the
 * transport drops or the session is disconnected.
 */

import {
  COMMAND_TYPES,
  COMMUNIQUE_TYPES,
  PROTOCOL_CONFIG,
  URLS,
  parseStatusCode,
  type RequestType,
} from '../LeapProtocol.mjs';
import {
  AuthError,
  CommandRejected,
  CommandTimeout,
  TransportError,
  describeError,
  isRequestTimeout,
} from '../errors.mjs';
import { pingTimeout } from '../config.mjs';
import { MessageHandler, type ChannelResolver } from '../messaging/MessageHandler.mjs';
import type { TopologyBodies } from '../messaging/TopologyParser.mjs';
import type { DeviceSource, LookupResult } from '../registry/DeviceRegistry.mjs';
import { AsyncQueue } from '../utils/AsyncQueue.mjs';
import { createLogger } from '../utils/Logger.mjs';
import { toHubAction } from '../utils/ValueConverters.mjs';
import { classifyHubError, type LeapTransport, type LeapTransportFactory } from './LeapConnection.mjs';
import type {
  Channel,
  CommandAck,
  Device,
  InboundHubEvent,
  LeapMessage,
  OutboundCommand,
} from '../types.mjs';

const logger = createLogger('HubSession');

// ============================================================================
// Module-specific Types
// ============================================================================

/**
 * Device lookups the session needs (the registry)
 */
export interface DeviceDirectory extends ChannelResolver {
  lookup(deviceId: string): LookupResult;
  resolveChannel(deviceId: string, channel: number): Channel | undefined;
  devices(): Device[];
}

export interface HubSessionOptions {
  commandTimeout?: number;
  keepaliveInterval?: number;
}

/** Callback when keepalive gives up on the connection */
export type OnDegradedFn = (reason: string) => void;

function isZoneChannel(channel: Channel): boolean {
  return channel.kind === 'switch' || channel.kind === 'level' || channel.kind === 'shade';
}

/**
 * Throw unless the response status is a success
 */
function expectSuccess(response: LeapMessage, what: string): void {
  const status = parseStatusCode(response.Header.StatusCode);
  if (status === undefined || status < 300) return;
  if (status === 401 || status === 403) {
    throw new AuthError(`Hub refused ${what}: ${response.Header.StatusCode}`);
  }
  throw new TransportError(`${what} failed: ${response.Header.StatusCode}`);
}

// ============================================================================
// HubSession Class
// ============================================================================

export class HubSession implements DeviceSource {
  private factory: LeapTransportFactory;
  private directory: DeviceDirectory;
  private messageHandler: MessageHandler;
  private commandTimeout: number;
  private keepaliveInterval: number;

  private transport: LeapTransport | null = null;
  private queue: AsyncQueue<InboundHubEvent> = new AsyncQueue();
  private subscribed: Set<string> = new Set();
  private keepaliveTimer: ReturnType<typeof setInterval> | null = null;
  private missedPings: number = 0;
  private lastActivity: number | null = null;
  /** Bumped by every disconnect; a connect started earlier is abandoned */
  private generation: number = 0;

  private onDegraded?: OnDegradedFn;

  constructor(factory: LeapTransportFactory, directory: DeviceDirectory, options: HubSessionOptions = {}) {
    this.factory = factory;
    this.directory = directory;
    this.messageHandler = new MessageHandler(directory);
    this.commandTimeout = options.commandTimeout ?? PROTOCOL_CONFIG.TIMEOUTS.COMMAND;
    this.keepaliveInterval = options.keepaliveInterval ?? PROTOCOL_CONFIG.TIMEOUTS.KEEPALIVE;
    this.queue.close();
  }

  /**
   * Set callback for missed keepalives
   */
  setOnDegraded(callback: OnDegradedFn): void {
    this.onDegraded = callback;
  }

  get isConnected(): boolean {
    return this.transport?.isOpen ?? false;
  }

  /**
   * Time of the last message received from the hub
   */
  getLastActivity(): number | null {
    return this.lastActivity;
  }

  /**
   * Open the transport and prove the session with a ping
   *
   * @throws AuthError when the hub refuses the credentials, TransportError otherwise
   */
  async connect(): Promise<void> {
    await this.disconnect();
    const generation = this.generation;

    let transport: LeapTransport;
    try {
      transport = await this.factory();
    } catch (error) {
      throw classifyHubError(error);
    }
    if (generation !== this.generation) {
      transport.close();
      throw new TransportError('Hub connect abandoned by disconnect');
    }

    const queue = new AsyncQueue<InboundHubEvent>();
    this.transport = transport;
    this.queue = queue;
    this.subscribed = new Set();
    this.missedPings = 0;

    transport.setOnMessage((message) => this.handlePush(message, queue));
    transport.setOnClose((error) => this.handleClose(transport, queue, error));

    try {
      const pong = await transport.request(COMMUNIQUE_TYPES.READ_REQUEST, URLS.PING);
      expectSuccess(pong, 'ping');
      this.lastActivity = Date.now();
    } catch (error) {
      if (this.transport === transport) await this.disconnect();
      else transport.close();
      throw classifyHubError(error);
    }
    if (generation !== this.generation) {
      transport.close();
      throw new TransportError('Hub connect abandoned by disconnect');
    }

    this.startKeepalive(transport);
    logger.info('Hub session authenticated');
  }

  /**
   * Enumerate devices, areas, buttons and occupancy groups
   */
  async readTopology(): Promise<TopologyBodies> {
    const devices = await this.request(COMMUNIQUE_TYPES.READ_REQUEST, URLS.DEVICES);
    expectSuccess(devices, 'device enumeration');

    return {
      devices: devices.Body ?? {},
      areas: await this.readOptional(URLS.AREAS),
      buttons: await this.readOptional(URLS.BUTTONS),
      occupancyGroups: await this.readOptional(URLS.OCCUPANCY_GROUPS),
    };
  }

  /**
   * Subscribe to status pushes for the given devices. URLs already
   * subscribed on this connection are skipped.
   */
  async subscribeAll(deviceIds: readonly string[]): Promise<number> {
    const urls: string[] = [];
    let wantsOccupancy = false;

    for (const deviceId of deviceIds) {
      const result = this.directory.lookup(deviceId);
      if (!result.found) continue;
      for (const channel of result.device.channels) {
        if (isZoneChannel(channel)) urls.push(URLS.zoneStatus(channel.href));
        else if (channel.kind === 'button') urls.push(URLS.buttonEvents(channel.href));
        else wantsOccupancy = true;
      }
    }
    if (wantsOccupancy) urls.push(URLS.OCCUPANCY_GROUP_STATUS);

    let added = 0;
    for (const url of urls) {
      if (this.subscribed.has(url)) continue;
      const response = await this.request(COMMUNIQUE_TYPES.SUBSCRIBE_REQUEST, url);
      expectSuccess(response, `subscription to ${url}`);
      this.subscribed.add(url);
      added++;
    }

    logger.info(`Subscribed to ${added} new status URLs (${this.subscribed.size} total)`);
    return added;
  }

  /**
   * Read the current status of every zone and occupancy group
   */
  async readCurrentState(): Promise<InboundHubEvent[]> {
    const events: InboundHubEvent[] = [];
    let hasOccupancy = false;

    for (const device of this.directory.devices()) {
      for (const channel of device.channels) {
        if (channel.kind === 'occupancy') hasOccupancy = true;
        if (!isZoneChannel(channel)) continue;

        const url = URLS.zoneStatus(channel.href);
        const response = await this.request(COMMUNIQUE_TYPES.READ_REQUEST, url);
        const status = parseStatusCode(response.Header.StatusCode);
        if (status !== undefined && status >= 300) {
          logger.warn(`Reading ${url} failed: ${response.Header.StatusCode}`);
          continue;
        }
        events.push(...this.messageHandler.toEvents(response));
      }
    }

    if (hasOccupancy) {
      const response = await this.request(COMMUNIQUE_TYPES.READ_REQUEST, URLS.OCCUPANCY_GROUP_STATUS);
      events.push(...this.messageHandler.toEvents(response));
    }

    logger.info(`Read current state: ${events.length} channel values`);
    return events;
  }

  /**
   * Issue a zone command and wait for the hub's acknowledgement
   *
   * @throws CommandTimeout when the hub does not answer in time
   * @throws CommandRejected when the hub answers with an error status
   */
  async sendCommand(command: OutboundCommand): Promise<CommandAck> {
    const channel = this.directory.resolveChannel(command.deviceId, command.channel);
    if (!channel || !channel.controllable) {
      throw new CommandRejected(404, `Channel ${command.deviceId}/${command.channel} is not controllable`);
    }

    const action = toHubAction(channel.kind, command.value);
    if (!action) {
      throw new CommandRejected(400, `Value ${String(command.value)} does not apply to a ${channel.kind} channel`);
    }

    const body =
      action.command === COMMAND_TYPES.GO_TO_LEVEL
        ? {
            Command: {
              CommandType: action.command,
              Parameter: [{ Type: 'Level', Value: action.level }],
            },
          }
        : { Command: { CommandType: action.command } };

    let response: LeapMessage;
    try {
      response = await this.request(
        COMMUNIQUE_TYPES.CREATE_REQUEST,
        URLS.commandProcessor(channel.href),
        body,
        this.commandTimeout
      );
    } catch (error) {
      if (isRequestTimeout(error)) {
        throw new CommandTimeout(
          `No acknowledgement for ${command.deviceId}/${command.channel} within ${this.commandTimeout}ms`
        );
      }
      throw error;
    }

    const statusCode = parseStatusCode(response.Header.StatusCode) ?? 200;
    if (statusCode >= 400) {
      throw new CommandRejected(statusCode);
    }

    for (const event of this.messageHandler.toEvents(response, 'command-ack')) {
      this.queue.push(event);
    }
    return { deviceId: command.deviceId, channel: command.channel, statusCode };
  }

  /**
   * Stream of events for the current connection
   */
  notifications(): AsyncIterable<InboundHubEvent> {
    return this.queue;
  }

  /**
   * Close the transport and end the notification stream
   */
  async disconnect(): Promise<void> {
    this.generation++;
    this.stopKeepalive();
    const transport = this.transport;
    this.transport = null;
    this.queue.close();
    if (transport) {
      transport.close();
      logger.info('Hub session closed');
    }
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private request(
    type: RequestType,
    url: string,
    body?: Record<string, unknown>,
    timeoutMs?: number
  ): Promise<LeapMessage> {
    const transport = this.transport;
    if (!transport || !transport.isOpen) {
      return Promise.reject(new TransportError('Hub session is not connected'));
    }
    return transport.request(type, url, body, timeoutMs).then((response) => {
      this.lastActivity = Date.now();
      return response;
    });
  }

  private async readOptional(url: string): Promise<Record<string, unknown>> {
    const response = await this.request(COMMUNIQUE_TYPES.READ_REQUEST, url);
    const status = parseStatusCode(response.Header.StatusCode);
    if (status === 204 || status === 404) return {};
    expectSuccess(response, `read of ${url}`);
    return response.Body ?? {};
  }

  private handlePush(message: LeapMessage, queue: AsyncQueue<InboundHubEvent>): void {
    this.lastActivity = Date.now();
    for (const event of this.messageHandler.toEvents(message)) {
      queue.push(event);
    }
  }

  private handleClose(transport: LeapTransport, queue: AsyncQueue<InboundHubEvent>, error?: Error): void {
    queue.close();
    if (transport !== this.transport) return;

    this.stopKeepalive();
    this.transport = null;
    logger.warn(`Hub transport dropped${error ? `: ${describeError(error)}` : ''}`);
  }

  private startKeepalive(transport: LeapTransport): void {
    this.stopKeepalive();
    const timeout = pingTimeout(this.keepaliveInterval);
    this.keepaliveTimer = setInterval(() => {
      void this.ping(transport, timeout);
    }, this.keepaliveInterval);
  }

  private stopKeepalive(): void {
    if (this.keepaliveTimer) {
      clearInterval(this.keepaliveTimer);
      this.keepaliveTimer = null;
    }
  }

  private async ping(transport: LeapTransport, timeout: number): Promise<void> {
    try {
      await transport.request(COMMUNIQUE_TYPES.READ_REQUEST, URLS.PING, undefined, timeout);
      this.missedPings = 0;
      this.lastActivity = Date.now();
    } catch (error) {
      if (transport !== this.transport) return;

      this.missedPings++;
      logger.warn(`Keepalive missed (${this.missedPings}): ${describeError(error)}`);
      if (this.missedPings >= PROTOCOL_CONFIG.KEEPALIVE_MAX_MISSES) {
        this.stopKeepalive();
        this.onDegraded?.(`${this.missedPings} consecutive keepalive pings unanswered`);
      }
    }
  }
}
