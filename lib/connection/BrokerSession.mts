/**
 * Broker Session
 *
 * Owns one MQTT connection at a time. Publishing is fire-and-forget:
 * failures are logged and the next change or force-refresh supersedes
 * the lost message. Inbound command messages are parsed into a stream
 * that is replaced on each connect and ends when the connection drops.
 */

import { TransportError, describeError } from '../errors.mjs';
import {
  availabilityTopic,
  commandSubscription,
  hubStatusTopic,
  parseCommand,
} from '../router/TopicCodec.mjs';
import { AsyncQueue } from '../utils/AsyncQueue.mjs';
import { createLogger } from '../utils/Logger.mjs';
import type { BrokerTransport, BrokerTransportFactory } from './MqttTransport.mjs';
import type { BrokerCommand, DiagnosticCallback } from '../types.mjs';

const logger = createLogger('BrokerSession');

const ONLINE = 'online';
const OFFLINE = 'offline';

export class BrokerSession {
  private factory: BrokerTransportFactory;
  private prefix: string;

  private transport: BrokerTransport | null = null;
  private queue: AsyncQueue<BrokerCommand> = new AsyncQueue();
  private lastActivity: number | null = null;
  /** Bumped by every disconnect; a connect started earlier is abandoned */
  private generation: number = 0;

  private onDiagnostic?: DiagnosticCallback;

  constructor(factory: BrokerTransportFactory, topicPrefix: string) {
    this.factory = factory;
    this.prefix = topicPrefix;
    this.queue.close();
  }

  /**
   * Set callback for malformed command diagnostics
   */
  setOnDiagnostic(callback: DiagnosticCallback): void {
    this.onDiagnostic = callback;
  }

  get isConnected(): boolean {
    return this.transport !== null;
  }

  getLastActivity(): number | null {
    return this.lastActivity;
  }

  /**
   * Connect, subscribe to the command tree and announce availability
   *
   * @throws TransportError
   */
  async connect(): Promise<void> {
    await this.disconnect();
    const generation = this.generation;

    let transport: BrokerTransport;
    try {
      transport = await this.factory({
        topic: availabilityTopic(this.prefix),
        payload: OFFLINE,
        retain: true,
      });
    } catch (error) {
      throw error instanceof TransportError
        ? error
        : new TransportError(`Broker connection failed: ${describeError(error)}`, error);
    }
    if (generation !== this.generation) {
      await this.endQuietly(transport);
      throw new TransportError('Broker connect abandoned by disconnect');
    }

    const queue = new AsyncQueue<BrokerCommand>();
    transport.setOnMessage((topic, payload) => this.handleMessage(topic, payload, queue));
    transport.setOnClose(() => this.handleClose(transport, queue));

    try {
      await transport.subscribe(commandSubscription(this.prefix), 1);
      await transport.publish(availabilityTopic(this.prefix), ONLINE, { qos: 1, retain: true });
    } catch (error) {
      queue.close(true);
      await this.endQuietly(transport);
      throw error instanceof TransportError
        ? error
        : new TransportError(`Broker session setup failed: ${describeError(error)}`, error);
    }
    if (generation !== this.generation) {
      queue.close(true);
      await this.endQuietly(transport);
      throw new TransportError('Broker connect abandoned by disconnect');
    }

    this.transport = transport;
    this.queue = queue;
    this.lastActivity = Date.now();
    logger.info(`Connected; listening on ${commandSubscription(this.prefix)}`);
  }

  /**
   * Publish at QoS 1 without waiting. Dropped while disconnected.
   */
  publish(topic: string, payload: string, retained: boolean): void {
    const transport = this.transport;
    if (!transport) {
      logger.debug(`Not connected, dropping ${topic} = ${payload}`);
      return;
    }

    transport.publish(topic, payload, { qos: 1, retain: retained }).then(
      () => {
        this.lastActivity = Date.now();
      },
      (error: unknown) => {
        logger.warn(`Publish to ${topic} failed: ${describeError(error)}`);
      }
    );
  }

  /**
   * Publish whether the hub side is live
   */
  publishHubStatus(online: boolean): void {
    this.publish(hubStatusTopic(this.prefix), online ? ONLINE : OFFLINE, true);
  }

  /**
   * Stream of commands for the current connection
   */
  commands(): AsyncIterable<BrokerCommand> {
    return this.queue;
  }

  /**
   * Announce offline, end the client and the command stream
   */
  async disconnect(): Promise<void> {
    this.generation++;
    const transport = this.transport;
    this.transport = null;
    this.queue.close();
    if (!transport) return;

    try {
      await transport.publish(availabilityTopic(this.prefix), OFFLINE, { qos: 1, retain: true });
    } catch (error) {
      logger.warn(`Could not publish offline availability: ${describeError(error)}`);
    }
    await this.endQuietly(transport);
    logger.info('Disconnected');
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private handleMessage(topic: string, payload: Buffer, queue: AsyncQueue<BrokerCommand>): void {
    this.lastActivity = Date.now();
    const result = parseCommand(this.prefix, topic, payload.toString('utf8'));
    if (!result.ok) {
      logger.warn(`Malformed command on ${topic}: ${result.reason}`);
      this.onDiagnostic?.({
        code: 'MALFORMED_COMMAND',
        message: result.reason,
        topic,
      });
      return;
    }
    queue.push(result.command);
  }

  private handleClose(transport: BrokerTransport, queue: AsyncQueue<BrokerCommand>): void {
    queue.close();
    if (transport !== this.transport) return;
    this.transport = null;
    logger.warn('Broker connection dropped');
  }

  private async endQuietly(transport: BrokerTransport): Promise<void> {
    try {
      await transport.end();
    } catch (error) {
      logger.warn(`Error ending MQTT client: ${describeError(error)}`);
    }
  }
}
