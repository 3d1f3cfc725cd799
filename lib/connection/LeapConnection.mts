/**
 * LEAP Connection
 *
 * Handles the hub transport:
 * - Mutually authenticated TLS socket
 * - Line framing (one JSON communique per CRLF-terminated line)
 * - Request/response correlation through ClientTag
 *
 * Messages whose ClientTag matches no pending request (subscription pushes)
 * go to the message callback.
 */

import tls from 'node:tls';
import type { Duplex } from 'node:stream';
import { StringDecoder } from 'node:string_decoder';
import {
  CLIENT_CONFIG,
  ERROR_CODES,
  PROTOCOL_CONFIG,
  type RequestType,
} from '../LeapProtocol.mjs';
import { AuthError, TransportError, describeError } from '../errors.mjs';
import type { HubCredentials } from '../crypto/Certificates.mjs';
import { isRecord, readRecord, readString } from '../utils/guards.mjs';
import { createLogger } from '../utils/Logger.mjs';
import type { HubConfig, LeapHeader, LeapMessage } from '../types.mjs';

const logger = createLogger('LeapConnection');

// ============================================================================
// Transport Contract
// ============================================================================

/** Callback for unsolicited messages */
export type OnLeapMessageFn = (message: LeapMessage) => void;

/** Callback for transport close; error is set when the close was not requested */
export type OnLeapCloseFn = (error?: Error) => void;

/**
 * What the hub session needs from a LEAP transport
 */
export interface LeapTransport {
  readonly isOpen: boolean;
  request(
    type: RequestType,
    url: string,
    body?: Record<string, unknown>,
    timeoutMs?: number
  ): Promise<LeapMessage>;
  setOnMessage(callback: OnLeapMessageFn): void;
  setOnClose(callback: OnLeapCloseFn): void;
  close(): void;
}

export type LeapTransportFactory = () => Promise<LeapTransport>;

// ============================================================================
// Error Classification
// ============================================================================

const AUTH_FAILURE_CODE =
  /CERT|SELF_SIGNED|UNABLE_TO_VERIFY|UNABLE_TO_GET_ISSUER|ALERT_(BAD_CERTIFICATE|UNKNOWN_CA|ACCESS_DENIED|CERTIFICATE_REQUIRED|CERTIFICATE_UNKNOWN|CERTIFICATE_REVOKED|CERTIFICATE_EXPIRED|DECRYPT_ERROR)/;

function errorCode(error: unknown): string | undefined {
  return isRecord(error) ? readString(error, 'code') : undefined;
}

/**
 * Map a socket or TLS failure onto the bridge taxonomy: certificate
 * failures are AuthError, everything else TransportError.
 */
export function classifyHubError(error: unknown): AuthError | TransportError {
  if (error instanceof AuthError || error instanceof TransportError) {
    return error;
  }
  const code = errorCode(error);
  if (code && AUTH_FAILURE_CODE.test(code)) {
    return new AuthError(`Hub TLS authentication failed (${code}): ${describeError(error)}`, error);
  }
  return new TransportError(`Hub transport failed: ${describeError(error)}`, error);
}

// ============================================================================
// Framing
// ============================================================================

/**
 * Parse one line into a communique, or undefined when it is not one
 */
export function parseLeapLine(line: string): LeapMessage | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed)) return undefined;

  const communiqueType = readString(parsed, 'CommuniqueType');
  const header = readRecord(parsed, 'Header');
  if (!communiqueType || !header) return undefined;

  const leapHeader: LeapHeader = {
    Url: readString(header, 'Url'),
    ClientTag: readString(header, 'ClientTag'),
    StatusCode: readString(header, 'StatusCode'),
    MessageBodyType: readString(header, 'MessageBodyType'),
  };
  return { CommuniqueType: communiqueType, Header: leapHeader, Body: readRecord(parsed, 'Body') };
}

export function encodeLeapMessage(message: LeapMessage): string {
  return JSON.stringify(message) + PROTOCOL_CONFIG.LINE_TERMINATOR;
}

// ============================================================================
// LeapConnection Class
// ============================================================================

interface PendingRequest {
  resolve: (message: LeapMessage) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class LeapConnection implements LeapTransport {
  private stream: Duplex;
  private buffer: string = '';
  /** Holds back a multi-byte character split across records */
  private decoder: StringDecoder = new StringDecoder('utf8');
  private tag: number = 0;
  private open: boolean = true;
  private closeError?: Error;
  private pending: Map<string, PendingRequest> = new Map();
  private requestTimeout: number;

  private onMessage?: OnLeapMessageFn;
  private onClose?: OnLeapCloseFn;

  constructor(stream: Duplex, requestTimeout: number = PROTOCOL_CONFIG.TIMEOUTS.REQUEST) {
    this.stream = stream;
    this.requestTimeout = requestTimeout;

    stream.on('data', (chunk: Buffer | string) => this.handleData(chunk));
    stream.on('error', (error: Error) => {
      this.closeError = classifyHubError(error);
      logger.error(`Socket error: ${error.message}`);
    });
    stream.on('close', () => this.handleClose());
  }

  /**
   * Open a TLS connection to the hub
   *
   * @throws AuthError on certificate failures, TransportError otherwise
   */
  static open(
    hub: HubConfig,
    credentials: HubCredentials,
    timeouts: { connect: number; request: number }
  ): Promise<LeapConnection> {
    return new Promise((resolve, reject) => {
      logger.info(`Connecting to hub at ${hub.host}:${hub.port}`);

      const socket = tls.connect({
        host: hub.host,
        port: hub.port,
        ca: credentials.ca,
        cert: credentials.cert,
        key: credentials.key,
        rejectUnauthorized: true,
        checkServerIdentity: hub.verifyHostname ? tls.checkServerIdentity : () => undefined,
      });

      const timer = setTimeout(() => {
        socket.destroy();
        reject(new TransportError(`Hub connection timed out after ${timeouts.connect}ms`));
      }, timeouts.connect);

      const onError = (error: Error) => {
        clearTimeout(timer);
        socket.destroy();
        reject(classifyHubError(error));
      };

      socket.once('error', onError);
      socket.once('secureConnect', () => {
        clearTimeout(timer);
        socket.removeListener('error', onError);
        socket.setNoDelay(true);
        logger.info('TLS session established');
        resolve(new LeapConnection(socket, timeouts.request));
      });
    });
  }

  get isOpen(): boolean {
    return this.open;
  }

  setOnMessage(callback: OnLeapMessageFn): void {
    this.onMessage = callback;
  }

  setOnClose(callback: OnLeapCloseFn): void {
    this.onClose = callback;
  }

  /**
   * Send a request and wait for the response carrying the same ClientTag
   */
  request(
    type: RequestType,
    url: string,
    body?: Record<string, unknown>,
    timeoutMs: number = this.requestTimeout
  ): Promise<LeapMessage> {
    if (!this.open) {
      return Promise.reject(this.closeError ?? new TransportError('Hub connection is closed'));
    }

    const clientTag = `${CLIENT_CONFIG.CLIENT_TAG_PREFIX}-${++this.tag}`;
    const message: LeapMessage = {
      CommuniqueType: type,
      Header: { Url: url, ClientTag: clientTag },
      ...(body ? { Body: body } : {}),
    };

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(clientTag);
        reject(
          new TransportError(
            `${type} ${url} timed out after ${timeoutMs}ms`,
            { url },
            ERROR_CODES.REQUEST_TIMEOUT
          )
        );
      }, timeoutMs);

      this.pending.set(clientTag, { resolve, reject, timer });
      logger.debug(`SEND ${type} ${url} tag=${clientTag}`);
      this.stream.write(encodeLeapMessage(message));
    });
  }

  /**
   * Close the connection; pending requests fail with TransportError
   */
  close(): void {
    if (!this.open) return;
    this.stream.end();
    this.stream.destroy();
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private handleData(chunk: Buffer | string): void {
    this.buffer += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).trim();
      this.buffer = this.buffer.slice(newline + 1);
      if (line.length > 0) this.handleLine(line);
      newline = this.buffer.indexOf('\n');
    }
  }

  private handleLine(line: string): void {
    const message = parseLeapLine(line);
    if (!message) {
      logger.warn(`Discarding malformed line: ${line.slice(0, 120)}`);
      return;
    }

    const tag = message.Header.ClientTag;
    const pending = tag ? this.pending.get(tag) : undefined;
    if (tag && pending) {
      clearTimeout(pending.timer);
      this.pending.delete(tag);
      pending.resolve(message);
      return;
    }

    try {
      this.onMessage?.(message);
    } catch (error) {
      logger.error('Error in message callback:', error);
    }
  }

  private handleClose(): void {
    if (!this.open) return;
    this.open = false;

    const failure = this.closeError ?? new TransportError('Hub connection closed');
    for (const [tag, pending] of this.pending) {
      clearTimeout(pending.timer);
      pending.reject(failure);
      this.pending.delete(tag);
    }

    logger.info(`Connection closed${this.closeError ? `: ${this.closeError.message}` : ''}`);
    this.onClose?.(this.closeError);
  }
}
