/**
 * Session Supervisor
 *
 * Drives one session through
 *   disconnected → connecting → (authenticated) → ready → degraded → connecting …
 * retrying recoverable failures with capped exponential backoff and equal
 * jitter. An AuthError stops the loop and is reported as fatal.
 *
 * While ready, the session's stream is pumped item by item into onItem; the
 * next item is pulled only after the previous one was handled.
 */

import { AuthError, TransportError, describeError } from '../errors.mjs';
import { computeBackoffDelay, sleep, withTimeout, type BackoffPolicy } from '../utils/Backoff.mjs';
import { createLogger, type Logger } from '../utils/Logger.mjs';
import type { ConnectionHealth, SessionState } from '../types.mjs';

// ============================================================================
// Module-specific Types
// ============================================================================

export type ReportStateFn = (state: SessionState) => void;
export type OnFatalFn = (error: AuthError) => void;
export type OnStateChangeFn = (state: SessionState) => void;

export interface SessionSupervisorOptions<T> {
  name: string;
  /**
   * Establish the session; may report 'authenticated' on the way. The
   * signal aborts once the attempt timed out, failed or is being stopped;
   * reports made after that are ignored.
   */
  connect(report: ReportStateFn, signal: AbortSignal): Promise<void>;
  /** Stream of the current connection */
  stream(): AsyncIterable<T>;
  disconnect(): Promise<void>;
  onItem(item: T): Promise<void>;
  /** Runs on every Ready, before pumping starts */
  onReady?(isReconnect: boolean): Promise<void>;
  /** Runs when a Ready session goes down */
  onDown?(): void;
  backoff: BackoffPolicy;
  connectTimeout: number;
  random?: () => number;
}

const INTERRUPTED = Symbol('interrupted');

// ============================================================================
// SessionSupervisor Class
// ============================================================================

export class SessionSupervisor<T> {
  private options: SessionSupervisorOptions<T>;
  private logger: Logger;

  private state: SessionState = 'disconnected';
  private consecutiveFailures: number = 0;
  private lastActivity: number | null = null;

  private stopping: boolean = false;
  private abort: AbortController = new AbortController();
  private loop: Promise<void> | null = null;
  private attempt: AbortController | null = null;
  private interrupt: (() => void) | null = null;
  private degradedReason: string | null = null;

  private onFatal?: OnFatalFn;
  private onStateChange?: OnStateChangeFn;

  constructor(options: SessionSupervisorOptions<T>) {
    this.options = options;
    this.logger = createLogger(`Supervisor:${options.name}`);
  }

  /**
   * Set callback for unrecoverable authentication failures
   */
  setOnFatal(callback: OnFatalFn): void {
    this.onFatal = callback;
  }

  setOnStateChange(callback: OnStateChangeFn): void {
    this.onStateChange = callback;
  }

  getHealth(): ConnectionHealth {
    return {
      state: this.state,
      lastActivity: this.lastActivity,
      consecutiveFailures: this.consecutiveFailures,
    };
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  /**
   * Start supervising. Resolves immediately; the loop runs until stop()
   * or a fatal error.
   */
  start(): void {
    if (this.loop) return;
    this.stopping = false;
    this.abort = new AbortController();
    this.loop = this.run()
      .catch((error: unknown) => {
        this.logger.error(`Supervisor loop failed: ${describeError(error)}`);
      })
      .finally(() => {
        this.loop = null;
      });
  }

  /**
   * Move a Ready session to Degraded and reconnect. Concurrent reports
   * cause one reconnect.
   *
   * @returns whether this report triggered the transition
   */
  reportDegraded(reason: string): boolean {
    if (this.state !== 'ready' || this.degradedReason !== null || !this.interrupt) {
      this.logger.debug(`Ignoring degraded report while ${this.state}: ${reason}`);
      return false;
    }
    this.degradedReason = reason;
    this.interrupt();
    return true;
  }

  /**
   * Stop the loop: cancel backoff and any pending connect, let the
   * in-flight item finish, disconnect
   */
  async stop(): Promise<void> {
    this.stopping = true;
    this.abort.abort();
    this.attempt?.abort(new TransportError(`${this.options.name} stopping`));
    this.interrupt?.();

    const loop = this.loop;
    if (loop) await loop;
    await this.safeDisconnect();
    this.setState('disconnected');
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async run(): Promise<void> {
    let hasBeenReady = false;

    while (!this.stopping) {
      const attempt = new AbortController();
      this.attempt = attempt;
      const report: ReportStateFn = (state) => {
        if (!attempt.signal.aborted) this.setState(state);
      };

      try {
        this.setState('connecting');
        await withTimeout(
          this.options.connect(report, attempt.signal),
          this.options.connectTimeout,
          () => new TransportError(`${this.options.name} connect timed out after ${this.options.connectTimeout}ms`),
          attempt.signal
        );
        if (this.stopping) break;

        this.consecutiveFailures = 0;
        this.degradedReason = null;
        this.lastActivity = Date.now();
        this.setState('ready');
        this.logger.info(hasBeenReady ? 'Ready (reconnected)' : 'Ready');

        if (this.options.onReady) {
          await withTimeout(
            this.options.onReady(hasBeenReady),
            this.options.connectTimeout,
            () => new TransportError(`${this.options.name} initial sync timed out`),
            attempt.signal
          );
        }
        hasBeenReady = true;

        await this.pump();
        if (this.stopping) break;

        attempt.abort();
        this.setState('degraded');
        this.logger.warn(`Session degraded: ${this.degradedReason ?? 'stream ended'}`);
        this.options.onDown?.();
        await this.safeDisconnect();
      } catch (error) {
        attempt.abort(error);
        if (this.stopping) break;

        if (error instanceof AuthError) {
          this.logger.error(`Authentication failed, giving up: ${error.message}`);
          await this.safeDisconnect();
          this.setState('disconnected');
          this.onFatal?.(error);
          return;
        }

        const wasReady = this.state === 'ready';
        this.logger.warn(`Connection attempt failed: ${describeError(error)}`);
        this.setState('disconnected');
        if (wasReady) this.options.onDown?.();
        await this.safeDisconnect();
      }

      if (this.stopping) break;

      this.consecutiveFailures++;
      const delay = computeBackoffDelay(this.consecutiveFailures, this.options.backoff, this.options.random);
      this.logger.info(`Retrying in ${delay}ms (failure ${this.consecutiveFailures})`);
      await sleep(delay, this.abort.signal);
    }
  }

  /**
   * Feed stream items to onItem until the stream ends or is interrupted
   */
  private async pump(): Promise<void> {
    const iterator = this.options.stream()[Symbol.asyncIterator]();
    const interrupted = new Promise<typeof INTERRUPTED>((resolve) => {
      this.interrupt = () => resolve(INTERRUPTED);
    });

    try {
      while (!this.stopping && this.degradedReason === null) {
        const result = await Promise.race([iterator.next(), interrupted]);
        if (result === INTERRUPTED || result.done) break;

        this.lastActivity = Date.now();
        try {
          await this.options.onItem(result.value);
        } catch (error) {
          this.logger.error(`Error handling stream item: ${describeError(error)}`);
        }
      }
    } finally {
      this.interrupt = null;
      await iterator.return?.();
    }
  }

  private async safeDisconnect(): Promise<void> {
    try {
      await this.options.disconnect();
    } catch (error) {
      this.logger.warn(`Error while disconnecting: ${describeError(error)}`);
    }
  }

  private setState(state: SessionState): void {
    if (this.state === state) return;
    this.logger.debug(`${this.state} → ${state}`);
    this.state = state;
    this.onStateChange?.(state);
  }
}
