import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as delay } from 'node:timers/promises';
import { SessionSupervisor, type SessionSupervisorOptions } from '../lib/supervisor/SessionSupervisor.mjs';
import { AsyncQueue } from '../lib/utils/AsyncQueue.mjs';
import { AuthError, TransportError } from '../lib/errors.mjs';
import { waitFor } from './helpers/fakes.mjs';
import type { SessionState } from '../lib/types.mjs';

/**
 * Session whose connect outcomes are scripted
 */
class ScriptedSession {
  failures: Error[] = [];
  hang: boolean = false;
  connectDelay: number = 0;
  connects: number = 0;
  signals: AbortSignal[] = [];
  disconnects: number = 0;
  queue: AsyncQueue<number> = new AsyncQueue();

  async connect(report: (state: SessionState) => void, signal: AbortSignal): Promise<void> {
    this.connects++;
    this.signals.push(signal);
    if (this.hang) {
      await new Promise<void>(() => undefined);
    }
    if (this.connectDelay > 0) await delay(this.connectDelay);
    const failure = this.failures.shift();
    if (failure) throw failure;
    report('authenticated');
    this.queue = new AsyncQueue();
  }

  async disconnect(): Promise<void> {
    this.disconnects++;
    this.queue.close();
  }
}

function supervise(
  session: ScriptedSession,
  overrides: Partial<SessionSupervisorOptions<number>> = {}
): SessionSupervisor<number> {
  return new SessionSupervisor<number>({
    name: 'test',
    connect: (report, signal) => session.connect(report, signal),
    stream: () => session.queue,
    disconnect: () => session.disconnect(),
    onItem: async () => undefined,
    backoff: { baseDelay: 10, maxDelay: 40 },
    connectTimeout: 1000,
    random: () => 0,
    ...overrides,
  });
}

describe('SessionSupervisor', () => {
  it('walks connecting → authenticated → ready', async () => {
    const session = new ScriptedSession();
    const supervisor = supervise(session);
    const states: SessionState[] = [];
    supervisor.setOnStateChange((state) => states.push(state));

    supervisor.start();
    await waitFor(() => supervisor.getHealth().state === 'ready');
    assert.deepEqual(states, ['connecting', 'authenticated', 'ready']);
    assert.equal(supervisor.isRunning, true);

    await supervisor.stop();
    assert.equal(supervisor.getHealth().state, 'disconnected');
    assert.equal(supervisor.isRunning, false);
  });

  it('counts consecutive failures and resets them on Ready', async () => {
    const session = new ScriptedSession();
    session.failures.push(new TransportError('refused'), new TransportError('refused'));
    const supervisor = supervise(session);
    const failuresAtConnect: number[] = [];
    supervisor.setOnStateChange((state) => {
      if (state === 'connecting') failuresAtConnect.push(supervisor.getHealth().consecutiveFailures);
    });

    supervisor.start();
    await waitFor(() => supervisor.getHealth().state === 'ready');
    assert.deepEqual(failuresAtConnect, [0, 1, 2]);
    assert.equal(supervisor.getHealth().consecutiveFailures, 0);
    assert.equal(session.connects, 3);
    await supervisor.stop();
  });

  it('treats AuthError as fatal', async () => {
    const session = new ScriptedSession();
    session.failures.push(new AuthError('bad certificate'));
    const supervisor = supervise(session);
    const fatals: AuthError[] = [];
    supervisor.setOnFatal((error) => fatals.push(error));

    supervisor.start();
    await waitFor(() => !supervisor.isRunning);
    assert.deepEqual(fatals.map((error) => error.message), ['bad certificate']);
    assert.equal(session.connects, 1);
    assert.equal(supervisor.getHealth().state, 'disconnected');
  });

  it('gives up on a connect that never completes', async () => {
    const session = new ScriptedSession();
    session.hang = true;
    const supervisor = supervise(session, { connectTimeout: 20 });

    supervisor.start();
    await waitFor(() => session.connects >= 2);
    assert.ok(session.disconnects >= 1);
    await supervisor.stop();
  });

  it('reconnects once for concurrent degraded reports', async () => {
    const session = new ScriptedSession();
    let downs = 0;
    const readies: boolean[] = [];
    const supervisor = supervise(session, {
      onDown: () => {
        downs++;
      },
      onReady: async (isReconnect) => {
        readies.push(isReconnect);
      },
    });

    supervisor.start();
    await waitFor(() => readies.length === 1);
    await delay(5);

    assert.equal(supervisor.reportDegraded('keepalive'), true);
    assert.equal(supervisor.reportDegraded('keepalive again'), false);

    await waitFor(() => readies.length === 2);
    assert.deepEqual(readies, [false, true]);
    assert.equal(session.connects, 2);
    assert.equal(downs, 1);
    await supervisor.stop();
  });

  it('reconnects when the stream ends', async () => {
    const session = new ScriptedSession();
    const supervisor = supervise(session);

    supervisor.start();
    await waitFor(() => supervisor.getHealth().state === 'ready');
    session.queue.close();

    await waitFor(() => session.connects === 2 && supervisor.getHealth().state === 'ready');
    await supervisor.stop();
  });

  it('handles items one at a time in arrival order', async () => {
    const session = new ScriptedSession();
    const handled: number[] = [];
    let active = 0;
    let maxActive = 0;
    const supervisor = supervise(session, {
      onItem: async (item) => {
        active++;
        maxActive = Math.max(maxActive, active);
        try {
          await delay(2);
          if (item === 2) throw new Error('handler failed');
          handled.push(item);
        } finally {
          active--;
        }
      },
    });

    supervisor.start();
    await waitFor(() => supervisor.getHealth().state === 'ready');
    session.queue.push(1);
    session.queue.push(2);
    session.queue.push(3);

    await waitFor(() => handled.length === 2);
    assert.deepEqual(handled, [1, 3]);
    assert.equal(maxActive, 1);
    await supervisor.stop();
  });

  it('stop interrupts a connect that never completes', async () => {
    const session = new ScriptedSession();
    session.hang = true;
    const supervisor = supervise(session, { connectTimeout: 60_000 });

    supervisor.start();
    await waitFor(() => supervisor.getHealth().state === 'connecting');

    const started = Date.now();
    await supervisor.stop();
    assert.ok(Date.now() - started < 1000);
    assert.equal(session.signals[0]?.aborted, true);
    assert.equal(session.connects, 1);
    assert.equal(supervisor.getHealth().state, 'disconnected');
    assert.equal(supervisor.isRunning, false);
  });

  it('stop interrupts an initial sync that never completes', async () => {
    const session = new ScriptedSession();
    const supervisor = supervise(session, {
      connectTimeout: 60_000,
      onReady: () => new Promise<void>(() => undefined),
    });

    supervisor.start();
    await waitFor(() => supervisor.getHealth().state === 'ready');

    const started = Date.now();
    await supervisor.stop();
    assert.ok(Date.now() - started < 1000);
    assert.equal(supervisor.getHealth().state, 'disconnected');
  });

  it('ignores reports from an attempt that timed out', async () => {
    const session = new ScriptedSession();
    session.connectDelay = 60;
    const supervisor = supervise(session, {
      connectTimeout: 20,
      backoff: { baseDelay: 60_000, maxDelay: 60_000 },
    });
    const states: SessionState[] = [];
    supervisor.setOnStateChange((state) => states.push(state));

    supervisor.start();
    await waitFor(() => supervisor.getHealth().consecutiveFailures === 1);
    await delay(100);

    assert.deepEqual(states, ['connecting', 'disconnected']);
    assert.equal(session.signals[0]?.aborted, true);
    assert.equal(supervisor.getHealth().state, 'disconnected');
    await supervisor.stop();
  });

  it('stop cancels a pending backoff', async () => {
    const session = new ScriptedSession();
    session.failures.push(new TransportError('refused'));
    const supervisor = supervise(session, { backoff: { baseDelay: 60_000, maxDelay: 60_000 } });

    supervisor.start();
    await waitFor(() => supervisor.getHealth().consecutiveFailures === 1);

    const started = Date.now();
    await supervisor.stop();
    assert.ok(Date.now() - started < 1000);
    assert.equal(session.connects, 1);
    assert.equal(supervisor.getHealth().state, 'disconnected');
  });
});
