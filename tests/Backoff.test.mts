import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { computeBackoffDelay, sleep, withTimeout } from '../lib/utils/Backoff.mjs';
import { Mutex } from '../lib/utils/Mutex.mjs';

const policy = { baseDelay: 1000, maxDelay: 60000 };

describe('computeBackoffDelay', () => {
  it('starts at the base delay with equal jitter', () => {
    assert.equal(computeBackoffDelay(1, policy, () => 0), 500);
    assert.equal(computeBackoffDelay(1, policy, () => 1), 1000);
  });

  it('doubles per consecutive failure', () => {
    assert.equal(computeBackoffDelay(2, policy, () => 0), 1000);
    assert.equal(computeBackoffDelay(3, policy, () => 0.5), 3000);
  });

  it('caps at the maximum delay', () => {
    assert.equal(computeBackoffDelay(10, policy, () => 0), 30000);
    assert.equal(computeBackoffDelay(40, policy, () => 1), 60000);
  });

  it('treats zero failures like the first', () => {
    assert.equal(computeBackoffDelay(0, policy, () => 0), 500);
  });

  it('stays within [delay/2, delay] for any random source', () => {
    for (let failures = 1; failures <= 8; failures++) {
      const cap = Math.min(policy.maxDelay, policy.baseDelay * 2 ** (failures - 1));
      const delay = computeBackoffDelay(failures, policy);
      assert.ok(delay >= cap / 2 && delay <= cap, `failures=${failures} delay=${delay}`);
    }
  });
});

describe('sleep', () => {
  it('ends early when aborted', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const sleeping = sleep(10000, controller.signal);
    controller.abort();
    await sleeping;
    assert.ok(Date.now() - started < 1000);
  });

  it('returns at once for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const started = Date.now();
    await sleep(10000, controller.signal);
    assert.ok(Date.now() - started < 1000);
  });
});

describe('withTimeout', () => {
  it('passes the value through', async () => {
    assert.equal(await withTimeout(Promise.resolve(5), 100, () => new Error('late')), 5);
  });

  it('rejects with the built error when the timer wins', async () => {
    const never = new Promise<number>(() => undefined);
    await assert.rejects(withTimeout(never, 10, () => new Error('too slow')), /too slow/);
  });

  it('rejects with the abort reason when the signal aborts first', async () => {
    const never = new Promise<number>(() => undefined);
    const controller = new AbortController();
    const pending = withTimeout(never, 60_000, () => new Error('too slow'), controller.signal);

    controller.abort(new Error('stopping'));
    await assert.rejects(pending, /stopping/);
  });

  it('rejects at once for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('gone'));
    await assert.rejects(withTimeout(Promise.resolve(1), 100, () => new Error('too slow'), controller.signal), /gone/);
  });
});

describe('Mutex', () => {
  it('runs critical sections one at a time in order', async () => {
    const mutex = new Mutex();
    const log: string[] = [];

    const first = mutex.runExclusive(async () => {
      log.push('first:start');
      await sleep(10);
      log.push('first:end');
    });
    const second = mutex.runExclusive(() => {
      log.push('second');
    });

    await Promise.all([first, second]);
    assert.deepEqual(log, ['first:start', 'first:end', 'second']);
    assert.equal(mutex.isLocked, false);
  });

  it('releases the lock when a section throws', async () => {
    const mutex = new Mutex();
    await assert.rejects(
      mutex.runExclusive(() => {
        throw new Error('boom');
      }),
      /boom/
    );
    assert.equal(await mutex.runExclusive(() => 'ok'), 'ok');
  });
});
