/**
 * @description: Covers sliding-window rate limiting per bot and user.
 * @parley-scope: test
 * @parley-module: RateLimiterTests
 * @parley-risk: low - Uses an injected clock only.
 */

import test from 'node:test';
import assert from 'node:assert/strict';

import { RateLimiter } from '../src/utils/RateLimiter.js';

const createClock = (start = 1_000_000) => {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    }
  };
};

test('the eleventh request inside the window is denied after ten are allowed', () => {
  const clock = createClock();
  const limiter = new RateLimiter({ limit: 10, windowMs: 60_000, now: clock.now });

  for (let i = 0; i < 10; i++) {
    assert.deepEqual(limiter.check('bot-a', 'user-1'), { allowed: true });
    clock.advance(1_000);
  }

  const decision = limiter.check('bot-a', 'user-1');
  assert.equal(decision.allowed, false);
  assert.ok(!decision.allowed && decision.retryAfterMs > 0);
});

test('retryAfterMs counts down to when the oldest request leaves the window', () => {
  const clock = createClock();
  const limiter = new RateLimiter({ limit: 2, windowMs: 10_000, now: clock.now });

  limiter.check('bot-a', 'user-1');
  clock.advance(3_000);
  limiter.check('bot-a', 'user-1');
  clock.advance(1_000);

  // Oldest was 4s ago, so it expires in 6s.
  assert.deepEqual(limiter.check('bot-a', 'user-1'), { allowed: false, retryAfterMs: 6_000 });
});

test('denied checks do not consume quota', () => {
  const clock = createClock();
  const limiter = new RateLimiter({ limit: 1, windowMs: 10_000, now: clock.now });

  assert.equal(limiter.check('bot-a', 'user-1').allowed, true);
  for (let i = 0; i < 5; i++) {
    clock.advance(1_000);
    assert.equal(limiter.check('bot-a', 'user-1').allowed, false);
  }

  // Only the first request counts, so the window reopens 10s after it.
  clock.advance(5_000);
  assert.equal(limiter.check('bot-a', 'user-1').allowed, true);
});

test('a request exactly one window later is allowed', () => {
  const clock = createClock();
  const limiter = new RateLimiter({ limit: 1, windowMs: 10_000, now: clock.now });

  limiter.check('bot-a', 'user-1');
  clock.advance(10_000);
  assert.equal(limiter.check('bot-a', 'user-1').allowed, true);
});

test('quota is tracked separately per bot and per user', () => {
  const clock = createClock();
  const limiter = new RateLimiter({ limit: 1, windowMs: 60_000, now: clock.now });

  assert.equal(limiter.check('bot-a', 'user-1').allowed, true);
  assert.equal(limiter.check('bot-a', 'user-1').allowed, false);
  assert.equal(limiter.check('bot-b', 'user-1').allowed, true);
  assert.equal(limiter.check('bot-a', 'user-2').allowed, true);
  assert.equal(limiter.trackedIdentities, 3);
});

test('cleanup drops identities whose windows have expired', () => {
  const clock = createClock();
  const limiter = new RateLimiter({ limit: 5, windowMs: 10_000, now: clock.now });

  limiter.check('bot-a', 'user-1');
  clock.advance(6_000);
  limiter.check('bot-a', 'user-2');
  clock.advance(5_000);

  assert.equal(limiter.cleanup(), 1);
  assert.equal(limiter.trackedIdentities, 1);
});

test('invalid limits are rejected at construction', () => {
  assert.throws(() => new RateLimiter({ limit: 0, windowMs: 1_000 }), /positive integer/);
  assert.throws(() => new RateLimiter({ limit: 2.5, windowMs: 1_000 }), /positive integer/);
  assert.throws(() => new RateLimiter({ limit: 1, windowMs: 0 }), /must be positive/);
});
