/**
 * @description: Guards the interaction lifecycle: legal transitions, single edit and terminal silence.
 * @parley-scope: test
 * @parley-module: DeferredInteractionTests
 * @parley-risk: low - Uses a recording transport only.
 */

import test from 'node:test';
import assert from 'node:assert/strict';

import { DeferredInteraction } from '../src/orchestrator/DeferredInteraction.js';
import { InternalInvariantViolationError, TransportError } from '../src/orchestrator/errors.js';
import { RecordingTransport, makeRequest } from './helpers.js';

const create = (transport = new RecordingTransport(), now = () => 10_000) =>
  new DeferredInteraction(makeRequest({ receivedAt: 9_000 }), transport, {
    ackDeadlineMs: 3_000,
    completionTimeoutMs: 60_000,
    now
  });

test('the happy path walks every state in order', async () => {
  const interaction = create();

  interaction.transition('rate_checked');
  interaction.transition('configured');
  await interaction.acknowledge({ mode: 'deferred' });
  interaction.transition('acknowledged');
  interaction.transition('completing');
  await interaction.editPlaceholder({ content: 'done' });
  interaction.transition('delivered');

  assert.deepEqual(interaction.history, [
    'received',
    'rate_checked',
    'configured',
    'acknowledged',
    'completing',
    'delivered'
  ]);
  assert.equal(interaction.isTerminal, true);
});

test('illegal transitions throw an invariant violation', () => {
  const interaction = create();

  assert.throws(() => interaction.transition('completing'), InternalInvariantViolationError);
  interaction.transition('failed');
  assert.throws(() => interaction.transition('delivered'), InternalInvariantViolationError);
  assert.equal(interaction.state, 'failed');
});

test('the ack budget counts down from the receive time', () => {
  const interaction = create();

  assert.equal(interaction.ackDeadlineAt, 12_000);
  assert.equal(interaction.ackBudgetMs(), 2_000);
  assert.equal(interaction.completionDeadlineAt, undefined);
});

test('the completion deadline starts at acknowledgment', async () => {
  const interaction = create();
  await interaction.acknowledge({ mode: 'deferred' });

  assert.equal(interaction.completionDeadlineAt, 70_000);
});

test('the placeholder can be edited only once', async () => {
  const transport = new RecordingTransport();
  const interaction = create(transport);
  await interaction.acknowledge({ mode: 'deferred' });

  await interaction.editPlaceholder({ content: 'first' });
  await assert.rejects(interaction.editPlaceholder({ content: 'second' }), InternalInvariantViolationError);
  assert.deepEqual(transport.sentTexts, ['<deferred>', 'first']);
});

test('an immediate acknowledgment has no placeholder to edit', async () => {
  const interaction = create();
  await interaction.acknowledge({ mode: 'immediate', reply: { content: 'pong' } });

  await assert.rejects(interaction.editPlaceholder({ content: 'late' }), InternalInvariantViolationError);
});

test('nothing is sent after a terminal state', async () => {
  const transport = new RecordingTransport();
  const interaction = create(transport);
  await interaction.acknowledge({ mode: 'deferred' });
  interaction.transition('failed');

  await assert.rejects(interaction.editPlaceholder({ content: 'late' }), InternalInvariantViolationError);
  await assert.rejects(interaction.sendFollowup('late'), InternalInvariantViolationError);
  assert.equal(transport.calls.length, 1);
});

test('followups require an acknowledgment', async () => {
  await assert.rejects(create().sendFollowup('early'), InternalInvariantViolationError);
});

test('a second acknowledgment is refused', async () => {
  const interaction = create();
  await interaction.acknowledge({ mode: 'deferred' });

  await assert.rejects(interaction.acknowledge({ mode: 'deferred' }), InternalInvariantViolationError);
});

test('a transport failure is retried once', async () => {
  const transport = new RecordingTransport();
  transport.failNext('followup');
  const interaction = create(transport);
  await interaction.acknowledge({ mode: 'deferred' });

  await interaction.sendFollowup('part two');

  assert.deepEqual(transport.sentTexts, ['<deferred>', 'part two', 'part two']);
});

test('a transport failure on the retry propagates', async () => {
  const transport = new RecordingTransport();
  transport.failNext('acknowledge', 2);
  const interaction = create(transport);

  await assert.rejects(interaction.acknowledge({ mode: 'deferred' }), TransportError);
  assert.equal(interaction.isAcknowledged, false);
  assert.equal(transport.calls.length, 2);
});

test('a missed ack deadline still attempts the acknowledgment', async () => {
  const transport = new RecordingTransport();
  const interaction = create(transport, () => 20_000);

  assert.ok(interaction.ackBudgetMs() < 0);
  await interaction.acknowledge({ mode: 'deferred' });
  assert.equal(interaction.isAcknowledged, true);
});
