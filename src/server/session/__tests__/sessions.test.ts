import test from 'node:test';
import assert from 'node:assert/strict';
import { World } from '../../game/world.js';
import { ColorPool } from '../../game/snake.js';
import { createRng } from '../../game/rng.js';
import { SessionManager, endpointKey } from '../sessions.js';

function setup() {
  let now = 1_000;
  const world = new World();
  const sessions = new SessionManager(world, new ColorPool(createRng(1)), {
    maxSessions: 16,
    clientTimeoutMs: 10_000,
    heartbeatIntervalMs: 5_000,
    now: () => now,
  });
  const advance = (ms: number) => {
    now += ms;
  };
  return { world, sessions, advance };
}

const endpoint = (port: number) => ({ address: '127.0.0.1', port });

test('connect creates a session and a player keyed by endpoint', () => {
  const { world, sessions } = setup();
  const result = sessions.connect(endpoint(4000), '  alice ');
  assert.ok(result.success);
  assert.equal(result.reconnected, false);
  assert.equal(result.session.id, '127.0.0.1:4000');
  assert.equal(result.session.state, 'active');
  assert.equal(result.player.name, 'alice');
  assert.equal(result.player.color, '#00FF00');
  assert.equal(world.getPlayer('127.0.0.1:4000'), result.player);
});

test('each connection gets a fresh public id unrelated to the endpoint', () => {
  const { sessions } = setup();
  const first = sessions.connect(endpoint(4000), 'alice');
  const second = sessions.connect(endpoint(4001), 'bob');
  assert.ok(first.success && second.success);
  assert.equal(first.player.publicId, 'p1');
  assert.equal(second.player.publicId, 'p2');

  sessions.disconnect('127.0.0.1:4000');
  const again = sessions.connect(endpoint(4000), 'alice');
  assert.ok(again.success);
  assert.equal(again.player.publicId, 'p3');
});

test('the 17th connect is rejected and creates no player', () => {
  const { world, sessions } = setup();
  for (let i = 0; i < 16; i++) {
    assert.equal(sessions.connect(endpoint(5000 + i), `p${i}`).success, true);
  }

  const result = sessions.connect(endpoint(6000), 'late');
  assert.deepEqual(result, {
    success: false,
    error: 'SERVER_FULL',
    message: 'Server is full (16/16 players). Please try again later.',
  });
  assert.equal(world.players.size, 16);
  assert.equal(sessions.size, 16);
  assert.equal(world.findPlayerByName('late'), undefined);
});

test('a name held by another endpoint is refused', () => {
  const { sessions } = setup();
  sessions.connect(endpoint(4000), 'alice');
  const result = sessions.connect(endpoint(4001), 'alice');
  assert.equal(result.success, false);
  assert.equal(!result.success && result.error, 'NAME_TAKEN');
  assert.equal(sessions.size, 1);
});

test('the same endpoint reconnecting gets its session back', () => {
  const { sessions } = setup();
  const first = sessions.connect(endpoint(4000), 'alice');
  const again = sessions.connect(endpoint(4000), 'alice');
  assert.ok(first.success && again.success);
  assert.equal(again.reconnected, true);
  assert.equal(again.player, first.player);
  assert.equal(sessions.size, 1);
});

test('empty names are refused', () => {
  const { sessions } = setup();
  const result = sessions.connect(endpoint(4000), '   ');
  assert.equal(!result.success && result.error, 'INVALID_NAME');
  assert.equal(sessions.size, 0);
});

test('disconnect removes the player and frees its color', () => {
  const { world, sessions } = setup();
  sessions.connect(endpoint(4000), 'alice');
  sessions.connect(endpoint(4001), 'bob');

  const removed = sessions.disconnect(endpointKey(endpoint(4000)));
  assert.equal(removed?.player?.name, 'alice');
  assert.equal(removed?.session.state, 'expired');
  assert.equal(world.players.size, 1);
  assert.equal(sessions.disconnect('127.0.0.1:4000'), undefined);

  const carol = sessions.connect(endpoint(4002), 'carol');
  assert.ok(carol.success);
  assert.equal(carol.player.color, '#00FF00');
});

test('silent sessions go idle, then expire', () => {
  const { world, sessions, advance } = setup();
  sessions.connect(endpoint(4000), 'alice');
  sessions.connect(endpoint(4001), 'bob');

  advance(6_000);
  sessions.touch('127.0.0.1:4001');
  assert.deepEqual(sessions.sweep(), []);
  assert.deepEqual(sessions.list().map(s => s.state), ['idle', 'active']);

  advance(4_001);
  const expired = sessions.sweep();
  assert.deepEqual(expired.map(e => e.session.name), ['alice']);
  assert.equal(world.getPlayer('127.0.0.1:4000'), undefined);
  assert.deepEqual(sessions.list().map(s => s.name), ['bob']);

  sessions.touch('127.0.0.1:4001');
  assert.equal(sessions.list()[0]?.state, 'active');
});

test('touch reports unknown endpoints', () => {
  const { sessions } = setup();
  assert.equal(sessions.touch('10.0.0.1:1'), false);
});
