import test from 'node:test';
import assert from 'node:assert/strict';
import { World } from '../world.js';
import { GameEngine } from '../engine.js';
import { DIRECTIONS } from '../../../shared/types.js';
import { cellKey } from '../grid.js';
import { createRng, pick } from '../rng.js';
import { targetPickupCount } from '../spawn.js';
import { bodyOf, makePlayer } from './fixtures.js';

function setup(seed = 1) {
  const world = new World();
  const engine = new GameEngine(world, createRng(seed), { moveIntervalMs: 150 });
  return { world, engine };
}

test('head at (10,10) heading RIGHT advances to (11,10) for one point', () => {
  const { world, engine } = setup();
  const player = makePlayer('a', [[10, 10]], 'RIGHT');
  world.addPlayer(player);

  engine.movePlayers();
  assert.deepEqual(bodyOf(player), [[11, 10]]);
  assert.equal(player.score, 1);
});

test('a regular brick at (5,5) is eaten for 100 points and one cell of growth', () => {
  const { world, engine } = setup();
  const player = makePlayer('a', [[4, 5], [3, 5]], 'RIGHT');
  world.addPlayer(player);
  world.addPickup({ x: 5, y: 5 }, 'brick');

  const events = engine.movePlayers();
  assert.deepEqual(bodyOf(player), [[5, 5], [4, 5], [3, 5]]);
  assert.equal(player.score, 100);
  assert.equal(world.pickups.length, 0);
  assert.deepEqual(events, [{ type: 'pickupCollected', playerId: 'a', kind: 'brick' }]);
});

test('ammo bricks add ammo without growth', () => {
  const { world, engine } = setup();
  const player = makePlayer('a', [[4, 5], [3, 5]], 'RIGHT');
  world.addPlayer(player);
  world.addPickup({ x: 5, y: 5 }, 'bullet_brick');
  world.addPickup({ x: 6, y: 5 }, 'bomb_brick');

  engine.movePlayers();
  engine.movePlayers();
  assert.deepEqual(bodyOf(player), [[6, 5], [5, 5]]);
  assert.equal(player.bullets, 1);
  assert.equal(player.bombs, 1);
  assert.equal(player.score, 2);
});

test('hitting the wall kills and reports the score at death', () => {
  const { world, engine } = setup();
  const player = makePlayer('a', [[39, 10], [38, 10]], 'RIGHT', { score: 12, bullets: 1 });
  world.addPlayer(player);

  const events = engine.movePlayers();
  assert.equal(player.alive, false);
  assert.deepEqual(player.body, []);
  assert.equal(player.bullets, 0);
  assert.deepEqual(events, [{ type: 'playerDied', playerId: 'a', name: 'a', cause: 'wall', score: 12 }]);
});

test('turning into its own body is a self collision', () => {
  const { world, engine } = setup();
  const player = makePlayer('a', [[5, 5], [6, 5], [6, 6], [5, 6], [4, 6]], 'LEFT');
  world.addPlayer(player);
  engine.steer('a', 'DOWN');

  const [died] = engine.movePlayers();
  assert.equal(player.alive, false);
  assert.ok(died?.type === 'playerDied');
  assert.equal(died.cause, 'self');
});

test('only the snake that runs into another body dies', () => {
  const { world, engine } = setup();
  const mover = makePlayer('mover', [[10, 10]], 'RIGHT');
  const wall = makePlayer('wall', [[11, 9], [11, 10], [11, 11]], 'UP');
  world.addPlayer(mover);
  world.addPlayer(wall);

  engine.movePlayers();
  assert.equal(mover.alive, false);
  assert.equal(wall.alive, true);
  assert.deepEqual(bodyOf(wall), [[11, 8], [11, 9], [11, 10]]);
});

test('collisions are judged against bodies from before the tick', () => {
  // b leaves (11,10) this tick, but a still sees it as occupied
  const { world, engine } = setup();
  const a = makePlayer('a', [[10, 10]], 'RIGHT');
  const b = makePlayer('b', [[11, 10]], 'UP');
  world.addPlayer(b);
  world.addPlayer(a);

  engine.movePlayers();
  assert.equal(a.alive, false);
  assert.deepEqual(bodyOf(b), [[11, 9]]);
});

test('two heads entering the same empty cell both die', () => {
  const { world, engine } = setup();
  const a = makePlayer('a', [[10, 10], [9, 10]], 'RIGHT');
  const b = makePlayer('b', [[12, 10], [13, 10]], 'LEFT');
  world.addPlayer(a);
  world.addPlayer(b);

  const events = engine.movePlayers();
  assert.equal(a.alive, false);
  assert.equal(b.alive, false);
  assert.deepEqual(bodyOf(a), []);
  assert.deepEqual(bodyOf(b), []);
  assert.deepEqual(events, [
    { type: 'playerDied', playerId: 'a', name: 'a', cause: 'player', score: 1 },
    { type: 'playerDied', playerId: 'b', name: 'b', cause: 'player', score: 1 },
  ]);
});

test('heads in different cells are left alone', () => {
  const { world, engine } = setup();
  const a = makePlayer('a', [[10, 10]], 'RIGHT');
  const b = makePlayer('b', [[13, 10]], 'LEFT');
  world.addPlayer(a);
  world.addPlayer(b);

  assert.deepEqual(engine.movePlayers(), []);
  assert.deepEqual(bodyOf(a), [[11, 10]]);
  assert.deepEqual(bodyOf(b), [[12, 10]]);
});

test('three 50 ms steps make one move and three bullet steps', () => {
  const { world, engine } = setup();
  const player = makePlayer('a', [[10, 10]], 'RIGHT', { bullets: 1 });
  world.addPlayer(player);
  engine.queueAction('a', 'shoot');

  engine.step(50);
  assert.deepEqual(world.bullets.map(b => [b.x, b.y]), [[11, 10]]);
  engine.step(50);
  engine.step(50);

  assert.deepEqual(bodyOf(player), [[11, 10]]);
  assert.deepEqual(world.bullets.map(b => [b.x, b.y]), [[13, 10]]);
  assert.equal(player.score, 1);
  assert.equal(world.pickups.length, 1);
  assert.equal(engine.tick, 3);
  assert.equal(engine.gameTime, 0.15);
});

test('respawn waits for a request and halves the score', () => {
  const { world, engine } = setup();
  const player = makePlayer('a', [], 'RIGHT', { score: 301, alive: false });
  world.addPlayer(player);

  engine.step(10);
  assert.equal(player.alive, false);

  assert.equal(engine.requestRespawn('a'), true);
  const events = engine.step(10);
  assert.equal(player.alive, true);
  assert.equal(player.score, 150);
  assert.equal(player.bullets, 0);
  assert.equal(player.bombs, 0);
  assert.equal(player.body.length, 1);
  assert.deepEqual(events, [{ type: 'playerSpawned', playerId: 'a', name: 'a' }]);
});

test('respawn requests from living players are ignored', () => {
  const { world, engine } = setup();
  world.addPlayer(makePlayer('a', [[10, 10]], 'RIGHT', { score: 40 }));
  assert.equal(engine.requestRespawn('a'), false);
  assert.equal(engine.requestRespawn('missing'), false);
});

test('leave_game and start_game move a player between the arena and the stands', () => {
  const { world, engine } = setup();
  const player = makePlayer('a', [[10, 10]], 'RIGHT', { score: 90, bullets: 2 });
  world.addPlayer(player);

  engine.queueAction('a', 'leave_game');
  let events = engine.step(10);
  assert.equal(player.inGame, false);
  assert.equal(player.alive, false);
  assert.equal(player.score, 90);
  assert.deepEqual(events, [{ type: 'playerLeftGame', playerId: 'a', name: 'a', score: 90 }]);

  engine.queueAction('a', 'start_game');
  events = engine.step(10);
  assert.equal(player.inGame, true);
  assert.equal(player.alive, true);
  assert.equal(player.score, 0);
  assert.equal(player.bullets, 0);
  assert.deepEqual(events, [{ type: 'playerSpawned', playerId: 'a', name: 'a' }]);
});

test('actions from players that have gone are dropped', () => {
  const { world, engine } = setup();
  engine.queueAction('ghost', 'shoot');
  assert.deepEqual(engine.step(10), []);
  assert.equal(world.bullets.length, 0);
});

test('a forgotten player leaves no queued action or projectile for a newcomer with the same id', () => {
  const { world, engine } = setup();
  world.addPlayer(makePlayer('a', [[10, 10]], 'RIGHT', { bullets: 1 }));
  world.addBullet({ x: 20, y: 20 }, 'UP', 'a');
  world.addBomb({ x: 8, y: 8 }, 2000, 'a');
  world.addBullet({ x: 1, y: 1 }, 'DOWN', 'b');
  engine.queueAction('a', 'shoot');

  world.removePlayer('a');
  engine.forgetPlayer('a');
  const newcomer = makePlayer('a', [[30, 5]], 'LEFT', { bullets: 1 });
  world.addPlayer(newcomer);

  engine.step(10);
  assert.equal(newcomer.bullets, 1);
  assert.deepEqual(world.bullets.map(b => b.ownerId), ['b']);
  assert.equal(world.bombs.length, 0);
});

test('bodies never hold duplicate cells and pickups stay within the target', () => {
  const { world, engine } = setup(2024);
  const rng = createRng(77);
  for (let i = 0; i < 6; i++) {
    const player = makePlayer(`p${i}`, [], 'RIGHT', { alive: false });
    world.addPlayer(player);
    engine.spawnPlayer(player);
  }

  for (let tick = 0; tick < 3000; tick++) {
    for (const player of world.players.values()) {
      const direction = pick(rng, DIRECTIONS);
      if (direction && rng.next() < 0.2) engine.steer(player.id, direction);
      if (!player.alive) engine.requestRespawn(player.id);
      if (rng.next() < 0.05) {
        player.bullets = 1;
        engine.queueAction(player.id, 'shoot');
      }
    }
    engine.step(50);

    for (const player of world.players.values()) {
      if (!player.alive) continue;
      const keys = player.body.map(cellKey);
      assert.equal(new Set(keys).size, keys.length, `duplicate cell in ${player.id} at tick ${tick}`);
    }
    assert.ok(world.pickups.length <= targetPickupCount(world.activePlayerCount()));
  }
});

test('steering applies on the next move', () => {
  const { world, engine } = setup();
  const player = makePlayer('a', [[10, 10], [9, 10]], 'RIGHT');
  world.addPlayer(player);

  assert.equal(engine.steer('a', 'UP'), true);
  assert.equal(player.direction, 'RIGHT');
  engine.movePlayers();
  assert.deepEqual(bodyOf(player), [[10, 9], [10, 10]]);
  assert.equal(player.direction, 'UP');
  assert.equal(player.pendingDirection, null);
});
