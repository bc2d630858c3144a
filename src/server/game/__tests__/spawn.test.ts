import test from 'node:test';
import assert from 'node:assert/strict';
import { World } from '../world.js';
import {
  findSpawnPoint,
  maintainPickups,
  rollPickupKind,
  targetPickupCount,
} from '../spawn.js';
import { cellKey, step } from '../grid.js';
import { createRng } from '../rng.js';
import { makePlayer, sequenceRng } from './fixtures.js';

test('pickup target is half the active players, rounded up', () => {
  assert.equal(targetPickupCount(0), 0);
  assert.equal(targetPickupCount(1), 1);
  assert.equal(targetPickupCount(2), 1);
  assert.equal(targetPickupCount(3), 2);
  assert.equal(targetPickupCount(5), 3);
  assert.equal(targetPickupCount(16), 8);
});

test('pickup kinds follow the 2 / 5 / 93 split', () => {
  assert.equal(rollPickupKind(sequenceRng([0.01])), 'bomb_brick');
  assert.equal(rollPickupKind(sequenceRng([0.05])), 'bullet_brick');
  assert.equal(rollPickupKind(sequenceRng([0.07])), 'brick');
  assert.equal(rollPickupKind(sequenceRng([0.5])), 'brick');
});

test('at most one pickup spawns per call, up to the target', () => {
  const world = new World();
  world.addPlayer(makePlayer('a', [[5, 5]]));
  world.addPlayer(makePlayer('b', [[10, 10]]));
  world.addPlayer(makePlayer('c', [[15, 15]]));
  const rng = createRng(11);

  maintainPickups(world, rng);
  assert.equal(world.pickups.length, 1);
  for (let i = 0; i < 5; i++) maintainPickups(world, rng);
  assert.equal(world.pickups.length, 2);

  const occupied = ['5,5', '10,10', '15,15'];
  for (const pickup of world.pickups) {
    assert.equal(occupied.includes(cellKey(pickup)), false);
  }
});

test('surplus pickups are removed when players leave the field', () => {
  const world = new World();
  world.addPickup({ x: 1, y: 1 }, 'brick');
  world.addPickup({ x: 2, y: 2 }, 'brick');
  world.addPickup({ x: 3, y: 3 }, 'brick');
  world.addPlayer(makePlayer('a', [[5, 5]]));

  maintainPickups(world, createRng(1));
  assert.deepEqual(world.pickups.map(cellKey), ['1,1']);
});

test('spawn point follows the random draws', () => {
  // x = 5 + 0.5 * 30, y = 5 + 0.5 * 20, heading index floor(0.5 * 4)
  const spawn = findSpawnPoint(new World(), sequenceRng([0.5]));
  assert.deepEqual(spawn, { cell: { x: 20, y: 15 }, direction: 'LEFT' });
});

test('spawn points keep 5 cells from the walls with a clear path ahead', () => {
  const world = new World();
  world.addPlayer(makePlayer('a', [[20, 15], [19, 15], [18, 15]]));
  const rng = createRng(99);

  for (let i = 0; i < 200; i++) {
    const { cell, direction } = findSpawnPoint(world, rng);
    assert.ok(cell.x >= 5 && cell.x <= 34, `x=${cell.x}`);
    assert.ok(cell.y >= 5 && cell.y <= 24, `y=${cell.y}`);

    const occupied = world.occupiedCells();
    assert.equal(occupied.has(cellKey(cell)), false);
    assert.equal(occupied.has(cellKey(step(cell, direction))), false);
    assert.equal(occupied.has(cellKey(step(cell, direction, 2))), false);
  }
});

test('a full arena falls back to the last empty cell', () => {
  const world = new World();
  for (let y = 0; y < 30; y++) {
    for (let x = 0; x < 40; x++) {
      if (x === 0 && y === 0) continue;
      world.addPickup({ x, y }, 'brick');
    }
  }

  const spawn = findSpawnPoint(world, createRng(5));
  assert.deepEqual(spawn, { cell: { x: 0, y: 0 }, direction: 'UP' });
});
