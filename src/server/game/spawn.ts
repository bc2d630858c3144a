import { Cell, Direction, DIRECTIONS, Pickup, PickupKind } from '../../shared/types.js';
import {
  GRID_WIDTH,
  GRID_HEIGHT,
  SPAWN_WALL_MARGIN,
  SPAWN_MAX_ATTEMPTS,
  SPAWN_LOOKAHEAD,
  BOMB_BRICK_CHANCE,
  BULLET_BRICK_CHANCE,
} from '../../shared/constants.js';
import { World } from './world.js';
import { cellKey, inBounds, step, wallDistance } from './grid.js';
import { Random, nextInt, pick } from './rng.js';
import { SpawnPoint } from './snake.js';

// 1 player -> 1, 2-3 -> 2, 4-5 -> 3, ...
export function targetPickupCount(activePlayers: number): number {
  return Math.ceil(Math.max(0, activePlayers) / 2);
}

export function rollPickupKind(rng: Random): PickupKind {
  const roll = rng.next() * 100;
  if (roll < BOMB_BRICK_CHANCE) return 'bomb_brick';
  if (roll < BOMB_BRICK_CHANCE + BULLET_BRICK_CHANCE) return 'bullet_brick';
  return 'brick';
}

function emptyCells(occupied: Set<string>): Cell[] {
  const cells: Cell[] = [];
  for (let y = 0; y < GRID_HEIGHT; y++) {
    for (let x = 0; x < GRID_WIDTH; x++) {
      const cell = { x, y };
      if (!occupied.has(cellKey(cell))) cells.push(cell);
    }
  }
  return cells;
}

/** Place one pickup on a uniformly random empty cell. */
export function spawnPickup(world: World, rng: Random): Pickup | undefined {
  const cell = pick(rng, emptyCells(world.occupiedCells()));
  if (!cell) return undefined;
  return world.addPickup(cell, rollPickupKind(rng));
}

/**
 * Move the pickup count one step toward the target for the current number of
 * active players. Surplus pickups (players left or died) are removed newest first.
 */
export function maintainPickups(world: World, rng: Random): void {
  const target = dropSurplusPickups(world);
  if (world.pickups.length < target) {
    spawnPickup(world, rng);
  }
}

/** Trim pickups down to the current target; returns that target. */
export function dropSurplusPickups(world: World): number {
  const target = targetPickupCount(world.activePlayerCount());
  while (world.pickups.length > target) {
    world.pickups.pop();
  }
  return target;
}

function freeRun(cell: Cell, direction: Direction, occupied: Set<string>, limit: number): number {
  let run = 0;
  let next = cell;
  while (run < limit) {
    next = step(next, direction);
    if (!inBounds(next) || occupied.has(cellKey(next))) break;
    run++;
  }
  return run;
}

function safeDirections(cell: Cell, occupied: Set<string>): Direction[] {
  return DIRECTIONS.filter(d => freeRun(cell, d, occupied, SPAWN_LOOKAHEAD) === SPAWN_LOOKAHEAD);
}

/**
 * Pick a spawn cell away from the walls with a clear path ahead.
 *
 * Random attempts are bounded; once they are used up the most open empty
 * cell on the whole grid is taken instead, so spawning never fails.
 */
export function findSpawnPoint(world: World, rng: Random): SpawnPoint {
  const occupied = world.occupiedCells();

  for (let attempt = 0; attempt < SPAWN_MAX_ATTEMPTS; attempt++) {
    const cell = {
      x: nextInt(rng, SPAWN_WALL_MARGIN, GRID_WIDTH - 1 - SPAWN_WALL_MARGIN),
      y: nextInt(rng, SPAWN_WALL_MARGIN, GRID_HEIGHT - 1 - SPAWN_WALL_MARGIN),
    };
    if (occupied.has(cellKey(cell))) continue;
    const direction = pick(rng, safeDirections(cell, occupied));
    if (direction) return { cell, direction };
  }

  return fallbackSpawnPoint(occupied);
}

function fallbackSpawnPoint(occupied: Set<string>): SpawnPoint {
  let best: SpawnPoint | null = null;
  let bestScore = -1;
  for (const cell of emptyCells(occupied)) {
    for (const direction of DIRECTIONS) {
      const score = freeRun(cell, direction, occupied, GRID_WIDTH) * 100 + wallDistance(cell);
      if (score > bestScore) {
        bestScore = score;
        best = { cell, direction };
      }
    }
  }
  // Completely full grid: the centre is as good as anywhere
  return best ?? { cell: { x: Math.floor(GRID_WIDTH / 2), y: Math.floor(GRID_HEIGHT / 2) }, direction: 'RIGHT' };
}
