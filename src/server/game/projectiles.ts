/**
 * Bullets, bombs and explosions.
 *
 * Bullets move one cell per bullet step and stop at the first snake they
 * touch. Bombs count down in milliseconds and, when the fuse runs out, turn
 * into an explosion that damages every snake in its 3x3 block once. The
 * owner of a bullet or bomb is never damaged by it.
 */

import { Bomb, Bullet, Player } from '../../shared/types.js';
import {
  BOMB_THROW_MIN,
  BOMB_THROW_MAX,
  BOMB_FUSE_MIN_MS,
  BOMB_FUSE_MAX_MS,
  EXPLOSION_RADIUS,
  EXPLOSION_DURATION_MS,
  KILL_REWARD,
} from '../../shared/constants.js';
import { World } from './world.js';
import { BodyHit, findBodyHit } from './collision.js';
import { EngineEvent } from './events.js';
import { cellKey, clampToGrid, inBounds, neighborhood, perpendiculars, step } from './grid.js';
import { addScore, getHead, killPlayer, truncateBody } from './snake.js';
import { Random, nextInt, nextRange, pick } from './rng.js';

/** Fire along the current heading. No-op without ammo or while dead. */
export function fireBullet(world: World, player: Player): Bullet | undefined {
  const head = getHead(player);
  if (!player.alive || !head || player.bullets <= 0) return undefined;
  player.bullets--;
  return world.addBullet(head, player.direction, player.id);
}

/** Lob a bomb 2-5 cells to the left or right of the heading. */
export function throwBomb(world: World, player: Player, rng: Random): Bomb | undefined {
  const head = getHead(player);
  if (!player.alive || !head || player.bombs <= 0) return undefined;
  player.bombs--;

  const [sideA, sideB] = perpendiculars(player.direction);
  const side = pick(rng, [sideA, sideB]) ?? sideA;
  const distance = nextInt(rng, BOMB_THROW_MIN, BOMB_THROW_MAX);
  const landing = clampToGrid(step(head, side, distance));
  const fuseMs = nextRange(rng, BOMB_FUSE_MIN_MS, BOMB_FUSE_MAX_MS);
  return world.addBomb(landing, fuseMs, player.id);
}

/**
 * Apply a bullet or blast hit. A headshot kills and credits the owner; a body
 * hit cuts the snake from the hit segment to the tail.
 */
export function applyHit(
  world: World,
  victim: Player,
  hit: BodyHit,
  ownerId: string,
  cause: 'bullet' | 'explosion',
  events: EngineEvent[],
): void {
  if (hit.kind === 'head') {
    killPlayer(victim);
    events.push({
      type: 'playerDied',
      playerId: victim.id,
      name: victim.name,
      cause,
      score: victim.score,
      killerId: ownerId,
    });
    const owner = world.getPlayer(ownerId);
    if (owner) addScore(owner, KILL_REWARD);
    return;
  }

  const removed = truncateBody(victim, hit.index);
  if (removed > 0) {
    events.push({ type: 'bodyHit', playerId: victim.id, removed, byId: ownerId });
  }
}

/** One bullet step: every bullet moves a cell and resolves against at most one snake. */
export function advanceBullets(world: World, events: EngineEvent[]): void {
  for (const bullet of [...world.bullets]) {
    const next = step(bullet, bullet.direction);
    if (!inBounds(next)) {
      world.removeBullet(bullet.id);
      continue;
    }
    bullet.x = next.x;
    bullet.y = next.y;

    const area = new Set([cellKey(next)]);
    for (const player of world.players.values()) {
      if (!player.alive || player.id === bullet.ownerId) continue;
      const hit = findBodyHit(player, area);
      if (!hit) continue;
      applyHit(world, player, hit, bullet.ownerId, 'bullet', events);
      world.removeBullet(bullet.id);
      break;
    }
  }
}

export function detonate(world: World, bomb: Bomb, events: EngineEvent[]): void {
  world.removeBomb(bomb.id);
  world.addExplosion(bomb, EXPLOSION_DURATION_MS, bomb.ownerId);
  events.push({ type: 'bombExploded', ownerId: bomb.ownerId, x: bomb.x, y: bomb.y });

  const area = new Set(neighborhood(bomb, EXPLOSION_RADIUS).map(cellKey));
  for (const player of world.players.values()) {
    if (!player.alive || player.id === bomb.ownerId) continue;
    const hit = findBodyHit(player, area);
    if (hit) applyHit(world, player, hit, bomb.ownerId, 'explosion', events);
  }
}

export function updateBombs(world: World, elapsedMs: number, events: EngineEvent[]): void {
  for (const bomb of [...world.bombs]) {
    bomb.remainingMs -= elapsedMs;
    if (bomb.remainingMs <= 0) detonate(world, bomb, events);
  }
}

// Explosions are cosmetic after the blast; they just fade out.
export function updateExplosions(world: World, elapsedMs: number): void {
  for (const explosion of [...world.explosions]) {
    explosion.remainingMs -= elapsedMs;
    if (explosion.remainingMs <= 0) world.removeExplosion(explosion.id);
  }
}
