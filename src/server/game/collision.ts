import { Cell, Direction, Player } from '../../shared/types.js';
import { cellKey, inBounds, step } from './grid.js';

export type MoveOutcome =
  | { kind: 'moved'; head: Cell }
  | { kind: 'wall' }
  | { kind: 'self' }
  | { kind: 'player'; otherId: string };

export type BodyHit = { kind: 'head' } | { kind: 'body'; index: number };

/** Frozen copy of every alive body, taken before anyone moves this tick. */
export type BodySnapshot = Map<string, Set<string>>;

export function snapshotBodies(players: Iterable<Player>): BodySnapshot {
  const snapshot: BodySnapshot = new Map();
  for (const player of players) {
    if (!player.alive) continue;
    snapshot.set(player.id, new Set(player.body.map(cellKey)));
  }
  return snapshot;
}

/**
 * Check one step of `player` toward `direction` without committing it.
 *
 * `keepsTail` is true when the step lands on a growth brick: the tail stays
 * put, so the candidate may not enter it. Otherwise the tail cell is vacated
 * during the step and is a legal target. Other snakes are checked against the
 * pre-tick snapshot (including their tails), so the result does not depend on
 * the order players are processed in.
 */
export function resolveMove(
  player: Player,
  direction: Direction,
  keepsTail: boolean,
  snapshot: BodySnapshot,
): MoveOutcome {
  const head = player.body[0];
  if (!head) return { kind: 'wall' };

  const candidate = step(head, direction);
  if (!inBounds(candidate)) return { kind: 'wall' };

  const key = cellKey(candidate);
  const checked = keepsTail ? player.body.length : player.body.length - 1;
  for (let i = 0; i < checked; i++) {
    if (cellKey(player.body[i]) === key) return { kind: 'self' };
  }

  for (const [otherId, cells] of snapshot) {
    if (otherId === player.id) continue;
    if (cells.has(key)) return { kind: 'player', otherId };
  }

  return { kind: 'moved', head: candidate };
}

/** Lowest-index body segment inside `area`; index 0 is a headshot. */
export function findBodyHit(player: Player, area: Set<string>): BodyHit | null {
  for (let i = 0; i < player.body.length; i++) {
    if (!area.has(cellKey(player.body[i]))) continue;
    return i === 0 ? { kind: 'head' } : { kind: 'body', index: i };
  }
  return null;
}
