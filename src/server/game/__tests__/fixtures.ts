import { Direction, Player } from '../../../shared/types.js';
import { createPlayer } from '../snake.js';
import { Random } from '../rng.js';

/** Replays `values` in order, then keeps returning the last one. */
export function sequenceRng(values: number[]): Random {
  let index = 0;
  return {
    next(): number {
      const value = values[Math.min(index, values.length - 1)] ?? 0;
      index++;
      return value;
    },
  };
}

export function makePlayer(
  id: string,
  cells: [number, number][],
  direction: Direction = 'RIGHT',
  overrides: Partial<Player> = {},
): Player {
  const player = createPlayer(id, overrides.publicId ?? id, overrides.name ?? id, overrides.color ?? '#00FF00');
  return {
    ...player,
    body: cells.map(([x, y]) => ({ x, y })),
    direction,
    alive: cells.length > 0,
    inGame: true,
    ...overrides,
  };
}

export function bodyOf(player: Player): [number, number][] {
  return player.body.map((c): [number, number] => [c.x, c.y]);
}
