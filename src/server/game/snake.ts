import { Cell, Direction, Player } from '../../shared/types.js';
import { SEGMENT_LOSS_PENALTY } from '../../shared/constants.js';
import { opposite } from './grid.js';
import { Random, nextInt } from './rng.js';

// Predefined colors for snakes, one per seat
const SNAKE_COLORS = [
  '#00FF00', // Green
  '#FF0000', // Red
  '#0064FF', // Blue
  '#FFFF00', // Yellow
  '#FF00FF', // Magenta
  '#00FFFF', // Cyan
  '#FF8000', // Orange
  '#8000FF', // Purple
  '#FFC0CB', // Pink
  '#00FF80', // Spring Green
  '#80FF00', // Chartreuse
  '#FF4040', // Light Red
  '#4040FF', // Light Blue
  '#FFFF80', // Light Yellow
  '#80FFFF', // Light Cyan
  '#FF80FF', // Light Magenta
];

/** Hands out the first free predefined color; random ones once all are taken. */
export class ColorPool {
  private inUse: Set<string> = new Set();

  constructor(private readonly rng: Random) {}

  acquire(): string {
    const free = SNAKE_COLORS.find(c => !this.inUse.has(c));
    const color = free ?? randomColor(this.rng);
    this.inUse.add(color);
    return color;
  }

  release(color: string): void {
    this.inUse.delete(color);
  }
}

function randomColor(rng: Random): string {
  const channel = () => nextInt(rng, 50, 255).toString(16).padStart(2, '0').toUpperCase();
  return `#${channel()}${channel()}${channel()}`;
}

export interface SpawnPoint {
  cell: Cell;
  direction: Direction;
}

/** A connected player with no snake on the field yet. */
export function createPlayer(id: string, publicId: string, name: string, color: string): Player {
  return {
    id,
    publicId,
    name,
    color,
    body: [],
    direction: 'RIGHT',
    pendingDirection: null,
    alive: false,
    score: 0,
    bullets: 0,
    bombs: 0,
    inGame: false,
    respawnRequested: false,
  };
}

export function getHead(player: Player): Cell | undefined {
  return player.body[0];
}

export function placeSnake(player: Player, spawn: SpawnPoint): void {
  player.body = [{ ...spawn.cell }];
  player.direction = spawn.direction;
  player.pendingDirection = null;
  player.alive = true;
  player.inGame = true;
  player.respawnRequested = false;
}

/** Fresh game from the spectator seat: score and ammo start from zero. */
export function startGame(player: Player, spawn: SpawnPoint): void {
  player.score = 0;
  player.bullets = 0;
  player.bombs = 0;
  placeSnake(player, spawn);
}

/** Respawn after death keeps half of the previous score. */
export function respawnPlayer(player: Player, spawn: SpawnPoint): void {
  player.score = Math.floor(player.score / 2);
  player.bullets = 0;
  player.bombs = 0;
  placeSnake(player, spawn);
}

export function killPlayer(player: Player): void {
  player.alive = false;
  player.body = [];
  player.bullets = 0;
  player.bombs = 0;
  player.pendingDirection = null;
  player.respawnRequested = false;
}

/** Back to spectating. Score is kept for the scoreboard. */
export function leaveGame(player: Player): void {
  killPlayer(player);
  player.inGame = false;
}

export function addScore(player: Player, delta: number): void {
  player.score = Math.max(0, player.score + delta);
}

/**
 * Cut the body so only the first `index` segments remain and charge the
 * per-segment penalty. Returns the number of removed segments.
 */
export function truncateBody(player: Player, index: number): number {
  if (index <= 0 || index >= player.body.length) return 0;
  const removed = player.body.length - index;
  player.body = player.body.slice(0, index);
  addScore(player, -SEGMENT_LOSS_PENALTY * removed);
  return removed;
}

/**
 * Queue a heading change. A straight reversal is refused while the snake is
 * longer than its head, since the next step would run into the neck.
 */
export function steerPlayer(player: Player, direction: Direction): boolean {
  if (!player.alive) return false;
  if (player.body.length > 1 && direction === opposite(player.direction)) return false;
  player.pendingDirection = direction;
  return true;
}
