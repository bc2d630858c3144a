import {
  Cell,
  Player,
  Pickup,
  PickupKind,
  Bullet,
  Bomb,
  Explosion,
  Direction,
} from '../../shared/types.js';
import { cellKey, sameCell } from './grid.js';

/**
 * Entity store: the single aggregate holding every live entity.
 *
 * Not safe for concurrent writers. All mutation happens on the event loop
 * inside a message handler or a scheduler step, never across an await.
 * Lookups return `undefined` for missing ids and removals report whether
 * anything was removed, so callers can iterate while entities disappear.
 */
export class World {
  readonly players: Map<string, Player> = new Map();
  pickups: Pickup[] = [];
  bullets: Bullet[] = [];
  bombs: Bomb[] = [];
  explosions: Explosion[] = [];
  private entityIdCounter = 0;

  // ── Players ───────────────────────────────────────────────────────

  addPlayer(player: Player): void {
    this.players.set(player.id, player);
  }

  removePlayer(playerId: string): Player | undefined {
    const player = this.players.get(playerId);
    if (!player) return undefined;
    this.players.delete(playerId);
    return player;
  }

  getPlayer(playerId: string): Player | undefined {
    return this.players.get(playerId);
  }

  findPlayerByName(name: string): Player | undefined {
    for (const player of this.players.values()) {
      if (player.name === name) return player;
    }
    return undefined;
  }

  alivePlayers(): Player[] {
    return Array.from(this.players.values()).filter(p => p.alive);
  }

  /** Players currently on the field (joined and alive). */
  activePlayerCount(): number {
    let count = 0;
    for (const player of this.players.values()) {
      if (player.alive && player.inGame) count++;
    }
    return count;
  }

  // ── Pickups ───────────────────────────────────────────────────────

  addPickup(cell: Cell, kind: PickupKind): Pickup {
    const pickup: Pickup = { id: this.nextId(), x: cell.x, y: cell.y, kind };
    this.pickups.push(pickup);
    return pickup;
  }

  removePickup(pickupId: number): boolean {
    const before = this.pickups.length;
    this.pickups = this.pickups.filter(p => p.id !== pickupId);
    return this.pickups.length !== before;
  }

  pickupAt(cell: Cell): Pickup | undefined {
    return this.pickups.find(p => sameCell(p, cell));
  }

  // ── Projectiles ───────────────────────────────────────────────────

  addBullet(cell: Cell, direction: Direction, ownerId: string): Bullet {
    const bullet: Bullet = { id: this.nextId(), x: cell.x, y: cell.y, direction, ownerId };
    this.bullets.push(bullet);
    return bullet;
  }

  removeBullet(bulletId: number): boolean {
    const before = this.bullets.length;
    this.bullets = this.bullets.filter(b => b.id !== bulletId);
    return this.bullets.length !== before;
  }

  addBomb(cell: Cell, fuseMs: number, ownerId: string): Bomb {
    const bomb: Bomb = { id: this.nextId(), x: cell.x, y: cell.y, remainingMs: fuseMs, ownerId };
    this.bombs.push(bomb);
    return bomb;
  }

  removeBomb(bombId: number): boolean {
    const before = this.bombs.length;
    this.bombs = this.bombs.filter(b => b.id !== bombId);
    return this.bombs.length !== before;
  }

  addExplosion(cell: Cell, durationMs: number, ownerId: string): Explosion {
    const explosion: Explosion = {
      id: this.nextId(),
      x: cell.x,
      y: cell.y,
      remainingMs: durationMs,
      durationMs,
      ownerId,
    };
    this.explosions.push(explosion);
    return explosion;
  }

  removeExplosion(explosionId: number): boolean {
    const before = this.explosions.length;
    this.explosions = this.explosions.filter(e => e.id !== explosionId);
    return this.explosions.length !== before;
  }

  /** Bullets and unexploded bombs owned by `ownerId`; returns how many were removed. */
  removeProjectilesOf(ownerId: string): number {
    const before = this.bullets.length + this.bombs.length;
    this.bullets = this.bullets.filter(b => b.ownerId !== ownerId);
    this.bombs = this.bombs.filter(b => b.ownerId !== ownerId);
    return before - this.bullets.length - this.bombs.length;
  }

  // ── Occupancy ─────────────────────────────────────────────────────

  /** Keys of every cell holding a snake segment, bullet, bomb or pickup. */
  occupiedCells(): Set<string> {
    const occupied = new Set<string>();
    for (const player of this.players.values()) {
      for (const segment of player.body) occupied.add(cellKey(segment));
    }
    for (const bullet of this.bullets) occupied.add(cellKey(bullet));
    for (const bomb of this.bombs) occupied.add(cellKey(bomb));
    for (const pickup of this.pickups) occupied.add(cellKey(pickup));
    return occupied;
  }

  private nextId(): number {
    return ++this.entityIdCounter;
  }
}
