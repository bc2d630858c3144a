import { Direction, Player } from '../../shared/types.js';
import {
  MOVE_INTERVAL_MS,
  BULLET_STEPS_PER_MOVE,
  MOVE_SCORE,
  BRICK_SCORE,
} from '../../shared/constants.js';
import { World } from './world.js';
import { EngineEvent } from './events.js';
import { resolveMove, snapshotBodies } from './collision.js';
import { cellKey, step } from './grid.js';
import { dropSurplusPickups, findSpawnPoint, maintainPickups } from './spawn.js';
import {
  addScore,
  getHead,
  killPlayer,
  leaveGame,
  placeSnake,
  respawnPlayer,
  startGame,
  steerPlayer,
} from './snake.js';
import {
  advanceBullets,
  fireBullet,
  throwBomb,
  updateBombs,
  updateExplosions,
} from './projectiles.js';
import { Random } from './rng.js';

export type PlayerAction = 'shoot' | 'throw_bomb' | 'start_game' | 'leave_game';

// Queued action from a client
interface QueuedAction {
  playerId: string;
  action: PlayerAction;
}

export interface EngineOptions {
  moveIntervalMs?: number;
}

/**
 * Fixed-step simulation over a World.
 *
 * `step(dt)` runs one engine tick: queued actions, respawns, then player
 * movement every `moveIntervalMs`, bullets three times as often, and bomb and
 * explosion timers by `dt`. Every mutation happens synchronously inside
 * `step`, so whoever reads the world between steps sees a settled state.
 */
export class GameEngine {
  private actionQueue: QueuedAction[] = [];
  private readonly moveIntervalMs: number;
  private readonly bulletIntervalMs: number;
  private moveAccumulatorMs = 0;
  private bulletAccumulatorMs = 0;
  private tickCount = 0;
  private elapsedMs = 0;

  constructor(
    readonly world: World,
    private readonly rng: Random,
    options: EngineOptions = {},
  ) {
    this.moveIntervalMs = options.moveIntervalMs ?? MOVE_INTERVAL_MS;
    this.bulletIntervalMs = this.moveIntervalMs / BULLET_STEPS_PER_MOVE;
  }

  get tick(): number {
    return this.tickCount;
  }

  /** Simulated time in seconds. */
  get gameTime(): number {
    return this.elapsedMs / 1000;
  }

  // ── Player lifecycle ──────────────────────────────────────────────

  /** Put a freshly connected player on the field. */
  spawnPlayer(player: Player): EngineEvent {
    placeSnake(player, findSpawnPoint(this.world, this.rng));
    return { type: 'playerSpawned', playerId: player.id, name: player.name };
  }

  // ── Client input ──────────────────────────────────────────────────

  steer(playerId: string, direction: Direction): boolean {
    const player = this.world.getPlayer(playerId);
    if (!player) return false;
    return steerPlayer(player, direction);
  }

  /** Honoured on the next step, and only while the player is dead. */
  requestRespawn(playerId: string): boolean {
    const player = this.world.getPlayer(playerId);
    if (!player || player.alive || !player.inGame) return false;
    player.respawnRequested = true;
    return true;
  }

  queueAction(playerId: string, action: PlayerAction): void {
    this.actionQueue.push({ playerId, action });
  }

  // ── Tick ──────────────────────────────────────────────────────────

  step(dtMs: number): EngineEvent[] {
    const events: EngineEvent[] = [];
    this.tickCount++;
    this.elapsedMs += dtMs;

    // 1. Process queued actions
    this.processActions(events);

    // 2. Handle respawns
    this.handleRespawns(events);

    // 3. Move snakes, then top up pickups
    this.moveAccumulatorMs += dtMs;
    while (this.moveAccumulatorMs >= this.moveIntervalMs) {
      this.moveAccumulatorMs -= this.moveIntervalMs;
      this.movePlayers(events);
      maintainPickups(this.world, this.rng);
    }

    // 4. Bullets
    this.bulletAccumulatorMs += dtMs;
    while (this.bulletAccumulatorMs >= this.bulletIntervalMs) {
      this.bulletAccumulatorMs -= this.bulletIntervalMs;
      advanceBullets(this.world, events);
    }

    // 5. Bomb fuses and explosion fade
    updateBombs(this.world, dtMs, events);
    updateExplosions(this.world, dtMs);

    // 6. Deaths and departures this tick may have lowered the pickup target
    dropSurplusPickups(this.world);

    return events;
  }

  private processActions(events: EngineEvent[]): void {
    const actions = this.actionQueue.splice(0);

    for (const { playerId, action } of actions) {
      // The player may have disconnected since the action was queued
      const player = this.world.getPlayer(playerId);
      if (!player) continue;

      switch (action) {
        case 'shoot':
          fireBullet(this.world, player);
          break;

        case 'throw_bomb':
          throwBomb(this.world, player, this.rng);
          break;

        case 'start_game':
          if (player.inGame) break;
          startGame(player, findSpawnPoint(this.world, this.rng));
          events.push({ type: 'playerSpawned', playerId: player.id, name: player.name });
          break;

        case 'leave_game':
          if (!player.inGame) break;
          leaveGame(player);
          events.push({ type: 'playerLeftGame', playerId: player.id, name: player.name, score: player.score });
          break;
      }
    }
  }

  private handleRespawns(events: EngineEvent[]): void {
    for (const player of this.world.players.values()) {
      if (player.alive || !player.respawnRequested) continue;
      respawnPlayer(player, findSpawnPoint(this.world, this.rng));
      events.push({ type: 'playerSpawned', playerId: player.id, name: player.name });
    }
  }

  /**
   * One movement step for every alive snake. Collisions with other snakes
   * are judged against the bodies as they were before anyone moved; heads
   * that meet in the same cell are settled once everyone has moved.
   */
  movePlayers(events: EngineEvent[] = []): EngineEvent[] {
    const snapshot = snapshotBodies(this.world.players.values());
    const moved: Player[] = [];

    for (const player of this.world.players.values()) {
      if (!player.alive) continue;

      if (player.pendingDirection) {
        player.direction = player.pendingDirection;
        player.pendingDirection = null;
      }

      const head = getHead(player);
      const ahead = head ? this.world.pickupAt(step(head, player.direction)) : undefined;
      const grows = ahead?.kind === 'brick';

      const outcome = resolveMove(player, player.direction, grows, snapshot);
      if (outcome.kind !== 'moved') {
        const score = player.score;
        killPlayer(player);
        events.push({ type: 'playerDied', playerId: player.id, name: player.name, cause: outcome.kind, score });
        continue;
      }

      player.body.unshift(outcome.head);
      moved.push(player);

      const pickup = this.world.pickupAt(outcome.head);
      if (pickup) {
        this.world.removePickup(pickup.id);
        events.push({ type: 'pickupCollected', playerId: player.id, kind: pickup.kind });
      }

      switch (pickup?.kind) {
        case 'brick':
          addScore(player, BRICK_SCORE);
          break;
        case 'bullet_brick':
          player.bullets++;
          player.body.pop();
          addScore(player, MOVE_SCORE);
          break;
        case 'bomb_brick':
          player.bombs++;
          player.body.pop();
          addScore(player, MOVE_SCORE);
          break;
        default:
          player.body.pop();
          addScore(player, MOVE_SCORE);
      }
    }

    this.resolveHeadOn(moved, events);
    return events;
  }

  // Every snake whose new head shares a cell with another new head dies
  private resolveHeadOn(moved: Player[], events: EngineEvent[]): void {
    const byHead = new Map<string, Player[]>();
    for (const player of moved) {
      const head = getHead(player);
      if (!head) continue;
      const key = cellKey(head);
      byHead.set(key, [...(byHead.get(key) ?? []), player]);
    }

    for (const group of byHead.values()) {
      if (group.length < 2) continue;
      for (const player of group) {
        const score = player.score;
        killPlayer(player);
        events.push({ type: 'playerDied', playerId: player.id, name: player.name, cause: 'player', score });
      }
    }
  }

  /** Drop everything a departed player still has in flight or queued. */
  forgetPlayer(playerId: string): void {
    this.actionQueue = this.actionQueue.filter(a => a.playerId !== playerId);
    this.world.removeProjectilesOf(playerId);
  }
}
