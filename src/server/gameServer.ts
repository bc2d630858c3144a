import {
  GameStateMessage,
  LeaderboardResponse,
  ServerMessage,
  StatusResponse,
} from '../shared/types.js';
import {
  BROADCAST_INTERVAL_MS,
  BULLET_STEPS_PER_MOVE,
  LEADERBOARD_SIZE,
  MOVE_INTERVAL_MS,
} from '../shared/constants.js';
import { World } from './game/world.js';
import { GameEngine } from './game/engine.js';
import { EngineEvent } from './game/events.js';
import { ColorPool } from './game/snake.js';
import { Random, mathRandom } from './game/rng.js';
import { TickScheduler } from './game/scheduler.js';
import { Endpoint, SessionManager, endpointKey } from './session/sessions.js';
import { buildSnapshot, decodeClientMessage, encodeServerMessage } from './net/protocol.js';
import { DatagramTransport } from './net/udp.js';
import { StatsStore } from './stats/store.js';
import { log } from './log.js';

export interface GameServerOptions {
  transport: DatagramTransport;
  stats?: StatsStore;
  rng?: Random;
  now?: () => number;
  maxPlayers?: number;
  moveIntervalMs?: number;
  broadcastIntervalMs?: number;
  clientTimeoutMs?: number;
  heartbeatIntervalMs?: number;
}

/**
 * Owns the world and everything that mutates it. Datagram handling,
 * simulation steps and broadcasts are all plain synchronous calls on this
 * object, so they never interleave.
 */
export class GameServer {
  readonly world: World;
  readonly engine: GameEngine;
  readonly sessions: SessionManager;
  readonly stats: StatsStore;

  private readonly transport: DatagramTransport;
  private readonly scheduler: TickScheduler;
  private readonly now: () => number;
  private broadcastCounter = 0;

  private onStateUpdateCallback: ((state: GameStateMessage) => void) | null = null;

  constructor(options: GameServerOptions) {
    const rng = options.rng ?? mathRandom;
    const moveIntervalMs = options.moveIntervalMs ?? MOVE_INTERVAL_MS;

    this.transport = options.transport;
    this.stats = options.stats ?? new StatsStore();
    this.now = options.now ?? Date.now;
    this.world = new World();
    this.engine = new GameEngine(this.world, rng, { moveIntervalMs });
    this.sessions = new SessionManager(this.world, new ColorPool(rng), {
      maxSessions: options.maxPlayers,
      clientTimeoutMs: options.clientTimeoutMs,
      heartbeatIntervalMs: options.heartbeatIntervalMs,
      now: this.now,
    });
    this.scheduler = new TickScheduler({
      simulationIntervalMs: moveIntervalMs / BULLET_STEPS_PER_MOVE,
      broadcastIntervalMs: options.broadcastIntervalMs ?? BROADCAST_INTERVAL_MS,
      onSimulate: (dtMs) => this.simulate(dtMs),
      onBroadcast: () => this.broadcast(),
    });
  }

  // ── Lifecycle ─────────────────────────────────────────────────────

  start(): void {
    this.scheduler.start();
  }

  stop(): void {
    this.scheduler.stop();
  }

  get running(): boolean {
    return this.scheduler.running;
  }

  onStateUpdate(callback: (state: GameStateMessage) => void): void {
    this.onStateUpdateCallback = callback;
  }

  // ── Inbound ───────────────────────────────────────────────────────

  handleDatagram(data: Buffer | string, endpoint: Endpoint): void {
    const decoded = decodeClientMessage(data);
    if (!decoded.ok) {
      log.debug(`[udp] Dropped datagram from ${endpointKey(endpoint)}: ${decoded.reason}`);
      return;
    }

    const message = decoded.message;
    if (message.type === 'connect') {
      this.handleConnect(endpoint, message.name);
      return;
    }

    const id = endpointKey(endpoint);
    if (!this.sessions.touch(id)) {
      log.debug(`[session] Ignoring ${message.type} from unknown endpoint ${id}`);
      return;
    }

    switch (message.type) {
      case 'update':
        if (message.direction) this.engine.steer(id, message.direction);
        if (message.respawn) this.engine.requestRespawn(id);
        break;

      case 'shoot':
      case 'throw_bomb':
      case 'start_game':
      case 'leave_game':
        this.engine.queueAction(id, message.type);
        break;

      case 'ping':
        this.send(endpoint, { type: 'pong', timestamp: this.now() });
        break;

      case 'disconnect':
        this.dropSession(id, 'disconnected');
        break;

      case 'ignored':
        log.debug(`[udp] Ignoring unknown message type "${message.tag}" from ${id}`);
        break;

      default: {
        const unreachable: never = message;
        return unreachable;
      }
    }
  }

  private handleConnect(endpoint: Endpoint, name: string): void {
    const result = this.sessions.connect(endpoint, name);

    if (!result.success) {
      switch (result.error) {
        case 'SERVER_FULL':
          console.log(`[session] Rejected ${name}: server full`);
          this.send(endpoint, {
            type: 'server_full',
            message: result.message,
            maxPlayers: this.sessions.maxSessions,
            currentPlayers: this.sessions.size,
          });
          break;
        case 'NAME_TAKEN':
          this.send(endpoint, { type: 'name_taken', message: result.message });
          break;
        case 'INVALID_NAME':
          log.debug(`[session] Invalid connect from ${endpointKey(endpoint)}: ${result.message}`);
          break;
      }
      return;
    }

    const { player, reconnected } = result;
    if (!reconnected) {
      this.recordEvents([this.engine.spawnPlayer(player)]);
      console.log(`[session] ${player.name} connected from ${player.id} (${this.sessions.size}/${this.sessions.maxSessions})`);
    }

    this.send(endpoint, {
      type: 'welcome',
      playerId: player.publicId,
      name: player.name,
      color: player.color,
      playerCount: this.sessions.size,
      maxPlayers: this.sessions.maxSessions,
    });
  }

  private dropSession(id: string, reason: string): void {
    const removed = this.sessions.disconnect(id);
    if (!removed) return;
    const { session, player } = removed;
    this.engine.forgetPlayer(id);
    if (player) this.stats.recordScore(player.name, player.score);
    console.log(`[session] ${session.name} ${reason} (${this.sessions.size}/${this.sessions.maxSessions})`);
    void this.stats.flush();
  }

  // ── Simulation ────────────────────────────────────────────────────

  simulate(dtMs: number): EngineEvent[] {
    const events = this.engine.step(dtMs);
    this.recordEvents(events);
    return events;
  }

  private recordEvents(events: EngineEvent[]): void {
    let flushNeeded = false;

    for (const event of events) {
      switch (event.type) {
        case 'playerSpawned':
          this.stats.recordGameStarted(event.name);
          log.debug(`[engine] ${event.name} spawned`);
          break;

        case 'playerDied': {
          this.stats.recordDeath(event.name, event.score);
          const killer = event.killerId ? this.world.getPlayer(event.killerId) : undefined;
          if (killer && killer.id !== event.playerId) {
            this.stats.recordKill(killer.name);
          }
          log.debug(`[engine] ${event.name} died (${event.cause}) with ${event.score} points`);
          flushNeeded = true;
          break;
        }

        case 'playerLeftGame':
          this.stats.recordScore(event.name, event.score);
          break;

        case 'bodyHit':
        case 'pickupCollected':
        case 'bombExploded':
          break;
      }
    }

    if (flushNeeded) void this.stats.flush();
  }

  // ── Broadcast ─────────────────────────────────────────────────────

  /** Expire silent sessions, then send one snapshot to every client. */
  broadcast(): GameStateMessage {
    const expired = this.sessions.sweep();
    for (const { session, player } of expired) {
      this.engine.forgetPlayer(session.id);
      if (player) this.stats.recordScore(player.name, player.score);
      console.log(`[session] ${session.name} timed out`);
    }
    if (expired.length > 0) void this.stats.flush();

    const snapshot = this.snapshot();
    const payload = encodeServerMessage(snapshot);
    for (const session of this.sessions.list()) {
      this.transport.send(session.endpoint, payload);
    }

    if (this.onStateUpdateCallback) {
      this.onStateUpdateCallback(snapshot);
    }
    return snapshot;
  }

  private snapshot(): GameStateMessage {
    this.broadcastCounter++;
    return buildSnapshot(this.world, {
      counter: this.broadcastCounter,
      gameTime: this.engine.gameTime,
      timestamp: this.now(),
      leaderboard: this.stats.topPlayers(LEADERBOARD_SIZE),
      allTimeHighscore: this.stats.allTimeHighscore(),
    });
  }

  // ── Queries ───────────────────────────────────────────────────────

  getStatus(): StatusResponse {
    const players = Array.from(this.world.players.values());
    return {
      serverTime: this.now(),
      players: players.length,
      maxPlayers: this.sessions.maxSessions,
      inGame: players.filter(p => p.inGame).length,
      alive: this.world.alivePlayers().length,
      pickups: this.world.pickups.length,
      tick: this.engine.tick,
      gameTime: this.engine.gameTime,
    };
  }

  getLeaderboard(): LeaderboardResponse {
    return {
      leaderboard: this.stats.topPlayers(LEADERBOARD_SIZE),
      allTimeHighscore: this.stats.allTimeHighscore(),
    };
  }

  private send(endpoint: Endpoint, message: ServerMessage): void {
    this.transport.send(endpoint, encodeServerMessage(message));
  }
}
