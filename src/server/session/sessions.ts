import { Player } from '../../shared/types.js';
import {
  MAX_PLAYERS,
  CLIENT_TIMEOUT_MS,
  HEARTBEAT_INTERVAL_MS,
} from '../../shared/constants.js';
import { World } from '../game/world.js';
import { ColorPool, createPlayer } from '../game/snake.js';

/**
 * connecting -> active <-> idle -> expired
 *
 * `idle` means the client missed its heartbeat window; any inbound message
 * brings it back to `active`. `expired` sessions are already gone from the
 * manager and the world.
 */
export type SessionState = 'connecting' | 'active' | 'idle' | 'expired';

export interface Endpoint {
  address: string;
  port: number;
}

export interface Session {
  /** Same value as the player id */
  id: string;
  endpoint: Endpoint;
  name: string;
  state: SessionState;
  connectedAt: number;
  lastSeen: number;
}

export type ConnectResult =
  | { success: true; session: Session; player: Player; reconnected: boolean }
  | { success: false; error: 'SERVER_FULL' | 'NAME_TAKEN' | 'INVALID_NAME'; message: string };

export interface SessionManagerOptions {
  maxSessions?: number;
  clientTimeoutMs?: number;
  heartbeatIntervalMs?: number;
  now?: () => number;
}

export function endpointKey(endpoint: Endpoint): string {
  return `${endpoint.address}:${endpoint.port}`;
}

export class SessionManager {
  private sessions: Map<string, Session> = new Map();
  private connectionCounter = 0;
  readonly maxSessions: number;
  private readonly clientTimeoutMs: number;
  private readonly heartbeatIntervalMs: number;
  private readonly now: () => number;

  constructor(
    private readonly world: World,
    private readonly colors: ColorPool,
    options: SessionManagerOptions = {},
  ) {
    this.maxSessions = options.maxSessions ?? MAX_PLAYERS;
    this.clientTimeoutMs = options.clientTimeoutMs ?? CLIENT_TIMEOUT_MS;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  list(): Session[] {
    return Array.from(this.sessions.values());
  }

  get(endpoint: Endpoint): Session | undefined {
    return this.sessions.get(endpointKey(endpoint));
  }

  /**
   * Open a session and its player record. The same endpoint connecting again
   * gets its existing session back; a name held by another endpoint is refused.
   */
  connect(endpoint: Endpoint, rawName: string): ConnectResult {
    const id = endpointKey(endpoint);
    const existing = this.sessions.get(id);
    const existingPlayer = this.world.getPlayer(id);
    if (existing && existingPlayer) {
      this.touch(id);
      return { success: true, session: existing, player: existingPlayer, reconnected: true };
    }

    const name = rawName.trim();
    if (name.length === 0) {
      return { success: false, error: 'INVALID_NAME', message: 'Player name must not be empty' };
    }

    if (this.sessions.size >= this.maxSessions) {
      return {
        success: false,
        error: 'SERVER_FULL',
        message: `Server is full (${this.maxSessions}/${this.maxSessions} players). Please try again later.`,
      };
    }

    if (this.world.findPlayerByName(name)) {
      return { success: false, error: 'NAME_TAKEN', message: `The name "${name}" is already in use` };
    }

    const now = this.now();
    const session: Session = {
      id,
      endpoint: { ...endpoint },
      name,
      state: 'connecting',
      connectedAt: now,
      lastSeen: now,
    };
    const player = createPlayer(id, `p${++this.connectionCounter}`, name, this.colors.acquire());
    this.world.addPlayer(player);
    this.sessions.set(id, session);
    session.state = 'active';

    return { success: true, session, player, reconnected: false };
  }

  /** Refresh liveness. Returns false for unknown endpoints. */
  touch(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    session.lastSeen = this.now();
    session.state = 'active';
    return true;
  }

  /** Tear down a session and its player; returns the removed player if any. */
  disconnect(sessionId: string): { session: Session; player: Player | undefined } | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) return undefined;

    this.sessions.delete(sessionId);
    session.state = 'expired';
    const player = this.world.removePlayer(sessionId);
    if (player) this.colors.release(player.color);
    return { session, player };
  }

  /**
   * Liveness sweep: flag sessions past the heartbeat window as idle and drop
   * the ones past the client timeout.
   */
  sweep(): { session: Session; player: Player | undefined }[] {
    const now = this.now();
    const expired: { session: Session; player: Player | undefined }[] = [];

    for (const session of this.list()) {
      const silentFor = now - session.lastSeen;
      if (silentFor > this.clientTimeoutMs) {
        const removed = this.disconnect(session.id);
        if (removed) expired.push(removed);
      } else if (silentFor > this.heartbeatIntervalMs) {
        session.state = 'idle';
      }
    }

    return expired;
  }
}
