// ============ Core Game Types ============

export interface Cell {
  x: number;
  y: number;
}

export type Direction = 'UP' | 'DOWN' | 'LEFT' | 'RIGHT';

export const DIRECTIONS: readonly Direction[] = ['UP', 'DOWN', 'LEFT', 'RIGHT'];

export type PickupKind = 'brick' | 'bullet_brick' | 'bomb_brick';

export interface Player {
  /** Endpoint key ("host:port"); one live player per endpoint. Never sent to clients */
  id: string;
  /** Opaque per-connection id shown to clients */
  publicId: string;
  name: string;
  color: string;
  /** Head first, tail last */
  body: Cell[];
  direction: Direction;
  /** Heading requested by the client, applied on the next movement step */
  pendingDirection: Direction | null;
  alive: boolean;
  score: number;
  bullets: number;
  bombs: number;
  /** false while spectating */
  inGame: boolean;
  respawnRequested: boolean;
}

export interface Pickup extends Cell {
  id: number;
  kind: PickupKind;
}

export interface Bullet extends Cell {
  id: number;
  direction: Direction;
  ownerId: string;
}

export interface Bomb extends Cell {
  id: number;
  remainingMs: number;
  ownerId: string;
}

export interface Explosion extends Cell {
  id: number;
  remainingMs: number;
  durationMs: number;
  ownerId: string;
}

// ============ Stats Types ============

export interface PlayerStats {
  highscore: number;
  gamesPlayed: number;
  kills: number;
  deaths: number;
}

export interface LeaderboardEntry extends PlayerStats {
  name: string;
}

export interface HighscoreRecord {
  name: string;
  score: number;
}

// ============ Wire Types (server -> client) ============

export interface SnapshotPlayer {
  id: string;
  name: string;
  body: [number, number][];
  direction: Direction;
  score: number;
  alive: boolean;
  color: string;
  bullets: number;
  bombs: number;
  inGame: boolean;
}

export interface GameStateMessage {
  type: 'game_state';
  counter: number;
  /** Simulated seconds since the server started */
  gameTime: number;
  timestamp: number;
  grid: { width: number; height: number };
  players: SnapshotPlayer[];
  pickups: { x: number; y: number; kind: PickupKind }[];
  bullets: { x: number; y: number; direction: Direction }[];
  /** remaining: seconds until detonation */
  bombs: { x: number; y: number; remaining: number }[];
  /** progress: 0 when the blast starts, 1 when it fades */
  explosions: { x: number; y: number; progress: number }[];
  leaderboard: LeaderboardEntry[];
  allTimeHighscore: HighscoreRecord | null;
}

export interface WelcomeMessage {
  type: 'welcome';
  playerId: string;
  name: string;
  color: string;
  playerCount: number;
  maxPlayers: number;
}

export interface ServerFullMessage {
  type: 'server_full';
  message: string;
  maxPlayers: number;
  currentPlayers: number;
}

export interface NameTakenMessage {
  type: 'name_taken';
  message: string;
}

export interface PongMessage {
  type: 'pong';
  timestamp: number;
}

export type ServerMessage =
  | GameStateMessage
  | WelcomeMessage
  | ServerFullMessage
  | NameTakenMessage
  | PongMessage;

// ============ HTTP API Types ============

// GET /api/status
export interface StatusResponse {
  serverTime: number;
  players: number;
  maxPlayers: number;
  inGame: number;
  alive: number;
  pickups: number;
  tick: number;
  gameTime: number;
}

// GET /api/leaderboard
export interface LeaderboardResponse {
  leaderboard: LeaderboardEntry[];
  allTimeHighscore: HighscoreRecord | null;
}
