// Arena dimensions (cells)
export const GRID_WIDTH = 40;
export const GRID_HEIGHT = 30;

// Snake settings
export const SPAWN_WALL_MARGIN = 5; // Spawn cells keep at least this many cells to every wall
export const SPAWN_MAX_ATTEMPTS = 50;
export const SPAWN_LOOKAHEAD = 2; // Cells ahead of a new head that must be free and inside the grid

// Scoring
export const MOVE_SCORE = 1; // Every legal step
export const BRICK_SCORE = 100; // Regular brick, replaces the step point
export const SEGMENT_LOSS_PENALTY = 50; // Per segment removed by a body hit
export const KILL_REWARD = 250; // Headshot credited to the bullet/bomb owner

// Pickups: percent chance per spawn, the rest are regular bricks
export const BOMB_BRICK_CHANCE = 2;
export const BULLET_BRICK_CHANCE = 5;

// Projectiles
export const BULLET_STEPS_PER_MOVE = 3; // Bullets cover 3 cells per movement interval
export const BOMB_THROW_MIN = 2;
export const BOMB_THROW_MAX = 5;
export const BOMB_FUSE_MIN_MS = 2000;
export const BOMB_FUSE_MAX_MS = 4000;
export const EXPLOSION_RADIUS = 1; // 3x3 block
export const EXPLOSION_DURATION_MS = 750;

// Sessions
export const MAX_PLAYERS = 16;
export const MAX_NAME_LENGTH = 20;
export const CLIENT_TIMEOUT_MS = 10_000;
export const HEARTBEAT_INTERVAL_MS = 5_000;

// Loop
export const MOVE_INTERVAL_MS = 150;
export const BROADCAST_INTERVAL_MS = 500; // 2 Hz
export const LEADERBOARD_SIZE = 10;

// Transport
export const DEFAULT_UDP_PORT = 50000;
export const DEFAULT_HTTP_PORT = 3000;
