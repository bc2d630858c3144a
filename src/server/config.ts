import {
  BROADCAST_INTERVAL_MS,
  BULLET_STEPS_PER_MOVE,
  CLIENT_TIMEOUT_MS,
  DEFAULT_HTTP_PORT,
  DEFAULT_UDP_PORT,
  HEARTBEAT_INTERVAL_MS,
  MAX_PLAYERS,
  MOVE_INTERVAL_MS,
} from '../shared/constants.js';

export interface ServerConfig {
  udpHost: string;
  udpPort: number;
  httpPort: number;
  maxPlayers: number;
  /** The engine ticks three times per move interval */
  moveIntervalMs: number;
  broadcastIntervalMs: number;
  clientTimeoutMs: number;
  heartbeatIntervalMs: number;
  statsFile: string;
  databaseUrl: string | null;
  statsFlushIntervalMs: number;
  rngSeed: number | null;
  production: boolean;
}

function readInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    console.warn(`[config] ${key}="${raw}" is not an integer, using ${fallback}`);
    return fallback;
  }
  if (value < min || value > max) {
    const clamped = Math.min(max, Math.max(min, value));
    console.warn(`[config] ${key}=${value} out of range ${min}..${max}, using ${clamped}`);
    return clamped;
  }
  return value;
}

function readString(env: NodeJS.ProcessEnv, key: string): string | null {
  const raw = env[key]?.trim();
  return raw ? raw : null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const moveIntervalMs = readInt(env, 'MOVE_INTERVAL_MS', MOVE_INTERVAL_MS, BULLET_STEPS_PER_MOVE);
  const seed = readString(env, 'RNG_SEED');
  let rngSeed: number | null = null;
  if (seed !== null) {
    rngSeed = readInt(env, 'RNG_SEED', 0, 0);
  }

  return {
    udpHost: readString(env, 'UDP_HOST') ?? '0.0.0.0',
    udpPort: readInt(env, 'UDP_PORT', DEFAULT_UDP_PORT, 0, 65535),
    httpPort: readInt(env, 'HTTP_PORT', DEFAULT_HTTP_PORT, 0, 65535),
    maxPlayers: readInt(env, 'MAX_PLAYERS', MAX_PLAYERS, 1, MAX_PLAYERS),
    moveIntervalMs,
    broadcastIntervalMs: readInt(env, 'BROADCAST_INTERVAL_MS', BROADCAST_INTERVAL_MS, 1),
    clientTimeoutMs: readInt(env, 'CLIENT_TIMEOUT_MS', CLIENT_TIMEOUT_MS, 1),
    heartbeatIntervalMs: readInt(env, 'HEARTBEAT_INTERVAL_MS', HEARTBEAT_INTERVAL_MS, 1),
    statsFile: readString(env, 'STATS_FILE') ?? 'player_stats.json',
    databaseUrl: readString(env, 'DATABASE_URL'),
    statsFlushIntervalMs: readInt(env, 'STATS_FLUSH_INTERVAL_MS', 30_000, 1000),
    rngSeed,
    production: env.NODE_ENV === 'production',
  };
}
