/**
 * Wire codec. Every datagram carries one JSON object with a `type` tag.
 *
 * Inbound records are validated with zod and narrowed into `ClientMessage`;
 * tags the server does not know decode to `{ type: 'ignored' }`. Outbound
 * records are the `ServerMessage` union from the shared types.
 */

import { z } from 'zod';
import {
  Direction,
  DIRECTIONS,
  GameStateMessage,
  HighscoreRecord,
  LeaderboardEntry,
  ServerMessage,
} from '../../shared/types.js';
import { GRID_WIDTH, GRID_HEIGHT, MAX_NAME_LENGTH } from '../../shared/constants.js';
import { World } from '../game/world.js';

export type ClientMessage =
  | { type: 'connect'; name: string }
  | { type: 'disconnect' }
  | { type: 'update'; direction?: Direction; respawn: boolean }
  | { type: 'shoot' }
  | { type: 'throw_bomb' }
  | { type: 'start_game' }
  | { type: 'leave_game' }
  | { type: 'ping' }
  | { type: 'ignored'; tag: string };

export type DecodeResult = { ok: true; message: ClientMessage } | { ok: false; reason: string };

const envelopeSchema = z.object({ type: z.string() });

// Compact clients send 0-3 instead of the direction name
const directionSchema = z.union([
  z.enum(['UP', 'DOWN', 'LEFT', 'RIGHT']),
  z.number().int().min(0).max(3).transform((i): Direction => DIRECTIONS[i]),
]);

const connectSchema = z.object({
  name: z.string().optional(),
  player_name: z.string().optional(),
});

const updateFieldsSchema = z.object({
  direction: directionSchema.optional(),
  respawn: z.boolean().optional(),
});

// Older clients nest the fields under `data`
const updateSchema = updateFieldsSchema.extend({
  data: updateFieldsSchema.optional(),
});

function describe(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || 'message'}: ${i.message}`).join('; ');
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function decodeClientMessage(data: Buffer | string): DecodeResult {
  const text = typeof data === 'string' ? data : data.toString('utf8');
  const raw = parseJson(text);
  if (raw === undefined) {
    return { ok: false, reason: 'invalid JSON' };
  }

  const envelope = envelopeSchema.safeParse(raw);
  if (!envelope.success) {
    return { ok: false, reason: describe(envelope.error) };
  }

  const tag = envelope.data.type;
  switch (tag) {
    case 'connect': {
      const parsed = connectSchema.safeParse(raw);
      if (!parsed.success) return { ok: false, reason: describe(parsed.error) };
      const name = (parsed.data.name ?? parsed.data.player_name ?? '').trim().slice(0, MAX_NAME_LENGTH);
      if (name.length === 0) return { ok: false, reason: 'connect requires a non-empty name' };
      return { ok: true, message: { type: 'connect', name } };
    }

    case 'update': {
      const parsed = updateSchema.safeParse(raw);
      if (!parsed.success) return { ok: false, reason: describe(parsed.error) };
      const direction = parsed.data.direction ?? parsed.data.data?.direction;
      const respawn = (parsed.data.respawn ?? parsed.data.data?.respawn) === true;
      return {
        ok: true,
        message: direction ? { type: 'update', direction, respawn } : { type: 'update', respawn },
      };
    }

    case 'disconnect':
    case 'shoot':
    case 'throw_bomb':
    case 'start_game':
    case 'leave_game':
    case 'ping':
      return { ok: true, message: { type: tag } };

    default:
      return { ok: true, message: { type: 'ignored', tag } };
  }
}

export function encodeServerMessage(message: ServerMessage): Buffer {
  return Buffer.from(JSON.stringify(message), 'utf8');
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export interface SnapshotMeta {
  counter: number;
  gameTime: number;
  timestamp: number;
  leaderboard: LeaderboardEntry[];
  allTimeHighscore: HighscoreRecord | null;
}

/** Full, self-contained picture of the world for one broadcast. */
export function buildSnapshot(world: World, meta: SnapshotMeta): GameStateMessage {
  return {
    type: 'game_state',
    counter: meta.counter,
    gameTime: round2(meta.gameTime),
    timestamp: meta.timestamp,
    grid: { width: GRID_WIDTH, height: GRID_HEIGHT },
    players: Array.from(world.players.values()).map(p => ({
      id: p.publicId,
      name: p.name,
      body: p.body.map((c): [number, number] => [c.x, c.y]),
      direction: p.direction,
      score: p.score,
      alive: p.alive,
      color: p.color,
      bullets: p.bullets,
      bombs: p.bombs,
      inGame: p.inGame,
    })),
    pickups: world.pickups.map(p => ({ x: p.x, y: p.y, kind: p.kind })),
    bullets: world.bullets.map(b => ({ x: b.x, y: b.y, direction: b.direction })),
    bombs: world.bombs.map(b => ({ x: b.x, y: b.y, remaining: round2(Math.max(0, b.remainingMs) / 1000) })),
    explosions: world.explosions.map(e => ({
      x: e.x,
      y: e.y,
      progress: round2(Math.min(1, Math.max(0, 1 - e.remainingMs / e.durationMs))),
    })),
    leaderboard: meta.leaderboard,
    allTimeHighscore: meta.allTimeHighscore,
  };
}
