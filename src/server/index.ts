import 'dotenv/config';
import express from 'express';
import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import cors from 'cors';

import { loadConfig } from './config.js';
import { GameServer } from './gameServer.js';
import { createRoutes } from './api/routes.js';
import { UdpTransport } from './net/udp.js';
import { StatsBackend, StatsStore } from './stats/store.js';
import { PostgresStatsBackend } from './stats/db.js';
import { JsonFileStatsBackend } from './stats/file.js';
import { createRng, mathRandom } from './game/rng.js';
import { GRID_WIDTH, GRID_HEIGHT } from '../shared/constants.js';

const config = loadConfig();

// Stats go to Postgres when DATABASE_URL is set, otherwise to a local JSON file
const backend: StatsBackend = config.databaseUrl
  ? new PostgresStatsBackend(config.databaseUrl)
  : new JsonFileStatsBackend(config.statsFile);
const stats = new StatsStore(backend);

const transport = new UdpTransport(config.udpHost, config.udpPort);
const gameServer = new GameServer({
  transport,
  stats,
  rng: config.rngSeed !== null ? createRng(config.rngSeed) : mathRandom,
  maxPlayers: config.maxPlayers,
  moveIntervalMs: config.moveIntervalMs,
  broadcastIntervalMs: config.broadcastIntervalMs,
  clientTimeoutMs: config.clientTimeoutMs,
  heartbeatIntervalMs: config.heartbeatIntervalMs,
});

// Initialize Express
const app = express();
const httpServer = createServer(app);

// Socket.IO for spectators; read-only, they never send game input
const io = new SocketIOServer(httpServer, {
  cors: {
    origin: config.production ? undefined : '*',
    methods: ['GET'],
  },
  maxHttpBufferSize: 1e4,
  pingTimeout: 10_000,
  pingInterval: 15_000,
  perMessageDeflate: false,
  httpCompression: false,
});

app.use(cors());
app.use(express.json());
app.use('/api', createRoutes(gameServer));

io.on('connection', (socket) => {
  socket.emit('status', gameServer.getStatus());
});

// Volatile so slow spectators drop frames instead of buffering them
gameServer.onStateUpdate((state) => {
  io.volatile.emit('gameState', state);
});

let flushTimer: NodeJS.Timeout | null = null;
let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`\n[server] ${signal} received, shutting down...`);

  gameServer.stop();
  if (flushTimer) {
    clearInterval(flushTimer);
    flushTimer = null;
  }

  // Everyone still connected gets their current score on record
  for (const player of gameServer.world.players.values()) {
    stats.recordScore(player.name, player.score);
  }
  await stats.close();
  await transport.close();
  // Also closes the underlying HTTP server
  io.close();
  process.exit(0);
}

async function main(): Promise<void> {
  try {
    await stats.load();
    console.log(`[stats] Loaded player stats from ${backend.name}`);
  } catch (err) {
    console.error(`[stats] Failed to load stats from ${backend.name}; this run's stats will not be saved:`, err);
  }

  const udpAddress = await transport
    .bind((data, endpoint) => gameServer.handleDatagram(data, endpoint))
    .catch((err: unknown) => {
      console.error(`[udp] Failed to bind ${config.udpHost}:${config.udpPort}:`, err);
      return process.exit(1);
    });

  httpServer.on('error', (err) => {
    console.error(`[http] Failed to listen on port ${config.httpPort}:`, err);
    process.exit(1);
  });

  httpServer.listen(config.httpPort, () => {
    gameServer.start();
    flushTimer = setInterval(() => {
      void stats.flush();
    }, config.statsFlushIntervalMs);

    console.log(`
╔════════════════════════════════════════════════════╗
║                  ARENA SNAKE SERVER                ║
╠════════════════════════════════════════════════════╣
║  UDP:        ${`${udpAddress.address}:${udpAddress.port}`.padEnd(38)}║
║  HTTP API:   ${`http://localhost:${config.httpPort}/api`.padEnd(38)}║
║  Grid:       ${`${GRID_WIDTH}x${GRID_HEIGHT}, ${config.maxPlayers} players max`.padEnd(38)}║
║  Stats:      ${backend.name.padEnd(38)}║
╚════════════════════════════════════════════════════╝
    `);
  });
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

main().catch((err: unknown) => {
  console.error('[server] Fatal startup error:', err);
  process.exit(1);
});
