import { Pool } from 'pg';
import { PlayerStats } from '../../shared/types.js';
import { StatsBackend, StatsSnapshot, emptyStats } from './store.js';

interface PlayerStatsRow {
  name: string;
  highscore: number;
  games_played: number;
  kills: number;
  deaths: number;
}

interface MetaRow {
  name: string | null;
  score: number | null;
}

/**
 * Postgres-backed stats. Tables are created on first load, so a fresh
 * database needs no separate migration step.
 */
export class PostgresStatsBackend implements StatsBackend {
  readonly name = 'postgres';
  private readonly pool: Pool;

  constructor(connectionString: string) {
    this.pool = new Pool({ connectionString, max: 2 });
  }

  private async dbQuery<T>(text: string, params: unknown[] = []): Promise<T[]> {
    const res = await this.pool.query(text, params);
    return res.rows as T[];
  }

  private async ensureSchema(): Promise<void> {
    await this.dbQuery(`
      CREATE TABLE IF NOT EXISTS player_stats (
        name          TEXT PRIMARY KEY,
        highscore     INTEGER NOT NULL DEFAULT 0,
        games_played  INTEGER NOT NULL DEFAULT 0,
        kills         INTEGER NOT NULL DEFAULT 0,
        deaths        INTEGER NOT NULL DEFAULT 0
      );
    `);
    await this.dbQuery(`
      CREATE TABLE IF NOT EXISTS stats_meta (
        id     INTEGER PRIMARY KEY DEFAULT 1 CHECK (id = 1),
        name   TEXT,
        score  INTEGER
      );
    `);
  }

  async load(): Promise<StatsSnapshot> {
    await this.ensureSchema();

    const snapshot = emptyStats();
    const rows = await this.dbQuery<PlayerStatsRow>(
      `SELECT name, highscore, games_played, kills, deaths FROM player_stats;`,
    );
    for (const row of rows) {
      const stats: PlayerStats = {
        highscore: row.highscore,
        gamesPlayed: row.games_played,
        kills: row.kills,
        deaths: row.deaths,
      };
      snapshot.players[row.name] = stats;
    }

    const meta = await this.dbQuery<MetaRow>(`SELECT name, score FROM stats_meta WHERE id = 1;`);
    if (meta.length > 0 && meta[0].name !== null && meta[0].score !== null) {
      snapshot.allTimeHighscore = { name: meta[0].name, score: meta[0].score };
    }
    return snapshot;
  }

  async save(snapshot: StatsSnapshot): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      for (const [name, stats] of Object.entries(snapshot.players)) {
        await client.query(
          `
          INSERT INTO player_stats (name, highscore, games_played, kills, deaths)
          VALUES ($1, $2, $3, $4, $5)
          ON CONFLICT (name) DO UPDATE
          SET highscore    = GREATEST(player_stats.highscore, EXCLUDED.highscore),
              games_played = GREATEST(player_stats.games_played, EXCLUDED.games_played),
              kills        = GREATEST(player_stats.kills, EXCLUDED.kills),
              deaths       = GREATEST(player_stats.deaths, EXCLUDED.deaths);
        `,
          [name, stats.highscore, stats.gamesPlayed, stats.kills, stats.deaths],
        );
      }

      if (snapshot.allTimeHighscore) {
        await client.query(
          `
          INSERT INTO stats_meta (id, name, score)
          VALUES (1, $1, $2)
          ON CONFLICT (id) DO UPDATE
          SET name  = EXCLUDED.name,
              score = EXCLUDED.score
          WHERE stats_meta.score IS NULL OR EXCLUDED.score > stats_meta.score;
        `,
          [snapshot.allTimeHighscore.name, snapshot.allTimeHighscore.score],
        );
      }

      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
