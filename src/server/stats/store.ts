import { HighscoreRecord, LeaderboardEntry, PlayerStats } from '../../shared/types.js';

export interface StatsSnapshot {
  players: Record<string, PlayerStats>;
  allTimeHighscore: HighscoreRecord | null;
}

/** Durable home for the stats records. */
export interface StatsBackend {
  readonly name: string;
  load(): Promise<StatsSnapshot>;
  save(snapshot: StatsSnapshot): Promise<void>;
  close(): Promise<void>;
}

export function emptyStats(): StatsSnapshot {
  return { players: {}, allTimeHighscore: null };
}

/**
 * Per-name player statistics, kept in memory and flushed to a backend on
 * demand. All updates are increments or maxima, so replaying a flush is
 * harmless.
 */
export class StatsStore {
  private players: Map<string, PlayerStats> = new Map();
  private record: HighscoreRecord | null = null;
  private dirty = false;
  // Set when the backend could not be read; saving would overwrite what is there
  private loadFailed = false;
  private flushChain: Promise<void> = Promise.resolve();

  constructor(private readonly backend: StatsBackend | null = null) {}

  async load(): Promise<void> {
    if (!this.backend) return;
    let snapshot: StatsSnapshot;
    try {
      snapshot = await this.backend.load();
    } catch (err) {
      this.loadFailed = true;
      throw err;
    }
    this.loadFailed = false;
    this.players = new Map(Object.entries(snapshot.players).map(([name, s]) => [name, { ...s }]));
    this.record = snapshot.allTimeHighscore;
    this.dirty = false;
  }

  get(name: string): PlayerStats | undefined {
    return this.players.get(name);
  }

  recordGameStarted(name: string): void {
    this.entry(name).gamesPlayed++;
    this.dirty = true;
  }

  recordKill(name: string): void {
    this.entry(name).kills++;
    this.dirty = true;
  }

  recordDeath(name: string, score: number): void {
    this.entry(name).deaths++;
    this.recordScore(name, score);
    this.dirty = true;
  }

  recordScore(name: string, score: number): void {
    const stats = this.entry(name);
    if (score > stats.highscore) {
      stats.highscore = score;
      this.dirty = true;
    }
    if (score > 0 && (!this.record || score > this.record.score)) {
      this.record = { name, score };
      this.dirty = true;
    }
  }

  /** Highest scores first; equal scores by name. */
  topPlayers(limit: number): LeaderboardEntry[] {
    return Array.from(this.players.entries())
      .map(([name, stats]) => ({ name, ...stats }))
      .sort((a, b) => b.highscore - a.highscore || a.name.localeCompare(b.name))
      .slice(0, limit);
  }

  allTimeHighscore(): HighscoreRecord | null {
    return this.record ? { ...this.record } : null;
  }

  toSnapshot(): StatsSnapshot {
    const players: Record<string, PlayerStats> = {};
    for (const [name, stats] of this.players) players[name] = { ...stats };
    return { players, allTimeHighscore: this.allTimeHighscore() };
  }

  /** False after a failed load: records are kept in memory only. */
  get persistent(): boolean {
    return this.backend !== null && !this.loadFailed;
  }

  /**
   * Write pending changes. Flushes run one after another; a failure is logged
   * and the data stays dirty for the next attempt. Never rejects.
   */
  flush(): Promise<void> {
    this.flushChain = this.flushChain
      .then(() => this.writePending())
      .catch((err: unknown) => {
        console.error('[stats] Flush failed:', err);
      });
    return this.flushChain;
  }

  async close(): Promise<void> {
    await this.flush();
    if (this.backend) await this.backend.close();
  }

  private async writePending(): Promise<void> {
    if (!this.backend || !this.persistent || !this.dirty) return;
    this.dirty = false;
    try {
      await this.backend.save(this.toSnapshot());
    } catch (err) {
      this.dirty = true;
      throw err;
    }
  }

  private entry(name: string): PlayerStats {
    let stats = this.players.get(name);
    if (!stats) {
      stats = { highscore: 0, gamesPlayed: 0, kills: 0, deaths: 0 };
      this.players.set(name, stats);
    }
    return stats;
  }
}
