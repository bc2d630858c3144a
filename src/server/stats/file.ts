import { readFile, rename, writeFile } from 'fs/promises';
import { z } from 'zod';
import { StatsBackend, StatsSnapshot, emptyStats } from './store.js';

const playerStatsSchema = z.object({
  highscore: z.number().int().nonnegative(),
  gamesPlayed: z.number().int().nonnegative(),
  kills: z.number().int().nonnegative(),
  deaths: z.number().int().nonnegative(),
});

const highscoreSchema = z.object({ name: z.string(), score: z.number() }).nullable();

// Records are checked one by one so a single bad entry does not cost the rest
const statsFileSchema = z.object({
  players: z.record(z.unknown()),
  allTimeHighscore: z.unknown(),
});

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** Stats kept in a single JSON file, rewritten atomically on every save. */
export class JsonFileStatsBackend implements StatsBackend {
  readonly name = 'json-file';

  constructor(private readonly path: string) {}

  async load(): Promise<StatsSnapshot> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return emptyStats();
      throw err;
    }

    const json = parseJson(text);
    if (!json.ok) {
      await this.moveAside('is not valid JSON');
      return emptyStats();
    }

    const parsed = statsFileSchema.safeParse(json.value);
    if (!parsed.success) {
      await this.moveAside(`has an unexpected shape (${parsed.error.issues[0]?.message ?? 'invalid'})`);
      return emptyStats();
    }

    const snapshot = emptyStats();
    for (const [name, value] of Object.entries(parsed.data.players)) {
      const record = playerStatsSchema.safeParse(value);
      if (record.success) {
        snapshot.players[name] = record.data;
      } else {
        console.warn(`[stats] Skipping malformed record for "${name}" in ${this.path}`);
      }
    }

    const record = highscoreSchema.safeParse(parsed.data.allTimeHighscore ?? null);
    if (record.success) {
      snapshot.allTimeHighscore = record.data;
    } else {
      console.warn(`[stats] Ignoring malformed all-time highscore in ${this.path}`);
    }
    return snapshot;
  }

  async save(snapshot: StatsSnapshot): Promise<void> {
    const tmp = `${this.path}.tmp`;
    await writeFile(tmp, JSON.stringify(snapshot, null, 2), 'utf8');
    await rename(tmp, this.path);
  }

  async close(): Promise<void> {
    // nothing held open
  }

  // Keep an unreadable file for inspection instead of overwriting it
  private async moveAside(reason: string): Promise<void> {
    const target = `${this.path}.corrupt`;
    await rename(this.path, target);
    console.warn(`[stats] ${this.path} ${reason}; moved to ${target}, starting empty`);
  }
}
