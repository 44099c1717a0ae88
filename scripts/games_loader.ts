import * as fs from 'fs';
import { Timestamp } from 'firebase-admin/firestore';
import * as logger from 'firebase-functions/logger';
import { z } from 'zod';
import { SnapshotReadError, describeError } from './errors';
import { DataWarning, Game, GameEntry } from './game_interface';

const GameEntrySchema = z.object({
  player: z.string().trim().min(1, 'Player name is required'),
  commander: z.string().trim().min(1, 'Commander is required'),
  // Kept loose: bad brackets are counted as n/a with a warning, not rejected.
  bracket: z.unknown().optional(),
});

// Timestamps without an offset are UTC.
const hasOffset = /(z|[+-]\d{2}(:?\d{2})?)$/i;

const GameSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform(String),
  playedAt: z
    .string()
    .datetime({ offset: true, local: true })
    .transform((value) => new Date(hasOffset.test(value) ? value : `${value}Z`).toISOString()),
  winner: z
    .string()
    .nullish()
    .transform((value) => value?.trim() || null),
  notes: z.string().optional(),
  // Checked one by one so a bad entry does not cost the whole game.
  entries: z.array(z.unknown()),
});

function issueDetail(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
}

export interface GamesSnapshot {
  games: Game[];
  warnings: DataWarning[];
}

function gameIdOf(raw: unknown, index: number): string {
  if (typeof raw === 'object' && raw !== null && 'id' in raw) {
    const { id } = raw;
    if (typeof id === 'string' || typeof id === 'number') {
      return String(id);
    }
  }
  return `#${index}`;
}

/**
 * Validates a snapshot given either as `{ games: [...] }` or as a bare array.
 * A malformed game is skipped with a warning, a malformed entry is dropped from its
 * game with a warning; only a snapshot that is not a list of games at all is fatal.
 */
export function parseGamesSnapshot(raw: unknown): GamesSnapshot {
  let list: unknown[];
  if (Array.isArray(raw)) {
    list = raw;
  } else if (typeof raw === 'object' && raw !== null && 'games' in raw && Array.isArray(raw.games)) {
    list = raw.games;
  } else {
    throw new SnapshotReadError('Games snapshot must be an array or an object with a "games" array');
  }

  const games: Game[] = [];
  const warnings: DataWarning[] = [];
  const seen = new Set<string>();

  list.forEach((item, index) => {
    const result = GameSchema.safeParse(item);
    if (!result.success) {
      const detail = issueDetail(result.error);
      warnings.push({ code: 'game-invalid', gameId: gameIdOf(item, index), message: `Skipped: ${detail}` });
      return;
    }
    const { entries: rawEntries, ...game } = result.data;
    if (seen.has(game.id)) {
      warnings.push({ code: 'game-invalid', gameId: game.id, message: 'Skipped: duplicate game id' });
      return;
    }
    seen.add(game.id);

    const entries: GameEntry[] = [];
    rawEntries.forEach((rawEntry, entryIndex) => {
      const entry = GameEntrySchema.safeParse(rawEntry);
      if (entry.success) {
        entries.push(entry.data);
      } else {
        warnings.push({
          code: 'entry-invalid',
          gameId: game.id,
          message: `Dropped entry ${entryIndex}: ${issueDetail(entry.error)}`,
        });
      }
    });
    games.push({ ...game, entries });
  });

  return { games, warnings };
}

export function loadGamesFromFile(filePath: string): GamesSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new SnapshotReadError(`Cannot read games from ${filePath}: ${describeError(error)}`, { cause: error });
  }

  const snapshot = parseGamesSnapshot(raw);
  logger.info('Loaded games snapshot', {
    source: filePath,
    games: snapshot.games.length,
    warnings: snapshot.warnings.length,
  });
  return snapshot;
}

function toIsoString(value: unknown): unknown {
  return value instanceof Timestamp ? value.toDate().toISOString() : value;
}

function compareGames(a: Game, b: Game): number {
  if (a.playedAt !== b.playedAt) return a.playedAt < b.playedAt ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

// The part of a Firestore client the loader reads through.
export interface GamesCollectionReader {
  collection(path: string): {
    get(): Promise<{ docs: { id: string; data(): Record<string, unknown> }[] }>;
  };
}

export async function loadGamesFromFirestore(
  db: GamesCollectionReader,
  collection = 'games',
): Promise<GamesSnapshot> {
  let raw: unknown[];
  try {
    const snapshot = await db.collection(collection).get();
    raw = snapshot.docs.map((doc) => {
      const data: Record<string, unknown> = doc.data();
      return { ...data, id: doc.id, playedAt: toIsoString(data.playedAt) };
    });
  } catch (error) {
    throw new SnapshotReadError(`Cannot read Firestore collection "${collection}": ${describeError(error)}`, {
      cause: error,
    });
  }

  const parsed = parseGamesSnapshot(raw);
  logger.info('Loaded games snapshot', {
    source: `firestore:${collection}`,
    games: parsed.games.length,
    warnings: parsed.warnings.length,
  });
  return { games: [...parsed.games].sort(compareGames), warnings: parsed.warnings };
}
