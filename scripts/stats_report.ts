import { NO_BRACKET, bracketKey } from './bracket';
import { DataWarning, NormalizedGame } from './game_interface';
import { normalizeGames } from './game_snapshot';
import { GamesSnapshot } from './games_loader';
import { TrendPoint, playerTrends } from './player_trend';
import { PodSizeTables, segmentByPodSize } from './pod_size';
import { compareBy, compareText } from './sort_keys';
import {
  AggregationOptions,
  BracketRow,
  CommanderBracketRow,
  CommanderRow,
  PairRow,
  PlayerRow,
  TripleRow,
  UniqueTripleRow,
  aggregateGames,
  compareTriples,
} from './stats_calculator';
import { StatsConfig } from './stats_config';

export const STATS_SCHEMA = 'stats.v1';

export interface LineupEntry {
  player: string;
  commander: string;
  bracket: string;
}

export interface RecentGame {
  id: string;
  playedAt: string;
  winner: string | null;
  podSize: number;
  notes: string;
  lineup: LineupEntry[];
}

export interface StatsReport {
  schema: typeof STATS_SCHEMA;
  generatedAt: string;
  params: {
    alpha: number;
    topTriples: number;
    maxUniqueTriples: number;
    recentGames: number;
  };
  counts: {
    games: number;
    entries: number;
    resolvedWinners: number;
    unresolvedWinners: number;
  };
  filters: {
    players: string[];
    commanders: string[];
    brackets: string[];
  };
  byPlayer: PlayerRow[];
  byPlayerCommander: PairRow[];
  byCommander: CommanderRow[];
  byBracket: BracketRow[];
  commanderBrackets: CommanderBracketRow[];
  bracketEntryCounts: Record<string, number>;
  bracketWinnerCounts: Record<string, number>;
  podSizes: number[];
  byPodSize: Record<string, PodSizeTables>;
  triples: TripleRow[];
  uniqueTriples: UniqueTripleRow[];
  truncated: {
    triples: { total: number; shown: number };
    uniqueTriples: { total: number; shown: number };
  };
  recentGames: RecentGame[];
  trend: Record<string, TrendPoint[]>;
  warnings: DataWarning[];
}

// Most-played triples first for the cut, then back to key order for output.
function topTriples(rows: TripleRow[], limit: number): TripleRow[] {
  return [...rows]
    .sort((a, b) => b.games - a.games || compareTriples(a, b))
    .slice(0, limit)
    .sort(compareTriples);
}

const compareRecent = compareBy<NormalizedGame>(
  (a, b) => (a.playedAt === b.playedAt ? 0 : a.playedAt < b.playedAt ? 1 : -1),
  (a, b) => (a.id === b.id ? 0 : a.id < b.id ? 1 : -1),
);

function recentGames(games: NormalizedGame[], limit: number): RecentGame[] {
  return [...games]
    .sort(compareRecent)
    .slice(0, limit)
    .map((game) => ({
      id: game.id,
      playedAt: game.playedAt,
      winner: game.winnerName,
      podSize: game.podSize,
      notes: game.notes,
      lineup: game.entries
        .map((entry) => ({ player: entry.player, commander: entry.commander, bracket: bracketKey(entry.bracket) }))
        .sort(
          compareBy<LineupEntry>(
            (a, b) => compareText(a.player, b.player),
            (a, b) => compareText(a.commander, b.commander),
          ),
        ),
    }));
}

/**
 * Builds the versioned stats document from one snapshot. Nothing here reads the
 * clock except through `now`, so two runs over the same snapshot differ only in
 * `generatedAt`.
 */
export function buildStatsReport(snapshot: GamesSnapshot, config: StatsConfig, now: Date = new Date()): StatsReport {
  const normalized = normalizeGames(snapshot.games);
  const games = normalized.games;
  const options: AggregationOptions = { alpha: config.alpha, pressureLabels: config.pressureLabels };

  const tables = aggregateGames(games, options);
  const pods = segmentByPodSize(games, options);
  const triples = topTriples(tables.triples, config.topTriples);
  const uniqueTriples = tables.uniqueTriples.slice(0, config.maxUniqueTriples);

  return {
    schema: STATS_SCHEMA,
    generatedAt: now.toISOString(),
    params: {
      alpha: config.alpha,
      topTriples: config.topTriples,
      maxUniqueTriples: config.maxUniqueTriples,
      recentGames: config.recentGames,
    },
    counts: {
      games: tables.games,
      entries: tables.entries,
      resolvedWinners: tables.resolvedWinners,
      unresolvedWinners: tables.games - tables.resolvedWinners,
    },
    filters: {
      players: tables.byPlayer.map((row) => row.player),
      commanders: tables.byCommander.map((row) => row.commander),
      brackets: tables.byBracket.map((row) => row.bracket).filter((key) => key !== NO_BRACKET),
    },
    byPlayer: tables.byPlayer,
    byPlayerCommander: tables.byPlayerCommander,
    byCommander: tables.byCommander,
    byBracket: tables.byBracket,
    commanderBrackets: tables.commanderBrackets,
    bracketEntryCounts: tables.bracketEntryCounts,
    bracketWinnerCounts: tables.bracketWinnerCounts,
    podSizes: pods.sizes,
    byPodSize: pods.bySize,
    triples,
    uniqueTriples,
    truncated: {
      triples: { total: tables.triples.length, shown: triples.length },
      uniqueTriples: { total: tables.uniqueTriples.length, shown: uniqueTriples.length },
    },
    recentGames: recentGames(games, config.recentGames),
    trend: playerTrends(games),
    warnings: [...snapshot.warnings, ...normalized.warnings],
  };
}

export function serializeStatsReport(report: StatsReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}
