import { NormalizedGame } from './game_interface';
import { AggregationOptions, PairRow, PlayerRow, aggregateGames } from './stats_calculator';

export interface PodSizeTables {
  games: number;
  entries: number;
  byPlayer: PlayerRow[];
  byPlayerCommander: PairRow[];
}

export interface PodSizeSegments {
  sizes: number[];
  bySize: Record<string, PodSizeTables>;
}

/**
 * Re-runs the player and (player, commander) aggregation once per observed pod
 * size, on the games of that size only. Games without entries have no pod.
 */
export function segmentByPodSize(games: NormalizedGame[], options: AggregationOptions): PodSizeSegments {
  const gamesBySize = new Map<number, NormalizedGame[]>();
  for (const game of games) {
    if (game.podSize <= 0) continue;
    const bucket = gamesBySize.get(game.podSize);
    if (bucket) {
      bucket.push(game);
    } else {
      gamesBySize.set(game.podSize, [game]);
    }
  }

  const sizes = [...gamesBySize.keys()].sort((a, b) => a - b);
  const bySize: Record<string, PodSizeTables> = {};
  for (const size of sizes) {
    const tables = aggregateGames(gamesBySize.get(size) ?? [], options);
    bySize[String(size)] = {
      games: tables.games,
      entries: tables.entries,
      byPlayer: tables.byPlayer,
      byPlayerCommander: tables.byPlayerCommander,
    };
  }

  return { sizes, bySize };
}
