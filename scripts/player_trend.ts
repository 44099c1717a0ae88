import { NormalizedGame } from './game_interface';
import { winningEntry } from './game_snapshot';
import { compareBy, compareText } from './sort_keys';

// A player's running record after one of their games.
export interface TrendPoint {
  gameId: string;
  playedAt: string;
  games: number;
  wins: number;
  winrate: number;
}

const compareByTime = compareBy<NormalizedGame>(
  (a, b) => (a.playedAt === b.playedAt ? 0 : a.playedAt < b.playedAt ? -1 : 1),
  (a, b) => (a.id === b.id ? 0 : a.id < b.id ? -1 : 1),
);

/**
 * Cumulative winrate per player, one point per game the player sat in, oldest
 * first. A player listed twice in one game still gets a single point.
 */
export function playerTrends(games: NormalizedGame[]): Record<string, TrendPoint[]> {
  const trends = new Map<string, TrendPoint[]>();

  for (const game of [...games].sort(compareByTime)) {
    const winner = winningEntry(game)?.player;
    for (const player of new Set(game.entries.map((entry) => entry.player))) {
      let points = trends.get(player);
      if (!points) {
        points = [];
        trends.set(player, points);
      }
      const previous = points.length > 0 ? points[points.length - 1] : undefined;
      const played = (previous?.games ?? 0) + 1;
      const wins = (previous?.wins ?? 0) + (player === winner ? 1 : 0);
      points.push({ gameId: game.id, playedAt: game.playedAt, games: played, wins, winrate: wins / played });
    }
  }

  return Object.fromEntries([...trends.entries()].sort(([a], [b]) => compareText(a, b)));
}
