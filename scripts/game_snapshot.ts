import { parseBracket, tableBracketAverage } from './bracket';
import {
  DataWarning,
  Game,
  GameEntry,
  NormalizedEntry,
  NormalizedGame,
  WinnerResolution,
} from './game_interface';

/**
 * Joins the recorded winner name to the game's entries. Only an exact match on a
 * single entry counts; a repeated name is ambiguous rather than a shared win.
 */
export function resolveWinner(entries: Pick<GameEntry, 'player'>[], winner: string | null): WinnerResolution {
  if (!winner) {
    return { kind: 'missing' };
  }

  let entryIndex = -1;
  let matches = 0;
  entries.forEach((entry, index) => {
    if (entry.player === winner) {
      matches++;
      entryIndex = index;
    }
  });

  if (matches === 0) return { kind: 'unmatched' };
  if (matches > 1) return { kind: 'ambiguous', matches };
  return { kind: 'unique', entryIndex };
}

function winnerWarning(game: Game, winner: WinnerResolution): DataWarning | null {
  switch (winner.kind) {
    case 'missing':
      return { code: 'winner-missing', gameId: game.id, message: 'No winner recorded' };
    case 'unmatched':
      return {
        code: 'winner-unmatched',
        gameId: game.id,
        message: `Winner "${game.winner}" matches no entry`,
      };
    case 'ambiguous':
      return {
        code: 'winner-ambiguous',
        gameId: game.id,
        message: `Winner "${game.winner}" matches ${winner.matches} entries`,
      };
    case 'unique':
      return null;
  }
}

export function normalizeGame(game: Game, warnings: DataWarning[]): NormalizedGame {
  const entries: NormalizedEntry[] = game.entries.map((entry) => {
    const { bracket, invalid } = parseBracket(entry.bracket);
    if (invalid) {
      warnings.push({
        code: 'bracket-invalid',
        gameId: game.id,
        message: `Bracket ${JSON.stringify(entry.bracket)} for ${entry.player} counted as n/a`,
      });
    }
    return { player: entry.player, commander: entry.commander, bracket };
  });

  if (entries.length === 0) {
    warnings.push({ code: 'game-empty', gameId: game.id, message: 'Game has no entries' });
  }

  const winner = resolveWinner(entries, game.winner);
  const warning = entries.length > 0 ? winnerWarning(game, winner) : null;
  if (warning) {
    warnings.push(warning);
  }

  return {
    id: game.id,
    playedAt: game.playedAt,
    notes: game.notes ?? '',
    winnerName: game.winner,
    entries,
    podSize: entries.length,
    tableAvg: tableBracketAverage(entries.map((e) => e.bracket)),
    winner,
  };
}

export function normalizeGames(games: Game[]): { games: NormalizedGame[]; warnings: DataWarning[] } {
  const warnings: DataWarning[] = [];
  const normalized = games.map((game) => normalizeGame(game, warnings));
  return { games: normalized, warnings };
}

export function winningEntry(game: NormalizedGame): NormalizedEntry | null {
  return game.winner.kind === 'unique' ? game.entries[game.winner.entryIndex] : null;
}
