import { Game } from './game_interface';
import { compareText } from './sort_keys';

export const CSV_HEADER = ['game_id', 'played_at_utc', 'participants', 'winner_player', 'notes', 'lineup'];

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function csvLine(fields: (string | number)[]): string {
  return fields.map(csvField).join(',');
}

/**
 * One row per game, oldest first. The lineup column lists `player=commander`
 * pairs sorted by player, joined with " | ".
 */
export function formatGamesCsv(games: Game[]): string {
  const ordered = [...games].sort((a, b) =>
    a.playedAt !== b.playedAt ? (a.playedAt < b.playedAt ? -1 : 1) : a.id < b.id ? -1 : a.id > b.id ? 1 : 0,
  );

  const lines = [csvLine(CSV_HEADER)];
  for (const game of ordered) {
    const lineup = [...game.entries]
      .sort((a, b) => compareText(a.player, b.player))
      .map((entry) => `${entry.player}=${entry.commander}`)
      .join(' | ');
    lines.push(csvLine([game.id, game.playedAt, game.entries.length, game.winner ?? '', game.notes ?? '', lineup]));
  }
  return `${lines.join('\r\n')}\r\n`;
}
