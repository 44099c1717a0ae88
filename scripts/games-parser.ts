import * as fs from 'fs';
import * as path from 'path';
import * as logger from 'firebase-functions/logger';
import { BRACKET_MAX, BRACKET_MIN } from './bracket';
import { LineupParseError, describeError } from './errors';
import { Game } from './game_interface';

export interface LineupEntry {
  player: string;
  commander: string;
  bracket: number | null;
}

const noBracketTokens = new Set(['', 'n/a', 'na', 'none', 'null']);

/**
 * Parses a lineup, one player per line:
 *
 *   Player - Commander - Bracket
 *
 * Bracket is an integer from 1 to 5, or n/a. "Player - Commander" is accepted too.
 * Commanders whose names contain the separator keep it.
 */
export function parseLineup(text: string): LineupEntry[] {
  const entries: LineupEntry[] = [];

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) continue;

    const sep = line.includes(' - ') ? ' - ' : '-';
    const parts = line.split(sep).map((p) => p.trim());
    if (parts.length < 2 || !parts[0]) {
      throw new LineupParseError('Invalid lineup line', line);
    }

    const player = parts[0];
    let commanderParts = parts.slice(1);
    let bracket: number | null = null;

    if (parts.length >= 3) {
      const token = parts[parts.length - 1].toLowerCase();
      commanderParts = parts.slice(1, -1);
      if (!noBracketTokens.has(token)) {
        if (!/^[+-]?\d+$/.test(token)) {
          throw new LineupParseError(`Invalid bracket (use ${BRACKET_MIN}-${BRACKET_MAX} or n/a)`, line);
        }
        const value = Number.parseInt(token, 10);
        if (value < BRACKET_MIN || value > BRACKET_MAX) {
          throw new LineupParseError(`Bracket out of range (${BRACKET_MIN}-${BRACKET_MAX})`, line);
        }
        bracket = value;
      }
    }

    const commander = commanderParts.filter((c) => c).join(` ${sep.trim()} `).trim();
    if (!commander) {
      throw new LineupParseError('Invalid lineup line', line);
    }
    entries.push({ player, commander, bracket });
  }

  if (entries.length === 0) {
    throw new LineupParseError('No entries found', text.trim());
  }
  return entries;
}

/**
 * Parses a plain-text game log. Games are separated by blank lines:
 *
 *   # 2025-01-10T20:00:00Z
 *   winner: Alice
 *   notes: first game of the night
 *   Alice - Atraxa, Praetors' Voice - 4
 *   Bob - Krenko, Mob Boss - 3
 *
 * Games are numbered from 1 in file order.
 */
export function parseGameLog(text: string): Game[] {
  const blocks = text
    .split(/\r?\n\s*\r?\n/)
    .map((block) => block.trim())
    .filter((block) => block.length > 0);

  return blocks.map((block, index) => {
    const [header, ...rest] = block.split(/\r?\n/).map((line) => line.trim());
    const timestamp = header.startsWith('#') ? header.slice(1).trim() : '';
    if (!timestamp || Number.isNaN(Date.parse(timestamp))) {
      throw new LineupParseError('Game must start with "# <ISO timestamp>"', header);
    }

    let winner: string | null = null;
    let notes: string | undefined;
    const lineupLines: string[] = [];
    for (const line of rest) {
      const field = /^(winner|notes):(.*)$/i.exec(line);
      if (field && field[1].toLowerCase() === 'winner') {
        winner = field[2].trim() || null;
      } else if (field) {
        notes = field[2].trim();
      } else {
        lineupLines.push(line);
      }
    }

    return {
      id: String(index + 1),
      playedAt: new Date(timestamp).toISOString(),
      winner,
      ...(notes ? { notes } : {}),
      entries: parseLineup(lineupLines.join('\n')),
    };
  });
}

function main(fileName: string) {
  const inputFilePath = path.join(__dirname, '..', 'data', fileName);
  const outputFilePath = path.join(
    __dirname,
    '..',
    'data',
    `${path.basename(inputFilePath, path.extname(inputFilePath))}.json`,
  );

  try {
    const games = parseGameLog(fs.readFileSync(inputFilePath, 'utf-8'));
    fs.writeFileSync(outputFilePath, `${JSON.stringify({ games }, null, 2)}\n`);
    logger.info(`Converted ${inputFilePath} to ${outputFilePath}`, { games: games.length });
  } catch (error) {
    logger.error(`Error processing file ${inputFilePath}: ${describeError(error)}`);
    process.exit(1);
  }
}

if (require.main === module) {
  main(process.argv[2] || 'sample_games.txt');
}
