import { BRACKET_MAX, BRACKET_MIN, NO_BRACKET, bracketKey, compareBracketKeys } from './bracket';
import { winningEntry } from './game_snapshot';
import { NormalizedEntry, NormalizedGame } from './game_interface';
import {
  DEFAULT_PRESSURE_LABELS,
  PressureLabelTable,
  PressureSummary,
  QualifyingWin,
  summarizePressure,
} from './pressure_index';
import { compareBy, compareText } from './sort_keys';
import { bracketDelta, clampAlpha, winWeight } from './win_weight';

export interface AggregationOptions {
  alpha: number;
  pressureLabels?: PressureLabelTable;
}

export interface WinRow {
  games: number;
  wins: number;
  winrate: number;
}

export interface WeightedRow extends WinRow {
  weightedWins: number;
  weightedGames: number;
  weightedWinrate: number;
}

export interface PlayerRow extends WeightedRow {
  player: string;
  uniqueCommanders: number;
  topCommander: string;
  topCommanderGames: number;
  metaImpact: number | null;
}

export interface PairRow extends WeightedRow {
  player: string;
  commander: string;
}

export interface CommanderRow extends WinRow {
  commander: string;
}

export interface BracketRow extends WinRow {
  bracket: string;
}

export interface TripleRow extends WeightedRow, PressureSummary {
  player: string;
  commander: string;
  bracket: string;
}

export interface UniqueTripleRow {
  commander: string;
  player: string;
  bracket: string;
  entries: number;
}

/**
 * How often a commander was registered at each bracket. `counts` always carries
 * every key from 1 to 5 plus "n/a"; `currentBracket` is the most common bracket,
 * the lowest on ties, or null when none was recorded.
 */
export interface CommanderBracketRow {
  commander: string;
  total: number;
  counts: Record<string, number>;
  currentBracket: number | null;
}

export interface AggregateTables {
  games: number;
  entries: number;
  resolvedWinners: number;
  byPlayer: PlayerRow[];
  byPlayerCommander: PairRow[];
  byCommander: CommanderRow[];
  byBracket: BracketRow[];
  commanderBrackets: CommanderBracketRow[];
  triples: TripleRow[];
  uniqueTriples: UniqueTripleRow[];
  bracketEntryCounts: Record<string, number>;
  bracketWinnerCounts: Record<string, number>;
}

// Weighted games are kept as weightedWins + losses: each loss adds 1, each win adds its weight.
interface Tally {
  games: number;
  wins: number;
  weightedWins: number;
}

interface PlayerTally extends Tally {
  commanderGames: Map<string, number>;
  metaDeltaSum: number;
  metaGames: number;
}

interface TripleTally extends Tally {
  player: string;
  commander: string;
  bracket: string;
  qualifying: QualifyingWin[];
}

function emptyBracketCounts(): Record<string, number> {
  const counts: Record<string, number> = {};
  for (let bracket = BRACKET_MIN; bracket <= BRACKET_MAX; bracket++) {
    counts[String(bracket)] = 0;
  }
  counts[NO_BRACKET] = 0;
  return counts;
}

function modalBracket(counts: Record<string, number>): number | null {
  let current: number | null = null;
  let best = 0;
  for (let bracket = BRACKET_MIN; bracket <= BRACKET_MAX; bracket++) {
    const count = counts[String(bracket)] ?? 0;
    if (count > best) {
      best = count;
      current = bracket;
    }
  }
  return current;
}

function emptyTally(): Tally {
  return { games: 0, wins: 0, weightedWins: 0 };
}

function getOrCreate<K, V>(map: Map<K, V>, key: K, create: () => V): V {
  let value = map.get(key);
  if (value === undefined) {
    value = create();
    map.set(key, value);
  }
  return value;
}

function countEntry(tally: Tally, won: boolean, weight: number): void {
  tally.games++;
  if (won) {
    tally.wins++;
    tally.weightedWins += weight;
  }
}

function toWinRow(tally: Tally): WinRow {
  return { games: tally.games, wins: tally.wins, winrate: tally.wins / tally.games };
}

function toWeightedRow(tally: Tally): WeightedRow {
  const weightedGames = tally.weightedWins + (tally.games - tally.wins);
  return {
    ...toWinRow(tally),
    weightedWins: tally.weightedWins,
    weightedGames,
    weightedWinrate: weightedGames > 0 ? tally.weightedWins / weightedGames : 0,
  };
}

function pairKey(player: string, commander: string): string {
  return JSON.stringify([player, commander]);
}

function tripleKey(player: string, commander: string, bracket: string): string {
  return JSON.stringify([player, commander, bracket]);
}

/**
 * Per-run accumulator. One context is created for each aggregateGames call and
 * dropped once the tables are built.
 */
export class AggregationContext {
  readonly players = new Map<string, PlayerTally>();
  readonly pairs = new Map<string, Tally & { player: string; commander: string }>();
  readonly commanders = new Map<string, Tally>();
  readonly brackets = new Map<string, Tally>();
  readonly commanderBrackets = new Map<string, Record<string, number>>();
  readonly triples = new Map<string, TripleTally>();
  readonly uniqueTriples = new Map<string, UniqueTripleRow>();
  readonly bracketWinnerCounts = new Map<string, number>();
  games = 0;
  entries = 0;
  resolvedWinners = 0;

  constructor(private readonly alpha: number) {}

  addGame(game: NormalizedGame): void {
    this.games++;
    const winner = winningEntry(game);
    const winnerBracket = winner && winner.bracket.kind === 'present' ? winner.bracket.value : null;
    const weight = winWeight(winnerBracket, game.tableAvg, this.alpha);

    if (winner) {
      this.resolvedWinners++;
      const key = bracketKey(winner.bracket);
      this.bracketWinnerCounts.set(key, (this.bracketWinnerCounts.get(key) ?? 0) + 1);
    }

    for (const entry of game.entries) {
      this.addEntry(game, entry, entry === winner, weight, winnerBracket);
    }
  }

  private addEntry(
    game: NormalizedGame,
    entry: NormalizedEntry,
    won: boolean,
    weight: number,
    winnerBracket: number | null,
  ): void {
    const { player, commander } = entry;
    const bracket = bracketKey(entry.bracket);
    this.entries++;

    const playerTally = getOrCreate(this.players, player, () => ({
      ...emptyTally(),
      commanderGames: new Map<string, number>(),
      metaDeltaSum: 0,
      metaGames: 0,
    }));
    countEntry(playerTally, won, weight);
    playerTally.commanderGames.set(commander, (playerTally.commanderGames.get(commander) ?? 0) + 1);
    if (entry.bracket.kind === 'present' && game.tableAvg !== null) {
      playerTally.metaDeltaSum += entry.bracket.value - game.tableAvg;
      playerTally.metaGames++;
    }

    countEntry(
      getOrCreate(this.pairs, pairKey(player, commander), () => ({ ...emptyTally(), player, commander })),
      won,
      weight,
    );
    countEntry(getOrCreate(this.commanders, commander, emptyTally), won, weight);
    countEntry(getOrCreate(this.brackets, bracket, emptyTally), won, weight);
    const bracketCounts = getOrCreate(this.commanderBrackets, commander, emptyBracketCounts);
    bracketCounts[bracket] = (bracketCounts[bracket] ?? 0) + 1;

    const triple = getOrCreate(this.triples, tripleKey(player, commander, bracket), () => ({
      ...emptyTally(),
      player,
      commander,
      bracket,
      qualifying: [],
    }));
    countEntry(triple, won, weight);
    if (won) {
      const delta = bracketDelta(winnerBracket, game.tableAvg);
      if (delta !== null && game.tableAvg !== null) {
        triple.qualifying.push({ delta, tableAvg: game.tableAvg });
      }
    }

    const unique = getOrCreate(this.uniqueTriples, tripleKey(commander, player, bracket), () => ({
      commander,
      player,
      bracket,
      entries: 0,
    }));
    unique.entries++;
  }

  toTables(pressureLabels: PressureLabelTable): AggregateTables {
    const byPlayer: PlayerRow[] = [...this.players.entries()]
      .map(([player, tally]) => {
        const [topCommander, topCommanderGames] = [...tally.commanderGames.entries()].sort(
          ([ca, na], [cb, nb]) => nb - na || compareText(ca, cb),
        )[0];
        return {
          player,
          ...toWeightedRow(tally),
          uniqueCommanders: tally.commanderGames.size,
          topCommander,
          topCommanderGames,
          metaImpact: tally.metaGames > 0 ? tally.metaDeltaSum / tally.metaGames : null,
        };
      })
      .sort((a, b) => compareText(a.player, b.player));

    const byPlayerCommander: PairRow[] = [...this.pairs.values()]
      .map((tally) => ({ player: tally.player, commander: tally.commander, ...toWeightedRow(tally) }))
      .sort(
        compareBy<PairRow>(
          (a, b) => compareText(a.player, b.player),
          (a, b) => compareText(a.commander, b.commander),
        ),
      );

    const byCommander: CommanderRow[] = [...this.commanders.entries()]
      .map(([commander, tally]) => ({ commander, ...toWinRow(tally) }))
      .sort((a, b) => compareText(a.commander, b.commander));

    const byBracket: BracketRow[] = [...this.brackets.entries()]
      .map(([bracket, tally]) => ({ bracket, ...toWinRow(tally) }))
      .sort((a, b) => compareBracketKeys(a.bracket, b.bracket));

    const commanderBrackets: CommanderBracketRow[] = [...this.commanderBrackets.entries()]
      .map(([commander, counts]) => ({
        commander,
        total: Object.values(counts).reduce((sum, n) => sum + n, 0),
        counts,
        currentBracket: modalBracket(counts),
      }))
      .sort((a, b) => compareText(a.commander, b.commander));

    const triples: TripleRow[] = [...this.triples.values()]
      .map((tally) => ({
        player: tally.player,
        commander: tally.commander,
        bracket: tally.bracket,
        ...toWeightedRow(tally),
        ...summarizePressure(tally.qualifying, tally.wins, pressureLabels),
      }))
      .sort(compareTriples);

    const uniqueTriples: UniqueTripleRow[] = [...this.uniqueTriples.values()].sort(
      compareBy<UniqueTripleRow>(
        (a, b) => compareText(a.commander, b.commander),
        (a, b) => compareText(a.player, b.player),
        (a, b) => compareBracketKeys(a.bracket, b.bracket),
      ),
    );

    return {
      games: this.games,
      entries: this.entries,
      resolvedWinners: this.resolvedWinners,
      byPlayer,
      byPlayerCommander,
      byCommander,
      byBracket,
      commanderBrackets,
      triples,
      uniqueTriples,
      bracketEntryCounts: Object.fromEntries(byBracket.map((row) => [row.bracket, row.games])),
      bracketWinnerCounts: Object.fromEntries(
        [...this.bracketWinnerCounts.entries()].sort(([a], [b]) => compareBracketKeys(a, b)),
      ),
    };
  }
}

export const compareTriples = compareBy<Pick<TripleRow, 'player' | 'commander' | 'bracket'>>(
  (a, b) => compareText(a.player, b.player),
  (a, b) => compareText(a.commander, b.commander),
  (a, b) => compareBracketKeys(a.bracket, b.bracket),
);

/**
 * Single pass over the snapshot. Every entry counts towards the games of its player,
 * (player, commander), commander, bracket and (player, commander, bracket) buckets;
 * the resolved winner's entry also counts a win, weighted by the bracket delta.
 */
export function aggregateGames(games: NormalizedGame[], options: AggregationOptions): AggregateTables {
  const context = new AggregationContext(clampAlpha(options.alpha));
  for (const game of games) {
    context.addGame(game);
  }
  return context.toTables(options.pressureLabels ?? DEFAULT_PRESSURE_LABELS);
}
