// Shapes shared by the loader, the engine and the report.

export interface GameEntry {
  player: string;
  commander: string;
  // Raw value from the store; normalised by parseBracket.
  bracket?: unknown;
}

export interface Game {
  id: string;
  playedAt: string;
  winner: string | null;
  notes?: string;
  entries: GameEntry[];
}

export type Bracket =
  | { kind: 'present'; value: number }
  | { kind: 'absent' };

export type WinnerResolution =
  | { kind: 'unique'; entryIndex: number }
  | { kind: 'missing' }
  | { kind: 'unmatched' }
  | { kind: 'ambiguous'; matches: number };

export interface NormalizedEntry {
  player: string;
  commander: string;
  bracket: Bracket;
}

export interface NormalizedGame {
  id: string;
  playedAt: string;
  notes: string;
  winnerName: string | null;
  entries: NormalizedEntry[];
  podSize: number;
  tableAvg: number | null;
  winner: WinnerResolution;
}

export type WarningCode =
  | 'game-invalid'
  | 'entry-invalid'
  | 'game-empty'
  | 'bracket-invalid'
  | 'winner-missing'
  | 'winner-unmatched'
  | 'winner-ambiguous';

export interface DataWarning {
  code: WarningCode;
  gameId: string;
  message: string;
}
