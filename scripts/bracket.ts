import { Bracket } from './game_interface';

export const BRACKET_MIN = 1;
export const BRACKET_MAX = 5;
export const NO_BRACKET = 'n/a';

const absentTokens = new Set(['', 'n/a', 'na', 'none', 'null']);

export interface ParsedBracket {
  bracket: Bracket;
  invalid: boolean;
}

const absent: Bracket = { kind: 'absent' };

function inRange(value: number): boolean {
  return Number.isInteger(value) && value >= BRACKET_MIN && value <= BRACKET_MAX;
}

/**
 * Normalises whatever the store holds for a bracket. Missing values and the usual
 * "n/a" spellings are absent; out-of-range or non-numeric values are absent and
 * flagged so the caller can record a warning.
 */
export function parseBracket(raw: unknown): ParsedBracket {
  if (raw === undefined || raw === null) {
    return { bracket: absent, invalid: false };
  }

  if (typeof raw === 'number') {
    return inRange(raw)
      ? { bracket: { kind: 'present', value: raw }, invalid: false }
      : { bracket: absent, invalid: true };
  }

  if (typeof raw === 'string') {
    const token = raw.trim().toLowerCase();
    if (absentTokens.has(token)) {
      return { bracket: absent, invalid: false };
    }
    if (/^[+-]?\d+$/.test(token)) {
      const value = Number.parseInt(token, 10);
      if (inRange(value)) {
        return { bracket: { kind: 'present', value }, invalid: false };
      }
    }
  }

  return { bracket: absent, invalid: true };
}

export function bracketKey(bracket: Bracket): string {
  return bracket.kind === 'present' ? String(bracket.value) : NO_BRACKET;
}

export function compareBracketKeys(a: string, b: string): number {
  if (a === b) return 0;
  if (a === NO_BRACKET) return 1;
  if (b === NO_BRACKET) return -1;
  return Number(a) - Number(b);
}

// Mean bracket at the table, ignoring entries without one.
export function tableBracketAverage(brackets: Bracket[]): number | null {
  let sum = 0;
  let count = 0;
  for (const bracket of brackets) {
    if (bracket.kind === 'present') {
      sum += bracket.value;
      count++;
    }
  }
  return count > 0 ? sum / count : null;
}
