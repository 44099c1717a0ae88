export const DEFAULT_ALPHA = 0.5;

export function clampAlpha(alpha: number): number {
  if (!Number.isFinite(alpha) || alpha < 0) {
    return 0;
  }
  return alpha;
}

/**
 * Weight applied to a win based on bracket mismatch.
 *
 * delta = B_winner - B_avg (winner bracket minus table average)
 *
 * - delta > 0: the winner sat above the table, the win counts less: 1 / (1 + alpha * delta)
 * - delta = 0: neutral, 1
 * - delta < 0: the winner sat below the table, the win counts more: 1 + alpha * -delta
 *
 * alpha = 0 turns the weighting off.
 */
export function winWeightFromDelta(delta: number, alpha: number = DEFAULT_ALPHA): number {
  const a = clampAlpha(alpha);
  if (delta > 0) {
    return 1 / (1 + a * delta);
  }
  if (delta < 0) {
    return 1 + a * -delta;
  }
  return 1;
}

export function bracketDelta(winnerBracket: number | null, tableAvg: number | null): number | null {
  if (winnerBracket === null || tableAvg === null) {
    return null;
  }
  return winnerBracket - tableAvg;
}

// A win without a computable delta counts as a plain win.
export function winWeight(winnerBracket: number | null, tableAvg: number | null, alpha: number): number {
  const delta = bracketDelta(winnerBracket, tableAvg);
  return delta === null ? 1 : winWeightFromDelta(delta, alpha);
}
