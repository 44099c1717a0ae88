export const MIN_QUALIFYING_WINS = 2;
const INDEX_SCALE = 1e9;

export interface PressureBand {
  label: string;
  min?: number;
  max?: number;
}

/**
 * Step function from pressure index to a label. Bands are checked in order and
 * both bounds are inclusive; an index no band claims gets `neutral`.
 */
export interface PressureLabelTable {
  bands: PressureBand[];
  neutral: string;
  insufficient: string;
}

export const DEFAULT_PRESSURE_LABELS: PressureLabelTable = {
  bands: [
    { label: 'wins far above table', min: 2 },
    { label: 'wins skew above table', min: 1 },
    { label: 'wins skew below table', max: -1 },
  ],
  neutral: 'in line with table',
  insufficient: 'n/a',
};

export function labelPressure(index: number | null, table: PressureLabelTable = DEFAULT_PRESSURE_LABELS): string {
  if (index === null) {
    return table.insufficient;
  }
  const band = table.bands.find(
    (b) => (b.min === undefined || index >= b.min) && (b.max === undefined || index <= b.max),
  );
  return band ? band.label : table.neutral;
}

// One qualifying win: the winner's delta and the table average it was measured against.
export interface QualifyingWin {
  delta: number;
  tableAvg: number;
}

export interface PressureSummary {
  pressureIndex: number | null;
  pressureLabel: string;
  winCoverage: number | null;
  avgTableBracket: number | null;
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// Band bounds are exact, so float noise in the mean is cut off first.
function roundIndex(value: number): number {
  return Math.round(value * INDEX_SCALE) / INDEX_SCALE;
}

export function summarizePressure(
  qualifying: QualifyingWin[],
  wins: number,
  labels: PressureLabelTable = DEFAULT_PRESSURE_LABELS,
): PressureSummary {
  const pressureIndex =
    qualifying.length >= MIN_QUALIFYING_WINS ? roundIndex(mean(qualifying.map((q) => q.delta))) : null;
  return {
    pressureIndex,
    pressureLabel: labelPressure(pressureIndex, labels),
    winCoverage: wins > 0 ? qualifying.length / wins : null,
    avgTableBracket: qualifying.length > 0 ? mean(qualifying.map((q) => q.tableAvg)) : null,
  };
}
