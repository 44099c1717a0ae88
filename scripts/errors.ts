// Fatal failures surfaced to the caller. Data-quality problems are warnings, not errors.

export class SnapshotReadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SnapshotReadError';
  }
}

export class ReportWriteError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReportWriteError';
  }
}

export class StatsConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StatsConfigError';
  }
}

export class LineupParseError extends Error {
  constructor(message: string, readonly line: string) {
    super(`${message}: ${line}`);
    this.name = 'LineupParseError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
