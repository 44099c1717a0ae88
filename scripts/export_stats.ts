#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import * as admin from 'firebase-admin';
import { Command, InvalidArgumentError } from 'commander';
import * as logger from 'firebase-functions/logger';
import { ReportWriteError, SnapshotReadError, StatsConfigError, describeError } from './errors';
import { formatGamesCsv } from './games_csv';
import { GamesSnapshot, loadGamesFromFile, loadGamesFromFirestore } from './games_loader';
import { writeReportFile, writeReportToFirestore } from './report_writer';
import { loadStatsConfig } from './stats_config';
import { buildStatsReport } from './stats_report';

export type ExportOptions = {
  input?: string;
  firestore?: string;
  out?: string;
  firestoreOut?: string;
  csv?: string;
  config?: string;
  alpha?: number;
  topTriples?: number;
  maxUnique?: number;
  recent?: number;
};

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

let firestoreDb: admin.firestore.Firestore | undefined;

function firestore(): admin.firestore.Firestore {
  if (!firestoreDb) {
    if (!admin.apps.length) {
      admin.initializeApp({ credential: admin.credential.applicationDefault() });
    }
    firestoreDb = admin.firestore();
  }
  return firestoreDb;
}

export function buildProgram(): Command {
  return new Command()
    .name('export-stats')
    .description('Compute commander game statistics and write the stats.v1 report')
    .option('-i, --input <file>', 'games snapshot JSON file')
    .option('--firestore <collection>', 'read games from a Firestore collection')
    .option('-o, --out <file>', 'report output file', path.join('out', 'stats.v1.json'))
    .option('--firestore-out <collection>', 'also store the report in a Firestore collection')
    .option('--csv <file>', 'also write a one-row-per-game CSV export')
    .option('-c, --config <file>', 'stats config JSON file')
    .option('--alpha <number>', 'bracket weighting coefficient, 0 disables weighting', parseNumber)
    .option('--top-triples <n>', 'max (player, commander, bracket) rows', parseInteger)
    .option('--max-unique <n>', 'max distinct triple rows', parseInteger)
    .option('--recent <n>', 'number of recent games in the report', parseInteger);
}

async function loadSnapshot(options: ExportOptions): Promise<GamesSnapshot> {
  if (options.input && options.firestore) {
    throw new SnapshotReadError('Use either --input or --firestore, not both');
  }
  if (options.firestore) {
    return loadGamesFromFirestore(firestore(), options.firestore);
  }
  if (options.input) {
    return loadGamesFromFile(options.input);
  }
  throw new SnapshotReadError('No games source given (use --input or --firestore)');
}

export async function runExport(options: ExportOptions, now: Date = new Date()): Promise<void> {
  const config = loadStatsConfig(options.config, {
    alpha: options.alpha,
    topTriples: options.topTriples,
    maxUniqueTriples: options.maxUnique,
    recentGames: options.recent,
  });

  const snapshot = await loadSnapshot(options);
  const report = buildStatsReport(snapshot, config, now);

  for (const warning of report.warnings) {
    logger.warn(warning.message, { code: warning.code, gameId: warning.gameId });
  }
  logger.info('Computed stats', {
    games: report.counts.games,
    entries: report.counts.entries,
    warnings: report.warnings.length,
    alpha: config.alpha,
  });

  if (options.out) {
    writeReportFile(options.out, report);
  }
  if (options.firestoreOut) {
    await writeReportToFirestore(firestore(), report, options.firestoreOut);
  }
  if (options.csv) {
    try {
      fs.mkdirSync(path.dirname(options.csv), { recursive: true });
      fs.writeFileSync(options.csv, formatGamesCsv(snapshot.games), 'utf-8');
    } catch (error) {
      throw new ReportWriteError(`Cannot write CSV export to ${options.csv}: ${describeError(error)}`, { cause: error });
    }
    logger.info('Wrote games CSV', { path: options.csv, games: snapshot.games.length });
  }
}

async function main() {
  const program = buildProgram();
  program.parse();
  try {
    await runExport(program.opts<ExportOptions>());
  } catch (error) {
    if (error instanceof SnapshotReadError || error instanceof ReportWriteError || error instanceof StatsConfigError) {
      logger.error(`${error.name}: ${error.message}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

if (require.main === module) {
  main().catch((error) => {
    logger.error('Export failed', error);
    process.exitCode = 1;
  });
}
