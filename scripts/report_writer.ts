import * as fs from 'fs';
import * as path from 'path';
import * as logger from 'firebase-functions/logger';
import { ReportWriteError, describeError } from './errors';
import { StatsReport, serializeStatsReport } from './stats_report';

export function writeReportFile(filePath: string, report: StatsReport): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, serializeStatsReport(report), 'utf-8');
  } catch (error) {
    throw new ReportWriteError(`Cannot write stats report to ${filePath}: ${describeError(error)}`, { cause: error });
  }
  logger.info('Wrote stats report', { path: filePath, schema: report.schema });
}

export interface ReportDocumentWriter {
  collection(path: string): {
    doc(id: string): { set(data: Record<string, unknown>): Promise<unknown> };
  };
}

// Stores the whole report as one document, `<collection>/<schema>`.
export async function writeReportToFirestore(
  db: ReportDocumentWriter,
  report: StatsReport,
  collection = 'stats',
): Promise<void> {
  const data: Record<string, unknown> = JSON.parse(serializeStatsReport(report));
  try {
    await db.collection(collection).doc(report.schema).set(data);
  } catch (error) {
    throw new ReportWriteError(`Cannot write stats report to Firestore "${collection}": ${describeError(error)}`, {
      cause: error,
    });
  }
  logger.info('Wrote stats report to Firestore', { collection, doc: report.schema });
}
