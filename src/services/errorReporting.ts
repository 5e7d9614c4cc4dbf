import fs from 'node:fs';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

export const REPORT_SOURCES = ['api', 'parser', 'mapping', 'resolver', 'submission', 'schema-cache'] as const;

export type ReportSource = (typeof REPORT_SOURCES)[number];

const ErrorReportSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  source: z.enum(REPORT_SOURCES),
  severity: z.enum(['error', 'warning']),
  code: z.string(),
  message: z.string(),
  sessionId: z.string().optional(),
  table: z.string().optional(),
  batchId: z.string().optional(),
  endpoint: z.string().optional(),
  /** `rejected`: the ERP refused some records. `failed`: the batch never landed. */
  outcome: z.enum(['rejected', 'failed']).optional(),
  failedRecords: z.number().int().nonnegative().optional(),
  httpStatus: z.number().int().optional(),
  path: z.string().optional(),
});

export type ErrorReport = z.infer<typeof ErrorReportSchema>;
export type ReportSeverity = ErrorReport['severity'];
export type NewErrorReport = Omit<ErrorReport, 'id' | 'timestamp'>;

export interface ErrorReportFilter {
  sessionId?: string;
  table?: string;
  source?: ReportSource;
  code?: string;
  limit?: number;
}

export interface TableErrorSummary {
  table: string;
  rejectedBatches: number;
  failedBatches: number;
  failedRecords: number;
}

export interface ErrorReportSummary {
  total: number;
  bySource: Partial<Record<ReportSource, number>>;
  tables: TableErrorSummary[];
  latest: ErrorReport | null;
}

const DEFAULT_CAPACITY = 5000;
const MAX_MESSAGE_LENGTH = 2000;

/**
 * Failures of a migration run, newest first, kept in one JSON file.
 * Submission reports name the session, table and batch they belong to.
 */
export class ErrorReportLog {
  private reports: ErrorReport[];

  constructor(
    private readonly filePath: string,
    private readonly capacity = DEFAULT_CAPACITY,
  ) {
    this.reports = this.read();
  }

  record(input: NewErrorReport): ErrorReport {
    const report: ErrorReport = {
      ...input,
      id: uuidv4(),
      timestamp: new Date().toISOString(),
      message: input.message.length > MAX_MESSAGE_LENGTH ? `${input.message.slice(0, MAX_MESSAGE_LENGTH - 3)}...` : input.message,
    };
    this.reports = [report, ...this.reports].slice(0, this.capacity);
    this.write();
    return report;
  }

  list(filter: ErrorReportFilter = {}): ErrorReport[] {
    return this.matching(filter).slice(0, filter.limit ?? 100);
  }

  /** Counts for one session, or for every report when no session is given. */
  summarize(sessionId?: string): ErrorReportSummary {
    const reports = this.matching({ sessionId });
    const bySource: Partial<Record<ReportSource, number>> = {};
    const tables = new Map<string, TableErrorSummary>();

    for (const report of reports) {
      bySource[report.source] = (bySource[report.source] ?? 0) + 1;
      if (!report.table || !report.outcome) continue;

      const entry = tables.get(report.table) ?? { table: report.table, rejectedBatches: 0, failedBatches: 0, failedRecords: 0 };
      if (report.outcome === 'rejected') entry.rejectedBatches += 1;
      else entry.failedBatches += 1;
      entry.failedRecords += report.failedRecords ?? 0;
      tables.set(report.table, entry);
    }

    return {
      total: reports.length,
      bySource,
      tables: [...tables.values()].sort((a, b) => a.table.localeCompare(b.table)),
      latest: reports[0] ?? null,
    };
  }

  private matching(filter: ErrorReportFilter): ErrorReport[] {
    return this.reports.filter(
      (r) =>
        (filter.sessionId === undefined || r.sessionId === filter.sessionId) &&
        (filter.table === undefined || r.table === filter.table) &&
        (filter.source === undefined || r.source === filter.source) &&
        (filter.code === undefined || r.code === filter.code),
    );
  }

  private read(): ErrorReport[] {
    if (!fs.existsSync(this.filePath)) return [];

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
    } catch (err) {
      console.warn(`[ErrorReportLog] ignoring unreadable ${this.filePath}:`, err);
      return [];
    }
    if (!Array.isArray(raw)) return [];

    const reports: ErrorReport[] = [];
    for (const entry of raw) {
      const parsed = ErrorReportSchema.safeParse(entry);
      if (parsed.success) reports.push(parsed.data);
    }
    if (reports.length < raw.length) {
      console.warn(`[ErrorReportLog] dropped ${raw.length - reports.length} malformed reports from ${this.filePath}`);
    }
    return reports.slice(0, this.capacity);
  }

  private write(): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(this.reports, null, 2), 'utf8');
    } catch (err) {
      // The failure being reported matters more than the log file.
      console.warn(`[ErrorReportLog] could not write ${this.filePath}:`, err);
    }
  }
}

let log: ErrorReportLog | null = null;

export function configureErrorReportLog(filePath: string): ErrorReportLog {
  log = new ErrorReportLog(filePath);
  return log;
}

export function errorReportLog(): ErrorReportLog {
  log ??= new ErrorReportLog(path.resolve(process.env.DATA_DIR ?? './data', 'error-reports.json'));
  return log;
}
