import type { Request, Response } from 'express';
import { errorReportLog, type ReportSource } from '../services/errorReporting.js';
import { MappingEngineError } from './errors.js';

const STATUS_BY_CODE: Record<string, number> = {
  UNKNOWN_TABLE: 404,
  UNKNOWN_ENDPOINT: 404,
  UNKNOWN_COLUMN: 404,
  UNKNOWN_FIELD: 404,
  INVALID_EDIT: 400,
  INVALID_SCHEMA: 400,
  MAPPING_SET_FORMAT: 400,
  SOURCE_PARSE_FAILED: 422,
  UNSUPPORTED_FORMAT: 415,
  SCHEMA_NOT_LOADED: 409,
  MAPPING_NOT_VALIDATED: 409,
};

export function statusForError(error: unknown): number {
  return error instanceof MappingEngineError ? (STATUS_BY_CODE[error.code] ?? 400) : 500;
}

function param(req: Request, name: string): string | undefined {
  const value: unknown = req.params[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Logs the failure against the session and table named in the route, then
 * answers with `{ error: { code, message, details, reportId } }`.
 */
export function sendHttpError(
  req: Request,
  res: Response,
  status: number,
  code: string,
  message: string,
  details: unknown = null,
  source: ReportSource = 'api',
): void {
  const report = errorReportLog().record({
    source,
    severity: status >= 500 ? 'error' : 'warning',
    code,
    message,
    sessionId: param(req, 'sessionId'),
    table: param(req, 'table'),
    httpStatus: status,
    path: req.originalUrl,
  });
  res.status(status).json({ error: { code, message, details, reportId: report.id } });
}

export function sendEngineError(req: Request, res: Response, error: unknown, source: ReportSource = 'api'): void {
  const status = statusForError(error);
  if (error instanceof MappingEngineError) {
    sendHttpError(req, res, status, error.code, error.message, error.details ?? null, source);
    return;
  }
  console.error(`[api] ${req.method} ${req.originalUrl} failed:`, error);
  const message = error instanceof Error ? error.message : 'Unknown error';
  sendHttpError(req, res, status, 'INTERNAL_ERROR', message, null, source);
}
