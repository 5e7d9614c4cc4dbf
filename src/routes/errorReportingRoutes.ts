import type { Express } from 'express';
import { z } from 'zod';
import { REPORT_SOURCES, errorReportLog } from '../services/errorReporting.js';
import { sendHttpError } from '../utils/httpErrors.js';

const ListQuerySchema = z.object({
  sessionId: z.string().max(120).optional(),
  table: z.string().max(200).optional(),
  source: z.enum(REPORT_SOURCES).optional(),
  code: z.string().max(120).optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

const SummaryQuerySchema = z.object({
  sessionId: z.string().max(120).optional(),
});

export function setupErrorReportingRoutes(app: Express): void {
  app.get('/api/error-reports', (req, res) => {
    const parsed = ListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendHttpError(req, res, 400, 'VALIDATION_ERROR', 'Invalid error report query', parsed.error.issues);
      return;
    }
    const reports = errorReportLog().list(parsed.data);
    res.json({ reports, count: reports.length });
  });

  app.get('/api/error-reports/summary', (req, res) => {
    const parsed = SummaryQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendHttpError(req, res, 400, 'VALIDATION_ERROR', 'Invalid summary query', parsed.error.issues);
      return;
    }
    res.json({ summary: errorReportLog().summarize(parsed.data.sessionId) });
  });
}
