/**
 * sessionRoutes: review API for migration sessions.
 *
 * Endpoints:
 *   GET    /api/sessions                                      List live sessions
 *   POST   /api/sessions                                      Upload a source file and auto-map it
 *   GET    /api/sessions/:sessionId                           Mapping set and latest validation
 *   DELETE /api/sessions/:sessionId                           Drop a session
 *   GET    /api/sessions/:sessionId/tables/:table/candidates  Ranked endpoint or field candidates
 *   POST   /api/sessions/:sessionId/tables/:table/edits       Set or remove a column mapping
 *   POST   /api/sessions/:sessionId/tables/:table/skip        Mark a table as skipped
 *   POST   /api/sessions/:sessionId/tables/:table/unskip      Bring a skipped table back
 *   POST   /api/sessions/:sessionId/tables/:table/endpoint    Assign a target endpoint
 *   POST   /api/sessions/:sessionId/tables/:table/confirm-split
 *   POST   /api/sessions/:sessionId/tables/:table/review      Mark a draft as reviewed
 *   POST   /api/sessions/:sessionId/validate                  Run the validation gate
 *   GET    /api/sessions/:sessionId/export?format=json|csv    Download the mapping set
 *   POST   /api/sessions/:sessionId/import                    Replace the mapping set from a JSON export
 *   GET    /api/sessions/:sessionId/batches?limit=N           Preview shaped batches
 *   POST   /api/sessions/:sessionId/submit                    Dry run or live submission
 */
import type { Express, Request, Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import type { ParserRegistry } from '../parsers/parserRegistry.js';
import { buildCsvExport, buildJsonExport, parseMappingSet } from '../services/exporter.js';
import { MigrationSession, type PayloadSink } from '../services/migrationSession.js';
import type { MigrationSessionStore } from '../services/sessionStore.js';
import type { TargetSchemaReader } from '../services/schemaRegistry.js';
import type { PayloadBatch } from '../types.js';
import { SchemaNotLoadedError } from '../utils/errors.js';
import { sendEngineError, sendHttpError } from '../utils/httpErrors.js';
import {
  AssignEndpointSchema,
  ConfirmSplitSchema,
  CreateSessionSchema,
  MappingEditSchema,
  SkipTableSchema,
  SubmitSessionSchema,
} from '../validation/schemas.js';

export interface SessionRouteDeps {
  sessions: MigrationSessionStore;
  schemas: TargetSchemaReader;
  parsers: ParserRegistry;
  batchSize: number;
  uploadLimitBytes: number;
  /** ERP client for live submissions; without it only dry runs are accepted. */
  sink?: PayloadSink;
}

const CandidatesQuerySchema = z.object({
  column: z.string().min(1).optional(),
  endpoint: z.string().min(1).optional(),
});

const ExportQuerySchema = z.object({
  format: z.enum(['json', 'csv']).default('json'),
});

const BatchesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(5),
});

function findSession(deps: SessionRouteDeps, req: Request, res: Response): MigrationSession | undefined {
  const session = deps.sessions.get(req.params.sessionId);
  if (!session) {
    sendHttpError(req, res, 404, 'SESSION_NOT_FOUND', `No migration session "${req.params.sessionId}"`);
  }
  return session;
}

function take(batches: Iterable<PayloadBatch>, limit: number): PayloadBatch[] {
  const out: PayloadBatch[] = [];
  for (const batch of batches) {
    if (out.length >= limit) break;
    out.push(batch);
  }
  return out;
}

export function setupSessionRoutes(app: Express, deps: SessionRouteDeps): void {
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: deps.uploadLimitBytes } });

  app.get('/api/sessions', (_req, res) => {
    res.json({ sessions: deps.sessions.list() });
  });

  app.post('/api/sessions', upload.single('file'), async (req, res) => {
    const parsed = CreateSessionSchema.safeParse(req.body);
    if (!parsed.success) {
      sendHttpError(req, res, 400, 'VALIDATION_ERROR', 'Invalid input', parsed.error.issues);
      return;
    }
    if (!req.file) {
      sendHttpError(req, res, 400, 'VALIDATION_ERROR', 'Missing file upload');
      return;
    }

    const { connectionId } = parsed.data;
    try {
      const target = deps.schemas.get(connectionId);
      if (!target) {
        throw new SchemaNotLoadedError(['target'], `no cached schema for "${connectionId}", sync before mapping`);
      }
      const source = await deps.parsers.parse(req.file.buffer, req.file.originalname);
      const session = new MigrationSession(source, target, { batchSize: deps.batchSize, connectionId });
      deps.sessions.add(session);
      res.status(201).json({
        session: { id: session.id, createdAt: session.createdAt, connectionId, format: source.format },
        mappingSet: session.mappingSet(),
      });
    } catch (error: unknown) {
      sendEngineError(req, res, error, 'parser');
    }
  });

  app.get('/api/sessions/:sessionId', (req, res) => {
    const session = findSession(deps, req, res);
    if (!session) return;
    res.json({
      session: { id: session.id, createdAt: session.createdAt, connectionId: session.connectionId },
      mappingSet: session.mappingSet(),
      validation: session.latestValidation(),
    });
  });

  app.delete('/api/sessions/:sessionId', (req, res) => {
    if (!deps.sessions.delete(req.params.sessionId)) {
      sendHttpError(req, res, 404, 'SESSION_NOT_FOUND', `No migration session "${req.params.sessionId}"`);
      return;
    }
    res.status(204).end();
  });

  app.get('/api/sessions/:sessionId/tables/:table/candidates', (req, res) => {
    const session = findSession(deps, req, res);
    if (!session) return;
    const query = CandidatesQuerySchema.safeParse(req.query);
    if (!query.success) {
      sendHttpError(req, res, 400, 'VALIDATION_ERROR', 'Invalid query', query.error.issues);
      return;
    }
    try {
      const candidates = session.candidates(req.params.table, query.data.column, query.data.endpoint);
      res.json({ candidates });
    } catch (error: unknown) {
      sendEngineError(req, res, error, 'mapping');
    }
  });

  app.post('/api/sessions/:sessionId/tables/:table/edits', (req, res) => {
    const session = findSession(deps, req, res);
    if (!session) return;
    const parsed = MappingEditSchema.safeParse(req.body);
    if (!parsed.success) {
      sendHttpError(req, res, 400, 'VALIDATION_ERROR', 'Invalid edit', parsed.error.issues);
      return;
    }
    try {
      res.json({ table: session.edit(req.params.table, parsed.data) });
    } catch (error: unknown) {
      sendEngineError(req, res, error, 'mapping');
    }
  });

  app.post('/api/sessions/:sessionId/tables/:table/skip', (req, res) => {
    const session = findSession(deps, req, res);
    if (!session) return;
    const parsed = SkipTableSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendHttpError(req, res, 400, 'VALIDATION_ERROR', 'Invalid input', parsed.error.issues);
      return;
    }
    try {
      res.json({ table: session.builder.markSkip(req.params.table, parsed.data.reason) });
    } catch (error: unknown) {
      sendEngineError(req, res, error, 'mapping');
    }
  });

  app.post('/api/sessions/:sessionId/tables/:table/unskip', (req, res) => {
    const session = findSession(deps, req, res);
    if (!session) return;
    try {
      res.json({ table: session.builder.unmarkSkip(req.params.table) });
    } catch (error: unknown) {
      sendEngineError(req, res, error, 'mapping');
    }
  });

  app.post('/api/sessions/:sessionId/tables/:table/endpoint', (req, res) => {
    const session = findSession(deps, req, res);
    if (!session) return;
    const parsed = AssignEndpointSchema.safeParse(req.body);
    if (!parsed.success) {
      sendHttpError(req, res, 400, 'VALIDATION_ERROR', 'Invalid input', parsed.error.issues);
      return;
    }
    try {
      res.json({ table: session.builder.assignEndpoint(req.params.table, parsed.data.endpoint) });
    } catch (error: unknown) {
      sendEngineError(req, res, error, 'mapping');
    }
  });

  app.post('/api/sessions/:sessionId/tables/:table/confirm-split', (req, res) => {
    const session = findSession(deps, req, res);
    if (!session) return;
    const parsed = ConfirmSplitSchema.safeParse(req.body);
    if (!parsed.success) {
      sendHttpError(req, res, 400, 'VALIDATION_ERROR', 'Invalid input', parsed.error.issues);
      return;
    }
    try {
      res.json({ table: session.builder.confirmSplit(req.params.table, parsed.data.sourceColumn) });
    } catch (error: unknown) {
      sendEngineError(req, res, error, 'mapping');
    }
  });

  app.post('/api/sessions/:sessionId/tables/:table/review', (req, res) => {
    const session = findSession(deps, req, res);
    if (!session) return;
    try {
      res.json({ table: session.builder.markReviewed(req.params.table) });
    } catch (error: unknown) {
      sendEngineError(req, res, error, 'mapping');
    }
  });

  app.post('/api/sessions/:sessionId/validate', (req, res) => {
    const session = findSession(deps, req, res);
    if (!session) return;
    try {
      res.json({ validation: session.validate() });
    } catch (error: unknown) {
      sendEngineError(req, res, error, 'mapping');
    }
  });

  app.get('/api/sessions/:sessionId/export', (req, res) => {
    const session = findSession(deps, req, res);
    if (!session) return;
    const query = ExportQuerySchema.safeParse(req.query);
    if (!query.success) {
      sendHttpError(req, res, 400, 'VALIDATION_ERROR', 'Unsupported export format', query.error.issues);
      return;
    }
    const mappingSet = session.mappingSet();
    if (query.data.format === 'csv') {
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="mapping-${session.id}.csv"`);
      res.send(buildCsvExport(mappingSet));
      return;
    }
    res.setHeader('Content-Type', 'application/json; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename="mapping-${session.id}.json"`);
    res.send(buildJsonExport(mappingSet));
  });

  app.post('/api/sessions/:sessionId/import', (req, res) => {
    const session = findSession(deps, req, res);
    if (!session) return;
    try {
      res.json({ validation: session.importMappingSet(parseMappingSet(req.body)) });
    } catch (error: unknown) {
      sendEngineError(req, res, error, 'mapping');
    }
  });

  app.get('/api/sessions/:sessionId/batches', (req, res) => {
    const session = findSession(deps, req, res);
    if (!session) return;
    const query = BatchesQuerySchema.safeParse(req.query);
    if (!query.success) {
      sendHttpError(req, res, 400, 'VALIDATION_ERROR', 'Invalid query', query.error.issues);
      return;
    }
    try {
      res.json({ batches: take(session.batches(), query.data.limit) });
    } catch (error: unknown) {
      sendEngineError(req, res, error, 'resolver');
    }
  });

  app.post('/api/sessions/:sessionId/submit', async (req, res) => {
    const session = findSession(deps, req, res);
    if (!session) return;
    const parsed = SubmitSessionSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendHttpError(req, res, 400, 'VALIDATION_ERROR', 'Invalid input', parsed.error.issues);
      return;
    }
    const { dryRun } = parsed.data;
    if (!dryRun && !deps.sink) {
      sendHttpError(req, res, 409, 'ERP_NOT_CONFIGURED', 'Live submission needs ERP_BASE_URL; only dry runs are available');
      return;
    }

    // A client that hangs up stops the run before its next batch.
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const report = await session.submit(dryRun ? null : (deps.sink ?? null), {
        dryRun,
        signal: controller.signal,
      });
      res.json({ report });
    } catch (error: unknown) {
      sendEngineError(req, res, error, 'submission');
    }
  });
}
