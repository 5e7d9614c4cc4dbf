import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import type { AppConfig } from './config.js';
import { createDefaultParserRegistry, type ParserRegistry } from './parsers/parserRegistry.js';
import { setupErrorReportingRoutes } from './routes/errorReportingRoutes.js';
import { setupSessionRoutes } from './routes/sessionRoutes.js';
import { setupTargetSchemaRoutes } from './routes/targetSchemaRoutes.js';
import { ErpClient } from './services/erpClient.js';
import { MigrationSessionStore } from './services/sessionStore.js';
import { TargetSchemaCache } from './services/targetSchemaCache.js';
import { sendEngineError, sendHttpError } from './utils/httpErrors.js';

export interface AppServices {
  schemaCache: TargetSchemaCache;
  sessions: MigrationSessionStore;
  parsers: ParserRegistry;
  erp?: ErpClient;
}

export function createServices(config: AppConfig): AppServices {
  return {
    schemaCache: new TargetSchemaCache(config.schemaCacheDir),
    sessions: new MigrationSessionStore(),
    parsers: createDefaultParserRegistry(),
    ...(config.erp ? { erp: new ErpClient(config.erp) } : {}),
  };
}

export function createApp(config: AppConfig, services: AppServices = createServices(config)): Express {
  const app = express();

  app.use(cors(config.corsOrigin ? { origin: config.corsOrigin } : undefined));
  app.use(express.json({ limit: '16mb' }));

  app.get('/api/health', (_req, res) =>
    res.json({
      ok: true,
      sessions: services.sessions.list().length,
      formats: services.parsers.formats(),
      erpConfigured: services.erp !== undefined,
    }),
  );

  setupTargetSchemaRoutes(app, { cache: services.schemaCache, remote: services.erp });

  setupSessionRoutes(app, {
    sessions: services.sessions,
    schemas: services.schemaCache,
    parsers: services.parsers,
    batchSize: config.batchSize,
    uploadLimitBytes: config.uploadLimitBytes,
    sink: services.erp,
  });

  setupErrorReportingRoutes(app);

  // Body-parser and multer failures arrive here rather than in a route.
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      sendHttpError(req, res, status, 'UPLOAD_REJECTED', error.message, { field: error.field ?? null });
      return;
    }
    if (error instanceof SyntaxError) {
      sendHttpError(req, res, 400, 'VALIDATION_ERROR', `Malformed JSON body: ${error.message}`);
      return;
    }
    sendEngineError(req, res, error, 'api');
  });

  return app;
}
