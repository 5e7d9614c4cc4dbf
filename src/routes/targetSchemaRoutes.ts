/**
 * targetSchemaRoutes: explicit sync of the ERP target schema.
 *
 * Endpoints:
 *   POST   /api/target-schemas/:connectionId/sync   Sync from the posted OpenAPI document, or from the ERP
 *   GET    /api/target-schemas/:connectionId        Cached schema and its sync time
 *   DELETE /api/target-schemas/:connectionId        Forget the cached schema
 */
import type { Express } from 'express';
import { OpenApiDocumentSource } from '../services/openApiParser.js';
import type { TargetSchemaCache, TargetSchemaSource } from '../services/targetSchemaCache.js';
import { sendEngineError, sendHttpError } from '../utils/httpErrors.js';

export interface TargetSchemaRouteDeps {
  cache: TargetSchemaCache;
  /** Live ERP used when no document is posted. */
  remote?: TargetSchemaSource;
}

function hasPaths(body: unknown): boolean {
  return typeof body === 'object' && body !== null && 'paths' in body;
}

export function setupTargetSchemaRoutes(app: Express, deps: TargetSchemaRouteDeps): void {
  app.post('/api/target-schemas/:connectionId/sync', async (req, res) => {
    const { connectionId } = req.params;
    const source = hasPaths(req.body) ? new OpenApiDocumentSource(req.body) : deps.remote;
    if (!source) {
      sendHttpError(
        req,
        res,
        400,
        'VALIDATION_ERROR',
        'Post an OpenAPI document, or configure ERP_BASE_URL to sync from the ERP',
      );
      return;
    }

    try {
      const schema = await deps.cache.sync(connectionId, source);
      res.json({
        connectionId,
        syncedAt: deps.cache.syncedAt(connectionId),
        endpoints: schema.endpoints.length,
        schema,
      });
    } catch (error: unknown) {
      sendEngineError(req, res, error, 'schema-cache');
    }
  });

  app.get('/api/target-schemas/:connectionId', (req, res) => {
    const { connectionId } = req.params;
    const schema = deps.cache.get(connectionId);
    if (!schema) {
      sendHttpError(req, res, 404, 'SCHEMA_NOT_CACHED', `No cached target schema for "${connectionId}"`);
      return;
    }
    res.json({ connectionId, syncedAt: deps.cache.syncedAt(connectionId), schema });
  });

  app.delete('/api/target-schemas/:connectionId', (req, res) => {
    deps.cache.invalidate(req.params.connectionId);
    res.status(204).end();
  });
}
