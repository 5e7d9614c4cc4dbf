import path from 'node:path';
import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(4000),
  DATA_DIR: z.string().min(1).default('./data'),
  SCHEMA_CACHE_DIR: z.string().min(1).optional(),
  ERROR_REPORTS_FILE: z.string().min(1).optional(),
  MIGRATION_BATCH_SIZE: z.coerce.number().int().min(1).max(10000).default(500),
  UPLOAD_LIMIT_MB: z.coerce.number().positive().max(1024).default(50),
  CORS_ORIGIN: z.string().optional(),
  ERP_BASE_URL: z.string().url().optional(),
  ERP_API_TOKEN: z.string().min(1).optional(),
  ERP_TIMEOUT_MS: z.coerce.number().int().min(100).default(30000),
});

export interface ErpConfig {
  baseUrl: string;
  apiToken?: string;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  dataDir: string;
  schemaCacheDir: string;
  errorReportsFile: string;
  batchSize: number;
  uploadLimitBytes: number;
  corsOrigin?: string;
  /** Absent when no ERP is configured; submissions are then dry runs only. */
  erp?: ErpConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const data = parsed.data;
  const dataDir = path.resolve(data.DATA_DIR);
  return {
    port: data.PORT,
    dataDir,
    schemaCacheDir: path.resolve(data.SCHEMA_CACHE_DIR ?? path.join(dataDir, 'schema-cache')),
    errorReportsFile: path.resolve(data.ERROR_REPORTS_FILE ?? path.join(dataDir, 'error-reports.json')),
    batchSize: data.MIGRATION_BATCH_SIZE,
    uploadLimitBytes: Math.round(data.UPLOAD_LIMIT_MB * 1024 * 1024),
    ...(data.CORS_ORIGIN ? { corsOrigin: data.CORS_ORIGIN } : {}),
    ...(data.ERP_BASE_URL
      ? {
          erp: {
            baseUrl: data.ERP_BASE_URL,
            timeoutMs: data.ERP_TIMEOUT_MS,
            ...(data.ERP_API_TOKEN ? { apiToken: data.ERP_API_TOKEN } : {}),
          },
        }
      : {}),
  };
}
