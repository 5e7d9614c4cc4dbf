import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('falls back to defaults under the data directory', () => {
    const config = loadConfig({});
    const dataDir = path.resolve('./data');
    expect(config).toEqual({
      port: 4000,
      dataDir,
      schemaCacheDir: path.join(dataDir, 'schema-cache'),
      errorReportsFile: path.join(dataDir, 'error-reports.json'),
      batchSize: 500,
      uploadLimitBytes: 52428800,
    });
  });

  it('reads the ERP connection when a base URL is set', () => {
    const config = loadConfig({
      PORT: '8080',
      DATA_DIR: '/srv/mapper',
      MIGRATION_BATCH_SIZE: '250',
      UPLOAD_LIMIT_MB: '1.5',
      CORS_ORIGIN: 'http://localhost:5173',
      ERP_BASE_URL: 'http://erp.test',
      ERP_API_TOKEN: 'test-secret',
      ERP_TIMEOUT_MS: '5000',
    });
    expect(config).toEqual({
      port: 8080,
      dataDir: '/srv/mapper',
      schemaCacheDir: '/srv/mapper/schema-cache',
      errorReportsFile: '/srv/mapper/error-reports.json',
      batchSize: 250,
      uploadLimitBytes: 1572864,
      corsOrigin: 'http://localhost:5173',
      erp: { baseUrl: 'http://erp.test', apiToken: 'test-secret', timeoutMs: 5000 },
    });
  });

  it('ignores ERP settings without a base URL', () => {
    expect(loadConfig({ ERP_API_TOKEN: 'test-secret' }).erp).toBeUndefined();
  });

  it('names every invalid variable', () => {
    expect(() => loadConfig({ PORT: '0' })).toThrow(/^Invalid configuration: PORT: /);
    expect(() => loadConfig({ ERP_BASE_URL: 'not a url' })).toThrow('ERP_BASE_URL: Invalid url');
  });
});
