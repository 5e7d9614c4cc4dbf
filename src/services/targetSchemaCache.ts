import fs from 'node:fs';
import path from 'node:path';
import { createHash } from 'node:crypto';
import type { TargetSchema } from '../types.js';
import { InvalidSchemaError } from '../utils/errors.js';
import { deepFreeze } from '../utils/deepFreeze.js';
import { CachedTargetSchemaSchema, TargetSchemaSchema } from '../validation/schemas.js';
import type { TargetSchemaReader } from './schemaRegistry.js';

/** Anything that can produce the ERP's current entity/field schema. */
export interface TargetSchemaSource {
  fetchTargetSchema(): Promise<TargetSchema>;
}

interface CacheEntry {
  connectionId: string;
  syncedAt: string;
  schema: TargetSchema;
}

/**
 * File-backed cache of target schemas, one JSON file per ERP connection.
 * Entries change only through `sync`; reads never reach the ERP.
 */
export class TargetSchemaCache implements TargetSchemaReader {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly cacheDir: string) {
    if (!fs.existsSync(cacheDir)) {
      fs.mkdirSync(cacheDir, { recursive: true });
    }
  }

  get(connectionId: string): TargetSchema | undefined {
    return this.entry(connectionId)?.schema;
  }

  syncedAt(connectionId: string): string | undefined {
    return this.entry(connectionId)?.syncedAt;
  }

  async sync(connectionId: string, source: TargetSchemaSource): Promise<TargetSchema> {
    const fetched = await source.fetchTargetSchema();
    return this.put(connectionId, fetched);
  }

  put(connectionId: string, schema: TargetSchema): TargetSchema {
    const parsed = TargetSchemaSchema.safeParse(schema);
    if (!parsed.success) {
      throw new InvalidSchemaError(`Target schema for "${connectionId}" is invalid`, {
        issues: parsed.error.issues,
      });
    }

    const entry: CacheEntry = deepFreeze({
      connectionId,
      syncedAt: new Date().toISOString(),
      schema: parsed.data,
    });
    fs.writeFileSync(this.filePath(connectionId), JSON.stringify(entry, null, 2), 'utf8');
    this.entries.set(connectionId, entry);
    console.log(
      `[TargetSchemaCache] synced "${connectionId}" (${entry.schema.endpoints.length} endpoints)`,
    );
    return entry.schema;
  }

  invalidate(connectionId: string): void {
    this.entries.delete(connectionId);
    fs.rmSync(this.filePath(connectionId), { force: true });
  }

  private entry(connectionId: string): CacheEntry | undefined {
    const cached = this.entries.get(connectionId);
    if (cached) return cached;

    const file = this.filePath(connectionId);
    if (!fs.existsSync(file)) return undefined;

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (err) {
      console.warn(`[TargetSchemaCache] unreadable cache file for "${connectionId}":`, err);
      return undefined;
    }
    const parsed = CachedTargetSchemaSchema.safeParse(raw);
    if (!parsed.success || parsed.data.connectionId !== connectionId) {
      console.warn(`[TargetSchemaCache] ignoring malformed cache file for "${connectionId}"`);
      return undefined;
    }

    const entry = deepFreeze(parsed.data);
    this.entries.set(connectionId, entry);
    return entry;
  }

  private filePath(connectionId: string): string {
    const key = createHash('sha256').update(connectionId).digest('hex');
    return path.join(this.cacheDir, `${key}.json`);
  }
}
