import type { SourceSchema, SourceTable, TargetEndpoint, TargetSchema } from '../types.js';
import {
  InvalidSchemaError,
  SchemaNotLoadedError,
  UnknownEndpointError,
  UnknownTableError,
} from '../utils/errors.js';
import { deepFreeze } from '../utils/deepFreeze.js';

export interface TargetSchemaReader {
  get(connectionId: string): TargetSchema | undefined;
}

/**
 * Holds the discovered source schema and the ERP target schema for one run.
 * Both are frozen on registration; lookups are case-insensitive.
 */
export class SchemaRegistry {
  private source: SourceSchema | null = null;
  private target: TargetSchema | null = null;
  private readonly tablesByName = new Map<string, SourceTable>();
  private readonly endpointsByName = new Map<string, TargetEndpoint>();

  registerSource(schema: SourceSchema): void {
    const seen = new Set<string>();
    for (const table of schema.tables) {
      const key = table.name.toLowerCase();
      if (seen.has(key)) {
        throw new InvalidSchemaError(`Duplicate source table "${table.name}"`, { table: table.name });
      }
      seen.add(key);
    }

    this.source = deepFreeze(schema);
    this.tablesByName.clear();
    for (const table of this.source.tables) {
      this.tablesByName.set(table.name.toLowerCase(), table);
    }
  }

  loadTarget(schema: TargetSchema): void {
    this.target = deepFreeze(schema);
    this.endpointsByName.clear();
    for (const endpoint of this.target.endpoints) {
      this.endpointsByName.set(endpoint.path.toLowerCase(), endpoint);
    }
    // Entity names are a secondary key; paths win on collision.
    for (const endpoint of this.target.endpoints) {
      const key = endpoint.entity.toLowerCase();
      if (!this.endpointsByName.has(key)) this.endpointsByName.set(key, endpoint);
    }
  }

  loadTargetFromCache(cache: TargetSchemaReader, connectionId: string): void {
    const schema = cache.get(connectionId);
    if (!schema) {
      throw new SchemaNotLoadedError(['target'], `no cached schema for "${connectionId}", sync before mapping`);
    }
    this.loadTarget(schema);
  }

  hasSource(): boolean {
    return this.source !== null;
  }

  hasTarget(): boolean {
    return this.target !== null;
  }

  assertReady(): void {
    const missing: Array<'source' | 'target'> = [];
    if (!this.source) missing.push('source');
    if (!this.target) missing.push('target');
    if (missing.length > 0) throw new SchemaNotLoadedError(missing);
  }

  getSourceSchema(): SourceSchema {
    if (!this.source) throw new SchemaNotLoadedError(['source']);
    return this.source;
  }

  getTargetSchema(): TargetSchema {
    if (!this.target) throw new SchemaNotLoadedError(['target']);
    return this.target;
  }

  getSourceTable(name: string): SourceTable | undefined {
    return this.tablesByName.get(name.toLowerCase());
  }

  getTargetEndpoint(pathOrEntity: string): TargetEndpoint | undefined {
    return this.endpointsByName.get(pathOrEntity.toLowerCase());
  }

  requireSourceTable(name: string): SourceTable {
    this.assertReady();
    const table = this.getSourceTable(name);
    if (!table) throw new UnknownTableError(name);
    return table;
  }

  requireTargetEndpoint(pathOrEntity: string): TargetEndpoint {
    this.assertReady();
    const endpoint = this.getTargetEndpoint(pathOrEntity);
    if (!endpoint) throw new UnknownEndpointError(pathOrEntity);
    return endpoint;
  }
}
