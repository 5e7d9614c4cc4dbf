import { describe, expect, it } from 'vitest';
import { SchemaRegistry } from '../services/schemaRegistry.js';
import {
  InvalidSchemaError,
  SchemaNotLoadedError,
  UnknownEndpointError,
  UnknownTableError,
} from '../utils/errors.js';
import { col, sourceSchema, table, targetSchema } from './fixtures.js';

describe('SchemaRegistry', () => {
  it('refuses lookups before both schemas are loaded', () => {
    const registry = new SchemaRegistry();
    expect(registry.hasSource()).toBe(false);
    expect(() => registry.assertReady()).toThrow('source schema and target schema not loaded');

    registry.registerSource(sourceSchema());
    expect(() => registry.requireSourceTable('tb_clientes')).toThrow(SchemaNotLoadedError);
  });

  it('rejects duplicate source tables regardless of case', () => {
    const registry = new SchemaRegistry();
    expect(() =>
      registry.registerSource({
        format: 'csv',
        tables: [table('Clientes', [col('id')]), table('clientes', [col('id')])],
      }),
    ).toThrow(InvalidSchemaError);
  });

  it('looks up tables and endpoints case-insensitively, by path or entity', () => {
    const registry = new SchemaRegistry();
    registry.registerSource(sourceSchema());
    registry.loadTarget(targetSchema());

    expect(registry.getSourceTable('TB_CLIENTES')?.name).toBe('tb_clientes');
    expect(registry.getTargetEndpoint('/V1/CUSTOMERS')?.entity).toBe('Customer');
    expect(registry.getTargetEndpoint('product')?.path).toBe('/v1/products');
  });

  it('freezes registered schemas', () => {
    const registry = new SchemaRegistry();
    const source = sourceSchema();
    registry.registerSource(source);
    registry.loadTarget(targetSchema());

    expect(Object.isFrozen(registry.getSourceSchema().tables[0].columns[0])).toBe(true);
    expect(Object.isFrozen(registry.getTargetSchema().endpoints[0].fields)).toBe(true);
    expect(() => {
      source.tables.push(table('late', [col('x')]));
    }).toThrow(TypeError);
  });

  it('names the missing table or endpoint', () => {
    const registry = new SchemaRegistry();
    registry.registerSource(sourceSchema());
    registry.loadTarget(targetSchema());

    expect(() => registry.requireSourceTable('nope')).toThrow(new UnknownTableError('nope'));
    expect(() => registry.requireTargetEndpoint('/v1/orders')).toThrow(UnknownEndpointError);
    expect(() => registry.requireTargetEndpoint('/v1/orders')).toThrow('Unknown target endpoint "/v1/orders"');
  });

  it('loads the target from a cache and reports a miss', () => {
    const registry = new SchemaRegistry();
    const cache = { get: (id: string) => (id === 'erp-1' ? targetSchema() : undefined) };

    expect(() => registry.loadTargetFromCache(cache, 'erp-2')).toThrow(
      'target schema not loaded: no cached schema for "erp-2", sync before mapping',
    );
    registry.loadTargetFromCache(cache, 'erp-1');
    expect(registry.hasTarget()).toBe(true);
    expect(registry.getTargetSchema().endpoints).toHaveLength(4);
  });
});
