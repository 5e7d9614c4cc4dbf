import { describe, expect, it } from 'vitest';
import { EndpointResolver, isEmptyValue, splitValue } from '../services/endpointResolver.js';
import { createDefaultTransformers } from '../services/transformers.js';
import { ValidationGate } from '../services/validationGate.js';
import type { MappingSet, PayloadBatch, SourceRow, TableMapping } from '../types.js';
import { MappingNotValidatedError } from '../utils/errors.js';
import { CUSTOMER_ROWS, engine, sampleRows } from './fixtures.js';

function validatedSet(prepare?: (e: ReturnType<typeof engine>) => void) {
  const e = engine();
  e.builder.autoMap();
  prepare?.(e);
  const transformers = createDefaultTransformers();
  const result = new ValidationGate(e.registry, transformers).validate(e.builder.current());
  return { ...e, transformers, set: result.mappingSet };
}

function tableIn(set: MappingSet, name: string): TableMapping {
  const found = set.tables.find((t) => t.sourceTable === name);
  if (!found) throw new Error(`no table ${name}`);
  return found;
}

describe('EndpointResolver.resolve', () => {
  it('shapes rows and reports a missing required value per row', () => {
    const { registry, transformers, set } = validatedSet();
    const resolver = new EndpointResolver(registry, transformers);

    const batches = [...resolver.resolve(tableIn(set, 'tb_clientes'), CUSTOMER_ROWS)];
    expect(batches).toHaveLength(1);
    const [batch] = batches;
    expect(batch).toMatchObject({ sourceTable: 'tb_clientes', endpoint: '/v1/customers', method: 'POST', index: 0 });
    expect(batch.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(batch.records).toEqual([
      {
        rowIndex: 0,
        data: { name: 'Maria Silva', document: '12345678901', email: 'maria@example.com', phone: '11999990000' },
      },
      { rowIndex: 2, data: { name: 'Joao Souza', document: '11122233344', email: 'joao@example.com' } },
    ]);
    expect(batch.errors).toEqual([
      {
        rowIndex: 1,
        field: 'name',
        code: 'MISSING_REQUIRED_VALUE',
        message: 'Row 1 of "tb_clientes": required field "name" is empty',
      },
    ]);
  });

  it('keys records by the field spelling the endpoint declares', () => {
    const { registry, transformers, set } = validatedSet();
    const table = tableIn(set, 'tb_clientes');
    const respelled: TableMapping = {
      ...table,
      columns: table.columns.map((m) => (m.type === 'one_to_one' ? { ...m, targetField: m.targetField.toUpperCase() } : m)),
    };

    const [batch] = [...new EndpointResolver(registry, transformers).resolve(respelled, CUSTOMER_ROWS)];
    expect(batch.records.map((r) => r.data)).toEqual([
      { name: 'Maria Silva', document: '12345678901', email: 'maria@example.com', phone: '11999990000' },
      { name: 'Joao Souza', document: '11122233344', email: 'joao@example.com' },
    ]);
    expect(batch.errors.map((e) => [e.rowIndex, e.field, e.code])).toEqual([[1, 'name', 'MISSING_REQUIRED_VALUE']]);
  });

  it('applies transformers and reports their failures without stopping', () => {
    const { registry, transformers, set } = validatedSet(({ builder }) => {
      builder.applyEdit('tb_clientes', {
        action: 'set',
        mapping: { type: 'one_to_one', sourceColumn: 'cpf', targetField: 'document', transformer: 'FORMAT_CPF' },
      });
    });
    const resolver = new EndpointResolver(registry, transformers);
    const rows: SourceRow[] = [
      { nome: 'Maria', cpf: '123' },
      { nome: 'Joao', cpf: '11122233344' },
    ];

    const [batch] = [...resolver.resolve(tableIn(set, 'tb_clientes'), rows)];
    expect(batch.records).toEqual([{ rowIndex: 1, data: { name: 'Joao', document: '111.222.333-44' } }]);
    expect(batch.errors).toEqual([
      {
        rowIndex: 0,
        column: 'cpf',
        field: 'document',
        code: 'TRANSFORM_FAILED',
        message: 'Row 0 of "tb_clientes": FORMAT_CPF: expected 11 digits, got 3 (value: "123")',
      },
    ]);
  });

  it('joins combined columns and skips empty parts', () => {
    const { registry, transformers, set } = validatedSet();
    const resolver = new EndpointResolver(registry, transformers);

    const [batch] = [...resolver.resolve(tableIn(set, 'contacts'), sampleRows().contacts)];
    expect(batch.records).toEqual([
      { rowIndex: 0, data: { full_name: 'Ana Lima', email: 'ana@example.com' } },
      { rowIndex: 1, data: { full_name: 'Bruno' } },
    ]);
  });

  it('splits one column into several fields once confirmed', () => {
    const { registry, transformers, set } = validatedSet(({ builder }) => builder.confirmSplit('staff', 'full_name'));
    const resolver = new EndpointResolver(registry, transformers);

    const [batch] = [...resolver.resolve(tableIn(set, 'staff'), sampleRows().staff)];
    expect(batch.method).toBe('PUT');
    expect(batch.records).toEqual([
      { rowIndex: 0, data: { first_name: 'Carla', last_name: 'Maria Dias', email: 'carla@example.com' } },
    ]);
  });

  it('cuts batches at the configured size', () => {
    const { registry, transformers, set } = validatedSet();
    const resolver = new EndpointResolver(registry, transformers, { batchSize: 2 });
    const rows = Array.from({ length: 5 }, (_, i) => ({ nome: `Cliente ${i}`, cpf: `0000000000${i}` }));

    const batches: PayloadBatch[] = [...resolver.resolve(tableIn(set, 'tb_clientes'), rows)];
    expect(batches.map((b) => b.records.length)).toEqual([2, 2, 1]);
    expect(batches.map((b) => b.index)).toEqual([0, 1, 2]);
    expect(batches[2].records[0].rowIndex).toBe(4);
    expect(new Set(batches.map((b) => b.id)).size).toBe(3);
  });

  it('emits one batch of errors when no row survives', () => {
    const { registry, transformers, set } = validatedSet();
    const resolver = new EndpointResolver(registry, transformers);
    const batches = [...resolver.resolve(tableIn(set, 'tb_clientes'), [{ nome: 'x' }])];
    expect(batches).toHaveLength(1);
    expect(batches[0].records).toEqual([]);
    expect(batches[0].errors.map((e) => e.field)).toEqual(['document']);
  });

  it('yields nothing for an empty table', () => {
    const { registry, transformers, set } = validatedSet();
    const resolver = new EndpointResolver(registry, transformers);
    expect([...resolver.resolve(tableIn(set, 'tb_clientes'), [])]).toEqual([]);
  });

  it('refuses tables that are not validated or are skipped', () => {
    const { registry, transformers, set } = validatedSet();
    const resolver = new EndpointResolver(registry, transformers);

    expect(() => [...resolver.resolve(tableIn(set, 'produtos'), [])]).toThrow(
      'Table "produtos" is draft; run validation before generating payloads',
    );
    expect(() => [...resolver.resolve(tableIn(set, 'xyz_random_table'), [])]).toThrow(MappingNotValidatedError);
  });
});

describe('EndpointResolver.resolveAll', () => {
  it('covers validated tables only and never the skipped ones', () => {
    const { registry, transformers, set } = validatedSet();
    const resolver = new EndpointResolver(registry, transformers);
    const rows = sampleRows();

    const tables = [...resolver.resolveAll(set, (name) => rows[name] ?? [])].map((b) => b.sourceTable);
    expect(tables).toEqual(['tb_clientes', 'contacts']);
  });
});

describe('splitValue', () => {
  it('puts the remainder in the last field', () => {
    expect(splitValue('Carla Maria Dias', { kind: 'whitespace' }, 2)).toEqual(['Carla', 'Maria Dias']);
    expect(splitValue('  Ana  ', { kind: 'whitespace' }, 2)).toEqual(['Ana']);
    expect(splitValue('a; b; c', { kind: 'delimiter', delimiter: ';' }, 2)).toEqual(['a', 'b;c']);
  });
});

describe('isEmptyValue', () => {
  it('treats null, undefined and blank strings as empty', () => {
    expect([null, undefined, '', '  ', 0, false].map(isEmptyValue)).toEqual([true, true, true, true, false, false]);
  });
});
