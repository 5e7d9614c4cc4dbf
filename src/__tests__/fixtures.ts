import { InMemoryParsedSource } from '../parsers/types.js';
import { FuzzyMatcher } from '../services/fuzzyMatcher.js';
import { MappingBuilder } from '../services/mappingBuilder.js';
import { SchemaRegistry } from '../services/schemaRegistry.js';
import type { DataType, SourceColumn, SourceRow, SourceSchema, SourceTable, TargetSchema } from '../types.js';

export function col(name: string, type: DataType = 'string'): SourceColumn {
  return { name, type, nullable: true, sampleValues: [] };
}

export function table(name: string, columns: SourceColumn[]): SourceTable {
  return { name, columns };
}

export function targetSchema(): TargetSchema {
  return {
    title: 'Test ERP',
    version: '1.0.0',
    endpoints: [
      {
        path: '/v1/customers',
        method: 'POST',
        entity: 'Customer',
        fields: [
          { name: 'name', type: 'string', required: true },
          { name: 'document', type: 'string', required: true },
          { name: 'email', type: 'email', required: false },
          { name: 'phone', type: 'string', required: false },
          { name: 'birthdate', type: 'date', required: false },
        ],
      },
      {
        path: '/v1/products',
        method: 'POST',
        entity: 'Product',
        fields: [
          { name: 'code', type: 'string', required: true },
          { name: 'description', type: 'string', required: true },
          { name: 'price', type: 'decimal', required: false },
        ],
      },
      {
        path: '/v1/contacts',
        method: 'POST',
        entity: 'Contact',
        fields: [
          { name: 'full_name', type: 'string', required: true },
          { name: 'email', type: 'email', required: false },
        ],
      },
      {
        path: '/v1/employees',
        method: 'PUT',
        entity: 'Employee',
        fields: [
          { name: 'first_name', type: 'string', required: true },
          { name: 'last_name', type: 'string', required: true },
          { name: 'email', type: 'email', required: false },
        ],
      },
    ],
  };
}

export function sourceSchema(): SourceSchema {
  return {
    format: 'sql_dump',
    tables: [
      table('tb_clientes', [col('nome'), col('cpf'), col('email'), col('telefone')]),
      table('contacts', [col('first_name'), col('last_name'), col('email')]),
      table('staff', [col('full_name'), col('email')]),
      table('produtos', [col('codigo'), col('preco', 'decimal')]),
      table('xyz_random_table', [col('foo'), col('bar', 'integer')]),
    ],
  };
}

export const CUSTOMER_ROWS: SourceRow[] = [
  { nome: 'Maria Silva', cpf: '12345678901', email: 'maria@example.com', telefone: '11999990000' },
  { nome: '', cpf: '98765432100', email: '', telefone: null },
  { nome: 'Joao Souza', cpf: '11122233344', email: 'joao@example.com', telefone: '' },
];

export function sampleRows(): Record<string, SourceRow[]> {
  return {
    tb_clientes: CUSTOMER_ROWS.map((row) => ({ ...row })),
    contacts: [
      { first_name: 'Ana', last_name: 'Lima', email: 'ana@example.com' },
      { first_name: 'Bruno', last_name: '', email: null },
    ],
    staff: [{ full_name: 'Carla Maria Dias', email: 'carla@example.com' }],
    produtos: [{ codigo: 'P-1', preco: 10.5 }],
    xyz_random_table: [{ foo: 'x', bar: 1 }],
  };
}

export function parsedSource(): InMemoryParsedSource {
  const rows = sampleRows();
  return new InMemoryParsedSource(
    'sql_dump',
    sourceSchema().tables.map((t) => ({ table: t, rows: rows[t.name] ?? [] })),
  );
}

export interface Engine {
  registry: SchemaRegistry;
  matcher: FuzzyMatcher;
  builder: MappingBuilder;
}

export function engine(source: SourceSchema = sourceSchema(), target: TargetSchema = targetSchema()): Engine {
  const registry = new SchemaRegistry();
  registry.registerSource(source);
  registry.loadTarget(target);
  const matcher = new FuzzyMatcher(registry);
  const builder = new MappingBuilder(registry, matcher);
  return { registry, matcher, builder };
}
