import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { MAPPING_SET_SCHEMA_VERSION, type ColumnMapping, type MappingSet } from '../types.js';
import { MappingSetFormatError } from '../utils/errors.js';

const rationaleSchema = z.enum(['exact', 'containment', 'token_similarity', 'synonym', 'none', 'manual']);

const mappingBase = {
  confidence: z.number().min(0).max(1),
  rationale: rationaleSchema,
};

const columnMappingSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('one_to_one'),
    sourceColumn: z.string().min(1),
    targetField: z.string().min(1),
    transformer: z.string().min(1).optional(),
    ...mappingBase,
  }),
  z.object({
    type: z.literal('many_to_one'),
    sourceColumns: z.array(z.string().min(1)).min(2),
    targetField: z.string().min(1),
    combine: z.object({ kind: z.literal('concat'), separator: z.string() }),
    transformer: z.string().min(1).optional(),
    ...mappingBase,
  }),
  z.object({
    type: z.literal('one_to_many'),
    sourceColumn: z.string().min(1),
    targetFields: z.array(z.string().min(1)).min(2),
    split: z.discriminatedUnion('kind', [
      z.object({ kind: z.literal('whitespace') }),
      z.object({ kind: z.literal('delimiter'), delimiter: z.string().min(1) }),
    ]),
    transformers: z.record(z.string().min(1)).optional(),
    confirmed: z.boolean(),
    ...mappingBase,
  }),
]);

const tableMappingSchema = z.object({
  sourceTable: z.string().min(1),
  endpoint: z.string().min(1).optional(),
  skipped: z.boolean(),
  skipReason: z.string().optional(),
  confidence: z.number().min(0).max(1),
  rationale: z.string(),
  columns: z.array(columnMappingSchema),
  unmappedColumns: z.array(z.string()),
  status: z.enum(['draft', 'reviewed', 'validated']),
});

export const mappingSetSchema = z.object({
  schemaVersion: z.literal(MAPPING_SET_SCHEMA_VERSION),
  tables: z.array(tableMappingSchema),
});

export function buildJsonExport(mappingSet: MappingSet): string {
  return `${JSON.stringify(mappingSet, null, 2)}\n`;
}

export function parseMappingSet(input: unknown): MappingSet {
  const parsed = mappingSetSchema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first?.path.length ? ` at ${first.path.join('.')}` : '';
    throw new MappingSetFormatError(
      `Invalid mapping set${where}: ${first?.message ?? 'unknown error'}`,
      parsed.error.issues,
    );
  }

  const seen = new Set<string>();
  for (const table of parsed.data.tables) {
    const key = table.sourceTable.toLowerCase();
    if (seen.has(key)) throw new MappingSetFormatError(`Duplicate table mapping "${table.sourceTable}"`);
    seen.add(key);
  }
  return parsed.data;
}

export function parseJsonExport(text: string): MappingSet {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new MappingSetFormatError(`Mapping set is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseMappingSet(document);
}

export function writeMappingSetFile(filePath: string, mappingSet: MappingSet): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, buildJsonExport(mappingSet), 'utf8');
}

export function readMappingSetFile(filePath: string): MappingSet {
  return parseJsonExport(fs.readFileSync(filePath, 'utf8'));
}

/** Review sheet: one row per column mapping, skipped table or unmapped column. */
export function buildCsvExport(mappingSet: MappingSet): string {
  const header = [
    'sourceTable',
    'endpoint',
    'status',
    'mappingType',
    'sourceColumns',
    'targetFields',
    'rule',
    'transformer',
    'confidence',
    'rationale',
  ];

  const rows: string[][] = [];
  for (const table of mappingSet.tables) {
    const endpoint = table.endpoint ?? '';
    if (table.skipped) {
      rows.push([table.sourceTable, endpoint, table.status, 'skip', '', '', '', '', '', table.skipReason ?? '']);
      continue;
    }
    for (const mapping of table.columns) {
      rows.push([
        table.sourceTable,
        endpoint,
        table.status,
        mapping.type,
        ...describeMapping(mapping),
        mapping.confidence.toFixed(3),
        mapping.rationale,
      ]);
    }
    for (const column of table.unmappedColumns) {
      rows.push([table.sourceTable, endpoint, table.status, 'unmapped', column, '', '', '', '', '']);
    }
  }

  return [header, ...rows.map((r) => r.map(csvEscape))].map((r) => r.join(',')).join('\n');
}

function describeMapping(mapping: ColumnMapping): [string, string, string, string] {
  switch (mapping.type) {
    case 'one_to_one':
      return [mapping.sourceColumn, mapping.targetField, '', mapping.transformer ?? ''];
    case 'many_to_one':
      return [
        mapping.sourceColumns.join('+'),
        mapping.targetField,
        `concat(${JSON.stringify(mapping.combine.separator)})`,
        mapping.transformer ?? '',
      ];
    case 'one_to_many': {
      const rule = mapping.split.kind === 'whitespace' ? 'split(whitespace)' : `split(${JSON.stringify(mapping.split.delimiter)})`;
      const transformers = Object.entries(mapping.transformers ?? {})
        .map(([field, name]) => `${field}=${name}`)
        .join(';');
      return [
        mapping.sourceColumn,
        mapping.targetFields.join('+'),
        mapping.confirmed ? rule : `${rule} unconfirmed`,
        transformers,
      ];
    }
  }
}

function csvEscape(value: string): string {
  if (/[",\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}
