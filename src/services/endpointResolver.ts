import { v4 as uuidv4 } from 'uuid';
import type {
  ColumnMapping,
  MappingSet,
  PayloadBatch,
  RowError,
  ShapedRecord,
  SourceRow,
  SplitRule,
  TableMapping,
  TargetEndpoint,
} from '../types.js';
import { MappingNotValidatedError, TransformError } from '../utils/errors.js';
import type { SchemaRegistry } from './schemaRegistry.js';
import type { TransformerLookup } from './transformers.js';

export const DEFAULT_BATCH_SIZE = 500;

export interface EndpointResolverOptions {
  batchSize?: number;
}

export type RowSource = (tableName: string) => Iterable<SourceRow>;

export function isEmptyValue(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Turns a validated TableMapping plus source rows into submittable batches.
 * Rows are consumed lazily; a failing row is reported on the batch it fell
 * into and never stops the rest.
 */
export class EndpointResolver {
  readonly batchSize: number;

  constructor(
    private readonly registry: SchemaRegistry,
    private readonly transformers: TransformerLookup,
    options: EndpointResolverOptions = {},
  ) {
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
  }

  *resolve(table: TableMapping, rows: Iterable<SourceRow>): Generator<PayloadBatch> {
    if (table.skipped || table.status !== 'validated') {
      throw new MappingNotValidatedError(table.sourceTable, table.skipped ? 'skipped' : table.status);
    }
    if (!table.endpoint) {
      throw new MappingNotValidatedError(table.sourceTable, 'missing an endpoint');
    }
    const endpoint = this.registry.requireTargetEndpoint(table.endpoint);

    let index = 0;
    let records: ShapedRecord[] = [];
    let errors: RowError[] = [];
    const flush = (): PayloadBatch => {
      const batch: PayloadBatch = {
        id: uuidv4(),
        sourceTable: table.sourceTable,
        endpoint: endpoint.path,
        method: endpoint.method,
        index: index++,
        records,
        errors,
      };
      records = [];
      errors = [];
      return batch;
    };

    let rowIndex = 0;
    for (const row of rows) {
      const shaped = this.shapeRow(table, endpoint, row, rowIndex);
      if ('data' in shaped) {
        records.push(shaped);
      } else {
        errors.push(...shaped.errors);
      }
      rowIndex += 1;
      if (records.length >= this.batchSize) yield flush();
    }
    if (records.length > 0 || errors.length > 0) yield flush();
  }

  /** Batches for every validated table; skipped and blocked tables yield nothing. */
  *resolveAll(mappingSet: MappingSet, rowsFor: RowSource): Generator<PayloadBatch> {
    for (const table of mappingSet.tables) {
      if (table.skipped || table.status !== 'validated') continue;
      yield* this.resolve(table, rowsFor(table.sourceTable));
    }
  }

  shapeRow(
    table: TableMapping,
    endpoint: TargetEndpoint,
    row: SourceRow,
    rowIndex: number,
  ): ShapedRecord | { errors: RowError[] } {
    const data: Record<string, unknown> = {};
    const errors: RowError[] = [];
    const failedFields = new Set<string>();
    // Records are keyed by the endpoint's spelling of each field.
    const declared = new Map(endpoint.fields.map((f) => [f.name.toLowerCase(), f.name]));
    const spell = (field: string) => declared.get(field.toLowerCase()) ?? field;

    for (const mapping of table.columns) {
      try {
        Object.assign(data, this.shapeMapping(mapping, row, spell));
      } catch (err) {
        if (!(err instanceof TransformError)) throw err;
        const fields = (mapping.type === 'one_to_many' ? mapping.targetFields : [mapping.targetField]).map(spell);
        fields.forEach((f) => failedFields.add(f));
        errors.push({
          rowIndex,
          column: mapping.type === 'many_to_one' ? mapping.sourceColumns.join('+') : mapping.sourceColumn,
          field: fields.join(', '),
          code: 'TRANSFORM_FAILED',
          message: `Row ${rowIndex} of "${table.sourceTable}": ${err.message}`,
        });
      }
    }

    for (const field of endpoint.fields) {
      if (field.required && !(field.name in data) && !failedFields.has(field.name)) {
        errors.push({
          rowIndex,
          field: field.name,
          code: 'MISSING_REQUIRED_VALUE',
          message: `Row ${rowIndex} of "${table.sourceTable}": required field "${field.name}" is empty`,
        });
      }
    }

    return errors.length > 0 ? { errors } : { rowIndex, data };
  }

  private shapeMapping(
    mapping: ColumnMapping,
    row: SourceRow,
    spell: (field: string) => string,
  ): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    const assign = (field: string, value: unknown) => {
      if (!isEmptyValue(value)) out[spell(field)] = value;
    };

    switch (mapping.type) {
      case 'one_to_one': {
        const raw = valueOf(row, mapping.sourceColumn);
        if (!isEmptyValue(raw)) assign(mapping.targetField, this.apply(mapping.transformer, raw));
        break;
      }
      case 'many_to_one': {
        const parts = mapping.sourceColumns
          .map((column) => valueOf(row, column))
          .filter((value) => !isEmptyValue(value))
          .map((value) => String(value).trim());
        if (parts.length > 0) {
          assign(mapping.targetField, this.apply(mapping.transformer, parts.join(mapping.combine.separator)));
        }
        break;
      }
      case 'one_to_many': {
        const raw = valueOf(row, mapping.sourceColumn);
        if (isEmptyValue(raw)) break;
        const pieces = splitValue(String(raw), mapping.split, mapping.targetFields.length);
        mapping.targetFields.forEach((field, i) => {
          const piece = pieces[i];
          if (piece === undefined || isEmptyValue(piece)) return;
          assign(field, this.apply(mapping.transformers?.[field], piece));
        });
        break;
      }
    }
    return out;
  }

  private apply(name: string | undefined, value: unknown): unknown {
    if (!name) return value;
    const transformer = this.transformers.get(name);
    if (!transformer) throw new TransformError(name, value, 'transformer is not registered');
    try {
      return transformer(value);
    } catch (err) {
      if (err instanceof TransformError) throw err;
      throw new TransformError(name, value, err instanceof Error ? err.message : String(err));
    }
  }
}

/** First `count - 1` pieces go one per field; the remainder lands in the last one. */
export function splitValue(value: string, rule: SplitRule, count: number): string[] {
  const separator = rule.kind === 'whitespace' ? ' ' : rule.delimiter;
  const pieces =
    rule.kind === 'whitespace'
      ? value.trim().split(/\s+/)
      : value.split(rule.delimiter).map((p) => p.trim());
  if (pieces.length <= count) return pieces;
  return [...pieces.slice(0, count - 1), pieces.slice(count - 1).join(separator)];
}

function valueOf(row: SourceRow, column: string): unknown {
  if (column in row) return row[column];
  const key = Object.keys(row).find((k) => k.toLowerCase() === column.toLowerCase());
  return key === undefined ? undefined : row[key];
}
