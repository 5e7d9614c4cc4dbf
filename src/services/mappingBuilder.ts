import {
  MAPPING_SET_SCHEMA_VERSION,
  type ColumnMapping,
  type ManyToOneMapping,
  type MappingSet,
  type MatchCandidate,
  type OneToManyMapping,
  type OneToOneMapping,
  type SourceTable,
  type TableMapping,
  type TargetEndpoint,
} from '../types.js';
import {
  InvalidEditError,
  MappingSetFormatError,
  UnknownColumnError,
  UnknownFieldError,
  UnknownTableError,
} from '../utils/errors.js';
import type { FuzzyMatcher } from './fuzzyMatcher.js';
import type { SchemaRegistry } from './schemaRegistry.js';

export const NO_ENDPOINT_MATCH = 'no endpoint match';
export const DEFAULT_SKIP_REASON = 'skipped by reviewer';
export const DEFAULT_COMBINE_SEPARATOR = ' ';

/** A reviewer-authored mapping; confidence and rationale are set by the builder. */
export type ColumnMappingDraft =
  | Omit<OneToOneMapping, 'confidence' | 'rationale'>
  | Omit<ManyToOneMapping, 'confidence' | 'rationale'>
  | (Omit<OneToManyMapping, 'confidence' | 'rationale' | 'confirmed'> & { confirmed?: boolean });

export type MappingEdit =
  | { action: 'set'; mapping: ColumnMappingDraft }
  | { action: 'remove'; sourceColumn: string };

export function sourceColumnsOf(mapping: ColumnMapping): string[] {
  return mapping.type === 'many_to_one' ? mapping.sourceColumns : [mapping.sourceColumn];
}

export function targetFieldsOf(mapping: ColumnMapping): string[] {
  return mapping.type === 'one_to_many' ? mapping.targetFields : [mapping.targetField];
}

/**
 * Owns the run's MappingSet: builds the draft from matcher candidates and
 * applies reviewer edits. Every mutation returns the table to `draft`.
 */
export class MappingBuilder {
  private mappingSet: MappingSet = { schemaVersion: MAPPING_SET_SCHEMA_VERSION, tables: [] };

  constructor(
    private readonly registry: SchemaRegistry,
    private readonly matcher: FuzzyMatcher,
  ) {}

  autoMap(): MappingSet {
    this.registry.assertReady();
    const tables = this.registry.getSourceSchema().tables.map((table) => this.mapTable(table));
    this.mappingSet = { schemaVersion: MAPPING_SET_SCHEMA_VERSION, tables };
    return this.current();
  }

  current(): MappingSet {
    return structuredClone(this.mappingSet);
  }

  getTable(tableName: string): TableMapping {
    return structuredClone(this.findTable(tableName));
  }

  load(set: MappingSet): void {
    const seen = new Set<string>();
    for (const table of set.tables) {
      const key = table.sourceTable.toLowerCase();
      if (seen.has(key)) {
        throw new MappingSetFormatError(`Duplicate table mapping "${table.sourceTable}"`);
      }
      seen.add(key);
    }
    this.mappingSet = {
      schemaVersion: set.schemaVersion,
      tables: set.tables.map((table) => this.declaredSpelling(structuredClone(table))),
    };
  }

  /**
   * Rewrites table, endpoint, column and field names to the spelling the
   * schemas declare. Names the schemas do not know are kept for the gate to
   * report as stale.
   */
  private declaredSpelling(table: TableMapping): TableMapping {
    const source = this.registry.hasSource() ? this.registry.getSourceTable(table.sourceTable) : undefined;
    const endpoint =
      table.endpoint && this.registry.hasTarget() ? this.registry.getTargetEndpoint(table.endpoint) : undefined;
    const column = (name: string) =>
      source?.columns.find((c) => c.name.toLowerCase() === name.toLowerCase())?.name ?? name;
    const field = (name: string) =>
      endpoint?.fields.find((f) => f.name.toLowerCase() === name.toLowerCase())?.name ?? name;

    return {
      ...table,
      sourceTable: source?.name ?? table.sourceTable,
      ...(table.endpoint ? { endpoint: endpoint?.path ?? table.endpoint } : {}),
      columns: table.columns.map((mapping): ColumnMapping => {
        switch (mapping.type) {
          case 'one_to_one':
            return { ...mapping, sourceColumn: column(mapping.sourceColumn), targetField: field(mapping.targetField) };
          case 'many_to_one':
            return { ...mapping, sourceColumns: mapping.sourceColumns.map(column), targetField: field(mapping.targetField) };
          case 'one_to_many':
            return {
              ...mapping,
              sourceColumn: column(mapping.sourceColumn),
              targetFields: mapping.targetFields.map(field),
              ...(mapping.transformers
                ? {
                    transformers: Object.fromEntries(
                      Object.entries(mapping.transformers).map(([name, transformer]) => [field(name), transformer]),
                    ),
                  }
                : {}),
            };
        }
      }),
      unmappedColumns: table.unmappedColumns.map(column),
    };
  }

  applyEdit(tableName: string, edit: MappingEdit): TableMapping {
    const mapping = this.findTable(tableName);
    const { source, endpoint } = this.editableContext(mapping);

    if (edit.action === 'set') {
      const next = this.resolveDraft(source, endpoint, edit.mapping);
      const incoming = new Set(sourceColumnsOf(next).map((c) => c.toLowerCase()));
      const overlaps = (m: ColumnMapping) => sourceColumnsOf(m).some((c) => incoming.has(c.toLowerCase()));
      const firstIndex = mapping.columns.findIndex(overlaps);
      const kept = mapping.columns.filter((m) => !overlaps(m));
      if (firstIndex < 0) {
        kept.push(next);
      } else {
        kept.splice(firstIndex, 0, next);
      }
      mapping.columns = kept;
    } else {
      const column = requireColumn(source, edit.sourceColumn);
      const index = mapping.columns.findIndex((m) => sourceColumnsOf(m).includes(column));
      if (index < 0) {
        throw new InvalidEditError(source.name, `column "${column}" is not mapped`);
      }
      mapping.columns.splice(index, 1);
    }

    mapping.unmappedColumns = unmappedOf(source, mapping.columns);
    mapping.status = 'draft';
    return structuredClone(mapping);
  }

  markSkip(tableName: string, reason: string = DEFAULT_SKIP_REASON): TableMapping {
    const mapping = this.findTable(tableName);
    mapping.skipped = true;
    mapping.skipReason = reason;
    mapping.columns = [];
    mapping.unmappedColumns = [];
    mapping.status = 'draft';
    return structuredClone(mapping);
  }

  unmarkSkip(tableName: string): TableMapping {
    const mapping = this.findTable(tableName);
    const source = this.registry.requireSourceTable(mapping.sourceTable);
    mapping.skipped = false;
    delete mapping.skipReason;
    mapping.columns = [];
    mapping.unmappedColumns = source.columns.map((c) => c.name);
    mapping.status = 'draft';
    return structuredClone(mapping);
  }

  assignEndpoint(tableName: string, endpointPath: string): TableMapping {
    const mapping = this.findTable(tableName);
    const source = this.registry.requireSourceTable(mapping.sourceTable);
    const endpoint = this.registry.requireTargetEndpoint(endpointPath);
    const { columns, unmappedColumns } = this.mapColumns(source, endpoint);

    mapping.endpoint = endpoint.path;
    mapping.skipped = false;
    delete mapping.skipReason;
    mapping.confidence = 1;
    mapping.rationale = 'manual';
    mapping.columns = columns;
    mapping.unmappedColumns = unmappedColumns;
    mapping.status = 'draft';
    return structuredClone(mapping);
  }

  confirmSplit(tableName: string, sourceColumn: string): TableMapping {
    const mapping = this.findTable(tableName);
    const split = mapping.columns.find(
      (m): m is OneToManyMapping =>
        m.type === 'one_to_many' && m.sourceColumn.toLowerCase() === sourceColumn.toLowerCase(),
    );
    if (!split) {
      throw new InvalidEditError(mapping.sourceTable, `column "${sourceColumn}" has no split mapping`);
    }
    split.confirmed = true;
    mapping.status = 'draft';
    return structuredClone(mapping);
  }

  markReviewed(tableName: string): TableMapping {
    const mapping = this.findTable(tableName);
    if (mapping.status === 'draft') mapping.status = 'reviewed';
    return structuredClone(mapping);
  }

  candidatesFor(tableName: string, column?: string, endpointPath?: string): MatchCandidate[] {
    if (column === undefined) return this.matcher.rankEndpoints(tableName);
    const endpoint = endpointPath ?? this.findTable(tableName).endpoint;
    if (!endpoint) {
      throw new InvalidEditError(tableName, 'no endpoint assigned; pass one to browse field candidates');
    }
    return this.matcher.rankFields(tableName, column, endpoint);
  }

  private findTable(tableName: string): TableMapping {
    const key = tableName.toLowerCase();
    const mapping = this.mappingSet.tables.find((t) => t.sourceTable.toLowerCase() === key);
    if (!mapping) throw new UnknownTableError(tableName);
    return mapping;
  }

  private editableContext(mapping: TableMapping): { source: SourceTable; endpoint: TargetEndpoint } {
    const source = this.registry.requireSourceTable(mapping.sourceTable);
    if (mapping.skipped) {
      throw new InvalidEditError(mapping.sourceTable, 'table is skipped; unmark it before editing columns');
    }
    if (!mapping.endpoint) {
      throw new InvalidEditError(mapping.sourceTable, 'no endpoint assigned');
    }
    return { source, endpoint: this.registry.requireTargetEndpoint(mapping.endpoint) };
  }

  private resolveDraft(source: SourceTable, endpoint: TargetEndpoint, draft: ColumnMappingDraft): ColumnMapping {
    const field = (name: string) => requireField(source, endpoint, name);
    const column = (name: string) => requireColumn(source, name);

    switch (draft.type) {
      case 'one_to_one':
        return {
          ...draft,
          sourceColumn: column(draft.sourceColumn),
          targetField: field(draft.targetField),
          confidence: 1,
          rationale: 'manual',
        };
      case 'many_to_one': {
        if (draft.sourceColumns.length < 2) {
          throw new InvalidEditError(source.name, 'a combined mapping needs at least two source columns');
        }
        return {
          ...draft,
          sourceColumns: draft.sourceColumns.map(column),
          targetField: field(draft.targetField),
          confidence: 1,
          rationale: 'manual',
        };
      }
      case 'one_to_many': {
        if (draft.targetFields.length < 2) {
          throw new InvalidEditError(source.name, 'a split mapping needs at least two target fields');
        }
        const transformers = draft.transformers
          ? Object.fromEntries(Object.entries(draft.transformers).map(([name, t]) => [field(name), t]))
          : undefined;
        return {
          ...draft,
          sourceColumn: column(draft.sourceColumn),
          targetFields: draft.targetFields.map(field),
          ...(transformers ? { transformers } : {}),
          confirmed: draft.confirmed ?? true,
          confidence: 1,
          rationale: 'manual',
        };
      }
    }
  }

  private mapTable(table: SourceTable): TableMapping {
    const [top] = this.matcher.rankEndpoints(table.name);
    if (!top?.accepted) {
      return {
        sourceTable: table.name,
        skipped: true,
        skipReason: NO_ENDPOINT_MATCH,
        confidence: top?.confidence ?? 0,
        rationale: NO_ENDPOINT_MATCH,
        columns: [],
        unmappedColumns: [],
        status: 'draft',
      };
    }

    const endpoint = this.registry.requireTargetEndpoint(top.target);
    const { columns, unmappedColumns } = this.mapColumns(table, endpoint);
    return {
      sourceTable: table.name,
      endpoint: endpoint.path,
      skipped: false,
      confidence: top.confidence,
      rationale: top.rationale,
      columns,
      unmappedColumns,
      status: 'draft',
    };
  }

  /**
   * Column assignment runs in passes: exact names claim their field first,
   * then a column that wins two or more fields becomes a split, then the
   * remaining columns are grouped by their best field.
   */
  private mapColumns(
    table: SourceTable,
    endpoint: TargetEndpoint,
  ): { columns: ColumnMapping[]; unmappedColumns: string[] } {
    const scores = new Map<string, Map<string, MatchCandidate>>();
    for (const column of table.columns) {
      const accepted = this.matcher.rankColumnAgainst(column, endpoint).filter((c) => c.accepted);
      scores.set(column.name, new Map(accepted.map((c) => [c.target, c])));
    }
    const scoreOf = (column: string, field: string) => scores.get(column)?.get(field);

    const remainingColumns = table.columns.map((c) => c.name);
    const remainingFields = endpoint.fields.map((f) => f.name);
    const produced: ColumnMapping[] = [];
    const take = (list: string[], names: string[]) => {
      for (const name of names) list.splice(list.indexOf(name), 1);
    };

    for (const field of [...remainingFields]) {
      const column = remainingColumns.find((c) => scoreOf(c, field)?.rationale === 'exact');
      if (!column) continue;
      const candidate = scoreOf(column, field);
      if (!candidate) continue;
      produced.push({
        type: 'one_to_one',
        sourceColumn: column,
        targetField: field,
        confidence: candidate.confidence,
        rationale: candidate.rationale,
      });
      take(remainingColumns, [column]);
      take(remainingFields, [field]);
    }

    for (const column of [...remainingColumns]) {
      const won = remainingFields.filter((field) => {
        const own = scoreOf(column, field);
        if (!own) return false;
        return remainingColumns.every((other) => (scoreOf(other, field)?.confidence ?? 0) <= own.confidence);
      });
      if (won.length < 2) continue;
      const members = won.flatMap((field) => scoreOf(column, field) ?? []);
      const weakest = lowest(members);
      produced.push({
        type: 'one_to_many',
        sourceColumn: column,
        targetFields: won,
        split: { kind: 'whitespace' },
        confirmed: false,
        confidence: weakest.confidence,
        rationale: weakest.rationale,
      });
      take(remainingColumns, [column]);
      take(remainingFields, won);
    }

    const groups = new Map<string, MatchCandidate[]>();
    for (const column of remainingColumns) {
      const best = this.bestRemainingField(column, remainingFields, scoreOf);
      if (!best) continue;
      const group = groups.get(best.target) ?? [];
      group.push(best);
      groups.set(best.target, group);
    }

    for (const field of remainingFields) {
      const group = groups.get(field);
      if (!group) continue;
      const weakest = lowest(group);
      if (group.length === 1) {
        produced.push({
          type: 'one_to_one',
          sourceColumn: group[0].source,
          targetField: field,
          confidence: weakest.confidence,
          rationale: weakest.rationale,
        });
      } else {
        produced.push({
          type: 'many_to_one',
          sourceColumns: group.map((c) => c.source),
          targetField: field,
          combine: { kind: 'concat', separator: DEFAULT_COMBINE_SEPARATOR },
          confidence: weakest.confidence,
          rationale: weakest.rationale,
        });
      }
    }

    const order = new Map(table.columns.map((c, i) => [c.name, i]));
    const position = (m: ColumnMapping) => Math.min(...sourceColumnsOf(m).map((c) => order.get(c) ?? 0));
    const columns = produced.sort((a, b) => position(a) - position(b));
    return { columns, unmappedColumns: unmappedOf(table, columns) };
  }

  private bestRemainingField(
    column: string,
    fields: string[],
    scoreOf: (column: string, field: string) => MatchCandidate | undefined,
  ): MatchCandidate | undefined {
    let best: MatchCandidate | undefined;
    for (const field of fields) {
      const candidate = scoreOf(column, field);
      if (!candidate) continue;
      if (
        !best ||
        candidate.confidence > best.confidence ||
        (candidate.confidence === best.confidence &&
          candidate.typeAffinity === 'exact' &&
          best.typeAffinity !== 'exact')
      ) {
        best = candidate;
      }
    }
    return best;
  }
}

function lowest(candidates: MatchCandidate[]): MatchCandidate {
  return candidates.reduce((min, c) => (c.confidence < min.confidence ? c : min));
}

function requireColumn(table: SourceTable, name: string): string {
  const column = table.columns.find((c) => c.name.toLowerCase() === name.toLowerCase());
  if (!column) throw new UnknownColumnError(table.name, name);
  return column.name;
}

function requireField(table: SourceTable, endpoint: TargetEndpoint, name: string): string {
  const field = endpoint.fields.find((f) => f.name.toLowerCase() === name.toLowerCase());
  if (!field) throw new UnknownFieldError(table.name, endpoint.path, name);
  return field.name;
}

function unmappedOf(table: SourceTable, columns: ColumnMapping[]): string[] {
  const used = new Set(columns.flatMap(sourceColumnsOf));
  return table.columns.map((c) => c.name).filter((name) => !used.has(name));
}
