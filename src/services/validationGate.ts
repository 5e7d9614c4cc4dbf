import type {
  ColumnMapping,
  FindingType,
  MappingSet,
  TableMapping,
  ValidationFinding,
  ValidationResult,
} from '../types.js';
import { sourceColumnsOf, targetFieldsOf } from './mappingBuilder.js';
import type { SchemaRegistry } from './schemaRegistry.js';
import type { TransformerLookup } from './transformers.js';

function emptyCounts(): Record<FindingType, number> {
  return {
    missing_endpoint: 0,
    incomplete_mapping: 0,
    conflicting_mapping: 0,
    stale_mapping: 0,
    unconfirmed_split: 0,
    unknown_transformer: 0,
  };
}

/**
 * Completeness and consistency gate between review and payload generation.
 * Findings are collected for every table; nothing is thrown for them.
 */
export class ValidationGate {
  constructor(
    private readonly registry: SchemaRegistry,
    private readonly transformers?: TransformerLookup,
  ) {}

  validate(mappingSet: MappingSet): ValidationResult {
    this.registry.assertReady();
    const findings: ValidationFinding[] = [];
    const validatedTables: string[] = [];
    const blockedTables: string[] = [];

    const tables = mappingSet.tables.map((table): TableMapping => {
      const tableFindings = table.skipped ? [] : this.checkTable(table);
      findings.push(...tableFindings);
      if (tableFindings.length === 0) {
        validatedTables.push(table.sourceTable);
        return { ...table, status: 'validated' };
      }
      blockedTables.push(table.sourceTable);
      return { ...table, status: table.status === 'validated' ? 'draft' : table.status };
    });

    const byType = emptyCounts();
    for (const finding of findings) byType[finding.type] += 1;

    return {
      findings,
      validatedTables,
      blockedTables,
      summary: { totalFindings: findings.length, byType },
      mappingSet: { ...mappingSet, tables: structuredClone(tables) },
    };
  }

  private checkTable(table: TableMapping): ValidationFinding[] {
    const findings: ValidationFinding[] = [];
    const name = table.sourceTable;
    const endpoint = table.endpoint ? this.registry.getTargetEndpoint(table.endpoint) : undefined;

    if (!endpoint) {
      findings.push({
        type: 'missing_endpoint',
        table: name,
        message: table.endpoint
          ? `Table "${name}" targets endpoint ${table.endpoint}, which is not in the target schema`
          : `Table "${name}" has no target endpoint; assign one or mark the table as skipped`,
      });
    }

    const source = this.registry.getSourceTable(name);
    if (!source) {
      findings.push({
        type: 'stale_mapping',
        table: name,
        message: `Source table "${name}" no longer exists in the source schema`,
      });
    }

    const sourceColumns = new Set(source?.columns.map((c) => c.name.toLowerCase()) ?? []);
    const targetFields = new Set(endpoint?.fields.map((f) => f.name.toLowerCase()) ?? []);
    const suppliers = new Map<string, { field: string; mappings: ColumnMapping[] }>();

    for (const mapping of table.columns) {
      if (source) {
        for (const column of sourceColumnsOf(mapping)) {
          if (!sourceColumns.has(column.toLowerCase())) {
            findings.push({
              type: 'stale_mapping',
              table: name,
              column,
              message: `Column "${column}" is mapped but no longer exists in source table "${name}"`,
            });
          }
        }
      }

      for (const field of targetFieldsOf(mapping)) {
        if (endpoint && !targetFields.has(field.toLowerCase())) {
          findings.push({
            type: 'stale_mapping',
            table: name,
            field,
            message: `Field "${field}" is mapped but no longer exists on endpoint ${endpoint.path}`,
          });
        }
        const key = field.toLowerCase();
        const entry = suppliers.get(key) ?? { field, mappings: [] };
        entry.mappings.push(mapping);
        suppliers.set(key, entry);
      }

      if (mapping.type === 'one_to_many' && !mapping.confirmed) {
        findings.push({
          type: 'unconfirmed_split',
          table: name,
          column: mapping.sourceColumn,
          message: `Split of "${mapping.sourceColumn}" into ${mapping.targetFields.join(', ')} must be confirmed by a reviewer`,
        });
      }

      for (const transformer of transformersOf(mapping)) {
        if (this.transformers && !this.transformers.has(transformer)) {
          findings.push({
            type: 'unknown_transformer',
            table: name,
            column: sourceColumnsOf(mapping).join(', '),
            message: `Transformer "${transformer}" used by table "${name}" is not registered`,
          });
        }
      }
    }

    for (const { field, mappings } of suppliers.values()) {
      if (mappings.length < 2) continue;
      const columns = mappings.map((m) => sourceColumnsOf(m).join('+'));
      findings.push({
        type: 'conflicting_mapping',
        table: name,
        field,
        message: `Field "${field}" is supplied by ${mappings.length} mappings (${columns.join(', ')}); combine them or remove all but one`,
      });
    }

    if (endpoint) {
      for (const field of endpoint.fields) {
        if (field.required && !suppliers.has(field.name.toLowerCase())) {
          findings.push({
            type: 'incomplete_mapping',
            table: name,
            field: field.name,
            message: `Required field "${field.name}" of ${endpoint.path} has no mapping in table "${name}"`,
          });
        }
      }
    }

    return findings;
  }
}

function transformersOf(mapping: ColumnMapping): string[] {
  if (mapping.type === 'one_to_many') return Object.values(mapping.transformers ?? {});
  return mapping.transformer ? [mapping.transformer] : [];
}
