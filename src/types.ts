export type SourceFormat = 'sql_dump' | 'csv' | 'excel' | 'access';

export type DataType =
  | 'string'
  | 'text'
  | 'email'
  | 'phone'
  | 'id'
  | 'integer'
  | 'decimal'
  | 'number'
  | 'boolean'
  | 'date'
  | 'datetime'
  | 'time'
  | 'object'
  | 'array'
  | 'unknown';

export interface SourceColumn {
  name: string;
  type: DataType;
  nullable: boolean;
  sampleValues: unknown[];
  rawType?: string;
  primaryKey?: boolean;
}

export interface SourceTable {
  name: string;
  columns: SourceColumn[];
  estimatedRows?: number;
}

export interface SourceSchema {
  format: SourceFormat;
  tables: SourceTable[];
}

export type SourceRow = Record<string, unknown>;

export interface TargetField {
  name: string;
  type: DataType;
  required: boolean;
  description?: string;
  format?: string;
}

export interface TargetEndpoint {
  path: string;
  method: 'POST' | 'PUT' | 'PATCH';
  entity: string;
  fields: TargetField[];
  description?: string;
}

export interface TargetSchema {
  title?: string;
  version?: string;
  endpoints: TargetEndpoint[];
}

export type MatchRationale = 'exact' | 'containment' | 'token_similarity' | 'synonym' | 'none';

export type TypeAffinity = 'exact' | 'compatible';

export interface MatchCandidate {
  readonly source: string;
  readonly target: string;
  readonly confidence: number;
  readonly rationale: MatchRationale;
  readonly typeAffinity: TypeAffinity;
  readonly accepted: boolean;
}

export interface CombineRule {
  kind: 'concat';
  separator: string;
}

export type SplitRule = { kind: 'whitespace' } | { kind: 'delimiter'; delimiter: string };

export type MappingRationale = MatchRationale | 'manual';

interface ColumnMappingBase {
  confidence: number;
  rationale: MappingRationale;
}

export interface OneToOneMapping extends ColumnMappingBase {
  type: 'one_to_one';
  sourceColumn: string;
  targetField: string;
  transformer?: string;
}

export interface ManyToOneMapping extends ColumnMappingBase {
  type: 'many_to_one';
  sourceColumns: string[];
  targetField: string;
  combine: CombineRule;
  transformer?: string;
}

export interface OneToManyMapping extends ColumnMappingBase {
  type: 'one_to_many';
  sourceColumn: string;
  targetFields: string[];
  split: SplitRule;
  /** Transformer per target field, applied to that field's piece. */
  transformers?: Record<string, string>;
  confirmed: boolean;
}

export type ColumnMapping = OneToOneMapping | ManyToOneMapping | OneToManyMapping;

export type ColumnMappingType = ColumnMapping['type'];

export type TableStatus = 'draft' | 'reviewed' | 'validated';

export interface TableMapping {
  sourceTable: string;
  endpoint?: string;
  skipped: boolean;
  skipReason?: string;
  confidence: number;
  rationale: string;
  columns: ColumnMapping[];
  unmappedColumns: string[];
  status: TableStatus;
}

export const MAPPING_SET_SCHEMA_VERSION = 1;

export interface MappingSet {
  schemaVersion: typeof MAPPING_SET_SCHEMA_VERSION;
  tables: TableMapping[];
}

export type FindingType =
  | 'missing_endpoint'
  | 'incomplete_mapping'
  | 'conflicting_mapping'
  | 'stale_mapping'
  | 'unconfirmed_split'
  | 'unknown_transformer';

export interface ValidationFinding {
  type: FindingType;
  table: string;
  column?: string;
  field?: string;
  message: string;
}

export interface ValidationResult {
  findings: ValidationFinding[];
  validatedTables: string[];
  blockedTables: string[];
  summary: {
    totalFindings: number;
    byType: Record<FindingType, number>;
  };
  /** The validated input with statuses updated; mapping content is unchanged. */
  mappingSet: MappingSet;
}

export interface ShapedRecord {
  rowIndex: number;
  data: Record<string, unknown>;
}

export interface RowError {
  rowIndex: number;
  column?: string;
  field?: string;
  code: 'TRANSFORM_FAILED' | 'MISSING_REQUIRED_VALUE';
  message: string;
}

export interface PayloadBatch {
  id: string;
  sourceTable: string;
  endpoint: string;
  method: TargetEndpoint['method'];
  index: number;
  records: ShapedRecord[];
  errors: RowError[];
}
