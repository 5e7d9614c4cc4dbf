import type { DataType, TypeAffinity } from '../types.js';

const SQL_TO_INTERNAL: Array<[RegExp, DataType]> = [
  [/^(bool|boolean|bit|yesno)$/, 'boolean'],
  [/^(tinyint|smallint|mediumint|int|integer|bigint|serial|bigserial|smallserial|int2|int4|int8|long|counter|autoincrement)$/, 'integer'],
  [/^(decimal|numeric|money|smallmoney|currency)$/, 'decimal'],
  [/^(float|float4|float8|real|double|double precision|single)$/, 'number'],
  [/^(date)$/, 'date'],
  [/^(datetime|datetime2|smalldatetime|timestamp|timestamptz|timestamp with time zone|timestamp without time zone)$/, 'datetime'],
  [/^(time|timetz)$/, 'time'],
  [/^(uuid|uniqueidentifier|guid)$/, 'id'],
  [/^(text|longtext|mediumtext|tinytext|clob|ntext|memo)$/, 'text'],
  [/^(char|nchar|varchar|nvarchar|character|character varying|varchar2|nvarchar2|string|enum|set)$/, 'string'],
  [/^(json|jsonb)$/, 'object'],
];

const OPENAPI_FORMATS: Record<string, DataType> = {
  date: 'date',
  'date-time': 'datetime',
  time: 'time',
  email: 'email',
  uuid: 'id',
  int32: 'integer',
  int64: 'integer',
  float: 'number',
  double: 'number',
  decimal: 'decimal',
};

export function normalizeSqlType(input: string): DataType {
  const lowered = input.toLowerCase().trim();
  if (/^tinyint\s*\(1\)/.test(lowered)) return 'boolean';
  const base = lowered
    .replace(/\([^)]*\)/g, '')
    .replace(/\s+unsigned$/, '')
    .replace(/\s+/g, ' ')
    .trim();
  for (const [pattern, type] of SQL_TO_INTERNAL) {
    if (pattern.test(base)) return type;
  }
  return 'unknown';
}

export function normalizeOpenApiType(type: string | undefined, format?: string): DataType {
  if (format && OPENAPI_FORMATS[format]) return OPENAPI_FORMATS[format];
  switch (type) {
    case 'string':
      return 'string';
    case 'integer':
      return 'integer';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    case 'object':
      return 'object';
    case 'array':
      return 'array';
    default:
      return 'unknown';
  }
}

type TypeGroup = 'text' | 'numeric' | 'temporal' | 'boolean' | 'structured' | 'unknown';

const GROUPS: Record<DataType, TypeGroup> = {
  string: 'text',
  text: 'text',
  email: 'text',
  phone: 'text',
  id: 'text',
  integer: 'numeric',
  decimal: 'numeric',
  number: 'numeric',
  boolean: 'boolean',
  date: 'temporal',
  datetime: 'temporal',
  time: 'temporal',
  object: 'structured',
  array: 'structured',
  unknown: 'unknown',
};

export function typeGroup(type: DataType): TypeGroup {
  return GROUPS[type];
}

/**
 * Whether a source column of type `source` can plausibly feed a target field
 * of type `target`. Legacy data keeps numbers and dates in text columns, so
 * text sources feed every scalar target and every scalar feeds a text target.
 */
export function isTypeCompatible(source: DataType, target: DataType): boolean {
  const s = typeGroup(source);
  const t = typeGroup(target);
  if (s === t || s === 'unknown' || t === 'unknown') return true;
  if (s === 'structured' || t === 'structured') return false;
  if (t === 'text' || s === 'text') return true;
  return (s === 'numeric' && t === 'boolean') || (s === 'boolean' && t === 'numeric');
}

export function typeAffinity(source: DataType, target: DataType): TypeAffinity | null {
  if (!isTypeCompatible(source, target)) return null;
  const s = typeGroup(source);
  return s !== 'unknown' && s === typeGroup(target) ? 'exact' : 'compatible';
}
