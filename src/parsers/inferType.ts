import type { DataType, SourceColumn } from '../types.js';

const SAMPLE_SIZE = 5;
const INFERENCE_ROWS = 100;
/** Share of non-empty values that must agree before a type is chosen. */
const AGREEMENT = 0.8;

const INTEGER = /^-?\d+$/;
const DECIMAL = /^-?(\d{1,3}(\.\d{3})+|\d+),\d+$|^-?\d+\.\d+$/;
const DATE = /^(\d{1,2}\/\d{1,2}\/\d{2,4}|\d{4}-\d{2}-\d{2}|\d{2}-\d{2}-\d{4})$/;
const DATETIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;
const BOOLEAN = /^(true|false|yes|no|sim|nao|não|s|n)$/i;
const EMAIL = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

function isEmpty(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function classify(value: unknown): DataType {
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'decimal';
  if (value instanceof Date) {
    return value.getUTCHours() === 0 && value.getUTCMinutes() === 0 && value.getUTCSeconds() === 0 ? 'date' : 'datetime';
  }
  const text = String(value).trim();
  // Leading zeros mark identifiers (CPF, zip codes), not numbers.
  if (INTEGER.test(text)) return /^-?0\d/.test(text) ? 'string' : 'integer';
  if (DECIMAL.test(text)) return 'decimal';
  if (DATE.test(text)) return 'date';
  if (DATETIME.test(text)) return 'datetime';
  if (BOOLEAN.test(text)) return 'boolean';
  if (EMAIL.test(text)) return 'email';
  return 'string';
}

export function inferDataType(values: unknown[]): DataType {
  const present = values.slice(0, INFERENCE_ROWS).filter((v) => !isEmpty(v));
  if (present.length === 0) return 'string';

  const counts = new Map<DataType, number>();
  for (const value of present) {
    const type = classify(value);
    counts.set(type, (counts.get(type) ?? 0) + 1);
  }
  // Integers mixed with decimals are still numeric.
  const numeric = (counts.get('integer') ?? 0) + (counts.get('decimal') ?? 0);
  const temporal = (counts.get('date') ?? 0) + (counts.get('datetime') ?? 0);

  const needed = present.length * AGREEMENT;
  if ((counts.get('integer') ?? 0) >= needed) return 'integer';
  if (numeric >= needed) return 'decimal';
  if ((counts.get('date') ?? 0) >= needed) return 'date';
  if (temporal >= needed) return 'datetime';
  if ((counts.get('boolean') ?? 0) >= needed) return 'boolean';
  if ((counts.get('email') ?? 0) >= needed) return 'email';
  return 'string';
}

export function sampleValues(values: unknown[]): unknown[] {
  const seen = new Set<string>();
  const samples: unknown[] = [];
  for (const value of values) {
    if (isEmpty(value)) continue;
    const key = value instanceof Date ? value.toISOString() : String(value);
    if (seen.has(key)) continue;
    seen.add(key);
    samples.push(value);
    if (samples.length >= SAMPLE_SIZE) break;
  }
  return samples;
}

export function inferColumn(name: string, values: unknown[]): SourceColumn {
  return {
    name,
    type: inferDataType(values),
    nullable: values.length === 0 || values.some(isEmpty),
    sampleValues: sampleValues(values),
  };
}

/**
 * Blank headers become `column_N`; a repeated one takes the first `_N`
 * suffix no other header uses, compared case-insensitively.
 */
export function uniqueHeaders(raw: string[]): string[] {
  const taken = new Set<string>();
  return raw.map((header, index) => {
    const base = header.trim() || `column_${index + 1}`;
    let name = base;
    for (let n = 2; taken.has(name.toLowerCase()); n += 1) name = `${base}_${n}`;
    taken.add(name.toLowerCase());
    return name;
  });
}
