import { TransformError } from '../utils/errors.js';

export type Transformer = (value: unknown) => unknown;

export interface TransformerLookup {
  has(name: string): boolean;
  get(name: string): Transformer | undefined;
}

/**
 * TransformerRegistry: named value-level conversions referenced by column
 * mappings. Names are upper-case identifiers such as `FORMAT_CPF`.
 */
export class TransformerRegistry implements TransformerLookup {
  private readonly transformers = new Map<string, Transformer>();

  register(name: string, transformer: Transformer): this {
    this.transformers.set(name.toUpperCase(), transformer);
    return this;
  }

  has(name: string): boolean {
    return this.transformers.has(name.toUpperCase());
  }

  get(name: string): Transformer | undefined {
    return this.transformers.get(name.toUpperCase());
  }

  names(): string[] {
    return [...this.transformers.keys()].sort();
  }
}

export const onlyDigits = (value: unknown) => String(value ?? '').replace(/\D/g, '');

export function formatCpf(value: unknown): string {
  const raw = onlyDigits(value);
  const digits = typeof value === 'number' ? raw.padStart(11, '0') : raw;
  if (digits.length !== 11) {
    throw new TransformError('FORMAT_CPF', value, `expected 11 digits, got ${digits.length}`);
  }
  return digits.replace(/^(\d{3})(\d{3})(\d{3})(\d{2})$/, '$1.$2.$3-$4');
}

export function formatCnpj(value: unknown): string {
  const raw = onlyDigits(value);
  const digits = typeof value === 'number' ? raw.padStart(14, '0') : raw;
  if (digits.length !== 14) {
    throw new TransformError('FORMAT_CNPJ', value, `expected 14 digits, got ${digits.length}`);
  }
  return digits.replace(/^(\d{2})(\d{3})(\d{3})(\d{4})(\d{2})$/, '$1.$2.$3/$4-$5');
}

/** Accepts `dd/mm/yyyy`, `yyyy-mm-dd` (with an optional time part) or a Date; emits `yyyy-mm-dd`. */
export function formatDate(value: unknown): string {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw new TransformError('FORMAT_DATE', value, 'invalid date');
    return value.toISOString().slice(0, 10);
  }

  const text = String(value).trim();
  const br = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text);
  const iso = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/.exec(text);
  let parts: [number, number, number] | null = null;
  if (br) parts = [Number(br[3]), Number(br[2]), Number(br[1])];
  else if (iso) parts = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
  if (!parts) {
    throw new TransformError('FORMAT_DATE', value, 'unrecognized date format');
  }

  const [year, month, day] = parts;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new TransformError('FORMAT_DATE', value, 'date out of range');
  }
  return date.toISOString().slice(0, 10);
}

/** `1.234,56` and `1234.56` both become 1234.56. */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  let text = String(value).trim().replace(/\s/g, '');
  if (text.includes(',')) text = text.replace(/\./g, '').replace(',', '.');
  const parsed = text === '' ? Number.NaN : Number(text);
  if (Number.isNaN(parsed)) {
    throw new TransformError('TO_NUMBER', value, 'not a number');
  }
  return parsed;
}

const TRUE_WORDS = new Set(['1', 's', 'sim', 'y', 'yes', 't', 'true', 'v', 'verdadeiro']);
const FALSE_WORDS = new Set(['0', 'n', 'nao', 'no', 'f', 'false', 'falso']);

export function toBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  const word = String(value)
    .trim()
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '');
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  throw new TransformError('TO_BOOLEAN', value, 'not a recognized boolean');
}

export function createDefaultTransformers(): TransformerRegistry {
  return new TransformerRegistry()
    .register('NONE', (value) => value)
    .register('TRIM', (value) => String(value).trim())
    .register('UPPERCASE', (value) => String(value).toUpperCase())
    .register('LOWERCASE', (value) => String(value).toLowerCase())
    .register('DIGITS_ONLY', onlyDigits)
    .register('FORMAT_CPF', formatCpf)
    .register('FORMAT_CNPJ', formatCnpj)
    .register('FORMAT_DATE', formatDate)
    .register('TO_NUMBER', toNumber)
    .register('TO_BOOLEAN', toBoolean);
}
