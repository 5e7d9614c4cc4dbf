import { distance } from 'fastest-levenshtein';

const NAME_PREFIXES = new Set(['tbl', 'tb', 'src', 'dst', 'tmp']);

const QUALIFIER_TOKENS = new Set(['full', 'complete', 'completo', 'de', 'da', 'do', 'of', 'the']);

export interface NormalizedName {
  raw: string;
  tokens: string[];
  /** Tokens joined without separators; the unit of exact/containment comparison. */
  key: string;
}

export function splitWords(value: string): string[] {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);
}

export function singularize(token: string): string {
  if (token.length <= 3) return token;
  if (token.endsWith('ies')) return `${token.slice(0, -3)}y`;
  if (/(ss|us|is)$/.test(token)) return token;
  if (/(s|x|z|r)es$/.test(token)) return token.slice(0, -2);
  if (token.endsWith('s')) return token.slice(0, -1);
  return token;
}

export function normalizeName(value: string): NormalizedName {
  let words = splitWords(value);
  if (words.length > 1 && NAME_PREFIXES.has(words[0])) {
    words = words.slice(1);
  }
  const meaningful = words.filter((w) => !QUALIFIER_TOKENS.has(w));
  const tokens = (meaningful.length > 0 ? meaningful : words).map(singularize);
  return { raw: value, tokens, key: tokens.join('') };
}

export function jaccard(a: readonly string[], b: readonly string[]): number {
  const setA = new Set(a);
  const setB = new Set(b);
  if (!setA.size || !setB.size) return 0;
  const intersection = [...setA].filter((x) => setB.has(x)).length;
  const union = new Set([...setA, ...setB]).size;
  return intersection / union;
}

export function levenshteinRatio(a: string, b: string): number {
  if (a === b) return a.length > 0 ? 1 : 0;
  if (a.length === 0 || b.length === 0) return 0;
  return 1 - distance(a, b) / Math.max(a.length, b.length);
}
