import { describe, expect, it } from 'vitest';
import { jaccard, levenshteinRatio, normalizeName, singularize, splitWords } from '../utils/stringSim.js';

describe('splitWords', () => {
  it('splits camelCase, snake_case and strips accents', () => {
    expect(splitWords('RazaoSocial')).toEqual(['razao', 'social']);
    expect(splitWords('data_nascimento')).toEqual(['data', 'nascimento']);
    expect(splitWords('Endereço')).toEqual(['endereco']);
    expect(splitWords('customerID2')).toEqual(['customer', 'id2']);
  });
});

describe('singularize', () => {
  it('handles the common English and Portuguese plural endings', () => {
    expect(singularize('categories')).toBe('category');
    expect(singularize('addresses')).toBe('address');
    expect(singularize('boxes')).toBe('box');
    expect(singularize('customers')).toBe('customer');
    expect(singularize('clientes')).toBe('cliente');
  });

  it('leaves short tokens and -us/-ss/-is endings alone', () => {
    expect(singularize('cpf')).toBe('cpf');
    expect(singularize('status')).toBe('status');
    expect(singularize('class')).toBe('class');
    expect(singularize('analysis')).toBe('analysis');
  });
});

describe('normalizeName', () => {
  it('drops a table prefix and singularizes', () => {
    expect(normalizeName('tb_clientes')).toEqual({ raw: 'tb_clientes', tokens: ['cliente'], key: 'cliente' });
    expect(normalizeName('tblOrders').key).toBe('order');
  });

  it('drops qualifier tokens unless nothing else is left', () => {
    expect(normalizeName('full_name').tokens).toEqual(['name']);
    expect(normalizeName('nome_completo').tokens).toEqual(['nome']);
    expect(normalizeName('the').tokens).toEqual(['the']);
  });

  it('keeps a lone prefix-like word', () => {
    expect(normalizeName('tb').tokens).toEqual(['tb']);
  });
});

describe('jaccard', () => {
  it('measures token set overlap', () => {
    expect(jaccard(['a', 'b'], ['b', 'c'])).toBeCloseTo(1 / 3);
    expect(jaccard(['a'], ['a'])).toBe(1);
    expect(jaccard([], ['a'])).toBe(0);
  });
});

describe('levenshteinRatio', () => {
  it('is 1 for identical strings and 0 when either side is empty', () => {
    expect(levenshteinRatio('abc', 'abc')).toBe(1);
    expect(levenshteinRatio('', '')).toBe(0);
    expect(levenshteinRatio('abc', '')).toBe(0);
  });

  it('normalizes the edit distance by the longer string', () => {
    expect(levenshteinRatio('kitten', 'sitting')).toBeCloseTo(1 - 3 / 7);
  });
});
