import type { MatchCandidate, MatchRationale, SourceColumn, TargetEndpoint, TypeAffinity } from '../types.js';
import { UnknownColumnError } from '../utils/errors.js';
import { jaccard, levenshteinRatio, normalizeName, type NormalizedName } from '../utils/stringSim.js';
import { defaultSynonyms, type SynonymDictionary } from '../utils/synonyms.js';
import { typeAffinity } from '../utils/typeUtils.js';
import type { SchemaRegistry } from './schemaRegistry.js';

export const ACCEPTANCE_THRESHOLD = 0.7;
export const EXACT_SCORE = 1;
export const CONTAINMENT_SCORE = 0.85;
/** Keeps token similarity strictly below containment: 0.84 × similarity in [0, 1]. */
export const TOKEN_SIMILARITY_WEIGHT = 0.84;
export const SYNONYM_FLOOR = 0.7;
const MIN_CONTAINMENT_LENGTH = 3;

export interface NameFeatures extends NormalizedName {
  concepts: string[];
  translated: boolean;
}

export interface ScoringStrategy {
  readonly rationale: Exclude<MatchRationale, 'none'>;
  score(source: NameFeatures, target: NameFeatures): number;
}

export const exactNameStrategy: ScoringStrategy = {
  rationale: 'exact',
  score: (a, b) => (a.key.length > 0 && a.key === b.key ? EXACT_SCORE : 0),
};

export const containmentStrategy: ScoringStrategy = {
  rationale: 'containment',
  score: (a, b) => {
    if (a.key === b.key) return 0;
    const [shorter, longer] = a.key.length <= b.key.length ? [a.key, b.key] : [b.key, a.key];
    if (shorter.length < MIN_CONTAINMENT_LENGTH) return 0;
    return longer.includes(shorter) ? CONTAINMENT_SCORE : 0;
  },
};

export const tokenSimilarityStrategy: ScoringStrategy = {
  rationale: 'token_similarity',
  score: (a, b) => TOKEN_SIMILARITY_WEIGHT * Math.max(jaccard(a.tokens, b.tokens), levenshteinRatio(a.key, b.key)),
};

export const synonymStrategy: ScoringStrategy = {
  rationale: 'synonym',
  score: (a, b) => {
    if (!a.translated && !b.translated) return 0;
    return a.concepts.join(' ') === b.concepts.join(' ') ? SYNONYM_FLOOR : 0;
  },
};

/** Evaluated in order; on equal scores the earlier strategy names the rationale. */
export const DEFAULT_STRATEGIES: readonly ScoringStrategy[] = [
  exactNameStrategy,
  containmentStrategy,
  tokenSimilarityStrategy,
  synonymStrategy,
];

export interface NameScore {
  confidence: number;
  rationale: MatchRationale;
}

export function scoreFeatures(
  source: NameFeatures,
  target: NameFeatures,
  strategies: readonly ScoringStrategy[] = DEFAULT_STRATEGIES,
): NameScore {
  let best: NameScore = { confidence: 0, rationale: 'none' };
  for (const strategy of strategies) {
    const value = round(strategy.score(source, target));
    if (value > best.confidence) {
      best = { confidence: value, rationale: strategy.rationale };
    }
  }
  return best;
}

export interface FuzzyMatcherOptions {
  strategies?: readonly ScoringStrategy[];
  synonyms?: SynonymDictionary;
  threshold?: number;
}

/**
 * Scores source tables against target endpoints and source columns against
 * endpoint fields. Output depends only on the registered schemas.
 */
export class FuzzyMatcher {
  readonly threshold: number;
  private readonly strategies: readonly ScoringStrategy[];
  private readonly synonyms: SynonymDictionary;
  private readonly featureCache = new Map<string, NameFeatures>();

  constructor(
    private readonly registry: SchemaRegistry,
    options: FuzzyMatcherOptions = {},
  ) {
    this.threshold = options.threshold ?? ACCEPTANCE_THRESHOLD;
    this.strategies = options.strategies ?? DEFAULT_STRATEGIES;
    this.synonyms = options.synonyms ?? defaultSynonyms();
  }

  features(name: string): NameFeatures {
    const cached = this.featureCache.get(name);
    if (cached) return cached;
    const normalized = normalizeName(name);
    const { concepts, translated } = this.synonyms.canonicalize(normalized);
    const features: NameFeatures = { ...normalized, concepts, translated };
    this.featureCache.set(name, features);
    return features;
  }

  score(source: string, target: string): NameScore {
    return scoreFeatures(this.features(source), this.features(target), this.strategies);
  }

  rankEndpoints(tableName: string): MatchCandidate[] {
    const table = this.registry.requireSourceTable(tableName);
    const endpoints = this.registry.getTargetSchema().endpoints;

    const scored = endpoints.map((endpoint, index) => {
      const byEntity = this.score(table.name, endpoint.entity);
      const segment = lastStaticSegment(endpoint.path);
      const bySegment = segment ? this.score(table.name, segment) : byEntity;
      const best = bySegment.confidence > byEntity.confidence ? bySegment : byEntity;
      return { index, candidate: this.candidate(table.name, endpoint.path, best, 'exact') };
    });

    return sortRanked(scored);
  }

  rankFields(tableName: string, columnName: string, endpointPath: string): MatchCandidate[] {
    const table = this.registry.requireSourceTable(tableName);
    const column = table.columns.find((c) => c.name.toLowerCase() === columnName.toLowerCase());
    if (!column) throw new UnknownColumnError(table.name, columnName);
    const endpoint = this.registry.requireTargetEndpoint(endpointPath);
    return this.rankColumnAgainst(column, endpoint);
  }

  rankColumnAgainst(column: SourceColumn, endpoint: TargetEndpoint): MatchCandidate[] {
    const scored: Array<{ index: number; candidate: MatchCandidate }> = [];
    endpoint.fields.forEach((field, index) => {
      const affinity = typeAffinity(column.type, field.type);
      if (!affinity) return;
      const score = this.score(column.name, field.name);
      scored.push({ index, candidate: this.candidate(column.name, field.name, score, affinity) });
    });
    return sortRanked(scored);
  }

  bestEndpoint(tableName: string): MatchCandidate | undefined {
    const [top] = this.rankEndpoints(tableName);
    return top?.accepted ? top : undefined;
  }

  private candidate(source: string, target: string, score: NameScore, affinity: TypeAffinity): MatchCandidate {
    return Object.freeze({
      source,
      target,
      confidence: score.confidence,
      rationale: score.rationale,
      typeAffinity: affinity,
      accepted: score.confidence >= this.threshold,
    });
  }
}

function sortRanked(scored: Array<{ index: number; candidate: MatchCandidate }>): MatchCandidate[] {
  return scored
    .sort((a, b) => {
      if (b.candidate.confidence !== a.candidate.confidence) {
        return b.candidate.confidence - a.candidate.confidence;
      }
      if (a.candidate.typeAffinity !== b.candidate.typeAffinity) {
        return a.candidate.typeAffinity === 'exact' ? -1 : 1;
      }
      return a.index - b.index;
    })
    .map((s) => s.candidate);
}

export function lastStaticSegment(path: string): string | undefined {
  const segments = path
    .split('/')
    .filter((s) => s && !s.startsWith('{') && !s.startsWith(':') && !/^v\d+$/i.test(s) && s.toLowerCase() !== 'api');
  return segments[segments.length - 1];
}

function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}
