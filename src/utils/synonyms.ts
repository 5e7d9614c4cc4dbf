import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { normalizeName, type NormalizedName } from './stringSim.js';

const DEFAULT_SYNONYMS_PATH = fileURLToPath(new URL('../../resources/synonyms.json', import.meta.url));

const SynonymFileSchema = z.object({
  concepts: z.record(z.array(z.string().min(1))),
});

/**
 * Static domain vocabulary: every term (Portuguese, English, abbreviations)
 * resolves to a concept key. Terms are stored normalized, so "razao_social"
 * and "RazaoSocial" both resolve to `name`.
 */
export class SynonymDictionary {
  private readonly conceptByTerm = new Map<string, string>();

  constructor(concepts: Record<string, string[]>) {
    for (const [concept, terms] of Object.entries(concepts)) {
      const conceptKey = normalizeName(concept).key;
      for (const term of [concept, ...terms]) {
        const termKey = normalizeName(term).key;
        if (!this.conceptByTerm.has(termKey)) {
          this.conceptByTerm.set(termKey, conceptKey);
        }
      }
    }
  }

  static fromFile(filePath: string = DEFAULT_SYNONYMS_PATH): SynonymDictionary {
    const parsed = SynonymFileSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf8')));
    return new SynonymDictionary(parsed.concepts);
  }

  get size(): number {
    return this.conceptByTerm.size;
  }

  lookup(term: string): string | undefined {
    return this.conceptByTerm.get(term);
  }

  /**
   * Concept tokens for a normalized name: a whole-key entry wins, otherwise
   * each token is translated on its own. `translated` is false when nothing
   * in the dictionary applied.
   */
  canonicalize(name: NormalizedName): { concepts: string[]; translated: boolean } {
    const whole = this.conceptByTerm.get(name.key);
    if (whole) {
      return { concepts: [whole], translated: whole !== name.key };
    }
    let translated = false;
    const concepts = name.tokens.map((token) => {
      const concept = this.conceptByTerm.get(token);
      if (concept && concept !== token) translated = true;
      return concept ?? token;
    });
    return { concepts: [...new Set(concepts)].sort(), translated };
  }
}

let defaultDictionary: SynonymDictionary | null = null;

export function defaultSynonyms(): SynonymDictionary {
  if (!defaultDictionary) {
    defaultDictionary = SynonymDictionary.fromFile();
  }
  return defaultDictionary;
}
