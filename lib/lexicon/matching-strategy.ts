// lib/lexicon/matching-strategy.ts
// How a lexicon term is located inside review text

export interface TermMatch {
  term: string;
  start: number;
  end: number; // exclusive
}

/**
 * Locates every non-overlapping occurrence of a term, left to right
 */
export interface MatchStrategy {
  readonly name: string;
  findAll(text: string, term: string): TermMatch[];
}

/**
 * Plain substring matching. Compound words containing a term match
 * (e.g. "품질" inside "고품질").
 */
export const substringMatchStrategy: MatchStrategy = {
  name: 'substring',
  findAll(text: string, term: string): TermMatch[] {
    const matches: TermMatch[] = [];
    if (!term) return matches;

    let index = text.indexOf(term);
    while (index !== -1) {
      matches.push({ term, start: index, end: index + term.length });
      index = text.indexOf(term, index + term.length);
    }
    return matches;
  },
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Term must start a word: the preceding character is not a letter or digit.
 * Trailing particles ("품질이") still match; "고품질" does not.
 */
export const wordStartMatchStrategy: MatchStrategy = {
  name: 'word-start',
  findAll(text: string, term: string): TermMatch[] {
    if (!term) return [];
    const pattern = new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(term)}`, 'gu');
    return Array.from(text.matchAll(pattern), match => {
      const start = match.index ?? 0;
      return { term, start, end: start + term.length };
    });
  },
};

/**
 * Exact word matching: letters or digits on neither side
 */
export const wordBoundaryMatchStrategy: MatchStrategy = {
  name: 'word-boundary',
  findAll(text: string, term: string): TermMatch[] {
    if (!term) return [];
    const pattern = new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(term)}(?![\\p{L}\\p{N}])`, 'gu');
    return Array.from(text.matchAll(pattern), match => {
      const start = match.index ?? 0;
      return { term, start, end: start + term.length };
    });
  },
};
