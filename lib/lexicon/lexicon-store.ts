// lib/lexicon/lexicon-store.ts
// Immutable review lexicon: negative categories, positive terms and guard markers
// Loaded once from data/review-lexicon.json and injected into the classifier

import { z } from 'zod';
import rawLexicon from '../../data/review-lexicon.json';
import { createAppError } from '../config/error-codes';

const termList = z.array(z.string().min(1)).min(1);

export const LexiconSchema = z.object({
  version: z.string().default('custom'),
  negative_categories: z
    .array(z.object({ category: z.string().min(1), keywords: termList }))
    .min(1),
  positive_keywords: termList,
  guard: z.object({
    prefix_negators: z.array(z.string().min(1)).default([]),
    suffix_negators: z.array(z.string().min(1)).default([]),
    between_negators: z.array(z.string().min(1)).default([]),
    absence_markers: z.array(z.string().min(1)).default([]),
  }),
});

export type LexiconData = z.input<typeof LexiconSchema>;

export interface NegativeCategory {
  readonly category: string;
  readonly keywords: readonly string[];
}

export interface GuardMarkers {
  readonly prefixNegators: readonly string[]; // "안 좋아요": the positive term is negated
  readonly suffixNegators: readonly string[]; // "만족 못해요"
  readonly betweenNegators: readonly string[]; // blocks a qualifier from guarding
  readonly absenceMarkers: readonly string[]; // "냄새 안 나요", "후회 없어요"
}

export interface Lexicon {
  readonly version: string;
  readonly negativeCategories: readonly NegativeCategory[];
  readonly positiveKeywords: readonly string[];
  readonly guard: GuardMarkers;
}

function freezeList(values: string[]): readonly string[] {
  return Object.freeze(Array.from(new Set(values)));
}

/**
 * Validate and deep-freeze lexicon data. Throws CONFIG_003 when invalid.
 */
export function createLexicon(data: unknown): Lexicon {
  const parsed = LexiconSchema.safeParse(data);
  if (!parsed.success) {
    const fields = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw createAppError('CONFIG_003', fields);
  }

  const { version, negative_categories, positive_keywords, guard } = parsed.data;
  const seen = new Set<string>();
  for (const { category } of negative_categories) {
    if (seen.has(category)) {
      throw createAppError('CONFIG_003', `Duplicate category: ${category}`);
    }
    seen.add(category);
  }

  return Object.freeze({
    version,
    negativeCategories: Object.freeze(
      negative_categories.map(entry => Object.freeze({
        category: entry.category,
        keywords: freezeList(entry.keywords),
      }))
    ),
    positiveKeywords: freezeList(positive_keywords),
    guard: Object.freeze({
      prefixNegators: freezeList(guard.prefix_negators),
      suffixNegators: freezeList(guard.suffix_negators),
      betweenNegators: freezeList(guard.between_negators),
      absenceMarkers: freezeList(guard.absence_markers),
    }),
  });
}

let defaultLexicon: Lexicon | null = null;

/**
 * The bundled Korean review lexicon, parsed on first use
 */
export function getDefaultLexicon(): Lexicon {
  if (!defaultLexicon) {
    defaultLexicon = createLexicon(rawLexicon);
  }
  return defaultLexicon;
}

/**
 * Map each negative keyword to its category (first category wins)
 */
export function getKeywordCategoryIndex(lexicon: Lexicon): ReadonlyMap<string, string> {
  const index = new Map<string, string>();
  for (const { category, keywords } of lexicon.negativeCategories) {
    for (const keyword of keywords) {
      if (!index.has(keyword)) {
        index.set(keyword, category);
      }
    }
  }
  return index;
}
