// lib/reviews/review-classifier.ts
// Lexicon-based review sentiment and complaint classifier
// Pure: the same review and lexicon always produce the same verdict

import type { ReviewRecord, ReviewVerdict, Sentiment } from '../../types';
import { SCORING_RULES } from '../config/scoring-rules';
import { getDefaultLexicon, type Lexicon } from '../lexicon/lexicon-store';
import { substringMatchStrategy, type MatchStrategy, type TermMatch } from '../lexicon/matching-strategy';
import {
  DEFAULT_GUARD_RULES,
  isGuarded,
  isNegatedPositive,
  splitSentences,
  type GuardRule,
} from './sentiment-guard';

export interface ReviewClassifierOptions {
  lexicon?: Lexicon;
  matcher?: MatchStrategy;
  guardWindowTokens?: number;
  guardRules?: readonly GuardRule[];
}

interface NegativeOccurrence {
  keyword: string;
  category: string;
  guarded: boolean;
}

function freezeVerdict(verdict: ReviewVerdict): ReviewVerdict {
  return Object.freeze(verdict);
}

const EMPTY_VERDICT = freezeVerdict({
  sentiment: 'NEUTRAL',
  is_complaint: false,
  matched_negative_keywords: [],
  matched_positive_keywords: [],
  guarded_negative_keywords: [],
  complaint_categories: [],
});

export class ReviewClassifier {
  readonly lexicon: Lexicon;
  readonly matcher: MatchStrategy;
  private readonly windowTokens: number;
  private readonly guardRules: readonly GuardRule[];

  constructor(options: ReviewClassifierOptions = {}) {
    this.lexicon = options.lexicon ?? getDefaultLexicon();
    this.matcher = options.matcher ?? substringMatchStrategy;
    this.windowTokens = options.guardWindowTokens ?? SCORING_RULES.reviews.guardWindowTokens;
    this.guardRules = options.guardRules ?? DEFAULT_GUARD_RULES;
  }

  /**
   * Classify one review by its text. The rating is never consulted.
   */
  classify(review: Pick<ReviewRecord, 'content'>): ReviewVerdict {
    return this.classifyText(review.content);
  }

  classifyText(text: string): ReviewVerdict {
    const sentences = splitSentences(text);
    if (sentences.length === 0) {
      return EMPTY_VERDICT;
    }

    const { guard, positiveKeywords, negativeCategories } = this.lexicon;
    const matchedPositive: string[] = [];
    const occurrences: NegativeOccurrence[] = [];

    const positivesBySentence: TermMatch[][] = sentences.map(() => []);
    const negativesBySentence: Array<Array<TermMatch & { category: string }>> = sentences.map(() => []);

    // Positive terms, lexicon order
    for (const term of positiveKeywords) {
      let counted = false;
      sentences.forEach((sentence, i) => {
        for (const match of this.matcher.findAll(sentence.text, term)) {
          if (isNegatedPositive(sentence.text, match, guard, this.windowTokens)) continue;
          positivesBySentence[i].push(match);
          counted = true;
        }
      });
      if (counted) matchedPositive.push(term);
    }

    // Negative terms, category then keyword order
    for (const { category, keywords } of negativeCategories) {
      for (const keyword of keywords) {
        sentences.forEach((sentence, i) => {
          for (const match of this.matcher.findAll(sentence.text, keyword)) {
            negativesBySentence[i].push({ ...match, category });
          }
        });
      }
    }

    sentences.forEach((sentence, i) => {
      const negatives = negativesBySentence[i];
      for (const negative of negatives) {
        occurrences.push({
          keyword: negative.term,
          category: negative.category,
          guarded: isGuarded({
            sentence: sentence.text,
            negative,
            negatives,
            positives: positivesBySentence[i],
            markers: guard,
            windowTokens: this.windowTokens,
          }, this.guardRules),
        });
      }
    });

    const matchedNegative: string[] = [];
    const guardedNegative: string[] = [];
    const categories: string[] = [];

    for (const { category, keywords } of negativeCategories) {
      for (const keyword of keywords) {
        const hits = occurrences.filter(o => o.keyword === keyword && o.category === category);
        if (hits.length === 0) continue;
        if (!matchedNegative.includes(keyword)) matchedNegative.push(keyword);

        if (hits.every(hit => hit.guarded)) {
          if (!guardedNegative.includes(keyword)) guardedNegative.push(keyword);
        } else if (!categories.includes(category)) {
          categories.push(category);
        }
      }
    }

    const sentiment: Sentiment = categories.length > 0
      ? 'NEGATIVE'
      : matchedPositive.length > 0 ? 'POSITIVE' : 'NEUTRAL';

    return freezeVerdict({
      sentiment,
      is_complaint: sentiment === 'NEGATIVE',
      matched_negative_keywords: Object.freeze(matchedNegative),
      matched_positive_keywords: Object.freeze(matchedPositive),
      guarded_negative_keywords: Object.freeze(guardedNegative.filter(k => !this.hasUnguarded(occurrences, k))),
      complaint_categories: Object.freeze(categories),
    });
  }

  private hasUnguarded(occurrences: readonly NegativeOccurrence[], keyword: string): boolean {
    return occurrences.some(o => o.keyword === keyword && !o.guarded);
  }
}

let defaultClassifier: ReviewClassifier | null = null;

/**
 * Classify with the bundled lexicon and substring matching
 */
export function classifyReview(review: Pick<ReviewRecord, 'content'>): ReviewVerdict {
  if (!defaultClassifier) {
    defaultClassifier = new ReviewClassifier();
  }
  return defaultClassifier.classify(review);
}
