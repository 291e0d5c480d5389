// lib/reviews/complaint-aggregator.ts
// Batch review classification, complaint histogram and enrichment digest

import type { ClassifiedComplaint, FilterResult, ReviewRecord, ReviewSummary } from '../../types';
import { SCORING_RULES } from '../config/scoring-rules';
import { ReviewClassifier } from './review-classifier';

export const DIGEST_HEADER = '# 불만 리뷰 분석 요청';
export const DIGEST_LIST_LABEL = '## 리뷰 목록:';

function sortByCountDesc(counts: Map<string, number>, limit?: number): Record<string, number> {
  const entries = Array.from(counts.entries()).sort((a, b) => b[1] - a[1]);
  return Object.fromEntries(limit === undefined ? entries : entries.slice(0, limit));
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

/**
 * Classify every review and aggregate. Complaints keep input order.
 */
export function filterReviews(
  reviews: readonly ReviewRecord[],
  classifier: ReviewClassifier = new ReviewClassifier()
): FilterResult {
  const complaints: ClassifiedComplaint[] = [];
  const categoryCounts = new Map<string, number>();
  const keywordCounts = new Map<string, number>();
  let positive = 0;
  let neutral = 0;

  for (const review of reviews) {
    const verdict = classifier.classify(review);

    switch (verdict.sentiment) {
      case 'NEGATIVE':
        complaints.push(Object.freeze({ review, verdict }));
        verdict.complaint_categories.forEach(category => increment(categoryCounts, category));
        verdict.matched_negative_keywords
          .filter(keyword => !verdict.guarded_negative_keywords.includes(keyword))
          .forEach(keyword => increment(keywordCounts, keyword));
        break;
      case 'POSITIVE':
        positive++;
        break;
      case 'NEUTRAL':
        neutral++;
        break;
    }
  }

  return Object.freeze({
    total_reviews: reviews.length,
    complaint_reviews: complaints.length,
    positive_reviews: positive,
    neutral_reviews: neutral,
    complaints: Object.freeze(complaints),
    complaint_categories: Object.freeze(sortByCountDesc(categoryCounts)),
    top_complaint_keywords: Object.freeze(sortByCountDesc(keywordCounts, SCORING_RULES.reviews.topKeywordLimit)),
  });
}

/**
 * Render up to maxReviews complaints as the summarizer input block.
 * Formatting only; no classification happens here.
 */
export function buildComplaintDigest(
  result: FilterResult,
  maxReviews: number = SCORING_RULES.reviews.digestMaxReviews
): string {
  const complaints = result.complaints.slice(0, Math.max(0, maxReviews));
  const maxChars = SCORING_RULES.reviews.digestContentMaxChars;

  const lines = [
    `${DIGEST_HEADER} (${complaints.length}건)`,
    `## 주요 불만 카테고리: ${Object.keys(result.complaint_categories).join(', ')}`,
    '',
    DIGEST_LIST_LABEL,
  ];

  complaints.forEach(({ review, verdict }, i) => {
    const categories = verdict.complaint_categories.length > 0
      ? verdict.complaint_categories.join(', ')
      : '기타';
    lines.push('');
    lines.push(`### 리뷰 ${i + 1} [${review.rating}점] - ${categories}`);
    lines.push(Array.from(review.content).slice(0, maxChars).join(''));
  });

  return lines.join('\n');
}

/**
 * Compact counts for the report record
 */
export function summarizeReviews(result: FilterResult): ReviewSummary {
  return Object.freeze({
    total_reviews: result.total_reviews,
    complaint_reviews: result.complaint_reviews,
    positive_reviews: result.positive_reviews,
    neutral_reviews: result.neutral_reviews,
    complaint_ratio: result.total_reviews > 0 ? result.complaint_reviews / result.total_reviews : 0,
    complaint_categories: result.complaint_categories,
    top_complaint_keywords: result.top_complaint_keywords,
  });
}
