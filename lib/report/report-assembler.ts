// lib/report/report-assembler.ts
// Pure aggregation of classifier and scorer outputs into one OpportunityReport

import { v4 as uuidv4 } from 'uuid';
import type {
  ClaimValidationSummary,
  FilterResult,
  KeywordOpportunity,
  MarginResult,
  OpportunityReport,
  ScoringOutcome,
  ValidationResult,
} from '../../types';
import { EMPTY_ENRICHMENT, type EnrichmentResult } from '../schemas/enrichment-schema';
import { summarizeReviews } from '../reviews/complaint-aggregator';
import { getScoreTier } from '../scoring/opportunity-scorer';

export interface ReportAssemblyInput {
  product_name: string;
  category?: string;
  keywords?: readonly KeywordOpportunity[];
  margin?: MarginResult;
  competition_rate: number;
  scoring: ScoringOutcome;
  reviews?: FilterResult;
  validation?: ValidationResult;
  enrichment?: EnrichmentResult;
  degraded_reasons?: readonly string[];
  report_id?: string;
  created_at?: Date;
}

export function generateReportId(): string {
  return uuidv4();
}

export function generateKeywordSummary(keywords: readonly KeywordOpportunity[]): string {
  const [top] = keywords;
  if (!top) return '키워드 데이터 없음';

  return `대표 키워드 '${top.keyword}' 월간 검색량 ${top.monthly_search_volume.toLocaleString('ko-KR')}회, 경쟁강도 ${top.competition_rate}`;
}

export function generateMarginSummary(margin: MarginResult | undefined): string {
  if (!margin) return '마진 분석 데이터 없음';

  return margin.is_viable
    ? `예상 마진율 ${margin.margin_percent}% - 수익성 확보 가능`
    : `예상 마진율 ${margin.margin_percent}% - 수익성 부족, 가격/비용 조정 필요`;
}

function toClaimValidationSummary(result: ValidationResult): ClaimValidationSummary {
  return Object.freeze({
    total_claims: result.total_claims,
    passed: result.passed,
    failed: result.failed,
    warnings: result.warnings,
    unverified: result.unverified,
    overall_status: result.overall_status,
    risk_level: result.risk_level,
    risk_reasons: result.risk_reasons,
    items: result.items,
  });
}

/**
 * Assemble the report. Absent enrichment becomes the empty enrichment.
 */
export function assembleOpportunityReport(input: ReportAssemblyInput): OpportunityReport {
  const keywords = input.keywords ?? [];
  const degradedReasons = input.degraded_reasons ?? [];
  const { scoring } = input;

  return Object.freeze({
    report_id: input.report_id ?? generateReportId(),
    created_at: (input.created_at ?? new Date()).toISOString(),
    product_name: input.product_name,
    category: input.category ?? '',
    target_keywords: Object.freeze([...keywords]),
    keyword_summary: generateKeywordSummary(keywords),
    margin_analysis: input.margin,
    margin_summary: generateMarginSummary(input.margin),
    competition_rate: input.competition_rate,
    opportunity_score: scoring.score,
    score_tier: getScoreTier(scoring.score.total_score),
    recommendation: scoring.recommendation.text,
    recommendation_verdict: scoring.recommendation.verdict,
    action_items: scoring.action_items,
    risks: scoring.risks,
    review_summary: input.reviews ? summarizeReviews(input.reviews) : undefined,
    claim_validation: input.validation ? toClaimValidationSummary(input.validation) : undefined,
    enrichment: input.enrichment ?? EMPTY_ENRICHMENT,
    degraded: degradedReasons.length > 0,
    degraded_reasons: Object.freeze([...degradedReasons]),
  });
}
