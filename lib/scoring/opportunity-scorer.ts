// lib/scoring/opportunity-scorer.ts
// Deterministic opportunity scoring - rule-based step functions, no ML
// Combines keyword demand, margin, competition and risk into one 0-100 score

import type {
  KeywordOpportunity,
  OpportunityScore,
  Recommendation,
  ScoreComponents,
  ScoreTier,
  ScoringInput,
  ScoringOutcome,
} from '../../types';
import { SCORING_RULES, type ScoringRules } from '../config/scoring-rules';

function clamp(value: number, min = 0, max = 100): number {
  return Math.min(max, Math.max(min, value));
}

// Scores are reported with one decimal
function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

// ═══════════════════════════════════════════════════════════════════════════
// SUB-SCORES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Non-decreasing step function of margin %; negative or NaN → 0
 */
export function calculateMarginScore(marginPercent: number, rules: ScoringRules = SCORING_RULES): number {
  if (Number.isNaN(marginPercent) || marginPercent < 0) return 0;

  for (const tier of rules.margin.tiers) {
    if (marginPercent >= tier.minPercent) return tier.score;
  }
  return clamp(marginPercent * rules.margin.belowTierSlope);
}

/**
 * Non-increasing step function of products per search
 */
export function calculateCompetitionScore(competitionRate: number, rules: ScoringRules = SCORING_RULES): number {
  if (Number.isNaN(competitionRate)) return rules.competition.saturatedScore;

  for (const tier of rules.competition.tiers) {
    if (competitionRate <= tier.maxRate) return tier.score;
  }
  return rules.competition.saturatedScore;
}

/**
 * avg(opportunity_score) scaled, plus a capped bonus for the largest search volume
 */
export function calculateKeywordScore(
  keywords: readonly KeywordOpportunity[],
  rules: ScoringRules = SCORING_RULES
): number {
  if (keywords.length === 0) return 0;

  const { averageMultiplier, volumeDivisor, volumeBonusCap } = rules.keyword;
  const average = keywords.reduce((sum, kw) => sum + kw.opportunity_score, 0) / keywords.length;
  const maxVolume = Math.max(...keywords.map(kw => kw.monthly_search_volume));
  const volumeBonus = Math.min(maxVolume / volumeDivisor, volumeBonusCap);

  return round1(clamp(average * averageMultiplier + volumeBonus));
}

/**
 * Distinct, trimmed, non-blank risks in first-seen order
 */
export function normalizeRisks(risks: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const risk of risks) {
    const trimmed = risk.trim();
    if (trimmed) seen.add(trimmed);
  }
  return Array.from(seen);
}

export function calculateRiskScore(risks: readonly string[], rules: ScoringRules = SCORING_RULES): number {
  return Math.min(normalizeRisks(risks).length * rules.risk.perRiskPenalty, rules.risk.maxPenalty);
}

// ═══════════════════════════════════════════════════════════════════════════
// COMPOSITE
// ═══════════════════════════════════════════════════════════════════════════

export function calculateTotalScore(components: ScoreComponents, rules: ScoringRules = SCORING_RULES): number {
  const { weights } = rules;
  const raw =
    components.keyword_score * weights.keyword +
    components.margin_score * weights.margin +
    components.competition_score * weights.competition -
    components.risk_score * weights.risk;
  return round1(clamp(raw));
}

/**
 * Build an immutable score; total_score is always derived from the components
 */
export function createOpportunityScore(components: ScoreComponents, rules: ScoringRules = SCORING_RULES): OpportunityScore {
  const bounded: ScoreComponents = {
    keyword_score: clamp(components.keyword_score),
    margin_score: clamp(components.margin_score),
    competition_score: clamp(components.competition_score),
    risk_score: clamp(components.risk_score),
  };
  return Object.freeze({ ...bounded, total_score: calculateTotalScore(bounded, rules) });
}

/**
 * Copy with changed components and a recomputed total
 */
export function updateOpportunityScore(
  score: OpportunityScore,
  changes: Partial<ScoreComponents>,
  rules: ScoringRules = SCORING_RULES
): OpportunityScore {
  return createOpportunityScore({
    keyword_score: changes.keyword_score ?? score.keyword_score,
    margin_score: changes.margin_score ?? score.margin_score,
    competition_score: changes.competition_score ?? score.competition_score,
    risk_score: changes.risk_score ?? score.risk_score,
  }, rules);
}

export function getScoreTier(totalScore: number, rules: ScoringRules = SCORING_RULES): ScoreTier {
  if (totalScore >= rules.tiers.excellent) return 'excellent';
  if (totalScore >= rules.tiers.good) return 'good';
  if (totalScore >= rules.tiers.fair) return 'fair';
  return 'poor';
}

// ═══════════════════════════════════════════════════════════════════════════
// RECOMMENDATION & ACTION ITEMS
// ═══════════════════════════════════════════════════════════════════════════

export const RECOMMENDATION_TEXT = {
  STRONG_BUY: '✅ 강력 추천 - 높은 기회 점수와 양호한 마진율. 소싱 진행 권장.',
  CONDITIONAL: '🟡 조건부 추천 - 기회 있으나 마진 개선 또는 리스크 관리 필요.',
  CAUTION: '⚠️ 신중 검토 필요 - 일부 기회 요소 있으나 리스크 높음.',
  REJECT: '❌ 비추천 - 기회 점수 낮음. 다른 상품 검토 권장.',
  REJECT_NEGATIVE_MARGIN: '❌ 비추천 - 마진이 음수입니다. 현재 가격 구조로는 손실 발생.',
} as const;

export function generateRecommendation(
  totalScore: number,
  marginPercent: number,
  rules: ScoringRules = SCORING_RULES
): Recommendation {
  const { strong, conditional, caution } = rules.recommendation;

  if (!Number.isFinite(marginPercent) || marginPercent < 0) {
    return { verdict: 'REJECT', text: RECOMMENDATION_TEXT.REJECT_NEGATIVE_MARGIN };
  }
  if (totalScore >= strong.minTotal && marginPercent >= strong.minMargin) {
    return { verdict: 'STRONG_BUY', text: RECOMMENDATION_TEXT.STRONG_BUY };
  }
  if (totalScore >= conditional.minTotal && marginPercent >= conditional.minMargin) {
    return { verdict: 'CONDITIONAL', text: RECOMMENDATION_TEXT.CONDITIONAL };
  }
  if (totalScore >= caution.minTotal) {
    return { verdict: 'CAUTION', text: RECOMMENDATION_TEXT.CAUTION };
  }
  return { verdict: 'REJECT', text: RECOMMENDATION_TEXT.REJECT };
}

export const ACTION_ITEMS = {
  RAISE_PRICE: '판매가 인상 또는 원가 절감 방안 검토',
  SEA_FREIGHT: '배송비 절감을 위한 해운 옵션 검토',
  KEYWORD_DISCOVERY: '롱테일 키워드 추가 발굴 - 검색량 대비 상품수 낮은 키워드 탐색',
  SEO: 'SEO 최적화 - 타겟 키워드 상세페이지 반영',
  DIFFERENTIATION: '경쟁 과열 - 번들 구성 또는 기능 차별화 포인트 확보',
  FIX_COPY: '상세페이지 카피 수정 - 스펙과 불일치하는 표기 제거',
  FALLBACK: '추가 시장 조사 진행',
} as const;

export interface ActionItemInput {
  score: OpportunityScore;
  marginPercent: number;
  breakevenPrice?: number;
  complaintCategories?: Readonly<Record<string, number>>;
  failedClaims?: number;
}

/**
 * Ordered, de-duplicated action items from the weak points
 */
export function generateActionItems(input: ActionItemInput, rules: ScoringRules = SCORING_RULES): string[] {
  const items: string[] = [];
  const add = (item: string): void => {
    if (!items.includes(item)) items.push(item);
  };

  if (!Number.isFinite(input.marginPercent) || input.marginPercent < rules.margin.viableMinPercent) {
    add(ACTION_ITEMS.RAISE_PRICE);
    add(ACTION_ITEMS.SEA_FREIGHT);
  }
  if (input.marginPercent < 0 && input.breakevenPrice !== undefined && input.breakevenPrice > 0) {
    add(`손익분기 판매가 ${Math.ceil(input.breakevenPrice).toLocaleString('ko-KR')}원 이상으로 가격 재설정`);
  }

  if (input.score.keyword_score < rules.keyword.lowScore) {
    add(ACTION_ITEMS.KEYWORD_DISCOVERY);
  } else if (input.score.keyword_score >= rules.keyword.seoScore) {
    add(ACTION_ITEMS.SEO);
  }

  if (input.score.competition_score <= rules.competition.differentiationMaxScore) {
    add(ACTION_ITEMS.DIFFERENTIATION);
  }

  const categories = Object.entries(input.complaintCategories ?? {})
    .filter(([, count]) => count > 0)
    .sort((a, b) => b[1] - a[1]);
  for (const [category] of categories) {
    add(rules.remediation[category] ?? rules.remediationFallback.replace('{category}', category));
  }

  if ((input.failedClaims ?? 0) > 0) {
    add(ACTION_ITEMS.FIX_COPY);
  }

  if (items.length === 0) {
    add(ACTION_ITEMS.FALLBACK);
  }
  return items;
}

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Score one product candidate from precomputed summaries
 */
export function scoreOpportunity(input: ScoringInput, rules: ScoringRules = SCORING_RULES): ScoringOutcome {
  const risks = normalizeRisks(input.risks);
  const score = createOpportunityScore({
    keyword_score: calculateKeywordScore(input.keywords, rules),
    margin_score: calculateMarginScore(input.marginPercent, rules),
    competition_score: calculateCompetitionScore(input.competitionRate, rules),
    risk_score: calculateRiskScore(risks, rules),
  }, rules);

  return Object.freeze({
    score,
    recommendation: Object.freeze(generateRecommendation(score.total_score, input.marginPercent, rules)),
    action_items: Object.freeze(generateActionItems({
      score,
      marginPercent: input.marginPercent,
      breakevenPrice: input.breakevenPrice,
      complaintCategories: input.complaintCategories,
      failedClaims: input.failedClaims,
    }, rules)),
    risks: Object.freeze(risks),
  });
}
