// lib/config/scoring-rules.ts
// SINGLE SOURCE OF TRUTH for scoring thresholds, weights and classifier tuning
// Every classifier imports from here. Change here = changes everywhere.

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface ScoringRules {
  margin: {
    tiers: ReadonlyArray<{ minPercent: number; score: number }>;
    belowTierSlope: number;
    viableMinPercent: number;
  };
  competition: {
    tiers: ReadonlyArray<{ maxRate: number; score: number }>;
    saturatedScore: number;
    differentiationMaxScore: number;
  };
  keyword: {
    averageMultiplier: number;
    volumeDivisor: number;
    volumeBonusCap: number;
    lowScore: number;
    seoScore: number;
  };
  risk: {
    perRiskPenalty: number;
    maxPenalty: number;
    complaintRatioThreshold: number;
  };
  weights: {
    keyword: number;
    margin: number;
    competition: number;
    risk: number;
  };
  recommendation: {
    strong: { minTotal: number; minMargin: number };
    conditional: { minTotal: number; minMargin: number };
    caution: { minTotal: number };
  };
  tiers: {
    excellent: number;
    good: number;
    fair: number;
  };
  claims: {
    weightTolerance: number;
  };
  reviews: {
    guardWindowTokens: number;
    topKeywordLimit: number;
    digestMaxReviews: number;
    digestContentMaxChars: number;
  };
  remediation: Readonly<Record<string, string>>;
  remediationFallback: string; // {category} is replaced
}

// ═══════════════════════════════════════════════════════════════════════════
// SCORING RULES CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

export const SCORING_RULES = {

  // ═══════════════════════════════════════════════════════════════════════
  // MARGIN SCORE (margin % → 0-100, first matching tier wins)
  // Below the last tier the score is linear: margin × belowTierSlope
  // ═══════════════════════════════════════════════════════════════════════
  margin: {
    tiers: [
      { minPercent: 30, score: 100 },
      { minPercent: 20, score: 80 },
      { minPercent: 15, score: 60 },
      { minPercent: 10, score: 40 },
    ],
    belowTierSlope: 4, // 0 <= x < 10 → 4x
    viableMinPercent: 15, // below this the margin drives pricing action items
  },

  // ═══════════════════════════════════════════════════════════════════════
  // COMPETITION SCORE (products per monthly search → 0-100)
  // ═══════════════════════════════════════════════════════════════════════
  competition: {
    tiers: [
      { maxRate: 0.3, score: 100 },
      { maxRate: 0.5, score: 80 },
      { maxRate: 1.0, score: 60 },
      { maxRate: 2.0, score: 40 },
      { maxRate: 5.0, score: 20 },
    ],
    saturatedScore: 10,
    differentiationMaxScore: 20, // at or below → differentiation action item
  },

  // ═══════════════════════════════════════════════════════════════════════
  // KEYWORD SCORE
  // avg(opportunity_score) × averageMultiplier + min(maxVolume / volumeDivisor, volumeBonusCap)
  // ═══════════════════════════════════════════════════════════════════════
  keyword: {
    averageMultiplier: 10,
    volumeDivisor: 10_000,
    volumeBonusCap: 20,
    lowScore: 40, // below → keyword discovery action item
    seoScore: 60, // at or above → SEO action item
  },

  // ═══════════════════════════════════════════════════════════════════════
  // RISK PENALTY
  // ═══════════════════════════════════════════════════════════════════════
  risk: {
    perRiskPenalty: 15,
    maxPenalty: 100,
    complaintRatioThreshold: 0.3, // complaint share that becomes a risk
  },

  // ═══════════════════════════════════════════════════════════════════════
  // COMPOSITE WEIGHTS (risk is subtracted)
  // ═══════════════════════════════════════════════════════════════════════
  weights: {
    keyword: 0.3,
    margin: 0.4,
    competition: 0.2,
    risk: 0.1,
  },

  // ═══════════════════════════════════════════════════════════════════════
  // RECOMMENDATION THRESHOLDS
  // ═══════════════════════════════════════════════════════════════════════
  recommendation: {
    strong: { minTotal: 70, minMargin: 20 },
    conditional: { minTotal: 50, minMargin: 15 },
    caution: { minTotal: 30 },
  },

  // ═══════════════════════════════════════════════════════════════════════
  // SCORE TIERS (report labels)
  // ═══════════════════════════════════════════════════════════════════════
  tiers: {
    excellent: 80,
    good: 60,
    fair: 40,
  },

  // ═══════════════════════════════════════════════════════════════════════
  // CLAIM VALIDATION
  // ═══════════════════════════════════════════════════════════════════════
  claims: {
    weightTolerance: 0.1, // ±10% of the actual weight
  },

  // ═══════════════════════════════════════════════════════════════════════
  // REVIEW CLASSIFICATION
  // ═══════════════════════════════════════════════════════════════════════
  reviews: {
    guardWindowTokens: 2, // whitespace boundaries between a negative match and its qualifier
    topKeywordLimit: 10,
    digestMaxReviews: 50,
    digestContentMaxChars: 500,
  },

  // ═══════════════════════════════════════════════════════════════════════
  // COMPLAINT REMEDIATION ACTIONS (by lexicon category)
  // ═══════════════════════════════════════════════════════════════════════
  remediation: {
    품질: '품질 검수 강화 - 샘플 테스트 필수',
    내구성: '내구성 테스트 결과 확인 필요',
    마감: '마감 상태 검수 기준 수립 - 입고 샘플 확인',
    배송: '배송 리드타임 단축 - 국내 재고 또는 빠른 배송 옵션 검토',
    포장: '포장 사양 강화 - 완충재 및 박스 규격 개선',
    설명불일치: '상세페이지 사진/설명 실물 기준 재작성',
    불편: '사용 설명서 및 사용법 콘텐츠 보강',
    소음: '소음 발생 부위 확인 - 공급사 개선 요청',
    냄새: '소재 냄새 확인 - 통풍 포장 또는 소재 변경 검토',
    가격: '가격 대비 가치 강화 - 구성품 또는 혜택 추가 검토',
    실망: '불만 리뷰 심층 분석 후 차별화 포인트 도출',
  },
  remediationFallback: "'{category}' 불만 원인 분석 및 개선 방안 검토",

} as const satisfies ScoringRules;

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Validate the scoring configuration
 */
export function validateScoringConfig(rules: ScoringRules = SCORING_RULES): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  // Tiers must be strictly ordered and scores within 0-100
  const marginTiers = rules.margin.tiers;
  for (let i = 0; i < marginTiers.length; i++) {
    const tier = marginTiers[i];
    if (tier.score < 0 || tier.score > 100) {
      errors.push(`margin.tiers[${i}].score must be between 0 and 100`);
    }
    if (i > 0 && tier.minPercent >= marginTiers[i - 1].minPercent) {
      errors.push(`margin.tiers[${i}].minPercent must be below the previous tier`);
    }
    if (i > 0 && tier.score > marginTiers[i - 1].score) {
      errors.push(`margin.tiers[${i}].score must not exceed the previous tier`);
    }
  }
  const lowestMargin = marginTiers.at(-1);
  if (lowestMargin && rules.margin.belowTierSlope * lowestMargin.minPercent > lowestMargin.score) {
    errors.push('margin.belowTierSlope must keep the linear band below the lowest tier score');
  }

  const competitionTiers = rules.competition.tiers;
  for (let i = 0; i < competitionTiers.length; i++) {
    const tier = competitionTiers[i];
    if (tier.score < 0 || tier.score > 100) {
      errors.push(`competition.tiers[${i}].score must be between 0 and 100`);
    }
    if (i > 0 && tier.maxRate <= competitionTiers[i - 1].maxRate) {
      errors.push(`competition.tiers[${i}].maxRate must be above the previous tier`);
    }
    if (i > 0 && tier.score > competitionTiers[i - 1].score) {
      errors.push(`competition.tiers[${i}].score must not exceed the previous tier`);
    }
  }
  const lowestCompetition = competitionTiers.at(-1);
  if (lowestCompetition && rules.competition.saturatedScore > lowestCompetition.score) {
    errors.push('competition.saturatedScore must not exceed the last tier score');
  }

  // Margin weighs most, then keyword, then competition
  const { weights } = rules;
  if (!(weights.margin > weights.keyword && weights.keyword > weights.competition)) {
    errors.push('weights must satisfy margin > keyword > competition');
  }
  if (weights.risk < 0 || weights.risk > 1) {
    errors.push('weights.risk must be between 0 and 1');
  }

  if (rules.risk.perRiskPenalty <= 0) {
    errors.push('risk.perRiskPenalty must be positive');
  }
  if (rules.risk.perRiskPenalty * 4 < 60) {
    errors.push('risk.perRiskPenalty must make four risks score at least 60');
  }

  const { recommendation } = rules;
  if (recommendation.strong.minTotal <= recommendation.conditional.minTotal ||
      recommendation.conditional.minTotal <= recommendation.caution.minTotal) {
    errors.push('recommendation thresholds must be strictly descending');
  }

  if (rules.claims.weightTolerance < 0 || rules.claims.weightTolerance >= 1) {
    errors.push('claims.weightTolerance must be between 0 and 1');
  }

  if (!Number.isInteger(rules.reviews.guardWindowTokens) || rules.reviews.guardWindowTokens < 0) {
    errors.push('reviews.guardWindowTokens must be a non-negative integer');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
