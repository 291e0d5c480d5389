// tests/lib/config/scoring-rules.test.ts
// Scoring configuration invariants

import { SCORING_RULES, validateScoringConfig, type ScoringRules } from '../../../lib/config/scoring-rules';

describe('SCORING_RULES', () => {
  test('default configuration is valid', () => {
    expect(validateScoringConfig()).toEqual({ valid: true, errors: [] });
  });

  test('weights rank margin above keyword above competition', () => {
    const { weights } = SCORING_RULES;
    expect(weights.margin).toBeGreaterThan(weights.keyword);
    expect(weights.keyword).toBeGreaterThan(weights.competition);
  });

  test('four risks reach at least 60 penalty', () => {
    expect(SCORING_RULES.risk.perRiskPenalty * 4).toBeGreaterThanOrEqual(60);
  });

  test('every remediation category has an action', () => {
    for (const action of Object.values(SCORING_RULES.remediation)) {
      expect(action.length).toBeGreaterThan(0);
    }
  });
});

describe('validateScoringConfig', () => {
  const withOverrides = (overrides: Partial<ScoringRules>): ScoringRules => ({ ...SCORING_RULES, ...overrides });

  test('rejects unordered margin tiers', () => {
    const result = validateScoringConfig(withOverrides({
      margin: {
        ...SCORING_RULES.margin,
        tiers: [
          { minPercent: 20, score: 80 },
          { minPercent: 30, score: 100 },
        ],
      },
    }));

    expect(result.valid).toBe(false);
    expect(result.errors).toContain('margin.tiers[1].minPercent must be below the previous tier');
    expect(result.errors).toContain('margin.tiers[1].score must not exceed the previous tier');
  });

  test('rejects weights that put keyword above margin', () => {
    const result = validateScoringConfig(withOverrides({
      weights: { keyword: 0.5, margin: 0.3, competition: 0.2, risk: 0.1 },
    }));

    expect(result.errors).toEqual(['weights must satisfy margin > keyword > competition']);
  });

  test('rejects a risk penalty too small for four risks', () => {
    const result = validateScoringConfig(withOverrides({
      risk: { ...SCORING_RULES.risk, perRiskPenalty: 10 },
    }));

    expect(result.errors).toEqual(['risk.perRiskPenalty must make four risks score at least 60']);
  });

  test('rejects non-descending recommendation thresholds', () => {
    const result = validateScoringConfig(withOverrides({
      recommendation: {
        strong: { minTotal: 50, minMargin: 20 },
        conditional: { minTotal: 50, minMargin: 15 },
        caution: { minTotal: 30 },
      },
    }));

    expect(result.errors).toEqual(['recommendation thresholds must be strictly descending']);
  });

  test('rejects a fractional guard window', () => {
    const result = validateScoringConfig(withOverrides({
      reviews: { ...SCORING_RULES.reviews, guardWindowTokens: 1.5 },
    }));

    expect(result.errors).toEqual(['reviews.guardWindowTokens must be a non-negative integer']);
  });
});
