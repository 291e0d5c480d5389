// types/index.ts
// Core types for the opportunity assessment engine
// Input records are defined by their zod schemas in lib/schemas/input-schema.ts

import type {
  ReviewRecord,
  SpecRecord,
  KeywordOpportunity,
  MarginResult,
} from '../lib/schemas/input-schema';
import type { EnrichmentResult } from '../lib/schemas/enrichment-schema';

export type {
  ReviewRecord,
  SpecRecord,
  KeywordOpportunity,
  MarginResult,
  EnrichmentResult,
};

// ═══════════════════════════════════════════════════════════════════════════
// REVIEW CLASSIFICATION TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type Sentiment = 'POSITIVE' | 'NEGATIVE' | 'NEUTRAL';

export interface ReviewVerdict {
  readonly sentiment: Sentiment;
  readonly is_complaint: boolean;
  readonly matched_negative_keywords: readonly string[];
  readonly matched_positive_keywords: readonly string[];
  readonly guarded_negative_keywords: readonly string[]; // neutralized by a positive qualifier or absence marker
  readonly complaint_categories: readonly string[];
}

export interface ClassifiedComplaint {
  readonly review: ReviewRecord;
  readonly verdict: ReviewVerdict;
}

export interface FilterResult {
  readonly total_reviews: number;
  readonly complaint_reviews: number;
  readonly positive_reviews: number;
  readonly neutral_reviews: number;
  readonly complaints: readonly ClassifiedComplaint[]; // input order
  readonly complaint_categories: Readonly<Record<string, number>>; // sorted by count desc
  readonly top_complaint_keywords: Readonly<Record<string, number>>;
}

// ═══════════════════════════════════════════════════════════════════════════
// CLAIM VALIDATION TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type ClaimType = 'weight' | 'load' | 'exaggeration' | 'comparison';
export type ValidationStatus = 'PASS' | 'FAIL' | 'WARNING' | 'UNVERIFIED';
export type OverallStatus = ValidationStatus | 'NO_CLAIMS';
export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export interface Claim {
  readonly claim_type: ClaimType;
  readonly raw_text: string;
  readonly extracted_value?: number; // kg for weight/load, % or multiplier for comparison
  readonly offset: number; // index of raw_text in the copy
}

export interface ValidationItem {
  readonly claim: Claim;
  readonly status: ValidationStatus;
  readonly explanation: string;
  readonly spec_reference?: string;
  readonly suggestion?: string;
}

export interface ValidationResult {
  readonly product_name: string;
  readonly total_claims: number;
  readonly passed: number;
  readonly failed: number;
  readonly warnings: number;
  readonly unverified: number;
  readonly items: readonly ValidationItem[];
  readonly overall_status: OverallStatus;
  readonly risk_level: RiskLevel;
  readonly risk_reasons: readonly string[];
}

// ═══════════════════════════════════════════════════════════════════════════
// SCORING TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface OpportunityScore {
  readonly keyword_score: number;
  readonly margin_score: number;
  readonly competition_score: number;
  readonly risk_score: number;
  readonly total_score: number;
}

export type ScoreComponents = Omit<OpportunityScore, 'total_score'>;

export type RecommendationVerdict = 'STRONG_BUY' | 'CONDITIONAL' | 'CAUTION' | 'REJECT';
export type ScoreTier = 'excellent' | 'good' | 'fair' | 'poor';

export interface Recommendation {
  readonly verdict: RecommendationVerdict;
  readonly text: string;
}

export interface ScoringInput {
  keywords: readonly KeywordOpportunity[];
  marginPercent: number;
  competitionRate: number;
  risks: readonly string[];
  breakevenPrice?: number;
  complaintCategories?: Readonly<Record<string, number>>;
  failedClaims?: number;
}

export interface ScoringOutcome {
  readonly score: OpportunityScore;
  readonly recommendation: Recommendation;
  readonly action_items: readonly string[];
  readonly risks: readonly string[]; // distinct, trimmed
}

// ═══════════════════════════════════════════════════════════════════════════
// REPORT TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface ReviewSummary {
  readonly total_reviews: number;
  readonly complaint_reviews: number;
  readonly positive_reviews: number;
  readonly neutral_reviews: number;
  readonly complaint_ratio: number; // 0..1
  readonly complaint_categories: Readonly<Record<string, number>>;
  readonly top_complaint_keywords: Readonly<Record<string, number>>;
}

export interface ClaimValidationSummary {
  readonly total_claims: number;
  readonly passed: number;
  readonly failed: number;
  readonly warnings: number;
  readonly unverified: number;
  readonly overall_status: OverallStatus;
  readonly risk_level: RiskLevel;
  readonly risk_reasons: readonly string[];
  readonly items: readonly ValidationItem[];
}

export interface OpportunityReport {
  readonly report_id: string;
  readonly created_at: string;
  readonly product_name: string;
  readonly category: string;
  readonly target_keywords: readonly KeywordOpportunity[];
  readonly keyword_summary: string;
  readonly margin_analysis?: MarginResult;
  readonly margin_summary: string;
  readonly competition_rate: number;
  readonly opportunity_score: OpportunityScore;
  readonly score_tier: ScoreTier;
  readonly recommendation: string;
  readonly recommendation_verdict: RecommendationVerdict;
  readonly action_items: readonly string[];
  readonly risks: readonly string[];
  readonly review_summary?: ReviewSummary;
  readonly claim_validation?: ClaimValidationSummary;
  readonly enrichment: EnrichmentResult;
  readonly degraded: boolean;
  readonly degraded_reasons: readonly string[];
}
