// lib/index.ts
// Public surface of the opportunity assessment engine

export * from '../types';
export * from '../types/errors';

export { SCORING_RULES, validateScoringConfig, type ScoringRules } from './config/scoring-rules';
export { getEnvConfig, hasSupabaseConfig, type EnvConfig } from './config/env';
export { ERROR_CODES, createAppError, getErrorDefinition } from './config/error-codes';

export {
  ReviewRecordSchema,
  SpecRecordSchema,
  KeywordOpportunitySchema,
  MarginResultSchema,
  AnalysisRequestSchema,
  createReviewRecord,
  createReviewRecords,
  createSpecRecord,
  createKeywordOpportunity,
  createMarginResult,
  safeParseAnalysisRequest,
  type AnalysisRequest,
  type AnalysisRequestInput,
} from './schemas/input-schema';
export {
  EnrichmentResultSchema,
  EMPTY_ENRICHMENT,
  isEmptyEnrichment,
  type ComplaintPattern,
  type SemanticGap,
  type CopywritingSuggestion,
  type SpecCheckItem,
} from './schemas/enrichment-schema';

export * from './lexicon/lexicon-store';
export * from './lexicon/matching-strategy';
export { ReviewClassifier, classifyReview, type ReviewClassifierOptions } from './reviews/review-classifier';
export { DEFAULT_GUARD_RULES, type GuardRule, type GuardContext } from './reviews/sentiment-guard';
export { filterReviews, buildComplaintDigest, summarizeReviews } from './reviews/complaint-aggregator';

export { ClaimExtractor, extractClaims } from './claims/claim-extractor';
export {
  ClaimValidator,
  validateCopy,
  generateValidationReport,
  summarizeValidation,
  type ClaimSpec,
} from './claims/claim-validator';

export * from './scoring/opportunity-scorer';

export { assembleOpportunityReport, type ReportAssemblyInput } from './report/report-assembler';
export { toMarkdown, toReportJson, toReportRecord, type ReportRecord } from './report/report-renderer';
export { saveReport, defaultReportFilename, type ReportFormat, type SaveReportOptions } from './report/report-writer';

export * from './services/enrichment-service';
export * from './db/report-persistence';
export * from './pipelines/opportunity-pipeline';

export { logger, LogLevel, ErrorCategory, PipelineType, MemoryLogSink, type LogSink } from './observability/logging';
export { RetryManager, type RetryConfig } from './observability/retry';
