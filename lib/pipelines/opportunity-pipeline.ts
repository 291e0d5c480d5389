// lib/pipelines/opportunity-pipeline.ts
// End-to-end opportunity assessment: classify → validate → enrich → score → assemble → persist
// Optional steps (enrichment, persistence, file write) degrade the report instead of failing it

import { z } from 'zod';
import type {
  FilterResult,
  OpportunityReport,
  SpecRecord,
  ValidationResult,
} from '../../types';
import { type ApiResponse, type ApiWarning, isAppError } from '../../types/errors';
import { ClaimValidator, generateValidationReport } from '../claims/claim-validator';
import { SCORING_RULES } from '../config/scoring-rules';
import { getEnvConfig } from '../config/env';
import { createAppError } from '../config/error-codes';
import { NoopReportPersistence, type ReportPersistence } from '../db/report-persistence';
import { ErrorCategory, logger, PipelineType } from '../observability/logging';
import { assembleOpportunityReport, generateReportId, type ReportAssemblyInput } from '../report/report-assembler';
import { toMarkdown, toReportRecord, type ReportRecord } from '../report/report-renderer';
import { saveReport, type SaveReportOptions } from '../report/report-writer';
import { buildComplaintDigest, filterReviews } from '../reviews/complaint-aggregator';
import { ReviewClassifier } from '../reviews/review-classifier';
import { EMPTY_ENRICHMENT, type EnrichmentResult } from '../schemas/enrichment-schema';
import {
  ReviewRecordSchema,
  SpecRecordSchema,
  parseRecord,
  safeParseAnalysisRequest,
  type AnalysisRequest,
} from '../schemas/input-schema';
import { scoreOpportunity } from '../scoring/opportunity-scorer';
import { NoopEnrichment, type ReviewEnrichment } from '../services/enrichment-service';
import { createErrorApiResponse, createSuccessResponse, createWarning, generateRequestId } from '../utils/api-error-handler';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface OpportunityPipelineDeps {
  classifier?: ReviewClassifier;
  validator?: ClaimValidator;
  enrichment?: ReviewEnrichment;
  persistence?: ReportPersistence;
  now?: () => Date;
  writeReport?: (report: OpportunityReport, outputDir: string, options: SaveReportOptions) => Promise<string>;
}

export interface OpportunityAnalysis {
  report: OpportunityReport;
  record: ReportRecord;
  markdown: string;
  review_result?: FilterResult;
  validation?: ValidationResult;
  report_path?: string;
}

export interface ReviewBatchAnalysis {
  result: FilterResult;
  digest: string;
}

export interface CopyValidationAnalysis {
  result: ValidationResult;
  report: string;
}

// Degradation bookkeeping for optional steps
interface StepFailures {
  warnings: ApiWarning[];
  reasons: string[];
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function recordFailure(failures: StepFailures, fallbackCode: string, step: string, error: unknown): void {
  const code = isAppError(error) ? error.code : fallbackCode;
  const warning = createWarning(code, error);
  failures.warnings.push(warning);
  failures.reasons.push(`${step}: ${warning.message}`);

  logger.warn(PipelineType.OPPORTUNITY_ANALYSIS, ErrorCategory.EXTERNAL_SERVICE,
    `${step} failed - report degraded`, toError(error), { error_code: code });
}

// ═══════════════════════════════════════════════════════════════════════════
// RISK DERIVATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Risks implied by the analysis itself, appended to caller-supplied risks
 */
export function deriveRisks(
  request: Pick<AnalysisRequest, 'margin'>,
  reviews: FilterResult | undefined,
  validation: ValidationResult | undefined
): string[] {
  const risks: string[] = [];

  if (validation && validation.failed > 0) {
    risks.push(`상세페이지 카피 스펙 불일치 ${validation.failed}건`);
  }
  if (reviews && reviews.total_reviews > 0) {
    const ratio = reviews.complaint_reviews / reviews.total_reviews;
    if (ratio >= SCORING_RULES.risk.complaintRatioThreshold) {
      risks.push(`리뷰 불만 비율 ${Math.round(ratio * 100)}%`);
    }
  }
  if (request.margin && !request.margin.is_viable) {
    risks.push(`마진율 ${request.margin.margin_percent}% - 수익성 기준 미달`);
  }
  return risks;
}

function buildSpec(request: AnalysisRequest): SpecRecord {
  return Object.freeze({
    ...request.spec,
    product_name: request.product_name,
    category: request.category,
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// FULL ANALYSIS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Run the full assessment for one candidate. Only invalid input fails the
 * call; optional step failures surface as warnings and degraded_reasons.
 */
export async function runOpportunityAnalysis(
  input: unknown,
  deps: OpportunityPipelineDeps = {}
): Promise<ApiResponse<OpportunityAnalysis>> {
  const requestId = generateRequestId();
  const startTime = Date.now();

  const parsed = safeParseAnalysisRequest(input);
  if (!parsed.success) {
    return createErrorApiResponse(parsed.error, { requestId });
  }
  const request = parsed.request;

  const executionId = logger.logPipelineStart(PipelineType.OPPORTUNITY_ANALYSIS, {
    request_id: requestId,
    product_name: request.product_name,
    reviews: request.reviews?.length ?? 0,
    has_copy: request.copy_text !== undefined,
  });

  try {
    if (request.reviews !== undefined && request.reviews.length === 0) {
      throw createAppError('VALID_002');
    }
    if (request.copy_text !== undefined && request.copy_text.trim().length === 0) {
      throw createAppError('VALID_003');
    }

    const classifier = deps.classifier ?? new ReviewClassifier();
    const validator = deps.validator ?? new ClaimValidator();
    const enrichment = deps.enrichment ?? new NoopEnrichment();
    const persistence = deps.persistence ?? new NoopReportPersistence();
    const now = deps.now ?? (() => new Date());
    const writeReport = deps.writeReport ?? saveReport;
    const failures: StepFailures = { warnings: [], reasons: [] };

    // 1. Reviews
    const reviewResult = request.reviews ? filterReviews(request.reviews, classifier) : undefined;

    // 2. Copy claims
    const validation = request.copy_text !== undefined
      ? validator.validate(request.copy_text, buildSpec(request))
      : undefined;

    // 3. Enrichment
    let enrichmentResult: EnrichmentResult = EMPTY_ENRICHMENT;
    if (reviewResult) {
      try {
        enrichmentResult = await enrichment.enrich({
          productName: request.product_name,
          category: request.category,
          digest: buildComplaintDigest(reviewResult),
          complaintCount: reviewResult.complaint_reviews,
        });
      } catch (error) {
        recordFailure(failures, 'EXT_001', 'enrichment', error);
      }
    }

    // 4. Score
    const marginPercent = request.margin?.margin_percent ?? 0;
    const competitionRate = request.competition_rate ?? request.keywords[0]?.competition_rate ?? 1.0;
    const scoring = scoreOpportunity({
      keywords: request.keywords,
      marginPercent,
      competitionRate,
      risks: [...request.risks, ...deriveRisks(request, reviewResult, validation)],
      breakevenPrice: request.margin?.breakeven_price,
      complaintCategories: reviewResult?.complaint_categories,
      failedClaims: validation?.failed,
    });

    // 5. Assemble; re-assembled with the same id and time when a later step degrades it
    const base: ReportAssemblyInput = {
      product_name: request.product_name,
      category: request.category,
      keywords: request.keywords,
      margin: request.margin,
      competition_rate: competitionRate,
      scoring,
      reviews: reviewResult,
      validation,
      enrichment: enrichmentResult,
      report_id: generateReportId(),
      created_at: now(),
    };
    const assemble = (): OpportunityReport =>
      assembleOpportunityReport({ ...base, degraded_reasons: failures.reasons });

    let report = assemble();

    // 6. Persist
    const persistenceKey = request.keywords[0]?.keyword ?? request.product_name;
    try {
      await persistence.saveReport(persistenceKey, report);
    } catch (error) {
      recordFailure(failures, 'DB_001', 'persistence', error);
      report = assemble();
    }

    // 7. Document
    let reportPath: string | undefined;
    if (request.output_dir || request.write_report) {
      try {
        const outputDir = request.output_dir ?? getEnvConfig().REPORT_OUTPUT_DIR;
        reportPath = await writeReport(report, outputDir, { format: request.output_format });
      } catch (error) {
        recordFailure(failures, 'FILE_001', 'report_file', error);
        report = assemble();
      }
    }

    const duration = Date.now() - startTime;
    logger.logPipelineEnd(PipelineType.OPPORTUNITY_ANALYSIS, executionId, true, {
      request_id: requestId,
      report_id: report.report_id,
      total_score: report.opportunity_score.total_score,
      verdict: report.recommendation_verdict,
      degraded: report.degraded,
      duration_ms: duration,
    });

    return createSuccessResponse<OpportunityAnalysis>({
      report,
      record: toReportRecord(report),
      markdown: toMarkdown(report),
      review_result: reviewResult,
      validation,
      report_path: reportPath,
    }, { requestId, warnings: failures.warnings, duration });
  } catch (error) {
    logger.logPipelineEnd(PipelineType.OPPORTUNITY_ANALYSIS, executionId, false, {
      request_id: requestId,
      duration_ms: Date.now() - startTime,
    }, toError(error));
    return createErrorApiResponse(error, { requestId, context: 'runOpportunityAnalysis' });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// BOUNDARY HELPERS
// ═══════════════════════════════════════════════════════════════════════════

const ReviewBatchSchema = z.array(ReviewRecordSchema);

/**
 * Classify a review batch and build the complaint digest
 */
export function analyzeReviewBatch(
  reviews: unknown,
  classifier: ReviewClassifier = new ReviewClassifier()
): ApiResponse<ReviewBatchAnalysis> {
  const requestId = generateRequestId();
  try {
    const records = parseRecord(ReviewBatchSchema, reviews, 'reviews');
    if (records.length === 0) {
      throw createAppError('VALID_002');
    }

    const result = filterReviews(records, classifier);
    logger.info(PipelineType.REVIEW_ANALYSIS, 'Review batch classified', {
      request_id: requestId,
      total: result.total_reviews,
      complaints: result.complaint_reviews,
    });
    return createSuccessResponse({ result, digest: buildComplaintDigest(result) }, { requestId });
  } catch (error) {
    return createErrorApiResponse(error, { requestId, context: 'analyzeReviewBatch' });
  }
}

/**
 * Validate marketing copy against a spec and render the validation report
 */
export function validateMarketingCopy(
  copyText: string,
  spec: unknown,
  validator: ClaimValidator = new ClaimValidator()
): ApiResponse<CopyValidationAnalysis> {
  const requestId = generateRequestId();
  try {
    if (copyText.trim().length === 0) {
      throw createAppError('VALID_003');
    }
    const specRecord = parseRecord(SpecRecordSchema, spec, 'spec');

    const result = validator.validate(copyText, specRecord);
    logger.info(PipelineType.CLAIM_VALIDATION, 'Copy validated', {
      request_id: requestId,
      product_name: result.product_name,
      total_claims: result.total_claims,
      overall_status: result.overall_status,
    });
    return createSuccessResponse({ result, report: generateValidationReport(result) }, { requestId });
  } catch (error) {
    return createErrorApiResponse(error, { requestId, context: 'validateMarketingCopy' });
  }
}
