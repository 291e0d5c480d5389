// lib/services/enrichment-service.ts
// Optional AI enrichment of complaint digests (patterns, gaps, copy, checklist)
// The engine works without it: NoopEnrichment returns the empty enrichment

import OpenAI from 'openai';
import { getEnvConfig, type EnvConfig } from '../config/env';
import { createAppError } from '../config/error-codes';
import { logger, PipelineType } from '../observability/logging';
import { RetryManager, type RetryConfig } from '../observability/retry';
import {
  EMPTY_ENRICHMENT,
  EnrichmentResultSchema,
  type EnrichmentResult,
} from '../schemas/enrichment-schema';

// ═══════════════════════════════════════════════════════════════════════════
// CAPABILITY
// ═══════════════════════════════════════════════════════════════════════════

export interface EnrichmentRequest {
  productName: string;
  category: string;
  digest: string; // buildComplaintDigest output
  complaintCount: number;
}

export interface ReviewEnrichment {
  readonly name: string;
  enrich(request: EnrichmentRequest): Promise<EnrichmentResult>;
}

export class NoopEnrichment implements ReviewEnrichment {
  readonly name = 'noop';

  async enrich(): Promise<EnrichmentResult> {
    return EMPTY_ENRICHMENT;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// COMPLETION CLIENT
// ═══════════════════════════════════════════════════════════════════════════

export interface CompletionRequest {
  system: string;
  user: string;
  temperature?: number;
}

/**
 * Minimal chat-completion surface; returns the message content or null
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string | null>;
}

export class OpenAICompletionClient implements CompletionClient {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  async complete(request: CompletionRequest): Promise<string | null> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.user },
      ],
      response_format: { type: 'json_object' },
      temperature: request.temperature ?? 0.3,
    });

    return response.choices[0]?.message.content ?? null;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PROMPTS
// ═══════════════════════════════════════════════════════════════════════════

export const ENRICHMENT_SYSTEM_PROMPT = `당신은 이커머스 소싱 분석가입니다.
1. 판매자 상세페이지는 광고로 간주하고 리뷰의 실제 불만에 집중하세요.
2. 근거 중심으로 답하세요. "리뷰 30%가 내구성을 지적" 처럼 수치로 말하세요.
3. 반드시 JSON 객체 하나만 출력하세요.`;

export function buildEnrichmentPrompt(request: EnrichmentRequest): string {
  return `상품: ${request.productName}
카테고리: ${request.category || '-'}

아래 불만 리뷰를 분석하여 다음 형식의 JSON으로 답하세요.
{
  "complaint_patterns": [{"rank": 1, "category": "카테고리", "description": "불만 설명", "frequency": "높음/중간/낮음", "severity": "심각/보통/경미", "example_quotes": ["인용"], "suggested_solution": "해결 방안"}],
  "semantic_gaps": [{"gap_type": "품질/기능/가격/디자인", "customer_expectation": "고객 기대", "actual_reality": "실제 상황", "impact_level": "높음/중간/낮음", "opportunity": "개선 기회"}],
  "copywriting_suggestions": [{"original_pain_point": "원래 불만", "suggested_copy": "제안 카피 (30자 이내)", "target_audience": "타겟 고객", "key_benefit": "핵심 혜택", "tone": "톤앤매너"}],
  "spec_checklist": [{"category": "필수/권장/선택", "item": "체크 항목", "reason": "이유", "verification_method": "검증 방법"}],
  "summary": "전체 요약",
  "key_insights": ["인사이트"]
}

${request.digest}`;
}

/**
 * Parse a model response; tolerates a surrounding markdown code fence.
 * Throws PARSE_001 on invalid JSON or shape.
 */
export function parseEnrichmentResponse(content: string): EnrichmentResult {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(content);
  const body = (fenced ? fenced[1] : content).trim();

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    throw createAppError('PARSE_001', undefined, error instanceof Error ? error.message : String(error));
  }

  const parsed = EnrichmentResultSchema.safeParse(data);
  if (!parsed.success) {
    throw createAppError('PARSE_001', undefined, parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  return parsed.data;
}

// ═══════════════════════════════════════════════════════════════════════════
// LLM-BACKED ENRICHMENT
// ═══════════════════════════════════════════════════════════════════════════

export interface LlmEnrichmentOptions {
  retry?: Partial<RetryConfig>;
}

export class LlmReviewEnrichment implements ReviewEnrichment {
  readonly name = 'llm';
  private readonly retry: Partial<RetryConfig>;

  constructor(
    private readonly client: CompletionClient,
    options: LlmEnrichmentOptions = {}
  ) {
    this.retry = options.retry ?? {};
  }

  /**
   * Skips the call when there is nothing to analyze. Retries transient and
   * parse failures, then throws the last error.
   */
  async enrich(request: EnrichmentRequest): Promise<EnrichmentResult> {
    if (request.complaintCount === 0) {
      logger.debug(PipelineType.REVIEW_ENRICHMENT, 'No complaints to enrich', { product_name: request.productName });
      return EMPTY_ENRICHMENT;
    }

    const outcome = await RetryManager.retryApiCall(
      () => this.requestOnce(request),
      PipelineType.REVIEW_ENRICHMENT,
      'review_enrichment',
      this.retry
    );

    if (outcome.success && outcome.result) {
      logger.info(PipelineType.REVIEW_ENRICHMENT, 'Review enrichment completed', {
        product_name: request.productName,
        attempts: outcome.attempts,
        patterns: outcome.result.complaint_patterns.length,
      });
      return outcome.result;
    }

    throw outcome.error ?? createAppError('EXT_001');
  }

  private async requestOnce(request: EnrichmentRequest): Promise<EnrichmentResult> {
    const content = await this.client.complete({
      system: ENRICHMENT_SYSTEM_PROMPT,
      user: buildEnrichmentPrompt(request),
    });
    if (!content) {
      throw createAppError('EXT_002');
    }
    return parseEnrichmentResponse(content);
  }
}

/**
 * LLM enrichment when OPENAI_API_KEY is set, otherwise no-op
 */
export function createEnrichmentFromEnv(config: EnvConfig = getEnvConfig()): ReviewEnrichment {
  if (!config.OPENAI_API_KEY) {
    logger.info(PipelineType.REVIEW_ENRICHMENT, 'OPENAI_API_KEY not set - enrichment disabled');
    return new NoopEnrichment();
  }
  const client = new OpenAI({ apiKey: config.OPENAI_API_KEY });
  return new LlmReviewEnrichment(new OpenAICompletionClient(client, config.OPENAI_MODEL));
}
