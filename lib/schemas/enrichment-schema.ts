// lib/schemas/enrichment-schema.ts
// Shape of the AI review summarizer output

import { z } from 'zod';

const level = z.string().default('');

export const ComplaintPatternSchema = z.object({
  rank: z.number().int().positive().optional(),
  category: z.string(),
  description: z.string().default(''),
  frequency: level, // 높음/중간/낮음
  severity: level, // 심각/보통/경미
  example_quotes: z.array(z.string()).default([]),
  suggested_solution: z.string().default(''),
});

export const SemanticGapSchema = z.object({
  gap_type: z.string(),
  customer_expectation: z.string().default(''),
  actual_reality: z.string().default(''),
  impact_level: level,
  opportunity: z.string().default(''),
});

export const CopywritingSuggestionSchema = z.object({
  original_pain_point: z.string(),
  suggested_copy: z.string(),
  target_audience: z.string().default(''),
  key_benefit: z.string().default(''),
  tone: z.string().default(''),
});

export const SpecCheckItemSchema = z.object({
  category: z.string().default(''), // 필수/권장/선택
  item: z.string(),
  reason: z.string().default(''),
  verification_method: z.string().default(''),
});

export const EnrichmentResultSchema = z.object({
  complaint_patterns: z.array(ComplaintPatternSchema).default([]),
  semantic_gaps: z.array(SemanticGapSchema).default([]),
  copywriting_suggestions: z.array(CopywritingSuggestionSchema).default([]),
  spec_checklist: z.array(SpecCheckItemSchema).default([]),
  summary: z.string().default(''),
  key_insights: z.array(z.string()).default([]),
});

// Export types
export type ComplaintPattern = z.infer<typeof ComplaintPatternSchema>;
export type SemanticGap = z.infer<typeof SemanticGapSchema>;
export type CopywritingSuggestion = z.infer<typeof CopywritingSuggestionSchema>;
export type SpecCheckItem = z.infer<typeof SpecCheckItemSchema>;
export type EnrichmentResult = z.infer<typeof EnrichmentResultSchema>;

/**
 * Enrichment used when the summarizer is absent or failed
 */
export const EMPTY_ENRICHMENT: EnrichmentResult = Object.freeze({
  complaint_patterns: [],
  semantic_gaps: [],
  copywriting_suggestions: [],
  spec_checklist: [],
  summary: '',
  key_insights: [],
});

export function isEmptyEnrichment(enrichment: EnrichmentResult): boolean {
  return enrichment.complaint_patterns.length === 0 &&
    enrichment.semantic_gaps.length === 0 &&
    enrichment.copywriting_suggestions.length === 0 &&
    enrichment.spec_checklist.length === 0 &&
    enrichment.summary.length === 0 &&
    enrichment.key_insights.length === 0;
}
