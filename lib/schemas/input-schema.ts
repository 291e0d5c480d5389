// lib/schemas/input-schema.ts
// Zod schemas for every record the engine consumes
// Records are validated at construction; classifiers never re-check fields

import { z } from 'zod';
import { ValidationError } from '../../types/errors';

// ═══════════════════════════════════════════════════════════════════════════
// REVIEW RECORD
// ═══════════════════════════════════════════════════════════════════════════

export const ReviewRecordSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform(String),
  content: z.string(),
  rating: z.number().int().min(1).max(5),
});

// ═══════════════════════════════════════════════════════════════════════════
// SPEC RECORD (physical specifications supplied by the caller)
// ═══════════════════════════════════════════════════════════════════════════

export const SpecRecordSchema = z.object({
  product_name: z.string().trim().min(1, 'product_name is required'),
  category: z.string().default(''),
  weight_kg: z.number().positive().optional(),
  dimensions_cm: z.tuple([z.number().positive(), z.number().positive(), z.number().positive()]).optional(),
  max_load_kg: z.number().positive().optional(),
  material: z.string().optional(),
});

// ═══════════════════════════════════════════════════════════════════════════
// EXTERNAL CALCULATOR OUTPUTS
// ═══════════════════════════════════════════════════════════════════════════

export const KeywordOpportunitySchema = z.object({
  keyword: z.string().trim().min(1),
  monthly_search_volume: z.number().int().nonnegative(),
  total_products: z.number().int().nonnegative().optional(),
  competition_rate: z.number().nonnegative(),
  opportunity_score: z.number().nonnegative(),
});

export const MarginResultSchema = z.object({
  margin_percent: z.number().finite(),
  is_viable: z.boolean(),
  total_cost: z.number().nonnegative(),
  breakeven_price: z.number().nonnegative(),
  selling_price: z.number().nonnegative().optional(),
  product_cost: z.number().nonnegative().optional(),
  shipping_cost: z.number().nonnegative().optional(),
  tax_cost: z.number().nonnegative().optional(),
  currency: z.string().default('KRW'),
});

// ═══════════════════════════════════════════════════════════════════════════
// ANALYSIS REQUEST (pipeline boundary)
// ═══════════════════════════════════════════════════════════════════════════

export const AnalysisRequestSchema = z.object({
  product_name: z.string().trim().min(1, 'product_name is required'),
  category: z.string().default(''),
  keywords: z.array(KeywordOpportunitySchema).default([]),
  margin: MarginResultSchema.optional(),
  competition_rate: z.number().nonnegative().optional(),
  reviews: z.array(ReviewRecordSchema).optional(),
  copy_text: z.string().optional(),
  spec: SpecRecordSchema.omit({ product_name: true, category: true }).optional(),
  risks: z.array(z.string()).default([]),
  output_dir: z.string().min(1).optional(),
  write_report: z.boolean().default(false), // write to REPORT_OUTPUT_DIR when output_dir is absent
  output_format: z.enum(['markdown', 'json']).default('markdown'),
});

// Export types
export type ReviewRecord = Readonly<z.infer<typeof ReviewRecordSchema>>;
export type SpecRecord = Readonly<z.infer<typeof SpecRecordSchema>>;
export type KeywordOpportunity = Readonly<z.infer<typeof KeywordOpportunitySchema>>;
export type MarginResult = Readonly<z.infer<typeof MarginResultSchema>>;
export type AnalysisRequest = z.infer<typeof AnalysisRequestSchema>;
export type AnalysisRequestInput = z.input<typeof AnalysisRequestSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// CONSTRUCTORS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Parse with the schema or throw a ValidationError naming every bad field
 */
export function parseRecord<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  data: unknown,
  recordName: string
): Output {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw ValidationError.fromZodIssues(parsed.error.issues, recordName);
  }
  return parsed.data;
}

export function createReviewRecord(data: unknown): ReviewRecord {
  return Object.freeze(parseRecord(ReviewRecordSchema, data, 'review'));
}

export function createReviewRecords(data: unknown[]): ReviewRecord[] {
  return data.map((item, index) => Object.freeze(parseRecord(ReviewRecordSchema, item, `reviews.${index}`)));
}

export function createSpecRecord(data: unknown): SpecRecord {
  return Object.freeze(parseRecord(SpecRecordSchema, data, 'spec'));
}

export function createKeywordOpportunity(data: unknown): KeywordOpportunity {
  return Object.freeze(parseRecord(KeywordOpportunitySchema, data, 'keyword'));
}

export function createMarginResult(data: unknown): MarginResult {
  return Object.freeze(parseRecord(MarginResultSchema, data, 'margin'));
}

/**
 * Non-throwing variant used at the pipeline boundary
 */
export function safeParseAnalysisRequest(
  data: unknown
): { success: true; request: AnalysisRequest } | { success: false; error: ValidationError } {
  const parsed = AnalysisRequestSchema.safeParse(data);
  if (!parsed.success) {
    return { success: false, error: ValidationError.fromZodIssues(parsed.error.issues, 'request') };
  }
  return { success: true, request: parsed.data };
}
