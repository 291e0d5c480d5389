// lib/db/report-persistence.ts
// Keyed storage of assessment reports (one row per target keyword)
// Supabase in production, in-memory for tests, no-op when unconfigured

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { OpportunityReport } from '../../types';
import { getEnvConfig, hasSupabaseConfig, type EnvConfig } from '../config/env';
import { createAppError } from '../config/error-codes';
import { logger, PipelineType } from '../observability/logging';
import { toReportRecord } from '../report/report-renderer';

export const StoredReportRowSchema = z.object({
  keyword: z.string().min(1),
  report_id: z.string().min(1),
  product_name: z.string(),
  total_score: z.number(),
  recommendation_verdict: z.string(),
  updated_at: z.string(),
  report: z.record(z.unknown()),
});

export type StoredReportRow = z.infer<typeof StoredReportRowSchema>;

export interface ReportPersistence {
  readonly name: string;
  saveReport(keyword: string, report: OpportunityReport): Promise<void>;
  getReport(keyword: string): Promise<StoredReportRow | null>;
}

/**
 * Row shape written for a report; the full record goes to the jsonb column
 */
export function toStoredReportRow(keyword: string, report: OpportunityReport, now: Date = new Date()): StoredReportRow {
  const record: unknown = JSON.parse(JSON.stringify(toReportRecord(report)));
  return StoredReportRowSchema.parse({
    keyword,
    report_id: report.report_id,
    product_name: report.product_name,
    total_score: report.opportunity_score.total_score,
    recommendation_verdict: report.recommendation_verdict,
    updated_at: now.toISOString(),
    report: record,
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// SUPABASE
// ═══════════════════════════════════════════════════════════════════════════

export interface SupabasePersistenceConfig {
  url: string;
  serviceRoleKey: string;
  table: string;
}

export class SupabaseReportPersistence implements ReportPersistence {
  readonly name = 'supabase';
  private client: SupabaseClient | null = null;

  constructor(private readonly config: SupabasePersistenceConfig) {}

  private getClient(): SupabaseClient {
    if (!this.client) {
      this.client = createClient(this.config.url, this.config.serviceRoleKey, {
        auth: { persistSession: false, autoRefreshToken: false },
      });
    }
    return this.client;
  }

  /**
   * Upsert by keyword; a later report for the same keyword replaces the earlier one
   */
  async saveReport(keyword: string, report: OpportunityReport): Promise<void> {
    const row = toStoredReportRow(keyword, report);
    const { error } = await this.getClient()
      .from(this.config.table)
      .upsert(row, { onConflict: 'keyword' });

    if (error) {
      throw createAppError('DB_001', `Keyword: ${keyword}`, error.message);
    }

    logger.info(PipelineType.REPORT_PERSISTENCE, 'Report saved', {
      keyword,
      report_id: report.report_id,
      table: this.config.table,
    });
  }

  async getReport(keyword: string): Promise<StoredReportRow | null> {
    const { data, error } = await this.getClient()
      .from(this.config.table)
      .select('keyword, report_id, product_name, total_score, recommendation_verdict, updated_at, report')
      .eq('keyword', keyword)
      .maybeSingle();

    if (error) {
      throw createAppError('DB_002', `Keyword: ${keyword}`, error.message);
    }
    if (!data) return null;

    const row: unknown = data;
    const parsed = StoredReportRowSchema.safeParse(row);
    if (!parsed.success) {
      throw createAppError('DB_002', `Keyword: ${keyword}`, parsed.error.message);
    }
    return parsed.data;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// IN-MEMORY / NO-OP
// ═══════════════════════════════════════════════════════════════════════════

export class InMemoryReportPersistence implements ReportPersistence {
  readonly name = 'memory';
  private readonly rows = new Map<string, StoredReportRow>();

  async saveReport(keyword: string, report: OpportunityReport): Promise<void> {
    this.rows.set(keyword, toStoredReportRow(keyword, report));
  }

  async getReport(keyword: string): Promise<StoredReportRow | null> {
    return this.rows.get(keyword) ?? null;
  }

  get size(): number {
    return this.rows.size;
  }
}

export class NoopReportPersistence implements ReportPersistence {
  readonly name = 'noop';

  async saveReport(): Promise<void> {
    return;
  }

  async getReport(): Promise<StoredReportRow | null> {
    return null;
  }
}

/**
 * Supabase persistence when URL and service key are set, otherwise no-op
 */
export function createPersistenceFromEnv(config: EnvConfig = getEnvConfig()): ReportPersistence {
  if (!hasSupabaseConfig(config)) {
    logger.info(PipelineType.REPORT_PERSISTENCE, 'Supabase not configured - reports are not persisted');
    return new NoopReportPersistence();
  }
  return new SupabaseReportPersistence({
    url: config.SUPABASE_URL,
    serviceRoleKey: config.SUPABASE_SERVICE_ROLE_KEY,
    table: config.REPORTS_TABLE,
  });
}
