// tests/lib/report/report-assembler.test.ts

import {
  generateKeywordSummary,
  generateMarginSummary,
  generateReportId,
} from '../../../lib/report/report-assembler';
import { EMPTY_ENRICHMENT } from '../../../lib/schemas/enrichment-schema';
import { createMarginResult } from '../../../lib/schemas/input-schema';
import { buildFullReport, buildReport, campingChairKeyword } from '../../helpers/report-fixtures';

describe('assembleOpportunityReport', () => {
  test('copies scoring output and derives summaries', () => {
    const report = buildReport();

    expect(report.report_id).toBe('rpt-1');
    expect(report.created_at).toBe('2026-01-15T00:00:00.000Z');
    expect(report.product_name).toBe('캠핑의자');
    expect(report.opportunity_score.total_score).toBe(80);
    expect(report.score_tier).toBe('excellent');
    expect(report.recommendation_verdict).toBe('STRONG_BUY');
    expect(report.keyword_summary).toBe("대표 키워드 '캠핑의자' 월간 검색량 50,000회, 경쟁강도 0.4");
    expect(report.margin_summary).toBe('예상 마진율 35% - 수익성 확보 가능');
    expect(report.enrichment).toEqual(EMPTY_ENRICHMENT);
    expect(report.degraded).toBe(false);
    expect(report.degraded_reasons).toEqual([]);
  });

  test('optional sections are absent until supplied', () => {
    const bare = buildReport();
    expect(bare.review_summary).toBeUndefined();
    expect(bare.claim_validation).toBeUndefined();

    const full = buildFullReport();
    expect(full.review_summary?.complaint_reviews).toBe(3);
    expect(full.claim_validation?.overall_status).toBe('FAIL');
  });

  test('degraded iff reasons are present', () => {
    const report = buildReport({ degraded_reasons: ['enrichment: Review enrichment failed'] });
    expect(report.degraded).toBe(true);
    expect(report.degraded_reasons).toEqual(['enrichment: Review enrichment failed']);
  });

  test('report is frozen', () => {
    const report = buildReport();
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.target_keywords)).toBe(true);
  });

  test('generated ids are unique uuids', () => {
    const id = generateReportId();
    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(generateReportId()).not.toBe(id);
  });
});

describe('summaries', () => {
  test('keyword summary', () => {
    expect(generateKeywordSummary([])).toBe('키워드 데이터 없음');
    expect(generateKeywordSummary([campingChairKeyword])).toBe("대표 키워드 '캠핑의자' 월간 검색량 50,000회, 경쟁강도 0.4");
  });

  test('margin summary', () => {
    expect(generateMarginSummary(undefined)).toBe('마진 분석 데이터 없음');
    expect(generateMarginSummary(createMarginResult({
      margin_percent: 8,
      is_viable: false,
      total_cost: 9_200,
      breakeven_price: 9_200,
    }))).toBe('예상 마진율 8% - 수익성 부족, 가격/비용 조정 필요');
  });
});
