// tests/lib/report/report-renderer.test.ts

import { toMarkdown, toReportJson, toReportRecord } from '../../../lib/report/report-renderer';
import { EnrichmentResultSchema } from '../../../lib/schemas/enrichment-schema';
import { ACTION_ITEMS } from '../../../lib/scoring/opportunity-scorer';
import { buildFullReport, buildReport } from '../../helpers/report-fixtures';

describe('toReportRecord', () => {
  test('absent sections become null', () => {
    const record = toReportRecord(buildReport({ margin: undefined }));

    expect(record.margin_analysis).toBeNull();
    expect(record.review_summary).toBeNull();
    expect(record.claim_validation).toBeNull();
  });

  test('JSON rendering parses back to the record', () => {
    const report = buildFullReport();
    const parsed: unknown = JSON.parse(toReportJson(report));

    expect(parsed).toEqual(JSON.parse(JSON.stringify(toReportRecord(report))));
    expect(parsed).toMatchObject({
      report_id: 'rpt-1',
      recommendation_verdict: 'STRONG_BUY',
      degraded: false,
      review_summary: { total_reviews: 5, complaint_reviews: 3 },
    });
  });
});

describe('toMarkdown', () => {
  const lines = toMarkdown(buildFullReport()).split('\n');

  test('header and score table', () => {
    expect(lines[0]).toBe('# 🎯 기회 분석 리포트');
    expect(lines).toContain('**리포트 ID:** rpt-1');
    expect(lines).toContain('**생성일시:** 2026-01-15T00:00:00.000Z');
    expect(lines).toContain('| 키워드 기회 | 80.0/100 |');
    expect(lines).toContain('| **종합 점수** | **80.0/100** |');
    expect(lines).toContain('- 등급: excellent');
  });

  test('keyword and margin sections', () => {
    expect(lines).toContain('| 캠핑의자 | 50,000 | 20,000 | 0.4 | 7.5 |');
    expect(lines).toContain('- 상품원가: 15,000원');
    expect(lines).toContain('- **예상 마진율: 35%**');
    expect(lines).toContain('- 손익분기 판매가: 26,000원');
  });

  test('review and claim sections', () => {
    expect(lines).toContain('- 불만 리뷰: 3건 (60.0%)');
    expect(lines).toContain('- 품질: 2건');
    expect(lines).toContain('- 전체 상태: FAIL (리스크 HIGH)');
    expect(lines).toContain('- [FAIL] 무게 "초경량 1.0kg" - 주장 무게(1kg)가 실제 무게(2.5kg)보다 가볍게 표기됨');
  });

  test('recommendation and action items come last', () => {
    const recommendationAt = lines.indexOf('## 🎯 최종 추천');
    expect(recommendationAt).toBeGreaterThan(lines.indexOf('## 💰 마진 분석'));
    expect(lines.indexOf('## 💰 마진 분석')).toBeGreaterThan(lines.indexOf('## 🔑 키워드 분석'));
    expect(lines.at(-1)).toBe(`- [ ] ${ACTION_ITEMS.SEO}`);
  });

  test('empty enrichment renders no insight section', () => {
    expect(lines).not.toContain('## 🤖 AI 인사이트');
  });

  test('enrichment section when present', () => {
    const enrichment = EnrichmentResultSchema.parse({
      summary: '내구성 불만이 가장 많음',
      key_insights: ['프레임 보강 필요'],
      complaint_patterns: [{ category: '내구성', description: '다리 파손', suggested_solution: '알루미늄 프레임' }],
    });
    const enriched = toMarkdown(buildReport({ enrichment })).split('\n');

    expect(enriched).toContain('## 🤖 AI 인사이트');
    expect(enriched).toContain('- 프레임 보강 필요');
    expect(enriched).toContain('1. **내구성** - 다리 파손');
    expect(enriched).toContain('   - 해결방안: 알루미늄 프레임');
  });

  test('degraded banner and risks', () => {
    const base = buildReport();
    const report = buildReport({
      degraded_reasons: ['persistence: Report save failed'],
      scoring: {
        score: base.opportunity_score,
        recommendation: { verdict: 'CAUTION', text: '검토' },
        action_items: ['추가 시장 조사 진행'],
        risks: ['배송 지연'],
      },
    });
    const degraded = toMarkdown(report).split('\n');

    expect(degraded).toContain('> ⚠️ 일부 외부 서비스 실패로 축소된 리포트입니다: persistence: Report save failed');
    expect(degraded.slice(-3)).toEqual(['', '### ⚠️ 리스크', '- 배송 지연']);
  });
});
