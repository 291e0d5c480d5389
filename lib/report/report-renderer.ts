// lib/report/report-renderer.ts
// Serializable record and markdown document renderings of an OpportunityReport

import type {
  ClaimValidationSummary,
  MarginResult,
  OpportunityReport,
  ReviewSummary,
} from '../../types';
import { CLAIM_TYPE_LABELS } from '../claims/claim-validator';
import { isEmptyEnrichment } from '../schemas/enrichment-schema';

// ═══════════════════════════════════════════════════════════════════════════
// STRUCTURED RECORD
// ═══════════════════════════════════════════════════════════════════════════

/**
 * JSON-compatible record: absent sections are null, never undefined
 */
export type ReportRecord = Omit<OpportunityReport, 'margin_analysis' | 'review_summary' | 'claim_validation'> & {
  margin_analysis: MarginResult | null;
  review_summary: ReviewSummary | null;
  claim_validation: ClaimValidationSummary | null;
};

export function toReportRecord(report: OpportunityReport): ReportRecord {
  return {
    ...report,
    margin_analysis: report.margin_analysis ?? null,
    review_summary: report.review_summary ?? null,
    claim_validation: report.claim_validation ?? null,
  };
}

export function toReportJson(report: OpportunityReport): string {
  return JSON.stringify(toReportRecord(report), null, 2);
}

// ═══════════════════════════════════════════════════════════════════════════
// MARKDOWN DOCUMENT
// ═══════════════════════════════════════════════════════════════════════════

const fmt1 = (value: number): string => value.toFixed(1);
const won = (value: number): string => `${Math.round(value).toLocaleString('ko-KR')}원`;

function renderKeywords(report: OpportunityReport): string[] {
  const lines = ['## 🔑 키워드 분석', report.keyword_summary, ''];
  if (report.target_keywords.length > 0) {
    lines.push('### 타겟 키워드');
    lines.push('| 키워드 | 월간 검색량 | 상품수 | 경쟁강도 | 기회점수 |');
    lines.push('|--------|------------|--------|----------|----------|');
    for (const kw of report.target_keywords.slice(0, 5)) {
      const products = kw.total_products === undefined ? '-' : kw.total_products.toLocaleString('ko-KR');
      lines.push(`| ${kw.keyword} | ${kw.monthly_search_volume.toLocaleString('ko-KR')} | ${products} | ${kw.competition_rate} | ${fmt1(kw.opportunity_score)} |`);
    }
    lines.push('');
  }
  return lines;
}

function renderMargin(report: OpportunityReport): string[] {
  const lines = ['## 💰 마진 분석', report.margin_summary, ''];
  const margin = report.margin_analysis;
  if (margin) {
    lines.push('### 비용 구조');
    if (margin.product_cost !== undefined) lines.push(`- 상품원가: ${won(margin.product_cost)}`);
    if (margin.shipping_cost !== undefined) lines.push(`- 배송비: ${won(margin.shipping_cost)}`);
    if (margin.tax_cost !== undefined) lines.push(`- 관부가세: ${won(margin.tax_cost)}`);
    lines.push(`- 총 비용: ${won(margin.total_cost)}`);
    if (margin.selling_price !== undefined) lines.push(`- 판매가: ${won(margin.selling_price)}`);
    lines.push(`- **예상 마진율: ${margin.margin_percent}%**`);
    lines.push(`- 손익분기 판매가: ${won(margin.breakeven_price)}`);
    lines.push('');
  }
  return lines;
}

function renderReviews(summary: ReviewSummary | undefined): string[] {
  if (!summary) return [];
  const lines = [
    '## 🔍 리뷰 불만 분석',
    `- 전체 리뷰: ${summary.total_reviews}건`,
    `- 불만 리뷰: ${summary.complaint_reviews}건 (${fmt1(summary.complaint_ratio * 100)}%)`,
    `- 긍정 리뷰: ${summary.positive_reviews}건`,
    `- 중립 리뷰: ${summary.neutral_reviews}건`,
  ];
  const categories = Object.entries(summary.complaint_categories);
  if (categories.length > 0) {
    lines.push('', '### 불만 카테고리');
    categories.forEach(([category, count]) => lines.push(`- ${category}: ${count}건`));
  }
  const keywords = Object.entries(summary.top_complaint_keywords);
  if (keywords.length > 0) {
    lines.push('', '### 주요 불만 키워드');
    keywords.forEach(([keyword, count]) => lines.push(`- ${keyword}: ${count}회`));
  }
  lines.push('');
  return lines;
}

function renderClaims(validation: ClaimValidationSummary | undefined): string[] {
  if (!validation) return [];
  const lines = [
    '## 📝 카피 검증',
    `- 전체 상태: ${validation.overall_status} (리스크 ${validation.risk_level})`,
    `- 통과 ${validation.passed} / 경고 ${validation.warnings} / 실패 ${validation.failed} / 미검증 ${validation.unverified}`,
  ];
  const flagged = validation.items.filter(item => item.status === 'FAIL' || item.status === 'WARNING');
  if (flagged.length > 0) {
    lines.push('', '### 확인 필요 표현');
    flagged.forEach(item => {
      lines.push(`- [${item.status}] ${CLAIM_TYPE_LABELS[item.claim.claim_type]} "${item.claim.raw_text}" - ${item.explanation}`);
    });
  }
  lines.push('');
  return lines;
}

function renderEnrichment(report: OpportunityReport): string[] {
  const { enrichment } = report;
  if (isEmptyEnrichment(enrichment)) return [];

  const lines = ['## 🤖 AI 인사이트'];
  if (enrichment.summary) lines.push(enrichment.summary, '');
  if (enrichment.key_insights.length > 0) {
    enrichment.key_insights.forEach(insight => lines.push(`- ${insight}`));
    lines.push('');
  }
  if (enrichment.complaint_patterns.length > 0) {
    lines.push('### 주요 불만 패턴');
    enrichment.complaint_patterns.slice(0, 3).forEach((p, i) => {
      lines.push(`${i + 1}. **${p.category}** - ${p.description}`);
      if (p.suggested_solution) lines.push(`   - 해결방안: ${p.suggested_solution}`);
    });
    lines.push('');
  }
  if (enrichment.semantic_gaps.length > 0) {
    lines.push('### 시맨틱 갭');
    enrichment.semantic_gaps.slice(0, 3).forEach(g => {
      lines.push(`- **${g.gap_type}**: ${g.customer_expectation} vs ${g.actual_reality}`);
    });
    lines.push('');
  }
  if (enrichment.copywriting_suggestions.length > 0) {
    lines.push('### ✍️ 카피라이팅 제안');
    enrichment.copywriting_suggestions.slice(0, 3).forEach(s => {
      lines.push(`- **불만:** ${s.original_pain_point}`);
      lines.push(`  - **제안 카피:** "${s.suggested_copy}"`);
    });
    lines.push('');
  }
  if (enrichment.spec_checklist.length > 0) {
    lines.push('### ✅ 스펙 체크리스트');
    enrichment.spec_checklist.forEach(c => lines.push(`- [${c.category}] ${c.item} - ${c.reason}`));
    lines.push('');
  }
  return lines;
}

/**
 * Human-readable report with headed sections
 */
export function toMarkdown(report: OpportunityReport): string {
  const score = report.opportunity_score;
  const lines = [
    '# 🎯 기회 분석 리포트',
    '',
    `**리포트 ID:** ${report.report_id}`,
    `**생성일시:** ${report.created_at}`,
    '',
  ];

  if (report.degraded) {
    lines.push(`> ⚠️ 일부 외부 서비스 실패로 축소된 리포트입니다: ${report.degraded_reasons.join(', ')}`, '');
  }

  lines.push(
    '---',
    '',
    '## 📦 상품 정보',
    `- **상품명:** ${report.product_name}`,
    `- **카테고리:** ${report.category || '-'}`,
    '',
    '---',
    '',
    '## 📊 종합 점수',
    '',
    '| 항목 | 점수 |',
    '|------|------|',
    `| 키워드 기회 | ${fmt1(score.keyword_score)}/100 |`,
    `| 마진 점수 | ${fmt1(score.margin_score)}/100 |`,
    `| 경쟁 점수 | ${fmt1(score.competition_score)}/100 |`,
    `| 리스크 점수 | ${fmt1(score.risk_score)}/100 |`,
    `| **종합 점수** | **${fmt1(score.total_score)}/100** |`,
    '',
    `- 등급: ${report.score_tier}`,
    `- 경쟁강도: ${report.competition_rate}`,
    '',
    '---',
    '',
    ...renderKeywords(report),
    '---',
    '',
    ...renderMargin(report),
    ...renderReviews(report.review_summary),
    ...renderClaims(report.claim_validation),
    ...renderEnrichment(report),
    '---',
    '',
    '## 🎯 최종 추천',
    '',
    report.recommendation,
    '',
    '### 액션 아이템',
    ...report.action_items.map(item => `- [ ] ${item}`),
  );

  if (report.risks.length > 0) {
    lines.push('', '### ⚠️ 리스크', ...report.risks.map(risk => `- ${risk}`));
  }

  return lines.join('\n');
}
