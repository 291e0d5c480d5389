// lib/claims/claim-validator.ts
// Checks extracted copy claims against the product's physical spec record
// Missing spec fields degrade a check to UNVERIFIED; nothing here throws

import type {
  Claim,
  ClaimType,
  OverallStatus,
  RiskLevel,
  SpecRecord,
  ValidationItem,
  ValidationResult,
  ValidationStatus,
} from '../../types';
import { SCORING_RULES } from '../config/scoring-rules';
import { ClaimExtractor } from './claim-extractor';

const EPSILON = 1e-9;

export const CLAIM_TYPE_LABELS: Record<ClaimType, string> = {
  weight: '무게',
  load: '하중',
  exaggeration: '과장표현',
  comparison: '비교표현',
};

const STATUS_MARKS: Record<ValidationStatus, string> = {
  PASS: '✅',
  WARNING: '⚠️',
  FAIL: '❌',
  UNVERIFIED: '❓',
};

export type ClaimSpec = Pick<SpecRecord, 'weight_kg' | 'max_load_kg'>;

// ═══════════════════════════════════════════════════════════════════════════
// PER-CLAIM RULES
// ═══════════════════════════════════════════════════════════════════════════

function validateWeight(claim: Claim, spec: ClaimSpec, tolerance: number): ValidationItem {
  const actual = spec.weight_kg;
  const claimed = claim.extracted_value;
  if (actual === undefined || claimed === undefined) {
    return {
      claim,
      status: 'UNVERIFIED',
      explanation: '실제 무게 정보 없음 - 검증 불가',
      suggestion: '스펙에 상품 무게(weight_kg)를 입력하세요',
    };
  }

  const specReference = `실제 무게: ${actual}kg`;
  if (Math.abs(claimed - actual) <= actual * tolerance + EPSILON) {
    return {
      claim,
      status: 'PASS',
      explanation: `주장 무게(${claimed}kg)가 실제 무게(${actual}kg)의 허용 오차(±${tolerance * 100}%) 이내`,
      spec_reference: specReference,
    };
  }

  // Lighter than reality is the deceptive direction
  if (claimed < actual) {
    return {
      claim,
      status: 'FAIL',
      explanation: `주장 무게(${claimed}kg)가 실제 무게(${actual}kg)보다 가볍게 표기됨`,
      spec_reference: specReference,
      suggestion: `무게 표기를 ${actual}kg로 수정하세요`,
    };
  }

  return {
    claim,
    status: 'WARNING',
    explanation: `주장 무게(${claimed}kg)가 실제 무게(${actual}kg)보다 무겁게 표기됨`,
    spec_reference: specReference,
    suggestion: `무게 표기를 ${actual}kg로 수정하세요`,
  };
}

function validateLoad(claim: Claim, spec: ClaimSpec): ValidationItem {
  const actual = spec.max_load_kg;
  const claimed = claim.extracted_value;
  if (actual === undefined || claimed === undefined) {
    return {
      claim,
      status: 'UNVERIFIED',
      explanation: '최대 하중 정보 없음 - 검증 불가',
      suggestion: '스펙에 최대 하중(max_load_kg)을 입력하세요',
    };
  }

  const specReference = `최대 하중: ${actual}kg`;
  if (claimed <= actual) {
    return {
      claim,
      status: 'PASS',
      explanation: `주장 하중(${claimed}kg)이 실제 최대 하중(${actual}kg) 이내`,
      spec_reference: specReference,
    };
  }

  return {
    claim,
    status: 'FAIL',
    explanation: `주장 하중(${claimed}kg)이 실제 최대 하중(${actual}kg)을 초과 - 안전 문제 우려`,
    spec_reference: specReference,
    suggestion: `하중 표기를 최대 ${actual}kg 이하로 수정하세요`,
  };
}

function validateClaim(claim: Claim, spec: ClaimSpec, tolerance: number): ValidationItem {
  switch (claim.claim_type) {
    case 'weight':
      return validateWeight(claim, spec, tolerance);
    case 'load':
      return validateLoad(claim, spec);
    case 'exaggeration':
      return {
        claim,
        status: 'WARNING',
        explanation: `과장 표현 '${claim.raw_text}' - 객관적 근거 확인 필요`,
        suggestion: '구체적인 수치나 인증 자료로 대체하세요',
      };
    case 'comparison':
      return {
        claim,
        status: 'WARNING',
        explanation: `비교 표현 '${claim.raw_text}' - 비교 대상 및 근거 자료 필요`,
        suggestion: '비교 기준과 시험 데이터를 함께 제시하세요',
      };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// AGGREGATION
// ═══════════════════════════════════════════════════════════════════════════

function overallStatus(total: number, failed: number, warnings: number, passed: number): OverallStatus {
  if (total === 0) return 'NO_CLAIMS';
  if (failed > 0) return 'FAIL';
  if (warnings > 0) return 'WARNING';
  if (passed > 0) return 'PASS';
  return 'UNVERIFIED';
}

function riskLevel(failed: number, warnings: number): RiskLevel {
  if (failed > 0) return 'HIGH';
  if (warnings > 0) return 'MEDIUM';
  return 'LOW';
}

/**
 * Aggregate items; every count is derived from the items themselves
 */
export function summarizeValidation(productName: string, items: readonly ValidationItem[]): ValidationResult {
  const count = (status: ValidationStatus): number => items.filter(item => item.status === status).length;
  const passed = count('PASS');
  const failed = count('FAIL');
  const warnings = count('WARNING');
  const unverified = count('UNVERIFIED');

  const riskReasons: string[] = [];
  if (failed > 0) riskReasons.push(`검증 실패 ${failed}건 - 수정 필수`);
  if (warnings > 0) riskReasons.push(`경고 ${warnings}건 - 검토 필요`);

  return Object.freeze({
    product_name: productName,
    total_claims: items.length,
    passed,
    failed,
    warnings,
    unverified,
    items: Object.freeze([...items]),
    overall_status: overallStatus(items.length, failed, warnings, passed),
    risk_level: riskLevel(failed, warnings),
    risk_reasons: Object.freeze(riskReasons),
  });
}

export interface ClaimValidatorOptions {
  extractor?: ClaimExtractor;
  weightTolerance?: number;
}

export class ClaimValidator {
  private readonly extractor: ClaimExtractor;
  private readonly tolerance: number;

  constructor(options: ClaimValidatorOptions = {}) {
    this.extractor = options.extractor ?? new ClaimExtractor();
    this.tolerance = options.weightTolerance ?? SCORING_RULES.claims.weightTolerance;
  }

  validateClaims(claims: readonly Claim[], spec: ClaimSpec): ValidationItem[] {
    return claims.map(claim => Object.freeze(validateClaim(claim, spec, this.tolerance)));
  }

  /**
   * Extract and validate. Empty copy gives total_claims = 0 and NO_CLAIMS.
   */
  validate(copyText: string, spec: SpecRecord): ValidationResult {
    const claims = this.extractor.extract(copyText);
    return summarizeValidation(spec.product_name, this.validateClaims(claims, spec));
  }
}

const defaultValidator = new ClaimValidator();

export function validateCopy(copyText: string, spec: SpecRecord): ValidationResult {
  return defaultValidator.validate(copyText, spec);
}

// ═══════════════════════════════════════════════════════════════════════════
// REPORT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Markdown validation report: title, summary counts, one entry per item
 */
export function generateValidationReport(result: ValidationResult): string {
  const lines = [
    '# 스펙 검증 리포트',
    '',
    `## 상품: ${result.product_name}`,
    '',
    '## 요약',
    `- 총 검증 항목: ${result.total_claims}건`,
    `- 통과: ${result.passed}건`,
    `- 경고: ${result.warnings}건`,
    `- 실패: ${result.failed}건`,
    `- 미검증: ${result.unverified}건`,
    '',
    `## 전체 상태: ${result.overall_status}`,
    `## 리스크 레벨: ${result.risk_level}`,
  ];

  if (result.risk_reasons.length > 0) {
    lines.push('', '### 리스크 사유:');
    result.risk_reasons.forEach(reason => lines.push(`- ${reason}`));
  }

  if (result.items.length > 0) {
    lines.push('', '## 상세 검증 결과');
    result.items.forEach((item, i) => {
      lines.push('');
      lines.push(`### ${i + 1}. ${STATUS_MARKS[item.status]} [${item.status}]`);
      lines.push(`- 원문: "${item.claim.raw_text}"`);
      lines.push(`- 유형: ${CLAIM_TYPE_LABELS[item.claim.claim_type]}`);
      lines.push(`- 사유: ${item.explanation}`);
      if (item.spec_reference) lines.push(`- 스펙 참조: ${item.spec_reference}`);
      if (item.suggestion) lines.push(`- 제안: ${item.suggestion}`);
    });
  }

  return lines.join('\n');
}
