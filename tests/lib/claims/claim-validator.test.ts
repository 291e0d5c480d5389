// tests/lib/claims/claim-validator.test.ts

import {
  ClaimValidator,
  generateValidationReport,
  summarizeValidation,
  validateCopy,
} from '../../../lib/claims/claim-validator';
import { createSpecRecord } from '../../../lib/schemas/input-schema';
import type { Claim, ValidationItem } from '../../../types';

const chairSpec = createSpecRecord({
  product_name: '캠핑의자',
  category: '캠핑',
  weight_kg: 2.5,
  max_load_kg: 120,
});

describe('validateCopy', () => {
  test('understated weight fails', () => {
    const result = validateCopy('초경량 1.0kg 캠핑의자', chairSpec);

    expect(result.total_claims).toBe(1);
    expect(result.items[0].status).toBe('FAIL');
    expect(result.items[0].spec_reference).toBe('실제 무게: 2.5kg');
    expect(result.items[0].suggestion).toBe('무게 표기를 2.5kg로 수정하세요');
    expect(result.overall_status).toBe('FAIL');
    expect(result.risk_level).toBe('HIGH');
    expect(result.risk_reasons).toEqual(['검증 실패 1건 - 수정 필수']);
  });

  test('weight within tolerance passes', () => {
    const result = validateCopy('무게 2.6kg', chairSpec);
    expect(result.items[0].status).toBe('PASS');
    expect(result.overall_status).toBe('PASS');
    expect(result.risk_level).toBe('LOW');
  });

  test('tolerance boundary is inclusive', () => {
    expect(validateCopy('무게 2.25kg', chairSpec).items[0].status).toBe('PASS');
    expect(validateCopy('무게 2.2kg', chairSpec).items[0].status).toBe('FAIL');
  });

  test('overstated weight warns', () => {
    expect(validateCopy('무게 3kg', chairSpec).items[0].status).toBe('WARNING');
  });

  test('load within the maximum passes', () => {
    expect(validateCopy('최대 100kg까지 지지', chairSpec).items[0].status).toBe('PASS');
  });

  test('load above the maximum fails', () => {
    const result = validateCopy('최대 150kg까지 거뜬히', chairSpec);
    expect(result.items[0].status).toBe('FAIL');
    expect(result.items[0].explanation).toBe('주장 하중(150kg)이 실제 최대 하중(120kg)을 초과 - 안전 문제 우려');
  });

  test('superlatives always warn', () => {
    const result = validateCopy('최고급 프리미엄 소재로 완벽한 품질', chairSpec);

    expect(result.items.map(i => i.status)).toEqual(['WARNING', 'WARNING', 'WARNING']);
    expect(result.overall_status).toBe('WARNING');
    expect(result.risk_level).toBe('MEDIUM');
    expect(result.risk_reasons).toEqual(['경고 3건 - 검토 필요']);
  });

  test('missing spec values are unverified', () => {
    const bare = createSpecRecord({ product_name: '캠핑의자' });
    const result = validateCopy('초경량 1.0kg, 최대 100kg까지 지지', bare);

    expect(result.items.map(i => i.status)).toEqual(['UNVERIFIED', 'UNVERIFIED']);
    expect(result.overall_status).toBe('UNVERIFIED');
    expect(result.risk_level).toBe('LOW');
  });

  test('grouped digits validate against the real weight', () => {
    const result = validateCopy('무게 1,200g 초경량', createSpecRecord({ product_name: '경량 의자', weight_kg: 1.2 }));

    expect(result.items.map(i => [i.claim.raw_text, i.status])).toEqual([['무게 1,200g', 'PASS']]);
    expect(result.overall_status).toBe('PASS');
  });

  test('a frequency is not checked as a weight', () => {
    const result = validateCopy('2.4G 무선 마우스', createSpecRecord({ product_name: '마우스', weight_kg: 0.1 }));

    expect(result.total_claims).toBe(0);
    expect(result.risk_level).toBe('LOW');
  });

  test('a weight difference warns instead of failing', () => {
    const result = validateCopy('기존 제품보다 2kg 더 가벼운', chairSpec);

    expect(result.items.map(i => i.status)).toEqual(['WARNING']);
    expect(result.failed).toBe(0);
  });

  test('a stand noun does not turn the weight into a load claim', () => {
    const spec = createSpecRecord({ product_name: '캠핑의자', weight_kg: 1.0, max_load_kg: 0.5 });
    const result = validateCopy('1.0kg 초경량 지지대 포함', spec);

    expect(result.items.map(i => [i.claim.claim_type, i.status])).toEqual([['weight', 'PASS']]);
  });

  test('validation is repeatable', () => {
    const validator = new ClaimValidator();
    const copy = '프리미엄 원단, 초경량 1.0kg, 최대 150kg 지지, 타사 대비 20% 더 튼튼';

    expect(validator.validate(copy, chairSpec)).toEqual(validator.validate(copy, chairSpec));
  });

  test('empty copy has no claims', () => {
    const result = validateCopy('', chairSpec);

    expect(result.total_claims).toBe(0);
    expect(result.overall_status).toBe('NO_CLAIMS');
    expect(result.risk_level).toBe('LOW');
    expect(result.product_name).toBe('캠핑의자');
  });

  test('counts always add up', () => {
    const result = validateCopy('프리미엄 원단, 초경량 1.2kg, 최대 120kg 하중, 타사 대비 20% 더 튼튼', chairSpec);

    expect(result.passed + result.failed + result.warnings + result.unverified).toBe(result.total_claims);
    expect(result.items.map(i => i.status)).toEqual(['WARNING', 'FAIL', 'PASS', 'WARNING']);
  });
});

describe('ClaimValidator', () => {
  test('custom tolerance', () => {
    const lenient = new ClaimValidator({ weightTolerance: 0.5 });
    expect(lenient.validate('초경량 1.5kg', chairSpec).items[0].status).toBe('PASS');
  });

  test('validateClaims keeps claim order', () => {
    const claims: Claim[] = [
      { claim_type: 'load', raw_text: '최대 200kg', extracted_value: 200, offset: 0 },
      { claim_type: 'weight', raw_text: '2.5kg', extracted_value: 2.5, offset: 10 },
    ];
    const items = new ClaimValidator().validateClaims(claims, chairSpec);
    expect(items.map(i => i.status)).toEqual(['FAIL', 'PASS']);
  });
});

describe('summarizeValidation', () => {
  test('derives counts from items', () => {
    const claim: Claim = { claim_type: 'exaggeration', raw_text: '최고', offset: 0 };
    const items: ValidationItem[] = [
      { claim, status: 'PASS', explanation: 'ok' },
      { claim, status: 'UNVERIFIED', explanation: '?' },
    ];
    const result = summarizeValidation('의자', items);

    expect(result).toMatchObject({ total_claims: 2, passed: 1, unverified: 1, overall_status: 'PASS', risk_level: 'LOW' });
    expect(result.risk_reasons).toEqual([]);
  });
});

describe('generateValidationReport', () => {
  test('renders summary and item details', () => {
    const report = generateValidationReport(validateCopy('초경량 1.0kg 캠핑의자', chairSpec));

    expect(report.split('\n')).toEqual([
      '# 스펙 검증 리포트',
      '',
      '## 상품: 캠핑의자',
      '',
      '## 요약',
      '- 총 검증 항목: 1건',
      '- 통과: 0건',
      '- 경고: 0건',
      '- 실패: 1건',
      '- 미검증: 0건',
      '',
      '## 전체 상태: FAIL',
      '## 리스크 레벨: HIGH',
      '',
      '### 리스크 사유:',
      '- 검증 실패 1건 - 수정 필수',
      '',
      '## 상세 검증 결과',
      '',
      '### 1. ❌ [FAIL]',
      '- 원문: "초경량 1.0kg"',
      '- 유형: 무게',
      '- 사유: 주장 무게(1kg)가 실제 무게(2.5kg)보다 가볍게 표기됨',
      '- 스펙 참조: 실제 무게: 2.5kg',
      '- 제안: 무게 표기를 2.5kg로 수정하세요',
    ]);
  });

  test('no item section for copy without claims', () => {
    const report = generateValidationReport(validateCopy('편안한 의자', chairSpec));
    expect(report).not.toContain('## 상세 검증 결과');
    expect(report).toContain('## 전체 상태: NO_CLAIMS');
  });
});
