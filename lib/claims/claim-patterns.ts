// lib/claims/claim-patterns.ts
// Grammar for marketing-copy claims: units, cue words and superlatives

// ═══════════════════════════════════════════════════════════════════════════
// WEIGHT & LOAD
// ═══════════════════════════════════════════════════════════════════════════

/** kg per unit */
export const WEIGHT_UNITS: Readonly<Record<string, number>> = Object.freeze({
  kg: 1,
  킬로그램: 1,
  킬로: 1,
  키로: 1,
  g: 0.001,
  그램: 0.001,
});

// Longer unit spellings first so "킬로그램" is not read as "킬로".
// Grams are lowercase only: "2.4G 무선" is a frequency, not a weight.
export const NUMERIC_WEIGHT_PATTERN =
  /(?<![\d.,])(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)\s*([kK][gG]|킬로그램|킬로|키로|그램|g)(?![A-Za-z])/g;

/** "2kg 더 가벼운": the value is a difference, not a weight */
export const RELATIVE_SUFFIX_PATTERN = /^\s*(?:훨씬\s*)?(?:더|덜)\s/;

/** "기존 제품보다 2kg": a baseline earlier in the same clause */
export const RELATIVE_BASIS_PATTERN = /(?:보다|대비|에 비해)[^,.!?\n]*$/;

const PARTICLE = '(?:[은는이가:]\\s*)?';

/** Qualifiers directly before a weight value ("초경량 1.0kg", "무게는 2kg") */
export const WEIGHT_PREFIX_PATTERN = new RegExp(`(?<![가-힣])(?:(?:초경량|경량|무게|중량|약|총)\\s*)+${PARTICLE}$`);

/** Cues before a value that make it a load claim ("최대 100kg", "내하중 120kg") */
export const LOAD_PREFIX_PATTERN = new RegExp(`(?<![가-힣])(?:(?:최대|내하중|하중)\\s*)+${PARTICLE}$`);

/**
 * Cues after a value that make it a load claim ("100kg까지 지지", "150kg도 거뜬").
 * "지지" counts only as a verb or "지지력", never as a noun stem like "지지대".
 */
export const LOAD_SUFFIX_PATTERN =
  /^(?:까지도|까지|도)?\s*(?:[가-힣]+\s+)?(?:지지(?:[합하해됩되력]|(?=[\s.,!?]|$))|견딤|견디|버팀|버티|버팁|거뜬|하중)/;

// ═══════════════════════════════════════════════════════════════════════════
// COMPARISON
// ═══════════════════════════════════════════════════════════════════════════

const BASELINE = '(?:타사|경쟁사|기존 제품|기존|일반 제품|시중 제품)';
const BASIS = '\\s*(?:대비|보다|에 비해|(?:와|과)\\s*비교(?:해서|하여|해)?)';
const QUALITATIVE = '(?:훨씬\\s*)?(?:더|덜)\\s*[가-힣]+';
// Percentage, multiplier or a weight difference ("2kg 더 가벼운")
const DELTA = '(\\d+(?:\\.\\d+)?)\\s*(?:%|배|[kK][gG]|킬로그램|킬로|키로|그램|g(?![A-Za-z]))';

/**
 * Comparison patterns in priority order. Capture group 1, when present,
 * is the percentage, multiplier or weight difference.
 */
export const COMPARISON_PATTERNS: readonly RegExp[] = Object.freeze([
  // 타사 대비 30% 더 가벼운 / 기존 제품보다 2kg 더 가벼운 / 경쟁사보다 더 넓은
  new RegExp(
    `${BASELINE}${BASIS}\\s*(?:[가-힣]+\\s+)?(?:${DELTA}(?:\\s*(?:더|덜))?(?:\\s*[가-힣]+)?|${QUALITATIVE})`,
    'g'
  ),
  // 일반 의자보다 30% 더 가벼운 / 의자보다 훨씬 더 편한
  new RegExp(`[가-힣A-Za-z0-9]+보다\\s*(?:${DELTA}\\s*)?(?:훨씬\\s*)?(?:더|덜)\\s*[가-힣]+`, 'g'),
  // 2배 더 튼튼한
  /(\d+(?:\.\d+)?)\s*배\s*(?:더|덜|이상)\s*[가-힣]+/g,
]);

// ═══════════════════════════════════════════════════════════════════════════
// EXAGGERATION
// ═══════════════════════════════════════════════════════════════════════════

export const EXAGGERATION_TERMS: readonly string[] = Object.freeze([
  '최고급',
  '최상급',
  '최상의',
  '완벽한',
  '완벽',
  '프리미엄',
  '최고',
  '100%',
  '무조건',
  '절대',
  '세계 최초',
  '국내 유일',
  '업계 최초',
  '1위',
]);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Longest term first so "최고급" wins over "최고"; "가장 <word>" is open-ended
 */
export function buildExaggerationPattern(terms: readonly string[] = EXAGGERATION_TERMS): RegExp {
  const alternatives = [...terms]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp);
  return new RegExp(`(?:${[...alternatives, '가장\\s*[가-힣]+'].join('|')})`, 'g');
}
