// lib/claims/claim-extractor.ts
// Parses marketing copy into typed, non-overlapping claims
// Unrecognized text yields no claim; extraction never throws

import type { Claim, ClaimType } from '../../types';
import {
  COMPARISON_PATTERNS,
  LOAD_PREFIX_PATTERN,
  LOAD_SUFFIX_PATTERN,
  NUMERIC_WEIGHT_PATTERN,
  RELATIVE_BASIS_PATTERN,
  RELATIVE_SUFFIX_PATTERN,
  WEIGHT_PREFIX_PATTERN,
  WEIGHT_UNITS,
  buildExaggerationPattern,
} from './claim-patterns';

interface Span {
  start: number;
  end: number;
}

function overlaps(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}

function toNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseFloat(value.replace(/,/g, ''));
  return Number.isFinite(parsed) ? parsed : undefined;
}

// Avoids 0.1 + 0.2 artifacts when converting grams
function roundKg(value: number): number {
  return Math.round(value * 1_000_000) / 1_000_000;
}

export class ClaimExtractor {
  private readonly exaggerationPattern: RegExp;

  constructor(exaggerationTerms?: readonly string[]) {
    this.exaggerationPattern = buildExaggerationPattern(exaggerationTerms);
  }

  /**
   * Extract claims sorted by position. Numeric claims take precedence over
   * comparisons, which take precedence over superlatives.
   */
  extract(copyText: string): Claim[] {
    if (!copyText.trim()) return [];

    const accepted: Array<Claim & Span> = [];
    const accept = (claim: Claim & Span): void => {
      if (!accepted.some(existing => overlaps(existing, claim))) {
        accepted.push(claim);
      }
    };

    this.extractNumeric(copyText).forEach(accept);
    this.extractComparisons(copyText).forEach(accept);
    this.extractExaggerations(copyText).forEach(accept);

    return accepted
      .sort((a, b) => a.start - b.start)
      .map(({ claim_type, raw_text, extracted_value, offset }) => {
        const claim: Claim = extracted_value === undefined
          ? { claim_type, raw_text, offset }
          : { claim_type, raw_text, extracted_value, offset };
        return Object.freeze(claim);
      });
  }

  private extractNumeric(text: string): Array<Claim & Span> {
    const claims: Array<Claim & Span> = [];

    for (const match of text.matchAll(NUMERIC_WEIGHT_PATTERN)) {
      const valueStart = match.index ?? 0;
      const valueEnd = valueStart + match[0].length;
      const amount = toNumber(match[1]);
      const factor = WEIGHT_UNITS[match[2].toLowerCase()];
      if (amount === undefined || factor === undefined) continue;

      const before = text.slice(0, valueStart);
      const after = text.slice(valueEnd);
      // Differences against a baseline are left to the comparison pass
      if (RELATIVE_SUFFIX_PATTERN.test(after) || RELATIVE_BASIS_PATTERN.test(before)) continue;

      const loadPrefix = LOAD_PREFIX_PATTERN.exec(before);
      const loadSuffix = LOAD_SUFFIX_PATTERN.exec(after);

      let type: ClaimType = 'weight';
      let start = valueStart;
      let end = valueEnd;

      if (loadPrefix || loadSuffix) {
        type = 'load';
        if (loadPrefix) start = loadPrefix.index;
        if (loadSuffix) end = valueEnd + loadSuffix[0].length;
      } else {
        const weightPrefix = WEIGHT_PREFIX_PATTERN.exec(before);
        if (weightPrefix) start = weightPrefix.index;
      }

      claims.push({
        claim_type: type,
        raw_text: text.slice(start, end).trim(),
        extracted_value: roundKg(amount * factor),
        offset: start,
        start,
        end,
      });
    }
    return claims;
  }

  private extractComparisons(text: string): Array<Claim & Span> {
    const claims: Array<Claim & Span> = [];

    for (const pattern of COMPARISON_PATTERNS) {
      for (const match of text.matchAll(pattern)) {
        const start = match.index ?? 0;
        const raw = match[0].trimEnd();
        claims.push({
          claim_type: 'comparison',
          raw_text: raw,
          extracted_value: toNumber(match[1]),
          offset: start,
          start,
          end: start + raw.length,
        });
      }
    }
    return claims;
  }

  private extractExaggerations(text: string): Array<Claim & Span> {
    return Array.from(text.matchAll(this.exaggerationPattern), match => {
      const start = match.index ?? 0;
      return {
        claim_type: 'exaggeration' as const,
        raw_text: match[0],
        offset: start,
        start,
        end: start + match[0].length,
      };
    });
  }
}

const defaultExtractor = new ClaimExtractor();

export function extractClaims(copyText: string): Claim[] {
  return defaultExtractor.extract(copyText);
}
