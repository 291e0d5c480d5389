// lib/reviews/sentiment-guard.ts
// False-positive guard rules for negative lexicon matches
// A guarded match stays visible in the verdict but does not count toward negativity

import type { TermMatch } from '../lexicon/matching-strategy';
import type { GuardMarkers } from '../lexicon/lexicon-store';

export interface SentenceSpan {
  text: string;
  start: number; // offset in the full review text
}

export interface GuardContext {
  sentence: string;
  negative: TermMatch;
  negatives: readonly TermMatch[]; // every negative match in the sentence
  positives: readonly TermMatch[]; // non-negated positive matches in the sentence
  markers: GuardMarkers;
  windowTokens: number;
}

/**
 * Returns true when the negative match should be discarded
 */
export type GuardRule = (context: GuardContext) => boolean;

const SENTENCE_DELIMITER = /[.!?\n]+/g;

/**
 * Split text into sentences with their offsets. Empty pieces are dropped.
 */
export function splitSentences(text: string): SentenceSpan[] {
  const spans: SentenceSpan[] = [];
  let cursor = 0;

  for (const match of text.matchAll(SENTENCE_DELIMITER)) {
    const end = match.index ?? cursor;
    if (text.slice(cursor, end).trim()) {
      spans.push({ text: text.slice(cursor, end), start: cursor });
    }
    cursor = end + match[0].length;
  }
  if (text.slice(cursor).trim()) {
    spans.push({ text: text.slice(cursor), start: cursor });
  }
  return spans;
}

/**
 * Number of whitespace runs, i.e. token boundaries crossed
 */
export function countTokenBoundaries(text: string): number {
  return (text.match(/\s+/g) ?? []).length;
}

function overlapsAny(position: number, spans: readonly TermMatch[], except: TermMatch): boolean {
  return spans.some(span => span !== except && position >= span.start && position < span.end);
}

/**
 * "품질이 좋아요": a positive term starts within the window after the
 * negative match with no negator in between.
 */
export const positiveQualifierRule: GuardRule = ({ sentence, negative, positives, markers, windowTokens }) =>
  positives.some(positive => {
    if (positive.start < negative.end) return false;
    const between = sentence.slice(negative.end, positive.start);
    if (countTokenBoundaries(between) > windowTokens) return false;
    return !markers.betweenNegators.some(negator => between.includes(negator));
  });

// A particle attached to the negative term itself ("냄새가없어요")
const ATTACHED_PARTICLE = /^[이가은는도]$/;

/**
 * Whether the marker at index starts a token of `after`. Inside a word
 * ("재미없어요") it is part of that word, not an absence marker.
 */
function startsToken(after: string, index: number): boolean {
  const head = after.slice(0, index);
  const tokenStart = head.search(/\S*$/);
  const prefix = head.slice(tokenStart);
  return prefix === '' || (tokenStart === 0 && ATTACHED_PARTICLE.test(prefix));
}

/**
 * "냄새가 전혀 안 나요", "후회 없어요": an absence marker starts a token within
 * the window. Markers that belong to another negative term ("설명서 없") do not count.
 */
export const absenceMarkerRule: GuardRule = ({ sentence, negative, negatives, markers, windowTokens }) => {
  const after = sentence.slice(negative.end);

  return markers.absenceMarkers.some(marker => {
    let index = after.indexOf(marker);
    while (index !== -1) {
      if (countTokenBoundaries(after.slice(0, index)) > windowTokens) return false;
      if (startsToken(after, index) && !overlapsAny(negative.end + index, negatives, negative)) return true;
      index = after.indexOf(marker, index + marker.length);
    }
    return false;
  });
};

export const DEFAULT_GUARD_RULES: readonly GuardRule[] = Object.freeze([
  positiveQualifierRule,
  absenceMarkerRule,
]);

export function isGuarded(context: GuardContext, rules: readonly GuardRule[] = DEFAULT_GUARD_RULES): boolean {
  return rules.some(rule => rule(context));
}

/**
 * A positive term preceded by a negator ("안 좋아요") or followed by one within
 * the window ("만족 못해요", "재구매 의사 없음") is not a positive signal.
 */
export function isNegatedPositive(
  sentence: string,
  match: TermMatch,
  markers: GuardMarkers,
  windowTokens: number
): boolean {
  const before = sentence.slice(0, match.start);
  if (markers.prefixNegators.some(negator => before.endsWith(negator))) {
    return true;
  }

  const following = sentence.slice(match.end);
  const tail = new RegExp(`^\\S*(?:\\s+\\S+){0,${windowTokens}}`).exec(following)?.[0] ?? '';
  return markers.suffixNegators.some(negator => tail.includes(negator));
}
