// tests/lib/reviews/review-classifier.test.ts

import { createLexicon } from '../../../lib/lexicon/lexicon-store';
import { wordStartMatchStrategy } from '../../../lib/lexicon/matching-strategy';
import { ReviewClassifier, classifyReview } from '../../../lib/reviews/review-classifier';

describe('ReviewClassifier', () => {
  const classifier = new ReviewClassifier();

  test('negative term qualified by a positive is guarded', () => {
    const verdict = classifier.classifyText('생각보다 품질이 좋아요. 만족합니다.');

    expect(verdict.sentiment).toBe('POSITIVE');
    expect(verdict.is_complaint).toBe(false);
    expect(verdict.matched_positive_keywords).toEqual(['좋아요', '만족']);
    expect(verdict.matched_negative_keywords).toEqual(['품질']);
    expect(verdict.guarded_negative_keywords).toEqual(['품질']);
    expect(verdict.complaint_categories).toEqual([]);
  });

  test('collects every complaint category in lexicon order', () => {
    const verdict = classifier.classifyText('품질이 너무 별로예요. 사진과 다르고 실밥도 나와있음.');

    expect(verdict.sentiment).toBe('NEGATIVE');
    expect(verdict.is_complaint).toBe(true);
    expect(verdict.complaint_categories).toEqual(['품질', '마감', '설명불일치', '실망']);
    expect(verdict.matched_negative_keywords).toEqual(['품질', '실밥', '사진과 다', '별로']);
    expect(verdict.guarded_negative_keywords).toEqual([]);
  });

  test('absence marker guards the term it follows', () => {
    const verdict = classifier.classifyText('냄새가 전혀 안 나요. 튼튼하고 좋아요.');

    expect(verdict.sentiment).toBe('POSITIVE');
    expect(verdict.matched_positive_keywords).toEqual(['좋아요', '튼튼']);
    expect(verdict.guarded_negative_keywords).toEqual(['냄새']);
  });

  test('a word containing an absence marker does not guard', () => {
    const verdict = classifier.classifyText('냄새 심하고 재미없어요');

    expect(verdict.sentiment).toBe('NEGATIVE');
    expect(verdict.complaint_categories).toEqual(['냄새']);
    expect(verdict.guarded_negative_keywords).toEqual([]);
  });

  test('classification is repeatable', () => {
    const review = { id: 'r1', content: '품질이 너무 별로예요. 냄새가 전혀 안 나요.', rating: 2 };
    expect(classifier.classify(review)).toEqual(classifier.classify(review));
  });

  test('negated positive is not a positive signal', () => {
    const verdict = classifier.classifyText('품질이 안 좋아요');

    expect(verdict.sentiment).toBe('NEGATIVE');
    expect(verdict.matched_positive_keywords).toEqual([]);
    expect(verdict.complaint_categories).toEqual(['품질', '실망']);
    expect(verdict.matched_negative_keywords).toEqual(['품질', '안 좋']);
  });

  test('negated positive without negative terms is neutral', () => {
    expect(classifier.classifyText('만족 못 해요').sentiment).toBe('NEUTRAL');
  });

  test('empty or punctuation-only text is neutral', () => {
    for (const text of ['', '   ', '...']) {
      const verdict = classifier.classifyText(text);
      expect(verdict.sentiment).toBe('NEUTRAL');
      expect(verdict.matched_negative_keywords).toEqual([]);
      expect(verdict.complaint_categories).toEqual([]);
    }
  });

  test('rating never changes the verdict', () => {
    const content = '배송 지연이 심하고 포장 불량이에요';
    const lowRated = { id: 'r1', content, rating: 1 };
    const highRated = { id: 'r2', content, rating: 5 };
    const low = classifier.classify(lowRated);
    const high = classifier.classify(highRated);

    expect(classifyReview(highRated)).toEqual(low);
    expect(high).toEqual(low);
    expect(low.complaint_categories).toEqual(['배송', '포장']);
  });

  test('complaint iff at least one unguarded category', () => {
    const samples = [
      '생각보다 품질이 좋아요',
      '품질이 안 좋아요',
      '그냥 그래요',
      '후회 없어요. 재구매 의사 있음',
      '소음이 심하고 삐걱거려요',
    ];
    for (const text of samples) {
      const verdict = classifier.classifyText(text);
      expect(verdict.is_complaint).toBe(verdict.complaint_categories.length > 0);
      expect(verdict.sentiment === 'NEGATIVE').toBe(verdict.is_complaint);
    }
  });

  test('verdicts are frozen', () => {
    const verdict = classifier.classifyText('품질이 너무 별로예요');
    expect(Object.isFrozen(verdict)).toBe(true);
    expect(Object.isFrozen(verdict.complaint_categories)).toBe(true);
  });

  describe('guard window', () => {
    const text = '품질은 솔직히 말해서 정말 좋아요';

    test('qualifier beyond the default window does not guard', () => {
      const verdict = classifier.classifyText(text);
      expect(verdict.sentiment).toBe('NEGATIVE');
      expect(verdict.complaint_categories).toEqual(['품질']);
    });

    test('a wider window guards it', () => {
      const wide = new ReviewClassifier({ guardWindowTokens: 4 });
      expect(wide.classifyText(text).sentiment).toBe('POSITIVE');
    });
  });

  describe('options', () => {
    test('word-start matching skips compound words', () => {
      const strict = new ReviewClassifier({ matcher: wordStartMatchStrategy });
      const verdict = strict.classifyText('고품질 소재라 만족해요');

      expect(verdict.matched_negative_keywords).toEqual([]);
      expect(verdict.matched_positive_keywords).toEqual(['만족']);
      expect(verdict.sentiment).toBe('POSITIVE');
    });

    test('substring matching sees the compound word but guards it', () => {
      const verdict = classifier.classifyText('고품질 소재라 만족해요');

      expect(verdict.matched_negative_keywords).toEqual(['품질']);
      expect(verdict.guarded_negative_keywords).toEqual(['품질']);
      expect(verdict.sentiment).toBe('POSITIVE');
    });

    test('no guard rules keeps every negative match', () => {
      const unguarded = new ReviewClassifier({ guardRules: [] });
      const verdict = unguarded.classifyText('생각보다 품질이 좋아요');

      expect(verdict.sentiment).toBe('NEGATIVE');
      expect(verdict.complaint_categories).toEqual(['품질']);
    });

    test('custom lexicon', () => {
      const lexicon = createLexicon({
        negative_categories: [{ category: '사이즈', keywords: ['작아요'] }],
        positive_keywords: ['예뻐요'],
        guard: {},
      });
      const custom = new ReviewClassifier({ lexicon });

      expect(custom.classifyText('생각보다 작아요').complaint_categories).toEqual(['사이즈']);
      expect(custom.classifyText('품질이 별로').sentiment).toBe('NEUTRAL');
    });
  });
});
