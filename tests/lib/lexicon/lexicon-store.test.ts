// tests/lib/lexicon/lexicon-store.test.ts

import {
  createLexicon,
  getDefaultLexicon,
  getKeywordCategoryIndex,
} from '../../../lib/lexicon/lexicon-store';
import { isAppError } from '../../../types/errors';

const minimalLexicon = {
  negative_categories: [{ category: '품질', keywords: ['품질', '품질', '조잡'] }],
  positive_keywords: ['만족'],
  guard: {},
};

describe('getDefaultLexicon', () => {
  test('loads the bundled lexicon once', () => {
    const lexicon = getDefaultLexicon();

    expect(lexicon.version).toBe('1.0.0');
    expect(lexicon.negativeCategories.map(c => c.category)).toEqual([
      '품질', '내구성', '마감', '배송', '포장', '설명불일치', '불편', '소음', '냄새', '가격', '실망',
    ]);
    expect(getDefaultLexicon()).toBe(lexicon);
  });

  test('is deeply frozen', () => {
    const lexicon = getDefaultLexicon();

    expect(Object.isFrozen(lexicon)).toBe(true);
    expect(Object.isFrozen(lexicon.negativeCategories)).toBe(true);
    expect(Object.isFrozen(lexicon.negativeCategories[0].keywords)).toBe(true);
    expect(Object.isFrozen(lexicon.positiveKeywords)).toBe(true);
    expect(Object.isFrozen(lexicon.guard.absenceMarkers)).toBe(true);
  });
});

describe('createLexicon', () => {
  test('dedupes keywords and defaults guard markers', () => {
    const lexicon = createLexicon(minimalLexicon);

    expect(lexicon.version).toBe('custom');
    expect(lexicon.negativeCategories[0].keywords).toEqual(['품질', '조잡']);
    expect(lexicon.guard).toEqual({
      prefixNegators: [],
      suffixNegators: [],
      betweenNegators: [],
      absenceMarkers: [],
    });
  });

  test('rejects duplicate categories with CONFIG_003', () => {
    let caught: unknown;
    try {
      createLexicon({
        ...minimalLexicon,
        negative_categories: [
          { category: '품질', keywords: ['품질'] },
          { category: '품질', keywords: ['조잡'] },
        ],
      });
    } catch (error) {
      caught = error;
    }

    expect(isAppError(caught)).toBe(true);
    if (isAppError(caught)) {
      expect(caught.code).toBe('CONFIG_003');
      expect(caught.details).toContain('Duplicate category: 품질');
    }
  });

  test('rejects an empty positive list', () => {
    expect(() => createLexicon({ ...minimalLexicon, positive_keywords: [] })).toThrow();
  });
});

describe('getKeywordCategoryIndex', () => {
  test('maps keywords to their category', () => {
    const index = getKeywordCategoryIndex(getDefaultLexicon());

    expect(index.get('실밥')).toBe('마감');
    expect(index.get('배송 지연')).toBe('배송');
    expect(index.get('만족')).toBeUndefined();
  });
});
