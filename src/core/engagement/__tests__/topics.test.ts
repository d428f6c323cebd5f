import { describe, it, expect } from 'vitest';
import { loadTopicTaxonomy, parseTopicTaxonomy, selectTopic } from '../index.js';

const fixed = (value: number) => ({ next: () => value });

describe('parseTopicTaxonomy', () => {
  it('keeps category order', () => {
    expect(parseTopicTaxonomy({ Sleep: ['Naps', 'Dreams'], Music: ['Songs'] })).toEqual([
      { category: 'Sleep', subcategories: ['Naps', 'Dreams'] },
      { category: 'Music', subcategories: ['Songs'] },
    ]);
  });

  it('rejects empty taxonomies and empty categories', () => {
    expect(() => parseTopicTaxonomy({})).toThrow();
    expect(() => parseTopicTaxonomy({ Sleep: [] })).toThrow();
  });
});

describe('loadTopicTaxonomy', () => {
  it('loads the bundled categories', () => {
    const taxonomy = loadTopicTaxonomy();
    expect(taxonomy).toHaveLength(25);
    expect(taxonomy.every(t => t.subcategories.length > 0)).toBe(true);
  });
});

describe('selectTopic', () => {
  const taxonomy = parseTopicTaxonomy({ Sleep: ['Naps', 'Dreams'], Music: ['Songs'] });

  it('picks a category and one of its subcategories', () => {
    expect(selectTopic(taxonomy, {}, {}, fixed(0))).toEqual({ category: 'Sleep', subcategory: 'Naps' });
  });

  it('shifts toward the less used category', () => {
    // weights Sleep 0.5, Music 1; 0.5 * 1.5 lands past Sleep
    expect(selectTopic(taxonomy, { Sleep: 4 }, {}, fixed(0.5))).toEqual({ category: 'Music', subcategory: 'Songs' });
  });

  it('returns undefined for an empty taxonomy', () => {
    expect(selectTopic([], {}, {}, fixed(0))).toBeUndefined();
  });
});
