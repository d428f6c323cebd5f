// ═══════════════════════════════════════════════════════════════════════════════
// TOPICS — Two-Level Category Taxonomy for Proactive Questions
// ═══════════════════════════════════════════════════════════════════════════════

import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { pickLeastUsed, type RandomSource, type UsageCounts } from '../weighting/index.js';

export interface TopicCategory {
  readonly category: string;
  readonly subcategories: readonly string[];
}

export type TopicTaxonomy = readonly TopicCategory[];

export interface TopicChoice {
  readonly category: string;
  readonly subcategory: string;
}

const TaxonomyFileSchema = z
  .record(z.array(z.string().min(1)).min(1))
  .refine(value => Object.keys(value).length > 0, { message: 'Taxonomy has no categories' });

const DEFAULT_TAXONOMY_URL = new URL('../../../data/topic-categories.json', import.meta.url);

/**
 * Parse a taxonomy document `{ category: [subcategory, ...] }`.
 */
export function parseTopicTaxonomy(raw: unknown): TopicTaxonomy {
  const parsed = TaxonomyFileSchema.parse(raw);
  return Object.entries(parsed).map(([category, subcategories]) => ({ category, subcategories }));
}

let cachedTaxonomy: TopicTaxonomy | null = null;

/**
 * The bundled taxonomy, read once.
 */
export function loadTopicTaxonomy(): TopicTaxonomy {
  if (!cachedTaxonomy) {
    const raw: unknown = JSON.parse(readFileSync(DEFAULT_TAXONOMY_URL, 'utf8'));
    cachedTaxonomy = parseTopicTaxonomy(raw);
  }
  return cachedTaxonomy;
}

/**
 * Weighted category, then a weighted subcategory within it, both favouring
 * the less used labels.
 */
export function selectTopic(
  taxonomy: TopicTaxonomy,
  categoryUsage: UsageCounts,
  subcategoryUsage: UsageCounts,
  random: RandomSource
): TopicChoice | undefined {
  const category = pickLeastUsed(taxonomy.map(t => t.category), categoryUsage, random);
  const entry = taxonomy.find(t => t.category === category);
  if (category === undefined || !entry) return undefined;

  const subcategory = pickLeastUsed(entry.subcategories, subcategoryUsage, random);
  if (subcategory === undefined) return undefined;

  return { category, subcategory };
}
