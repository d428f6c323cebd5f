// ═══════════════════════════════════════════════════════════════════════════════
// USAGE WEIGHTER — Inverse-Frequency Sampling Weights
// ═══════════════════════════════════════════════════════════════════════════════
//
//   weight(label) = base / (1 + count(label) / max(1, maxCount))
//
// maxCount ranges over every label in the counts map, not just the candidates.
// Weights fall in (base/2, base]: heavily used labels stay selectable.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';
import type { RandomSource } from './random.js';

const logger = getLogger({ component: 'usage-weighter' });

export type UsageCounts = Readonly<Record<string, number>>;

/**
 * Sampling weights parallel to `labels`. Falls back to uniform weights if
 * the counts produce anything other than positive finite numbers.
 */
export function calculateWeights(
  labels: readonly string[],
  counts: UsageCounts,
  baseWeight: number = 1
): number[] {
  const uniform = (): number[] => labels.map(() => baseWeight);

  try {
    const values = Object.values(counts);
    const maxCount = Math.max(1, ...values);

    const weights = labels.map(label => {
      const count = counts[label] ?? 0;
      return baseWeight / (1 + count / maxCount);
    });

    if (weights.some(w => !Number.isFinite(w) || w <= 0)) {
      logger.warn('Invalid usage counts, using uniform weights', { labels: labels.length });
      return uniform();
    }

    return weights;
  } catch (error) {
    logger.error('Weight calculation failed, using uniform weights', error);
    return uniform();
  }
}

/**
 * Pick one item with probability proportional to its weight.
 * Returns `undefined` for an empty list.
 */
export function weightedChoice<T>(
  items: readonly T[],
  weights: readonly number[],
  random: RandomSource
): T | undefined {
  if (items.length === 0) return undefined;

  const total = items.reduce((sum, _, i) => sum + (weights[i] ?? 0), 0);
  if (!(total > 0)) {
    return items[Math.floor(random.next() * items.length)];
  }

  let threshold = random.next() * total;
  for (let i = 0; i < items.length; i++) {
    threshold -= weights[i] ?? 0;
    if (threshold < 0) return items[i];
  }

  return items[items.length - 1];
}

/**
 * Weighted pick over `labels` biased toward the less used ones.
 */
export function pickLeastUsed(
  labels: readonly string[],
  counts: UsageCounts,
  random: RandomSource
): string | undefined {
  return weightedChoice(labels, calculateWeights(labels, counts), random);
}
