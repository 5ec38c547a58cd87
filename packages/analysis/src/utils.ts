/**
 * Small numeric helpers shared by the analyzers
 */

import type { SentimentTally } from '@lumora/core';

/**
 * Round to one decimal place
 */
export function roundOne(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Round to the nearest integer; exact halves go to the even neighbour
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * First entry with the highest value; ties keep encounter order
 */
export function firstMax<T>(items: readonly T[], value: (item: T) => number): T | undefined {
  let best: T | undefined;
  let bestValue = -Infinity;
  for (const item of items) {
    const current = value(item);
    if (best === undefined || current > bestValue) {
      best = item;
      bestValue = current;
    }
  }
  return best;
}

/**
 * First entry with the lowest value; ties keep encounter order
 */
export function firstMin<T>(items: readonly T[], value: (item: T) => number): T | undefined {
  return firstMax(items, (item) => -value(item));
}

export function emptyTally(): SentimentTally {
  return { positive: 0, neutral: 0, negative: 0 };
}

/**
 * Sum sentiment tallies across platforms
 */
export function sumTallies(tallies: Iterable<SentimentTally>): SentimentTally {
  const total = emptyTally();
  for (const tally of tallies) {
    total.positive += tally.positive;
    total.neutral += tally.neutral;
    total.negative += tally.negative;
  }
  return total;
}
