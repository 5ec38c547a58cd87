/**
 * Unit tests for entity name matching
 */

import { describe, it, expect } from 'vitest';
import {
  extractContext,
  extractRank,
  findOccurrences,
  generateNameVariants,
} from '../../index.js';

describe('generateNameVariants', () => {
  it('should split camel-case names', () => {
    expect(generateNameVariants('PolicyBazaar')).toEqual({ spaced: 'Policy Bazaar' });
  });

  it('should build an acronym for multi-word names', () => {
    expect(generateNameVariants('Acme Corp')).toEqual({ acronym: 'AC' });
  });

  it('should return no variants for a plain single word', () => {
    expect(generateNameVariants('Stripe')).toEqual({});
  });
});

describe('findOccurrences', () => {
  it('should find the literal name and the spaced variant in text order', () => {
    const occurrences = findOccurrences('We like PolicyBazaar and Policy Bazaar.', 'PolicyBazaar');

    expect(occurrences).toEqual([
      { index: 8, text: 'PolicyBazaar' },
      { index: 25, text: 'Policy Bazaar' },
    ]);
  });

  it('should match the literal name case-insensitively', () => {
    const occurrences = findOccurrences('STRIPE and stripe', 'Stripe');

    expect(occurrences.map((o) => o.text)).toEqual(['STRIPE', 'stripe']);
  });

  it('should match the acronym only as an uppercase whole word', () => {
    const occurrences = findOccurrences('AC leads; ac lags; ACME too', 'Acme Corp');

    expect(occurrences).toEqual([{ index: 0, text: 'AC' }]);
  });

  it('should treat regex characters in names literally', () => {
    const occurrences = findOccurrences('Try C++ Tools today', 'C++ Tools');

    expect(occurrences).toEqual([{ index: 4, text: 'C++ Tools' }]);
  });

  it('should return nothing for a blank name', () => {
    expect(findOccurrences('anything', '  ')).toEqual([]);
  });
});

describe('extractRank', () => {
  it('should read a leading list marker', () => {
    expect(extractRank('1. Acme Corp is great', 'Acme Corp')).toBe(1);
  });

  it('should trim the line before reading the marker', () => {
    expect(extractRank('Top picks:\n  3. Acme Corp\n1. Other', 'acme corp')).toBe(3);
  });

  it.each([
    ['Acme is the first option', 1],
    ['Acme is the number two choice', 2],
    ['Acme ranks #3 here', 3],
    ['Acme comes fourth', 4],
    ['Acme is number five', 5],
  ])('should read ordinal wording in "%s"', (text, rank) => {
    expect(extractRank(text, 'Acme')).toBe(rank);
  });

  it('should ignore a zero list marker', () => {
    expect(extractRank('0. Acme', 'Acme')).toBeNull();
  });

  it('should only inspect the first line naming the entity', () => {
    expect(extractRank('1. Other\nAcme is nice\n2. Acme again', 'Acme')).toBeNull();
  });

  it('should return null when the entity is absent', () => {
    expect(extractRank('1. Other', 'Acme')).toBeNull();
  });
});

describe('extractContext', () => {
  it('should keep 50 characters either side with ellipses when cut', () => {
    const text = `${'a'.repeat(60)}Acme${'b'.repeat(60)}`;

    const context = extractContext(text, { index: 60, text: 'Acme' });

    expect(context).toBe(`...${'a'.repeat(50)}Acme${'b'.repeat(50)}...`);
  });

  it('should not add ellipses when the window reaches both ends', () => {
    expect(extractContext('Acme rocks', { index: 0, text: 'Acme' })).toBe('Acme rocks');
  });

  it('should trim whitespace from the window', () => {
    expect(extractContext('   Acme   ', { index: 3, text: 'Acme' })).toBe('Acme');
  });
});
