/**
 * Entity name matching: surface-form variants, occurrences, rank and context
 * extraction
 */

/**
 * Characters kept either side of an occurrence in a mention context
 */
export const CONTEXT_RADIUS = 50;

export interface NameVariants {
  /** "PolicyBazaar" -> "Policy Bazaar"; absent when the name has no camel-case join */
  spaced?: string;
  /** Uppercase initials of a multi-word name */
  acronym?: string;
}

export interface Occurrence {
  /** Offset of the match in the text */
  index: number;
  /** Matched text as written */
  text: string;
}

const ORDINAL_PATTERNS: readonly RegExp[] = [
  /(?:first|#1|number one)/,
  /(?:second|#2|number two)/,
  /(?:third|#3|number three)/,
  /(?:fourth|#4|number four)/,
  /(?:fifth|#5|number five)/,
];

const LIST_MARKER = /^(\d+)\./;

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function generateNameVariants(name: string): NameVariants {
  const variants: NameVariants = {};

  const spaced = name.replace(/([a-z])([A-Z])/g, '$1 $2');
  if (spaced !== name) {
    variants.spaced = spaced;
  }

  const words = name.split(/\s+/).filter((word) => word.length > 0);
  if (words.length > 1) {
    variants.acronym = words.map((word) => word[0].toUpperCase()).join('');
  }

  return variants;
}

function collect(text: string, pattern: RegExp, into: Occurrence[]): void {
  for (const match of text.matchAll(pattern)) {
    into.push({ index: match.index ?? 0, text: match[0] });
  }
}

/**
 * Every occurrence of the name or one of its variants, in text order. The
 * name and spaced variant match case-insensitively; the acronym only as an
 * uppercase whole word.
 */
export function findOccurrences(text: string, name: string): Occurrence[] {
  const trimmed = name.trim();
  if (!trimmed) {
    return [];
  }

  const found: Occurrence[] = [];
  const variants = generateNameVariants(trimmed);

  collect(text, new RegExp(escapeRegExp(trimmed), 'gi'), found);
  if (variants.spaced) {
    collect(text, new RegExp(escapeRegExp(variants.spaced), 'gi'), found);
  }
  if (variants.acronym) {
    collect(text, new RegExp(`\\b${escapeRegExp(variants.acronym)}\\b`, 'g'), found);
  }

  const seen = new Set<string>();
  return found
    .sort((a, b) => a.index - b.index)
    .filter((occurrence) => {
      const key = `${occurrence.index}:${occurrence.text.length}`;
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });
}

/**
 * Rank from the first line naming the entity: a leading "<n>." list marker,
 * else an ordinal word or "#n" for positions one to five
 */
export function extractRank(text: string, name: string): number | null {
  const needle = name.trim().toLowerCase();
  if (!needle) {
    return null;
  }

  const line = text.split('\n').find((candidate) => candidate.toLowerCase().includes(needle));
  if (line === undefined) {
    return null;
  }

  const marker = LIST_MARKER.exec(line.trim());
  if (marker) {
    const rank = Number.parseInt(marker[1], 10);
    return rank >= 1 ? rank : null;
  }

  const lowered = line.toLowerCase();
  const position = ORDINAL_PATTERNS.findIndex((pattern) => pattern.test(lowered));
  return position >= 0 ? position + 1 : null;
}

/**
 * Text around an occurrence, with "..." where the window stops short of the
 * text boundary
 */
export function extractContext(
  text: string,
  occurrence: Occurrence,
  radius: number = CONTEXT_RADIUS
): string {
  const start = Math.max(0, occurrence.index - radius);
  const end = Math.min(text.length, occurrence.index + occurrence.text.length + radius);

  let context = text.slice(start, end).trim();
  if (start > 0) {
    context = `...${context}`;
  }
  if (end < text.length) {
    context = `${context}...`;
  }
  return context;
}
