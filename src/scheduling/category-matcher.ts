import { EventCategory } from '../common/types';

export type CategoryMatch =
  | { kind: 'matched'; category: EventCategory; matchedBy: 'exact' | 'substring' | 'default' }
  | { kind: 'needs_selection'; options: EventCategory[] }
  | { kind: 'empty' };

function normalizeLabel(value: string): string {
  return value.toLowerCase().replace(/[-_]+/g, ' ').replace(/\s+/g, ' ').trim();
}

function labelsOf(category: EventCategory): string[] {
  return [category.title, category.slug].map(normalizeLabel).filter((label) => label.length > 0);
}

/**
 * Picks the category a free-text reason refers to. Exact title or slug
 * matches win over substring matches; among substring matches the label
 * closest in length to the reason wins, so "interview prep call" lands on
 * "Interview Prep" rather than "Interview".
 */
export function matchCategory(categories: EventCategory[], reason?: string): CategoryMatch {
  if (categories.length === 0) {
    return { kind: 'empty' };
  }
  const wanted = reason ? normalizeLabel(reason) : '';
  if (!wanted) {
    return { kind: 'matched', category: categories[0], matchedBy: 'default' };
  }

  const exact = categories.find((category) => labelsOf(category).includes(wanted));
  if (exact) {
    return { kind: 'matched', category: exact, matchedBy: 'exact' };
  }

  let best: { category: EventCategory; distance: number } | undefined;
  for (const category of categories) {
    for (const label of labelsOf(category)) {
      if (!label.includes(wanted) && !wanted.includes(label)) continue;
      const distance = Math.abs(label.length - wanted.length);
      if (!best || distance < best.distance) {
        best = { category, distance };
      }
    }
  }
  if (best) {
    return { kind: 'matched', category: best.category, matchedBy: 'substring' };
  }
  return { kind: 'needs_selection', options: categories };
}
