import type { ChildCountEntry, Contour } from '@shared/types';

export interface RankedByChildCount<C extends Contour = Contour> {
  contour: C;
  childCount: number;
}

/**
 * Count direct children of every contour from the parent links
 * Parent indices outside the hierarchy are skipped.
 */
export function directChildCounts(contours: readonly Contour[]): number[] {
  const counts = new Array<number>(contours.length).fill(0);

  for (const contour of contours) {
    const parent = contour.parent;
    if (parent !== undefined && Number.isInteger(parent) && parent >= 0 && parent < counts.length) {
      counts[parent]++;
    }
  }

  return counts;
}

/**
 * Pair each contour with its direct child count and sort descending
 *
 * Takes ownership of `contours`: entries are moved into the result by
 * position, not cloned. Equal counts keep no particular order.
 */
export function rankByChildCount<C extends Contour>(contours: C[]): RankedByChildCount<C>[] {
  if (contours.length === 0) return [];

  const counts = directChildCounts(contours);
  const ranked = contours.map((contour, index) => ({
    contour,
    childCount: counts[index],
  }));

  ranked.sort((a, b) => b.childCount - a.childCount);
  return ranked;
}

/**
 * Indices of contours that have at least one child, most children first
 */
export function parentOrder(contours: readonly Contour[]): ChildCountEntry[] {
  return directChildCounts(contours)
    .map((childCount, index) => ({ index, childCount }))
    .filter(entry => entry.childCount > 0)
    .sort((a, b) => b.childCount - a.childCount);
}
