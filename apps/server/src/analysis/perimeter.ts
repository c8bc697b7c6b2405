import type { Contour, PerimeterEntry, Point } from '@shared/types';

export interface RankedByPerimeter<C extends Contour = Contour> {
  contour: C;
  perimeter: number;
}

/**
 * Calculate the perimeter of a closed contour
 * Sums consecutive point distances, including the closing last-to-first edge.
 * A two-point contour counts the segment there and back.
 */
export function contourPerimeter(points: Point[]): number {
  if (points.length < 2) return 0;

  let perimeter = 0;
  for (let i = 0; i < points.length; i++) {
    const current = points[i];
    const next = points[(i + 1) % points.length];
    perimeter += Math.hypot(next.x - current.x, next.y - current.y);
  }

  return perimeter;
}

/**
 * Pair each contour with its perimeter and sort descending
 *
 * The contours are moved into the result rather than copied, so the input
 * array must not be reused by the caller. Ties keep no particular order.
 */
export function rankByPerimeter<C extends Contour>(contours: C[]): RankedByPerimeter<C>[] {
  const ranked = contours.map(contour => ({
    contour,
    perimeter: contourPerimeter(contour.points),
  }));

  ranked.sort((a, b) => b.perimeter - a.perimeter);
  return ranked;
}

/**
 * Indices of contours whose perimeter reaches `minPerimeter`, longest first
 */
export function perimeterOrder(contours: readonly Contour[], minPerimeter: number = 0): PerimeterEntry[] {
  const entries: PerimeterEntry[] = [];

  contours.forEach((contour, index) => {
    const perimeter = contourPerimeter(contour.points);
    if (perimeter >= minPerimeter) {
      entries.push({ index, perimeter });
    }
  });

  return entries.sort((a, b) => b.perimeter - a.perimeter);
}
