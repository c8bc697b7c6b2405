import type { BorderType, Contour, MinAreaRectFn, Point, RotatedRect } from '@shared/types';

/** Squared edge lengths below this mark a collapsed rectangle */
const DEGENERATE_EDGE_SQUARED = 1e-6;

/** Fewest points that describe a meaningful rectangle */
const MIN_RECT_POINTS = 4;

function distanceSquared(a: Point, b: Point): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

/**
 * Long side over short side of a rectangle
 * Returns undefined when either side has (near) zero length.
 */
export function rectAspectRatio(rect: RotatedRect): number | undefined {
  const side1 = distanceSquared(rect[0], rect[1]);
  const side2 = distanceSquared(rect[1], rect[2]);

  if (side1 < DEGENERATE_EDGE_SQUARED || side2 < DEGENERATE_EDGE_SQUARED) {
    return undefined;
  }

  return side1 > side2 ? Math.sqrt(side1 / side2) : Math.sqrt(side2 / side1);
}

/**
 * Remove elongated and degenerate contours in place
 *
 * A contour survives when it matches `borderType` (if given), has at least
 * four points, and the minimum-area rectangle from `minAreaRect` has an
 * aspect ratio strictly below `maxAspectRatio`. Survivors keep their
 * relative order.
 *
 * @throws RangeError if `maxAspectRatio` is not a positive finite number
 */
export function filterByAspectRatio<C extends Contour>(
  contours: C[],
  maxAspectRatio: number,
  borderType: BorderType | undefined,
  minAreaRect: MinAreaRectFn
): void {
  if (!Number.isFinite(maxAspectRatio) || maxAspectRatio <= 0) {
    throw new RangeError('maxAspectRatio must be a positive finite number');
  }

  let write = 0;
  for (let read = 0; read < contours.length; read++) {
    const contour = contours[read];
    if (keepContour(contour, maxAspectRatio, borderType, minAreaRect)) {
      contours[write++] = contour;
    }
  }

  contours.length = write;
}

function keepContour(
  contour: Contour,
  maxAspectRatio: number,
  borderType: BorderType | undefined,
  minAreaRect: MinAreaRectFn
): boolean {
  if (borderType !== undefined && contour.borderType !== borderType) {
    return false;
  }

  if (contour.points.length < MIN_RECT_POINTS) {
    return false;
  }

  const aspectRatio = rectAspectRatio(minAreaRect(contour.points));
  if (aspectRatio === undefined) {
    return false;
  }

  return aspectRatio < maxAspectRatio;
}
