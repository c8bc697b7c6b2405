import type { AxisAlignedBox, RotatedRect } from '@shared/types';

/**
 * Calculate the axis-aligned bounding box of a rotated rectangle's vertices
 *
 * Extremes are found by pairwise comparison only, so float coordinates work
 * the same as integers. Each extreme is truncated toward zero and anything
 * negative, non-finite or beyond the unsigned 32-bit range becomes 0; width
 * and height never go below 0.
 * Geometry left of or above the origin is therefore lost.
 *
 * @example
 * axisAlignedBounds([
 *   { x: 50, y: 10 }, { x: 90, y: 50 }, { x: 50, y: 90 }, { x: 10, y: 50 },
 * ]); // { x: 10, y: 10, width: 80, height: 80 }
 */
export function axisAlignedBounds(vertices: RotatedRect): AxisAlignedBox {
  const first = vertices[0];
  let minX = first.x;
  let maxX = first.x;
  let minY = first.y;
  let maxY = first.y;

  for (let i = 1; i < vertices.length; i++) {
    const { x, y } = vertices[i];
    if (x < minX) minX = x;
    if (x > maxX) maxX = x;
    if (y < minY) minY = y;
    if (y > maxY) maxY = y;
  }

  const x = toUnsigned(minX);
  const y = toUnsigned(minY);

  return {
    x,
    y,
    width: Math.max(0, toUnsigned(maxX) - x),
    height: Math.max(0, toUnsigned(maxY) - y),
  };
}

/** Largest value an unsigned 32-bit pixel coordinate can hold */
const MAX_UNSIGNED = 0xffffffff;

function toUnsigned(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  const truncated = Math.trunc(value);
  return truncated > MAX_UNSIGNED ? 0 : truncated;
}
