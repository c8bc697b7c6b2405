import convert from 'color-convert';
import type { Rgba } from '@shared/types';

const SATURATION = 90;
const LIGHTNESS = 50;

/**
 * Generate `n` visually distinct colors from evenly spaced hues
 * Hue i is i * 360 / n at fixed saturation and lightness. Good enough to tell
 * labels apart in debug output, not colorimetrically tuned.
 */
export function generateContrastingColors(n: number, alpha: number): Rgba[] {
  const colors: Rgba[] = [];

  for (let i = 0; i < n; i++) {
    const hue = (i * 360) / n;
    const [r, g, b] = convert.hsl.rgb([hue, SATURATION, LIGHTNESS]);
    colors.push([r, g, b, alpha]);
  }

  return colors;
}
