import { generateContrastingColors } from './palette';
import type { ImageData, LabelMap, Region, Rgba } from '@shared/types';

/**
 * Count pixels per non-background label
 */
export function regionSizes(labelMap: LabelMap): Map<number, number> {
  const { labels } = labelMap;
  const sizes = new Map<number, number>();

  for (let i = 0; i < labels.length; i++) {
    const label = labels[i];
    if (label === 0) continue;
    sizes.set(label, (sizes.get(label) ?? 0) + 1);
  }

  return sizes;
}

/**
 * Pick the `count` largest regions
 * Equal sizes are ordered by the lower label first.
 */
export function selectPrincipalRegions(labelMap: LabelMap, count: number): Region[] {
  const regions: Region[] = [];
  for (const [label, size] of regionSizes(labelMap)) {
    regions.push({ label, size });
  }

  regions.sort((a, b) => b.size - a.size || a.label - b.label);
  return regions.slice(0, Math.max(0, count));
}

/**
 * Paint the principal regions of a label map with contrasting colors
 * Regions are colored in rank order; every other pixel gets `background`.
 */
export function colorizePrincipalRegions(labelMap: LabelMap, count: number, background: Rgba): ImageData {
  const { width, height, labels } = labelMap;

  if (labels.length !== width * height) {
    throw new Error(`Label map has ${labels.length} labels, expected ${width * height} for ${width}x${height}`);
  }

  const principal = selectPrincipalRegions(labelMap, count);
  const palette = generateContrastingColors(principal.length, 255);
  const colorByLabel = new Map<number, Rgba>();
  principal.forEach((region, rank) => colorByLabel.set(region.label, palette[rank]));

  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < labels.length; i++) {
    const color = colorByLabel.get(labels[i]) ?? background;
    data.set(color, i * 4);
  }

  return { width, height, data };
}
