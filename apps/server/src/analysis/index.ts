import { perimeterOrder } from './perimeter';
import { parentOrder } from './hierarchy';
import { filterByAspectRatio } from './filter';
import { axisAlignedBounds } from './bounds';
import { generateContrastingColors } from './palette';
import type { AnalysisOptions, AnalysisReport, Contour, RotatedRect } from '@shared/types';

interface IndexedContour extends Contour {
  index: number;
}

/**
 * Run every contour analysis over one hierarchy snapshot
 * The input hierarchy is left untouched; filtering works on an index-tagged copy.
 */
export function analyzeHierarchy(contours: readonly Contour[], options: AnalysisOptions): AnalysisReport {
  const startTime = Date.now();
  const timings = {
    ranking: 0,
    filtering: 0,
    total: 0,
  };

  const { rects } = options;
  if (rects && rects.length !== contours.length) {
    throw new Error(`Expected ${contours.length} rects, got ${rects.length}`);
  }

  // Step 1: Rankings
  const rankingStart = Date.now();
  const byPerimeter = perimeterOrder(contours, options.minPerimeter ?? 0);
  const byChildren = parentOrder(contours);
  timings.ranking = Date.now() - rankingStart;

  console.log(`Ranked ${byPerimeter.length}/${contours.length} contours by perimeter, ${byChildren.length} parents`);

  // Step 2: Aspect-ratio filter, only when the rect collaborator's output is available
  const filterStart = Date.now();
  let kept = contours.map((_, index) => index);
  if (rects) {
    // Each candidate gets its own points array, so contours sharing one still map to their own rect
    const rectByPoints = new Map<Contour['points'], RotatedRect>();
    const candidates: IndexedContour[] = contours.map((contour, index) => {
      const points = contour.points.slice();
      rectByPoints.set(points, rects[index]);
      return { ...contour, points, index };
    });

    filterByAspectRatio(candidates, options.maxAspectRatio, options.borderType, points => {
      const rect = rectByPoints.get(points);
      if (!rect) {
        throw new Error('No rect supplied for contour');
      }
      return rect;
    });

    kept = candidates.map(candidate => candidate.index);
    console.log(`Kept ${kept.length}/${contours.length} contours below aspect ratio ${options.maxAspectRatio}`);
  }
  timings.filtering = Date.now() - filterStart;

  const totalPerimeter = byPerimeter.reduce((total, entry) => total + entry.perimeter, 0);

  timings.total = Date.now() - startTime;

  return {
    contourCount: contours.length,
    outerCount: contours.filter(contour => contour.borderType === 'outer').length,
    holeCount: contours.filter(contour => contour.borderType === 'hole').length,
    perimeterOrder: byPerimeter,
    parentOrder: byChildren,
    kept,
    bounds: rects ? rects.map(rect => axisAlignedBounds(rect)) : [],
    palette: generateContrastingColors(kept.length, options.alpha ?? 255),
    metrics: {
      totalPerimeter,
      timings,
    },
  };
}
