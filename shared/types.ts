/**
 * Shared TypeScript types for the contour analysis API
 */
export interface Point {
  x: number;
  y: number;
}

/** Outer borders bound foreground, holes bound background nested inside it */
export type BorderType = 'outer' | 'hole';

export interface Contour {
  /** Boundary points, implicitly closed (last connects back to first) */
  points: Point[];
  borderType: BorderType;
  /** Position of the parent contour in the same hierarchy */
  parent?: number;
}

/** Ordered contours; array position is the identity parent links refer to */
export type ContourHierarchy = Contour[];

/** Four ordered vertices of a minimum-area (possibly rotated) rectangle */
export type RotatedRect = [Point, Point, Point, Point];

/** Geometry collaborator producing the minimum-area rectangle of a point set */
export type MinAreaRectFn = (points: Point[]) => RotatedRect;

export interface AxisAlignedBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** 8-bit RGBA color */
export type Rgba = [r: number, g: number, b: number, a: number];

export interface LabelMap {
  width: number;
  height: number;
  /** Row-major region labels, 0 = background */
  labels: ArrayLike<number>;
}

export interface ImageData {
  /** Image width in pixels */
  width: number;
  /** Image height in pixels */
  height: number;
  /** RGBA pixel data */
  data: Uint8Array;
}

export interface PerimeterEntry {
  index: number;
  perimeter: number;
}

export interface ChildCountEntry {
  index: number;
  childCount: number;
}

export interface Region {
  label: number;
  /** Pixel count */
  size: number;
}

export interface AnalysisOptions {
  /** Perimeter cutoff for the perimeter order */
  minPerimeter?: number;
  /** Aspect-ratio threshold; filtering runs only when rects are supplied */
  maxAspectRatio: number;
  borderType?: BorderType;
  /** Minimum-area rectangle per contour, by position */
  rects?: RotatedRect[];
  /** Alpha applied to the generated palette */
  alpha?: number;
}

export interface AnalysisReport {
  contourCount: number;
  outerCount: number;
  holeCount: number;
  perimeterOrder: PerimeterEntry[];
  parentOrder: ChildCountEntry[];
  /** Indices surviving the aspect-ratio filter (all indices when not filtered) */
  kept: number[];
  /** Axis-aligned bounds of each supplied rect */
  bounds: AxisAlignedBox[];
  /** One color per kept contour */
  palette: Rgba[];
  metrics: AnalysisMetrics;
}

export interface AnalysisMetrics {
  /** Sum of perimeters in the perimeter order */
  totalPerimeter: number;
  /** Processing time breakdown */
  timings: {
    ranking: number;
    filtering: number;
    total: number;
  };
}

export interface ErrorResponse {
  error: string;
  details?: string;
  code?: string;
}
