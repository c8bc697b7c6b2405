import { Router, type Request, type Response } from 'express';
import { PNG } from 'pngjs';
import { z } from 'zod';
import { analyzeHierarchy } from '../analysis/index';
import { perimeterOrder } from '../analysis/perimeter';
import { directChildCounts, parentOrder } from '../analysis/hierarchy';
import { filterByAspectRatio } from '../analysis/filter';
import { axisAlignedBounds } from '../analysis/bounds';
import { generateContrastingColors } from '../analysis/palette';
import { colorizePrincipalRegions } from '../analysis/regions';
import type { ServerConfig } from '../config';
import type { Contour, ErrorResponse, RotatedRect } from '@shared/types';

const MAX_PALETTE_SIZE = 4096;

// Request schemas

const PointSchema = z.object({
  x: z.number(),
  y: z.number(),
});

const RectSchema = z.tuple([PointSchema, PointSchema, PointSchema, PointSchema]);

const BorderTypeSchema = z.enum(['outer', 'hole']);

const ContourSchema = z.object({
  points: z.array(PointSchema),
  borderType: BorderTypeSchema,
  // Out-of-range parents are tolerated and ignored by the child counter
  parent: z.number().int().optional(),
});

const AspectRatioSchema = z.number().positive().finite();

const PerimeterRequestSchema = z.object({
  contours: z.array(ContourSchema),
  minPerimeter: z.number().min(0).finite().optional(),
});

const ChildrenRequestSchema = z.object({
  contours: z.array(ContourSchema),
});

const FilterRequestSchema = z.object({
  contours: z.array(ContourSchema.extend({ rect: RectSchema })),
  maxAspectRatio: AspectRatioSchema.optional(),
  borderType: BorderTypeSchema.optional(),
});

const AnalyzeRequestSchema = z
  .object({
    contours: z.array(ContourSchema),
    rects: z.array(RectSchema).optional(),
    minPerimeter: z.number().min(0).finite().optional(),
    maxAspectRatio: AspectRatioSchema.optional(),
    borderType: BorderTypeSchema.optional(),
    alpha: z.number().int().min(0).max(255).optional(),
  })
  .refine(body => !body.rects || body.rects.length === body.contours.length, {
    message: 'rects must have one entry per contour',
    path: ['rects'],
  });

const BoundsRequestSchema = z.object({
  vertices: RectSchema,
});

const PaletteQuerySchema = z.object({
  n: z.coerce.number().int().min(0).max(MAX_PALETTE_SIZE),
  alpha: z.coerce.number().int().min(0).max(255).default(255),
});

const ChannelSchema = z.number().int().min(0).max(255);

const ColorizeRequestSchema = z
  .object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    labels: z.array(z.number().int().min(0)),
    count: z.number().int().min(0),
    background: z.tuple([ChannelSchema, ChannelSchema, ChannelSchema, ChannelSchema]).default([0, 0, 0, 255]),
  })
  .refine(body => body.labels.length === body.width * body.height, {
    message: 'labels must hold width * height entries',
    path: ['labels'],
  });

/**
 * Build the analysis API router
 */
export function analysisRouter(config: ServerConfig): Router {
  const router = Router();

  // GET /api/health
  router.get('/health', (_req, res) => {
    res.json({ ok: true, timestamp: new Date().toISOString() });
  });

  // POST /api/contours/perimeter
  router.post('/contours/perimeter', (req, res) => {
    handle('PERIMETER', req, res, config, () => {
      const body = parseOrReject(PerimeterRequestSchema, req.body, res);
      if (!body) return;

      const ranked = perimeterOrder(body.contours, body.minPerimeter ?? 0);
      res.json({ ranked });
    });
  });

  // POST /api/contours/children
  router.post('/contours/children', (req, res) => {
    handle('CHILDREN', req, res, config, () => {
      const body = parseOrReject(ChildrenRequestSchema, req.body, res);
      if (!body) return;

      res.json({
        counts: directChildCounts(body.contours),
        parents: parentOrder(body.contours),
      });
    });
  });

  // POST /api/contours/filter
  router.post('/contours/filter', (req, res) => {
    handle('FILTER', req, res, config, () => {
      const body = parseOrReject(FilterRequestSchema, req.body, res);
      if (!body) return;

      const maxAspectRatio = body.maxAspectRatio ?? config.defaultMaxAspectRatio;
      const rectByPoints = new Map<Contour['points'], RotatedRect>();
      const candidates = body.contours.map((contour, index) => {
        const points = contour.points.slice();
        rectByPoints.set(points, contour.rect);
        return { ...contour, points, index };
      });

      filterByAspectRatio(candidates, maxAspectRatio, body.borderType, points => {
        const rect = rectByPoints.get(points);
        if (!rect) {
          throw new Error('No rect supplied for contour');
        }
        return rect;
      });

      console.log(`[FILTER] Kept ${candidates.length}/${body.contours.length} contours below ${maxAspectRatio}`);

      res.json({
        maxAspectRatio,
        kept: candidates.map(candidate => candidate.index),
        contours: candidates.map(({ points, borderType, parent }) => ({ points, borderType, parent })),
      });
    });
  });

  // POST /api/contours/analyze
  router.post('/contours/analyze', (req, res) => {
    handle('ANALYZE', req, res, config, () => {
      const body = parseOrReject(AnalyzeRequestSchema, req.body, res);
      if (!body) return;

      const report = analyzeHierarchy(body.contours, {
        minPerimeter: body.minPerimeter,
        maxAspectRatio: body.maxAspectRatio ?? config.defaultMaxAspectRatio,
        borderType: body.borderType,
        rects: body.rects,
        alpha: body.alpha,
      });
      res.json(report);
    });
  });

  // POST /api/rect/bounds
  router.post('/rect/bounds', (req, res) => {
    handle('BOUNDS', req, res, config, () => {
      const body = parseOrReject(BoundsRequestSchema, req.body, res);
      if (!body) return;

      res.json(axisAlignedBounds(body.vertices));
    });
  });

  // GET /api/palette?n=5&alpha=255
  router.get('/palette', (req, res) => {
    handle('PALETTE', req, res, config, () => {
      const query = parseOrReject(PaletteQuerySchema, req.query, res);
      if (!query) return;

      res.json({ colors: generateContrastingColors(query.n, query.alpha) });
    });
  });

  // POST /api/regions/colorize -> image/png
  router.post('/regions/colorize', (req, res) => {
    handle('COLORIZE', req, res, config, () => {
      const body = parseOrReject(ColorizeRequestSchema, req.body, res);
      if (!body) return;

      const image = colorizePrincipalRegions(body, body.count, body.background);
      const png = new PNG({ width: image.width, height: image.height });
      png.data = Buffer.from(image.data);

      res.type('image/png').send(PNG.sync.write(png));
    });
  });

  return router;
}

/**
 * Validate input against a schema, answering 400 on failure
 */
function parseOrReject<S extends z.ZodTypeAny>(schema: S, input: unknown, res: Response): z.infer<S> | undefined {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }

  const response: ErrorResponse = {
    error: 'Invalid request',
    details: parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; '),
    code: 'INVALID_REQUEST',
  };
  res.status(400).json(response);
  return undefined;
}

/**
 * Run a route body, turning thrown errors into a 500 response
 */
function handle(tag: string, req: Request, res: Response, config: ServerConfig, body: () => void): void {
  try {
    body();
  } catch (error) {
    console.error(`[${tag}] ${req.method} ${req.originalUrl} failed:`, error);
    const response: ErrorResponse = {
      error: error instanceof Error ? error.message : 'Internal server error',
      details: config.development && error instanceof Error ? error.stack : undefined,
      code: 'PROCESSING_ERROR',
    };
    res.status(500).json(response);
  }
}
