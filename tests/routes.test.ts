import request from 'supertest';
import { PNG } from 'pngjs';
import { createApp } from '../apps/server/src/app';
import { loadConfig } from '../apps/server/src/config';
import type { Point } from '../shared/types';

describe('Analysis API', () => {
  const app = createApp(loadConfig({}));

  const rectangle = (x: number, y: number, width: number, height: number): Point[] => [
    { x, y },
    { x: x + width, y },
    { x: x + width, y: y + height },
    { x, y: y + height },
  ];

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should report health', async () => {
    const res = await request(app).get('/api/health');
    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
  });

  it('should rank contours by perimeter', async () => {
    const res = await request(app)
      .post('/api/contours/perimeter')
      .send({
        contours: [
          { points: rectangle(0, 0, 1, 1), borderType: 'outer' },
          { points: rectangle(0, 0, 10, 10), borderType: 'outer' },
          { points: [{ x: 0, y: 0 }], borderType: 'hole', parent: 1 },
        ],
        minPerimeter: 1,
      });

    expect(res.status).toBe(200);
    expect(res.body.ranked).toEqual([
      { index: 1, perimeter: 40 },
      { index: 0, perimeter: 4 },
    ]);
  });

  it('should count children', async () => {
    const res = await request(app)
      .post('/api/contours/children')
      .send({
        contours: [
          { points: [], borderType: 'outer' },
          { points: [], borderType: 'hole', parent: 0 },
          { points: [], borderType: 'hole', parent: 0 },
          { points: [], borderType: 'outer', parent: 42 },
        ],
      });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      counts: [2, 0, 0, 0],
      parents: [{ index: 0, childCount: 2 }],
    });
  });

  describe('POST /api/contours/filter', () => {
    const contours = [
      { points: rectangle(0, 0, 10, 10), borderType: 'outer', rect: rectangle(0, 0, 10, 10) },
      { points: rectangle(20, 0, 20, 10), borderType: 'outer', rect: rectangle(20, 0, 20, 10) },
      { points: rectangle(2, 2, 3, 3), borderType: 'hole', parent: 0, rect: rectangle(2, 2, 3, 3) },
    ];

    it('should use the configured default threshold', async () => {
      const res = await request(app).post('/api/contours/filter').send({ contours });

      expect(res.status).toBe(200);
      expect(res.body.maxAspectRatio).toBe(5);
      expect(res.body.kept).toEqual([0, 1, 2]);
      expect(res.body.contours[2]).toEqual({ points: rectangle(2, 2, 3, 3), borderType: 'hole', parent: 0 });
    });

    it('should reject a rectangle whose ratio meets the threshold', async () => {
      const res = await request(app).post('/api/contours/filter').send({ contours, maxAspectRatio: 2 });

      expect(res.status).toBe(200);
      expect(res.body.kept).toEqual([0, 2]);
    });

    it('should apply an explicit threshold and border type', async () => {
      const res = await request(app)
        .post('/api/contours/filter')
        .send({ contours, maxAspectRatio: 5, borderType: 'outer' });

      expect(res.status).toBe(200);
      expect(res.body.kept).toEqual([0, 1]);
    });

    it('should reject a non-positive threshold', async () => {
      const res = await request(app).post('/api/contours/filter').send({ contours, maxAspectRatio: 0 });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('INVALID_REQUEST');
      expect(res.body.details).toContain('maxAspectRatio');
    });

    it('should reject contours without a rect', async () => {
      const res = await request(app)
        .post('/api/contours/filter')
        .send({ contours: [{ points: rectangle(0, 0, 10, 10), borderType: 'outer' }] });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('INVALID_REQUEST');
    });
  });

  it('should analyze a hierarchy', async () => {
    const res = await request(app)
      .post('/api/contours/analyze')
      .send({
        contours: [
          { points: rectangle(0, 0, 10, 10), borderType: 'outer' },
          { points: rectangle(2, 2, 2, 2), borderType: 'hole', parent: 0 },
        ],
        rects: [rectangle(0, 0, 10, 10), rectangle(2, 2, 2, 2)],
        maxAspectRatio: 3,
      });

    expect(res.status).toBe(200);
    expect(res.body.kept).toEqual([0, 1]);
    expect(res.body.parentOrder).toEqual([{ index: 0, childCount: 1 }]);
    expect(res.body.bounds).toEqual([
      { x: 0, y: 0, width: 10, height: 10 },
      { x: 2, y: 2, width: 2, height: 2 },
    ]);
  });

  it('should reject an analysis with mismatched rects', async () => {
    const res = await request(app)
      .post('/api/contours/analyze')
      .send({
        contours: [{ points: rectangle(0, 0, 10, 10), borderType: 'outer' }],
        rects: [],
      });

    expect(res.status).toBe(400);
    expect(res.body.details).toBe('rects: rects must have one entry per contour');
  });

  it('should project rect bounds', async () => {
    const res = await request(app)
      .post('/api/rect/bounds')
      .send({ vertices: [{ x: -10, y: -20 }, { x: 50, y: 30 }, { x: 50, y: -20 }, { x: -10, y: 30 }] });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ x: 0, y: 0, width: 50, height: 30 });
  });

  it('should reject bounds without exactly four vertices', async () => {
    const res = await request(app)
      .post('/api/rect/bounds')
      .send({ vertices: [{ x: 0, y: 0 }, { x: 1, y: 1 }] });

    expect(res.status).toBe(400);
  });

  it('should generate a palette', async () => {
    const res = await request(app).get('/api/palette').query({ n: 3, alpha: 100 });

    expect(res.status).toBe(200);
    expect(res.body.colors).toEqual([
      [242, 13, 13, 100],
      [13, 242, 13, 100],
      [13, 13, 242, 100],
    ]);
  });

  it('should reject a negative palette size', async () => {
    const res = await request(app).get('/api/palette').query({ n: -1 });
    expect(res.status).toBe(400);
  });

  it('should colorize principal regions as PNG', async () => {
    const res = await request(app)
      .post('/api/regions/colorize')
      .send({ width: 2, height: 2, labels: [1, 1, 2, 0], count: 1 });

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toContain('image/png');

    const png = PNG.sync.read(res.body);
    expect(png.width).toBe(2);
    expect(png.height).toBe(2);
    expect(Array.from(png.data.subarray(0, 4))).toEqual([242, 13, 13, 255]);
    expect(Array.from(png.data.subarray(8, 12))).toEqual([0, 0, 0, 255]);
  });

  it('should reject a label array that does not fill the image', async () => {
    const res = await request(app)
      .post('/api/regions/colorize')
      .send({ width: 2, height: 2, labels: [1], count: 1 });

    expect(res.status).toBe(400);
    expect(res.body.details).toBe('labels: labels must hold width * height entries');
  });

  it('should answer malformed JSON with 400', async () => {
    const res = await request(app)
      .post('/api/contours/perimeter')
      .set('Content-Type', 'application/json')
      .send('{"contours": [');

    expect(res.status).toBe(400);
    expect(res.body.code).toBe('INVALID_REQUEST');
  });

  it('should answer unknown routes with 404', async () => {
    const res = await request(app).get('/api/unknown');
    expect(res.status).toBe(404);
    expect(res.body.code).toBe('NOT_FOUND');
  });
});
