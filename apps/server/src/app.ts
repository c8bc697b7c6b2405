import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { analysisRouter } from './routes/analyze';
import type { ServerConfig } from './config';
import type { ErrorResponse } from '@shared/types';

/**
 * Create the express application with security, compression and the analysis API
 */
export function createApp(config: ServerConfig): express.Express {
  const app = express();

  // Security and performance middleware
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin }));
  app.use(compression());

  // Body parsing middleware
  app.use(express.json({ limit: config.bodyLimit }));

  app.use('/api', analysisRouter(config));

  app.use((req: Request, res: Response) => {
    const response: ErrorResponse = {
      error: `Not found: ${req.method} ${req.path}`,
      code: 'NOT_FOUND',
    };
    res.status(404).json(response);
  });

  // Error handling middleware (malformed JSON, oversized bodies, ...)
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(error);
    if (status >= 500) {
      console.error('Unhandled error:', error);
    } else {
      console.warn('Rejected request:', error instanceof Error ? error.message : error);
    }

    const response: ErrorResponse = {
      error: status >= 500 ? 'Internal server error' : 'Malformed request',
      details: config.development && error instanceof Error ? error.stack : undefined,
      code: status >= 500 ? 'UNHANDLED_ERROR' : 'INVALID_REQUEST',
    };
    res.status(status).json(response);
  });

  return app;
}

function errorStatus(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
}
