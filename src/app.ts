import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';

import { createCycleRouter } from './routes/cycle.routes.js';
import { createExternalRouter } from './routes/external.routes.js';
import { createNominationRouter } from './routes/nomination.routes.js';
import { createReviewRouter } from './routes/review.routes.js';
import { getEnvironment } from './config/env.js';
import { isWorkflowError, statusForErrorCode } from './types/errors.js';
import { HTTP_STATUS, sendError } from './utils/http.js';

/**
 * HTTP status carried by errors from body parsing and similar middleware
 */
function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return HTTP_STATUS.INTERNAL_SERVER_ERROR;
}

/**
 * Create and configure Express application
 *
 * Sets up middleware, routes, and error handling for the feedback workflow
 * service: review cycles, nominations, request handling for employees, and
 * token-based access for external reviewers.
 */
export function createApp(): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Request logging middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      console.log(`[${new Date().toISOString()}] ${req.method} ${req.path} ${res.statusCode} ${duration}ms`);
    });
    next();
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // API Routes
  app.use('/api/cycles', createCycleRouter());
  app.use('/api/nominations', createNominationRouter());
  app.use('/api/requests', createReviewRouter());
  app.use('/api/external', createExternalRouter());

  // 404 handler
  app.use((req: Request, res: Response) => {
    sendError(res, HTTP_STATUS.NOT_FOUND, 'NOT_FOUND', `Route ${req.method} ${req.path} not found`);
  });

  // Global error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[ERROR]', err);

    if (isWorkflowError(err)) {
      sendError(res, statusForErrorCode(err.code), err.code, err.message, err.details);
      return;
    }

    const statusCode = statusOf(err);
    const message =
      statusCode < HTTP_STATUS.INTERNAL_SERVER_ERROR && err instanceof Error
        ? err.message
        : 'An unexpected error occurred';

    sendError(
      res,
      statusCode,
      statusCode === HTTP_STATUS.BAD_REQUEST ? 'INVALID_REQUEST' : 'INTERNAL_SERVER_ERROR',
      message,
      getEnvironment() === 'development' && err instanceof Error ? { stack: err.stack } : undefined
    );
  });

  return app;
}
