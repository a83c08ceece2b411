/**
 * Readability Toolkit - API application
 *
 * Express application exposing the text statistics and readability formulas
 * over REST. Built by a factory so tests can mount it without listening.
 */

import express from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import helmet from 'helmet';
import compression from 'compression';
import { v4 as uuidv4 } from 'uuid';
import { createReadabilityRouter } from './routes/readability';
import { getServerConfig, isDevelopment } from './config';
import logger from './utils/logger';

interface HttpError {
  status: number;
  message: string;
  stack?: string;
}

// body-parser and http-errors put the status on the error object
const toHttpError = (err: unknown): HttpError => {
  if (!(err instanceof Error)) {
    return { status: 500, message: String(err) };
  }
  const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
  return { status, message: err.message, stack: err.stack };
};

const assignRequestId = (req: express.Request, res: express.Response, next: express.NextFunction) => {
  const requestId = req.get('X-Request-Id') || uuidv4();
  res.locals.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);
  next();
};

const healthCheck = (req: express.Request, res: express.Response) => {
  logger.debug('Health check endpoint called');
  res.json({ status: 'ok', message: 'Readability API is running' });
};

const notFound = (req: express.Request, res: express.Response) => {
  res.status(404).json({
    error: 'Not found',
    code: 'NOT_FOUND',
    message: `No route for ${req.method} ${req.path}`,
  });
};

// Error handling middleware
const handleErrors = (err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
  const error = toHttpError(err);
  const { status } = error;

  logger.error('Request failed', { requestId: res.locals.requestId, status, error: error.message });

  if (res.headersSent) {
    next(err);
    return;
  }

  res.status(status).json({
    error: status === 500 ? 'Internal server error' : error.message,
    code: status === 500 ? 'INTERNAL_ERROR' : 'REQUEST_ERROR',
    ...(isDevelopment() && { stack: error.stack }),
  });
};

export function createApp(): express.Express {
  const config = getServerConfig();
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(compression());

  // Rate limiting
  const generalLimiter = rateLimit({
    windowMs: config.rateLimitWindowMs,
    limit: config.rateLimitMax,
    message: {
      error: 'Too many requests from this IP, please try again later.',
      code: 'RATE_LIMITED',
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', generalLimiter);

  // CORS and body parsing
  app.use(cors());
  app.use(assignRequestId);
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));

  // Routes
  app.use('/api', createReadabilityRouter());
  app.get('/health', healthCheck);

  app.use(notFound);
  app.use(handleErrors);

  return app;
}

export default createApp;
