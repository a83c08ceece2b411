/**
 * Readability Toolkit - API Server
 *
 * Starts the Express application from ./app and installs process-level
 * error handlers.
 *
 * Endpoints:
 * - POST /api/readability        readability report for a JSON text
 * - POST /api/readability/file   readability report for an uploaded text file
 * - POST /api/stats              aggregate text statistics
 * - GET  /api/grades/:score      age and grade for an ARI score
 * - GET  /health
 *
 * @requires Express.js 5.x
 * @requires Node.js 20.x
 */

import dotenv from 'dotenv';

// Load environment variables before anything reads the configuration
dotenv.config();

import { createApp } from './app';
import { getServerConfig } from './config';
import logger from './utils/logger';

const { port, host } = getServerConfig();
const app = createApp();

const server = app.listen(port, host, () => {
  logger.info(`API server running on port ${port}`);
  logger.info('Health check: /health');
  logger.info('Readability endpoint: /api/readability');
});

server.on('error', (err) => {
  logger.error('Server error', { error: err.message });
  process.exit(1);
});

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
  process.exit(1);
});

export default app;
