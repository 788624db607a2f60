/**
 * HTTP API Server
 *
 * Express server exposing the OTP endpoints.
 */

import express from 'express';
import type { Express } from 'express';
import type { OtpService } from './services/OtpService.js';
import { registerRoutes } from './routes/index.js';
import { logger } from './utils/logger.js';

/**
 * Create and configure Express application
 */
export function createServer(otpService: OtpService): Express {
  const app = express();

  app.use(express.json({ limit: '10kb' }));

  registerRoutes(app, otpService);

  logger.info('HTTP server configured');

  return app;
}
