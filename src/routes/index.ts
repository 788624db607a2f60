/**
 * Routes Registration
 *
 * Registers all HTTP routes with Express app.
 */

import type { Express, Request, Response, NextFunction } from 'express';
import { OtpController } from '../controllers/OtpController.js';
import type { OtpService } from '../services/OtpService.js';
import { isDbConnected } from '../database/index.js';
import { logger } from '../utils/logger.js';

type Handler = (req: Request, res: Response) => Promise<void>;

/**
 * Adapt an async handler so rejections reach the error middleware
 */
function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

/**
 * Register all routes
 */
export function registerRoutes(app: Express, otpService: OtpService): void {
  const otpController = new OtpController(otpService);

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    const dbConnected = isDbConnected();

    res.status(dbConnected ? 200 : 503).json({
      status: dbConnected ? 'healthy' : 'degraded',
      database: dbConnected ? 'connected' : 'disconnected',
      uptime: Math.floor(process.uptime()),
      version: '1.0.0',
    });
  });

  app.post('/otp/send', route((req, res) => otpController.send(req, res)));
  app.post('/otp/:otpId/validate', route((req, res) => otpController.validate(req, res)));
  app.post('/otp/:otpId/resend', route((req, res) => otpController.resend(req, res)));
  app.get('/otp/:otpId', route((req, res) => otpController.get(req, res)));
  app.get('/otp', route((req, res) => otpController.getAll(req, res)));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'not_found', message: 'Endpoint not found' });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error', { error: err.message, stack: err.stack });
    res.status(500).json({ error: 'internal_error', message: 'Internal server error' });
  });

  logger.info('Routes registered');
}
