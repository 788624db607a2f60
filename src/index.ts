/**
 * OTP Lifecycle Service
 *
 * Main entry point - initializes database, collaborator clients, the OTP
 * service and the HTTP server.
 */

import type { Server } from 'http';
import { getConfig } from './config/index.js';
import { dbManager, runMigrations, seedDefaultApplication } from './database/index.js';
import { OtpRepository, ApplicationRepository } from './repositories/index.js';
import { CustomerClient, NumberInformationClient, NotificationClient } from './clients/index.js';
import { OtpService } from './services/index.js';
import { createServer } from './server.js';
import { logger, setLogLevel } from './utils/logger.js';

async function main(): Promise<void> {
  logger.info('OTP lifecycle service starting...');

  // Load and validate configuration
  const config = getConfig();
  setLogLevel(config.logging.level);
  logger.info('Configuration loaded', {
    port: config.api.port,
    database: config.database.path,
    services: config.services,
    otp: config.otp,
  });

  // Initialize database
  dbManager.connect(config.database.path);
  runMigrations();
  seedDefaultApplication({
    id: config.otp.applicationId,
    attemptsAllowed: config.otp.attemptsAllowed,
  });

  // Initialize repositories
  const otpRepo = new OtpRepository();
  const applicationRepo = new ApplicationRepository();

  // Initialize collaborator clients
  const timeoutMs = config.services.timeoutMs;
  const customers = new CustomerClient({ baseUrl: config.services.customerUrl, timeoutMs });
  const numberInformation = new NumberInformationClient({ url: config.services.numberInformationUrl, timeoutMs });
  const notifications = new NotificationClient({ url: config.services.notificationUrl, timeoutMs });

  const otpService = new OtpService(otpRepo, applicationRepo, customers, numberInformation, notifications, {
    applicationId: config.otp.applicationId,
    defaultChannel: config.otp.defaultChannel,
  });

  // Create and start HTTP server
  const app = createServer(otpService);
  const port = config.api.port;

  const server: Server = app.listen(port, () => {
    logger.info(`HTTP server listening on port ${port}`);
  });

  // Set up graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down...`);
    server.close((error) => {
      if (error) {
        logger.warn('Error closing HTTP server', { error: error.message });
      }
      dbManager.close();
      process.exit(0);
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  logger.info('Service ready', { applicationId: config.otp.applicationId });
}

main().catch((error: unknown) => {
  const msg = error instanceof Error ? error.message : String(error);
  logger.error('Failed to start service', { error: msg });
  process.exit(1);
});
