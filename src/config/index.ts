/**
 * Configuration module
 *
 * Parses and validates environment variables using Zod.
 * Provides type-safe access to all configuration values.
 */

import { z } from 'zod';

/**
 * Log level options
 */
const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']).default('info');

/**
 * Notification channels the dispatcher understands
 */
export const channelSchema = z.enum(['AUTO', 'SMS', 'EMAIL', 'PUSH']);

/**
 * Configuration schema with all environment variables
 */
const configSchema = z.object({
  api: z.object({
    port: z.coerce.number().int().min(1).max(65535).default(8080),
  }),

  logging: z.object({
    level: logLevelSchema,
  }),

  database: z.object({
    path: z.string().min(1).default('./data/otp.db'),
  }),

  // Collaborator services reached over HTTP
  services: z.object({
    customerUrl: z.string().url().default('http://localhost:8081'),
    numberInformationUrl: z.string().url().default('http://localhost:8082/number-information'),
    notificationUrl: z.string().url().default('http://localhost:8083/notifications'),
    timeoutMs: z.coerce.number().int().min(1000).max(30000).default(5000),
  }),

  otp: z.object({
    applicationId: z.string().min(1).default('PPR'),
    defaultChannel: channelSchema.default('AUTO'),
    // Attempt ceiling for the seeded default application
    attemptsAllowed: z.coerce.number().int().min(0).max(100).default(3),
  }),
});

/**
 * Inferred TypeScript type from the schema
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Parse environment variables into config object
 */
function parseEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return {
    api: {
      port: env.HTTP_PORT,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
    database: {
      path: env.DATABASE_PATH,
    },
    services: {
      customerUrl: env.CUSTOMER_SERVICE_URL,
      numberInformationUrl: env.NUMBER_INFORMATION_URL,
      notificationUrl: env.NOTIFICATION_SERVICE_URL,
      timeoutMs: env.SERVICES_TIMEOUT_MS,
    },
    otp: {
      applicationId: env.OTP_APPLICATION_ID,
      defaultChannel: env.OTP_DEFAULT_CHANNEL,
      attemptsAllowed: env.OTP_ATTEMPTS_ALLOWED,
    },
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Load and validate configuration from environment variables
 * Throws on validation failure with descriptive error messages
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(parseEnvVars(env));

  if (!result.success) {
    const errors = formatIssues(result.error)
      .map((issue) => `  - ${issue}`)
      .join('\n');

    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}

/**
 * Singleton config instance
 * Loaded lazily on first access
 */
let configInstance: Config | null = null;

/**
 * Get the configuration singleton
 * Throws if configuration is invalid
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

/**
 * Check if configuration is valid without throwing
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): { valid: boolean; errors?: string[] } {
  const result = configSchema.safeParse(parseEnvVars(env));

  if (!result.success) {
    return { valid: false, errors: formatIssues(result.error) };
  }

  return { valid: true };
}

