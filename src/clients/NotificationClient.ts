/**
 * Notification Client
 *
 * Posts notification requests to the external notification service, which
 * owns channel selection and delivery.
 */

import { z } from 'zod';
import type { NotificationDispatcher, NotificationRequest, NotificationResult } from './IServiceClients.js';
import { describeError, fetchWithTimeout } from './http.js';
import { logger } from '../utils/logger.js';

const notificationResultSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
});

/**
 * Dispatcher call failure. Not a fault reason: callers decide how to surface it.
 */
export class NotificationDispatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotificationDispatchError';
  }
}

export interface NotificationClientConfig {
  url: string;
  timeoutMs: number;
}

export class NotificationClient implements NotificationDispatcher {
  private config: NotificationClientConfig;

  constructor(config: NotificationClientConfig) {
    this.config = config;
  }

  async dispatch(request: NotificationRequest): Promise<NotificationResult> {
    let body: unknown;
    try {
      const response = await fetchWithTimeout(
        this.config.url,
        {
          method: 'POST',
          headers: {
            Accept: 'application/json',
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(request),
        },
        this.config.timeoutMs
      );
      body = await response.json();
    } catch (error) {
      const message = describeError(error);
      logger.warn('Notification dispatch failed', { channel: request.channel, error: message });
      throw new NotificationDispatchError(`Notification dispatch failed: ${message}`, { cause: error });
    }

    const parsed = notificationResultSchema.safeParse(body);
    if (!parsed.success) {
      throw new NotificationDispatchError('Invalid notification service response');
    }

    return parsed.data;
  }
}
