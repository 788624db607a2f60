/**
 * Customer Client
 *
 * Looks up the customer account owning a phone number.
 */

import { z } from 'zod';
import type { CustomerLookup } from './IServiceClients.js';
import { HttpStatusError, describeError, fetchWithTimeout } from './http.js';
import { OtpError } from '../domain/OtpError.js';
import { logger, maskPhone } from '../utils/logger.js';

const customerSchema = z.object({
  accountId: z.string().min(1),
});

export interface CustomerClientConfig {
  baseUrl: string;
  timeoutMs: number;
}

export class CustomerClient implements CustomerLookup {
  private config: CustomerClientConfig;

  constructor(config: CustomerClientConfig) {
    this.config = config;
  }

  async resolve(msisdn: string): Promise<string> {
    const url = new URL('/customers', this.config.baseUrl);
    url.searchParams.set('number', msisdn);

    let body: unknown;
    try {
      const response = await fetchWithTimeout(
        url.toString(),
        { method: 'GET', headers: { Accept: 'application/json' } },
        this.config.timeoutMs
      );
      body = await response.json();
    } catch (error) {
      if (error instanceof HttpStatusError && error.isClientError()) {
        logger.warn('Customer lookup rejected', { phone: maskPhone(msisdn), status: error.status });
        throw new OtpError('Error retrieving Customer', 'CUSTOMER_ERROR', undefined, { cause: error });
      }

      logger.error('Customer service call failed', { phone: maskPhone(msisdn), error: describeError(error) });
      throw new OtpError('Customer service unavailable', 'TRANSPORT_ERROR', undefined, { cause: error });
    }

    const parsed = customerSchema.safeParse(body);
    if (!parsed.success) {
      logger.error('Unexpected customer service response', { phone: maskPhone(msisdn) });
      throw new OtpError('Invalid customer service response', 'TRANSPORT_ERROR');
    }

    return parsed.data.accountId;
  }
}
