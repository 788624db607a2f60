/**
 * Number Information Client
 *
 * Checks that a phone number is valid with the external number-information service.
 */

import type { NumberInformation } from './IServiceClients.js';
import { describeError, fetchWithTimeout } from './http.js';
import { OtpError } from '../domain/OtpError.js';
import { logger, maskPhone } from '../utils/logger.js';

export interface NumberInformationConfig {
  url: string;
  timeoutMs: number;
}

export class NumberInformationClient implements NumberInformation {
  private config: NumberInformationConfig;

  constructor(config: NumberInformationConfig) {
    this.config = config;
  }

  async resolve(msisdn: string): Promise<string> {
    const url = new URL(this.config.url);
    url.searchParams.set('msisdn', msisdn);

    try {
      const response = await fetchWithTimeout(url.toString(), { method: 'GET' }, this.config.timeoutMs);
      const status = await response.text();

      logger.debug('Number information resolved', { phone: maskPhone(msisdn), status });
      return status;
    } catch (error) {
      logger.warn('Number information lookup failed', { phone: maskPhone(msisdn), error: describeError(error) });
      throw new OtpError('Error retrieving msisdn status', 'NUMBER_INFORMATION_ERROR', undefined, { cause: error });
    }
  }
}
