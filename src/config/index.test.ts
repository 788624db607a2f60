import { afterEach, describe, expect, it } from 'vitest';
import { loadConfig, resetConfig, validateConfig } from './index.js';

describe('config', () => {
  afterEach(() => {
    resetConfig();
  });

  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.api.port).toBe(8080);
    expect(config.database.path).toBe('./data/otp.db');
    expect(config.services.timeoutMs).toBe(5000);
    expect(config.otp).toEqual({ applicationId: 'PPR', defaultChannel: 'AUTO', attemptsAllowed: 3 });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      HTTP_PORT: '9090',
      OTP_DEFAULT_CHANNEL: 'SMS',
      OTP_ATTEMPTS_ALLOWED: '5',
      CUSTOMER_SERVICE_URL: 'http://customers.internal:8000',
    });

    expect(config.api.port).toBe(9090);
    expect(config.otp.defaultChannel).toBe('SMS');
    expect(config.otp.attemptsAllowed).toBe(5);
    expect(config.services.customerUrl).toBe('http://customers.internal:8000');
  });

  it('rejects an unknown channel', () => {
    expect(() => loadConfig({ OTP_DEFAULT_CHANNEL: 'FAX' })).toThrow(/Configuration validation failed/);
  });

  it('reports every invalid value', () => {
    const result = validateConfig({ HTTP_PORT: '0', SERVICES_TIMEOUT_MS: '10' });

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(2);
    expect(result.errors?.[0]).toMatch(/^api\.port: /);
    expect(result.errors?.[1]).toMatch(/^services\.timeoutMs: /);
  });
});
