import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { OtpError } from '../domain/OtpError.js';
import { CustomerClient } from './CustomerClient.js';
import { HttpStatusError, describeError } from './http.js';
import { NotificationClient, NotificationDispatchError } from './NotificationClient.js';
import { NumberInformationClient } from './NumberInformationClient.js';

describe('collaborator clients', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const jsonResponse = (body: unknown, status = 200): Response =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

  const faultOf = async (promise: Promise<unknown>): Promise<string | undefined> => {
    try {
      await promise;
    } catch (error) {
      return error instanceof OtpError ? error.faultReason : undefined;
    }
    return undefined;
  };

  describe('CustomerClient', () => {
    const client = new CustomerClient({ baseUrl: 'http://customers.test', timeoutMs: 1000 });

    it('queries by number and returns the account id', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ accountId: 'acc-42', name: 'ignored' }));

      await expect(client.resolve('+306941234567')).resolves.toBe('acc-42');
      expect(fetchMock.mock.calls[0][0]).toBe('http://customers.test/customers?number=%2B306941234567');
    });

    it('maps a client error to CUSTOMER_ERROR', async () => {
      fetchMock.mockResolvedValue(new Response('no such customer', { status: 404 }));

      expect(await faultOf(client.resolve('+306941234567'))).toBe('CUSTOMER_ERROR');
    });

    it('maps a server error to TRANSPORT_ERROR', async () => {
      fetchMock.mockResolvedValue(new Response('boom', { status: 503 }));

      expect(await faultOf(client.resolve('+306941234567'))).toBe('TRANSPORT_ERROR');
    });

    it('maps a network failure to TRANSPORT_ERROR', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      expect(await faultOf(client.resolve('+306941234567'))).toBe('TRANSPORT_ERROR');
    });

    it('rejects a response without an account id', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ name: 'nobody' }));

      expect(await faultOf(client.resolve('+306941234567'))).toBe('TRANSPORT_ERROR');
    });
  });

  describe('NumberInformationClient', () => {
    const client = new NumberInformationClient({ url: 'http://numbers.test/lookup', timeoutMs: 1000 });

    it('returns the status text', async () => {
      fetchMock.mockResolvedValue(new Response('VALID', { status: 200 }));

      await expect(client.resolve('+306941234567')).resolves.toBe('VALID');
      expect(fetchMock.mock.calls[0][0]).toBe('http://numbers.test/lookup?msisdn=%2B306941234567');
    });

    it('maps any failure to NUMBER_INFORMATION_ERROR', async () => {
      fetchMock.mockResolvedValueOnce(new Response('bad', { status: 400 }));
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      expect(await faultOf(client.resolve('+306941234567'))).toBe('NUMBER_INFORMATION_ERROR');
      expect(await faultOf(client.resolve('+306941234567'))).toBe('NUMBER_INFORMATION_ERROR');
    });
  });

  describe('NotificationClient', () => {
    const client = new NotificationClient({ url: 'http://notify.test/notifications', timeoutMs: 1000 });

    it('posts the request as JSON and returns the result', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ status: 'SENT' }));

      const result = await client.dispatch({ channel: 'SMS', destination: '+306941234567', message: '482915' });

      expect(result).toEqual({ status: 'SENT' });
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('http://notify.test/notifications');
      expect(init?.method).toBe('POST');
      expect(init?.body).toBe('{"channel":"SMS","destination":"+306941234567","message":"482915"}');
    });

    it('raises NotificationDispatchError on a failed call', async () => {
      fetchMock.mockResolvedValue(new Response('down', { status: 500 }));

      await expect(
        client.dispatch({ channel: 'AUTO', destination: '+306941234567', message: '482915' })
      ).rejects.toBeInstanceOf(NotificationDispatchError);
    });
  });

  describe('describeError', () => {
    it('includes the response body of a failed call', () => {
      expect(describeError(new HttpStatusError('http://customers.test/customers', 404, 'no such customer'))).toBe(
        'HTTP 404 from http://customers.test/customers: no such customer'
      );
    });

    it('leaves out an empty body', () => {
      expect(describeError(new HttpStatusError('http://numbers.test/lookup', 500, ''))).toBe(
        'HTTP 500 from http://numbers.test/lookup'
      );
    });
  });
});
