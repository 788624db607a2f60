import { describe, expect, it } from 'vitest';
import { normalizeMsisdn } from './msisdn.js';

describe('normalizeMsisdn', () => {
  it('keeps an E.164 number as is', () => {
    expect(normalizeMsisdn('+306941234567')).toBe('+306941234567');
  });

  it('adds the leading plus and strips separators', () => {
    expect(normalizeMsisdn('30 694-123-4567')).toBe('+306941234567');
    expect(normalizeMsisdn('(+30) 6941234567')).toBe('+306941234567');
  });

  it('treats a 00 prefix as international', () => {
    expect(normalizeMsisdn('00306941234567')).toBe('+306941234567');
  });

  it('rejects input that is not a number', () => {
    expect(normalizeMsisdn('call me')).toBeNull();
    expect(normalizeMsisdn('')).toBeNull();
    expect(normalizeMsisdn('+12')).toBeNull();
  });
});
