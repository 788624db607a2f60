/**
 * OTP Fault Reasons
 *
 * Classified failure causes surfaced by the orchestrator. Collaborator and
 * storage errors are re-wrapped into one of these before leaving the service.
 */

import type { Otp } from './Otp.js';

export type FaultReason =
  | 'CUSTOMER_ERROR'
  | 'NUMBER_INFORMATION_ERROR'
  | 'NOT_FOUND'
  | 'APPLICATION_NOT_FOUND'
  | 'TOO_MANY_ATTEMPTS'
  | 'INVALID_PIN'
  | 'INVALID_STATUS'
  | 'EXPIRED'
  | 'STORAGE_ERROR'
  | 'TRANSPORT_ERROR';

export class OtpError extends Error {
  readonly faultReason: FaultReason;
  /** Snapshot of the OTP at failure time, mutated by the attempt where relevant */
  readonly otp?: Otp;

  constructor(message: string, faultReason: FaultReason, otp?: Otp, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OtpError';
    this.faultReason = faultReason;
    this.otp = otp;
  }
}

export function isOtpError(error: unknown): error is OtpError {
  return error instanceof OtpError;
}
