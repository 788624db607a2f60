/**
 * OTP Domain Types
 */

/**
 * OTP lifecycle status
 * - ACTIVE: issued, awaiting validation
 * - VERIFIED / EXPIRED / TOO_MANY_ATTEMPTS: terminal
 */
export type OtpStatus = 'ACTIVE' | 'VERIFIED' | 'EXPIRED' | 'TOO_MANY_ATTEMPTS';

/**
 * Notification channel identifiers
 */
export type Channel = 'AUTO' | 'SMS' | 'EMAIL' | 'PUSH';

/**
 * One-time passcode record
 */
export interface Otp {
  id: number;
  customerId: string;
  msisdn: string;
  pin: number;
  /** Epoch milliseconds */
  createdOn: number;
  /** Epoch milliseconds, fixed at creation */
  expires: number;
  status: OtpStatus;
  attemptCount: number;
  applicationId: string;
}

/**
 * OTP fields supplied on creation (id is assigned by the store)
 */
export type NewOtp = Omit<Otp, 'id'>;

/**
 * Application policy owning a set of OTPs
 */
export interface Application {
  id: string;
  name: string;
  description: string | null;
  attemptsAllowed: number;
}

export const PIN_MIN = 100000;
export const PIN_MAX = 999999;

/**
 * Draw a 6-digit PIN uniformly from [PIN_MIN, PIN_MAX].
 * `random` must return a value in [0, 1), like Math.random.
 */
export function generatePin(random: () => number = Math.random): number {
  return PIN_MIN + Math.floor(random() * (PIN_MAX - PIN_MIN + 1));
}
