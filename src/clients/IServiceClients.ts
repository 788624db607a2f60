/**
 * Collaborator Service Interfaces
 *
 * Contracts the OTP orchestrator consumes. Transport is an implementation detail.
 */

import type { Channel } from '../domain/Otp.js';

/**
 * Resolves a phone number to the owning customer account
 */
export interface CustomerLookup {
  /**
   * @returns the customer's account identifier
   * @throws OtpError with CUSTOMER_ERROR or TRANSPORT_ERROR
   */
  resolve(msisdn: string): Promise<string>;
}

/**
 * Resolves a phone number to its validity status
 */
export interface NumberInformation {
  /**
   * @throws OtpError with NUMBER_INFORMATION_ERROR
   */
  resolve(msisdn: string): Promise<string>;
}

/**
 * Notification request sent to the dispatcher
 */
export interface NotificationRequest {
  channel: Channel;
  destination: string;
  message: string;
}

/**
 * Delivery result reported by the dispatcher
 */
export interface NotificationResult {
  status: string;
  message?: string;
}

/**
 * Delivers a message over a channel
 */
export interface NotificationDispatcher {
  /**
   * @throws NotificationDispatchError when the dispatcher cannot be reached or rejects the request
   */
  dispatch(request: NotificationRequest): Promise<NotificationResult>;
}
