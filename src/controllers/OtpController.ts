/**
 * OTP Controller
 *
 * HTTP handlers for the /otp endpoints.
 */

import type { Request, Response } from 'express';
import { z } from 'zod';
import { channelSchema } from '../config/index.js';
import type { Otp } from '../domain/Otp.js';
import { isOtpError } from '../domain/OtpError.js';
import type { FaultReason, OtpError } from '../domain/OtpError.js';
import type { OtpService } from '../services/OtpService.js';
import { logger } from '../utils/logger.js';
import { normalizeMsisdn } from '../utils/msisdn.js';

const msisdnSchema = z.string().transform((value, ctx) => {
  const normalized = normalizeMsisdn(value);
  if (!normalized) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Phone must be in E.164 format (e.g., +306941234567)' });
    return z.NEVER;
  }
  return normalized;
});

const sendSchema = z.object({
  msisdn: msisdnSchema,
});

const validateSchema = z.object({
  pin: z.coerce.number().int('PIN must be an integer'),
});

const resendSchema = z.object({
  channels: z.array(channelSchema).min(1, 'At least one channel is required'),
  mail: z.string().email().optional(),
});

const otpIdSchema = z.object({
  otpId: z.coerce.number().int().positive('OTP id must be a positive integer'),
});

const numberQuerySchema = z.object({
  number: msisdnSchema,
});

/**
 * HTTP status for each fault reason
 */
const FAULT_STATUS: Record<FaultReason, number> = {
  NOT_FOUND: 404,
  CUSTOMER_ERROR: 400,
  INVALID_PIN: 400,
  INVALID_STATUS: 409,
  EXPIRED: 410,
  TOO_MANY_ATTEMPTS: 403,
  NUMBER_INFORMATION_ERROR: 502,
  TRANSPORT_ERROR: 502,
  STORAGE_ERROR: 500,
  APPLICATION_NOT_FOUND: 500,
};

/**
 * OTP as exposed over HTTP. The PIN never leaves the service.
 */
export interface OtpResponse {
  id: number;
  customer_id: string;
  msisdn: string;
  status: Otp['status'];
  attempt_count: number;
  application_id: string;
  created_on: string;
  expires: string;
}

export function toOtpResponse(otp: Otp): OtpResponse {
  return {
    id: otp.id,
    customer_id: otp.customerId,
    msisdn: otp.msisdn,
    status: otp.status,
    attempt_count: otp.attemptCount,
    application_id: otp.applicationId,
    created_on: new Date(otp.createdOn).toISOString(),
    expires: new Date(otp.expires).toISOString(),
  };
}

export function statusForFault(fault: FaultReason): number {
  return FAULT_STATUS[fault];
}

type ParseResult<T> = { success: true; data: T } | { success: false; error: z.ZodError };

export class OtpController {
  private otpService: OtpService;

  constructor(otpService: OtpService) {
    this.otpService = otpService;
  }

  /**
   * Handle POST /otp/send
   */
  async send(req: Request, res: Response): Promise<void> {
    const body = this.parse(res, sendSchema.safeParse(req.body), 'send');
    if (!body) return;

    await this.respond(res, async () => {
      const otp = await this.otpService.send(body.msisdn);
      res.status(201).json(toOtpResponse(otp));
    });
  }

  /**
   * Handle POST /otp/:otpId/validate
   */
  async validate(req: Request, res: Response): Promise<void> {
    const params = this.parse(res, otpIdSchema.safeParse(req.params), 'validate');
    if (!params) return;
    const body = this.parse(res, validateSchema.safeParse(req.body), 'validate');
    if (!body) return;

    await this.respond(res, async () => {
      const otp = await this.otpService.validate(params.otpId, body.pin);
      res.status(200).json(toOtpResponse(otp));
    });
  }

  /**
   * Handle POST /otp/:otpId/resend
   */
  async resend(req: Request, res: Response): Promise<void> {
    const params = this.parse(res, otpIdSchema.safeParse(req.params), 'resend');
    if (!params) return;
    const body = this.parse(res, resendSchema.safeParse(req.body), 'resend');
    if (!body) return;

    await this.respond(res, async () => {
      const otp = await this.otpService.resend(params.otpId, body.channels, body.mail);
      res.status(200).json(toOtpResponse(otp));
    });
  }

  /**
   * Handle GET /otp/:otpId
   */
  async get(req: Request, res: Response): Promise<void> {
    const params = this.parse(res, otpIdSchema.safeParse(req.params), 'get');
    if (!params) return;

    await this.respond(res, async () => {
      const otp = await this.otpService.get(params.otpId);
      res.status(200).json(toOtpResponse(otp));
    });
  }

  /**
   * Handle GET /otp?number=
   */
  async getAll(req: Request, res: Response): Promise<void> {
    const query = this.parse(res, numberQuerySchema.safeParse(req.query), 'getAll');
    if (!query) return;

    await this.respond(res, async () => {
      const otps = await this.otpService.getAll(query.number);
      res.status(200).json(otps.map(toOtpResponse));
    });
  }

  private parse<T>(res: Response, result: ParseResult<T>, operation: string): T | null {
    if (result.success) {
      return result.data;
    }

    const errors = result.error.issues.map((i) => i.message).join(', ');
    logger.warn('Invalid OTP request', { operation, errors });
    res.status(400).json({
      error: 'invalid_request',
      message: errors,
    });
    return null;
  }

  /**
   * Run a service call, answering OtpErrors with their mapped status.
   * Anything else propagates to the error middleware.
   */
  private async respond(res: Response, handler: () => Promise<void>): Promise<void> {
    try {
      await handler();
    } catch (error) {
      if (!isOtpError(error)) throw error;
      this.sendFault(res, error);
    }
  }

  private sendFault(res: Response, error: OtpError): void {
    const status = statusForFault(error.faultReason);
    logger.info('OTP request failed', { fault: error.faultReason, status });

    res.status(status).json({
      error: error.faultReason,
      message: error.message,
      ...(error.otp ? { otp: toOtpResponse(error.otp) } : {}),
    });
  }
}
