/**
 * OTP Service
 *
 * Orchestrates the OTP lifecycle: issuance fans out to the customer and
 * number-information services, persists the OTP and notifies the user;
 * validation and resend enforce the status, attempt and expiry rules.
 */

import type {
  CustomerLookup,
  NotificationDispatcher,
  NotificationRequest,
  NotificationResult,
  NumberInformation,
} from '../clients/IServiceClients.js';
import { generatePin } from '../domain/Otp.js';
import type { Application, Channel, Otp } from '../domain/Otp.js';
import { OtpError, isOtpError } from '../domain/OtpError.js';
import type { FaultReason } from '../domain/OtpError.js';
import type { OtpRepository } from '../repositories/OtpRepository.js';
import type { ApplicationRepository } from '../repositories/ApplicationRepository.js';
import { getOtpStateMachine } from './OtpStateMachine.js';
import { logger, maskPhone } from '../utils/logger.js';

/**
 * OTP service configuration
 */
export interface OtpServiceConfig {
  applicationId: string;
  defaultChannel: Channel;
  validityMs: number;
  /** Clock, epoch milliseconds */
  now: () => number;
  /** Uniform source in [0, 1) used for PIN generation */
  random: () => number;
}

/** Conditional writes that may lose a race before a validation gives up */
const MAX_WRITE_CONFLICTS = 5;

const DEFAULT_CONFIG: OtpServiceConfig = {
  applicationId: 'PPR',
  defaultChannel: 'AUTO',
  validityMs: 60 * 1000,
  now: () => Date.now(),
  random: Math.random,
};

export class OtpService {
  private otpRepo: OtpRepository;
  private applicationRepo: ApplicationRepository;
  private customers: CustomerLookup;
  private numberInformation: NumberInformation;
  private notifications: NotificationDispatcher;
  private config: OtpServiceConfig;

  constructor(
    otpRepo: OtpRepository,
    applicationRepo: ApplicationRepository,
    customers: CustomerLookup,
    numberInformation: NumberInformation,
    notifications: NotificationDispatcher,
    config?: Partial<OtpServiceConfig>
  ) {
    this.otpRepo = otpRepo;
    this.applicationRepo = applicationRepo;
    this.customers = customers;
    this.numberInformation = numberInformation;
    this.notifications = notifications;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Generate an OTP for a phone number and send it over the default channel.
   * Resolves with the persisted OTP once both the write and the notification
   * attempt have settled; a failed notification does not fail the call.
   */
  async send(msisdn: string): Promise<Otp> {
    logger.info('Entered send', { phone: maskPhone(msisdn) });

    // Fail fast: the first rejection wins, the other call runs to completion unobserved
    const [customerId, numberStatus] = await Promise.all([
      this.guard('TRANSPORT_ERROR', 'Error retrieving Customer', () => this.customers.resolve(msisdn)),
      this.guard('NUMBER_INFORMATION_ERROR', 'Error retrieving msisdn status', () =>
        this.numberInformation.resolve(msisdn)
      ),
    ]);

    logger.debug('Lookups completed', { phone: maskPhone(msisdn), numberStatus });

    const pin = generatePin(this.config.random);
    const createdOn = this.config.now();

    const saved = this.withStorage('Error saving OTP', () =>
      this.otpRepo.create({
        customerId,
        msisdn,
        pin,
        createdOn,
        expires: createdOn + this.config.validityMs,
        status: 'ACTIVE',
        attemptCount: 0,
        applicationId: this.config.applicationId,
      })
    );

    const notified = this.notify({
      channel: this.config.defaultChannel,
      destination: msisdn,
      message: String(pin),
    });

    const [otp] = await Promise.all([saved, notified]);

    logger.info('OTP issued', { otpId: otp.id, phone: maskPhone(msisdn) });
    return otp;
  }

  /**
   * Validate a submitted PIN. Marks the OTP VERIFIED on success; on failure
   * throws an OtpError carrying the mutated OTP, which is persisted in the
   * background.
   *
   * Writes are conditional on the state the attempt was evaluated against.
   * When a concurrent validation wins the race the attempt is evaluated
   * again on the fresh row, so status never moves backwards and every
   * attempt is counted.
   */
  async validate(otpId: number, pin: number): Promise<Otp> {
    logger.info('Entered validate', { otpId });

    let otp = await this.findOtp(otpId, 'Error validating OTP');
    const application = await this.findApplication(otp);
    const now = this.config.now();
    const machine = getOtpStateMachine();

    for (let conflicts = 0; conflicts <= MAX_WRITE_CONFLICTS; conflicts++) {
      const outcome = machine.evaluateAttempt(otp, application, pin, now);
      const updated = machine.apply(otp, outcome);

      if (outcome.fault !== null) {
        logger.info('OTP validation failed', {
          otpId,
          fault: outcome.fault,
          status: updated.status,
          attemptCount: updated.attemptCount,
        });

        this.persistDetached(otp, updated, (current) =>
          machine.apply(current, machine.evaluateAttempt(current, application, pin, now))
        );
        throw new OtpError('Error validating OTP', outcome.fault, updated);
      }

      const read = otp;
      const saved = await this.withStorage('Error saving OTP', () => this.otpRepo.saveIfUnchanged(updated, read));
      if (saved) {
        logger.info('OTP verified', { otpId });
        return updated;
      }

      logger.info('OTP changed during validation, evaluating again', { otpId });
      otp = await this.findOtp(otpId, 'Error validating OTP');
    }

    logger.error('OTP kept changing during validation', { otpId });
    throw new OtpError('Error saving OTP', 'STORAGE_ERROR');
  }

  /**
   * Resend an ACTIVE OTP's PIN over each requested channel.
   * EMAIL goes to `mail`, every other channel to the OTP's phone number.
   * Channel failures are logged; the call still resolves with the OTP.
   */
  async resend(otpId: number, channels: ReadonlyArray<Channel | null | undefined>, mail?: string): Promise<Otp> {
    logger.info('Entered resend', { otpId, channels, hasMail: Boolean(mail) });

    const otp = await this.findOtp(otpId, 'Error resending OTP');

    if (otp.status !== 'ACTIVE') {
      throw new OtpError('Error resending OTP', 'INVALID_STATUS');
    }

    const requests: NotificationRequest[] = [];
    for (const channel of channels) {
      if (!channel) continue;

      if (channel === 'EMAIL' && !mail) {
        logger.warn('EMAIL channel requested without a mail address, skipping', { otpId });
        continue;
      }

      requests.push({
        channel,
        destination: channel === 'EMAIL' && mail ? mail : otp.msisdn,
        message: String(otp.pin),
      });
    }

    // Collect every channel's outcome; a synchronous throw becomes that channel's rejection
    const results = await Promise.allSettled(
      requests.map(async (request) => this.notifications.dispatch(request))
    );

    results.forEach((result, index) => {
      const channel = requests[index].channel;
      if (result.status === 'fulfilled') {
        logger.info('Resend dispatched', { otpId, channel, status: result.value.status });
      } else {
        logger.warn('Resend failed for channel', { otpId, channel, error: messageOf(result.reason) });
      }
    });

    return otp;
  }

  /**
   * Read an already generated OTP
   */
  async get(otpId: number): Promise<Otp> {
    logger.info('Entered get', { otpId });
    return this.findOtp(otpId, 'OTP not found');
  }

  /**
   * Read all OTPs of a phone number, newest first
   */
  async getAll(msisdn: string): Promise<Otp[]> {
    logger.info('Entered getAll', { phone: maskPhone(msisdn) });

    const otps = await this.withStorage('Error reading OTPs', () => this.otpRepo.findByMsisdn(msisdn));
    if (otps.length === 0) {
      throw new OtpError('OTPs not found', 'NOT_FOUND');
    }
    return otps;
  }

  private async findOtp(otpId: number, message: string): Promise<Otp> {
    const otp = await this.withStorage('Error reading OTP', () => this.otpRepo.findById(otpId));
    if (!otp) {
      throw new OtpError(message, 'NOT_FOUND');
    }
    return otp;
  }

  private async findApplication(otp: Otp): Promise<Application> {
    const application = await this.withStorage('Error reading application', () =>
      this.applicationRepo.findById(otp.applicationId)
    );
    if (!application) {
      logger.error('OTP references an unknown application', { otpId: otp.id, applicationId: otp.applicationId });
      throw new OtpError('Application not found', 'APPLICATION_NOT_FOUND');
    }
    return application;
  }

  /**
   * Send a notification, reporting the outcome in the logs only
   */
  private async notify(request: NotificationRequest): Promise<NotificationResult | null> {
    try {
      const result = await this.notifications.dispatch(request);
      logger.info('Notification dispatched', { channel: request.channel, status: result.status });
      return result;
    } catch (error) {
      logger.warn('Notification failed, OTP kept', { channel: request.channel, error: messageOf(error) });
      return null;
    }
  }

  /**
   * Best-effort write of a failed attempt's state; the caller does not wait on it
   */
  private persistDetached(read: Otp, updated: Otp, reapply: (current: Otp) => Otp): void {
    this.persistAttempt(read, updated, reapply).catch((error) => {
      logger.error('Failed to persist OTP after failed validation', {
        otpId: read.id,
        error: messageOf(error),
      });
    });
  }

  /**
   * Conditionally write an attempt, re-applying it to the stored row
   * whenever another write landed in between
   */
  private async persistAttempt(read: Otp, updated: Otp, reapply: (current: Otp) => Otp): Promise<void> {
    let previous = read;
    let next = updated;

    for (let conflicts = 0; conflicts <= MAX_WRITE_CONFLICTS; conflicts++) {
      if (await this.otpRepo.saveIfUnchanged(next, previous)) {
        return;
      }

      const current = await this.otpRepo.findById(read.id);
      if (!current) {
        throw new Error(`OTP ${read.id} does not exist`);
      }
      previous = current;
      next = reapply(current);
    }

    throw new Error(`OTP ${read.id} kept changing, attempt not recorded`);
  }

  private withStorage<T>(message: string, operation: () => Promise<T>): Promise<T> {
    return this.guard('STORAGE_ERROR', message, operation);
  }

  /**
   * Run a collaborator call, re-wrapping raw errors under the given fault
   */
  private async guard<T>(fault: FaultReason, message: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (isOtpError(error)) throw error;
      logger.error(message, { error: messageOf(error) });
      throw new OtpError(message, fault, undefined, { cause: error });
    }
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
