/**
 * OTP State Machine
 *
 * Defines valid status transitions and evaluates a single validation
 * attempt into the status, fault and attempt increment to apply.
 */

import type { Application, Otp, OtpStatus } from '../domain/Otp.js';
import type { FaultReason } from '../domain/OtpError.js';

/**
 * Valid transitions from each OTP status
 */
const VALID_TRANSITIONS: Record<OtpStatus, OtpStatus[]> = {
  ACTIVE: ['VERIFIED', 'EXPIRED', 'TOO_MANY_ATTEMPTS'],
  VERIFIED: [], // Terminal state
  EXPIRED: [], // Terminal state
  TOO_MANY_ATTEMPTS: [], // Terminal state
};

/**
 * Result of evaluating one validation attempt.
 * `fault` is null only when the attempt verified the OTP.
 */
export interface AttemptOutcome {
  status: OtpStatus;
  fault: FaultReason | null;
  attemptDelta: 0 | 1;
}

export class OtpStateMachine {
  /**
   * Check if a status transition is valid
   */
  canTransition(from: OtpStatus, to: OtpStatus): boolean {
    if (from === to) {
      return true;
    }
    return VALID_TRANSITIONS[from].includes(to);
  }

  isTerminal(status: OtpStatus): boolean {
    return VALID_TRANSITIONS[status].length === 0;
  }

  getValidTransitions(from: OtpStatus): OtpStatus[] {
    return VALID_TRANSITIONS[from];
  }

  /**
   * Return `next` if the transition is valid, otherwise keep `current`
   */
  transition(current: OtpStatus, next: OtpStatus): OtpStatus {
    return this.canTransition(current, next) ? next : current;
  }

  /**
   * Evaluate a validation attempt. Checks run in priority order, first match wins:
   * attempt ceiling, pin, status, expiry.
   */
  evaluateAttempt(otp: Otp, application: Application, pin: number, now: number): AttemptOutcome {
    if (otp.attemptCount > application.attemptsAllowed) {
      return {
        status: this.transition(otp.status, 'TOO_MANY_ATTEMPTS'),
        fault: 'TOO_MANY_ATTEMPTS',
        attemptDelta: 0,
      };
    }

    if (otp.pin !== pin) {
      return { status: otp.status, fault: 'INVALID_PIN', attemptDelta: 1 };
    }

    if (otp.status !== 'ACTIVE') {
      return { status: otp.status, fault: 'INVALID_STATUS', attemptDelta: 1 };
    }

    if (otp.expires < now) {
      return { status: this.transition(otp.status, 'EXPIRED'), fault: 'EXPIRED', attemptDelta: 1 };
    }

    return { status: this.transition(otp.status, 'VERIFIED'), fault: null, attemptDelta: 1 };
  }

  /**
   * Apply an outcome to an OTP, returning the mutated copy
   */
  apply(otp: Otp, outcome: AttemptOutcome): Otp {
    return {
      ...otp,
      status: outcome.status,
      attemptCount: otp.attemptCount + outcome.attemptDelta,
    };
  }
}

let instance: OtpStateMachine | null = null;

export function getOtpStateMachine(): OtpStateMachine {
  if (!instance) {
    instance = new OtpStateMachine();
  }
  return instance;
}
