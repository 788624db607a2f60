/**
 * Services Module
 *
 * Exports all service classes.
 */

export { OtpService } from './OtpService.js';
export type { OtpServiceConfig } from './OtpService.js';

export { OtpStateMachine, getOtpStateMachine } from './OtpStateMachine.js';
export type { AttemptOutcome } from './OtpStateMachine.js';
