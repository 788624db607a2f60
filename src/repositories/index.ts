/**
 * Repositories Module
 *
 * Exports all repository classes.
 */

export { OtpRepository } from './OtpRepository.js';
export { ApplicationRepository } from './ApplicationRepository.js';
