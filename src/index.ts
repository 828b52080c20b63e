/**
 * Admission Control
 *
 * Per-request admission decisions for HTTP services: path rules, fixed and
 * moving window rate limits, and escalating bans for repeat offenders.
 */

export * from './rate-limiter/index.js';
export * from './config/index.js';
export * from './storage/index.js';
export * from './utils/index.js';

export {
  createAdmissionControl,
  type AdmissionControl,
  type AdmissionControlOptions,
} from './admission-control.js';
