/**
 * Supervisor Module - Public API
 */

export {
  SessionSupervisor,
  type OnFatalFn,
  type ReportStateFn,
  type SessionSupervisorOptions,
} from './SessionSupervisor.mjs';
