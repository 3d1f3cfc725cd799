/**
 * Utilities barrel export
 */

export {
  clampLevel,
  decodeCommandPayload,
  encodePayload,
  isValidLevel,
  toHubAction,
  zoneStatusToValue,
  type HubAction,
} from './ValueConverters.mjs';

export { AsyncQueue } from './AsyncQueue.mjs';
export { Mutex } from './Mutex.mjs';
export { computeBackoffDelay, sleep, withTimeout, type BackoffPolicy } from './Backoff.mjs';
export { createLogger, setLogLevel, getLogLevel, isLogLevel, type Logger } from './Logger.mjs';
export {
  isRecord,
  readHref,
  readNumber,
  readRecord,
  readRecords,
  readString,
  type JsonRecord,
} from './guards.mjs';
