/**
 * Error taxonomy for the bridge
 *
 * Only AuthError and ConfigError are terminal. Everything else is either
 * retried by a supervisor or reported as a diagnostic.
 */

import { ERROR_CODES, ERROR_MESSAGES, type ErrorCode } from './LeapProtocol.mjs';

export class BridgeError extends Error {
  readonly code: ErrorCode;
  readonly details: unknown;

  constructor(code: ErrorCode, message?: string, details: unknown = null) {
    super(message ?? ERROR_MESSAGES[code]);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Credentials refused; retrying with the same material is pointless */
export class AuthError extends BridgeError {
  constructor(message?: string, details?: unknown) {
    super(ERROR_CODES.AUTHENTICATION_FAILED, message, details);
  }
}

/** Recoverable connection failure */
export class TransportError extends BridgeError {
  constructor(
    message?: string,
    details?: unknown,
    code: ErrorCode = ERROR_CODES.TRANSPORT_ERROR
  ) {
    super(code, message, details);
  }
}

export class CommandTimeout extends BridgeError {
  constructor(message?: string, details?: unknown) {
    super(ERROR_CODES.COMMAND_TIMEOUT, message, details);
  }
}

export class CommandRejected extends BridgeError {
  readonly statusCode: number;

  constructor(statusCode: number, message?: string) {
    super(ERROR_CODES.COMMAND_REJECTED, message ?? `Hub rejected the command with status ${statusCode}`);
    this.statusCode = statusCode;
  }
}

export class RegistryLoadError extends BridgeError {
  constructor(message?: string, details?: unknown) {
    super(ERROR_CODES.REGISTRY_LOAD_FAILED, message, details);
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string) {
    super(ERROR_CODES.INVALID_CONFIG, message);
  }
}

export function isRequestTimeout(error: unknown): boolean {
  return error instanceof TransportError && error.code === ERROR_CODES.REQUEST_TIMEOUT;
}

/**
 * Error message for logging, whatever was thrown
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
