/**
 * @file domain-errors.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export type ErrorCategory =
  | 'validation'
  | 'resolution'
  | 'transport'
  | 'protocol'
  | 'decode'
  | 'persistence'
  | 'configuration';

/**
 * Base class for all control-channel errors.
 * Provides structured error information for callers and logs.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { code: string; message: string } {
    return {
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Error thrown when a request fails its self-check. Raised before any I/O.
 */
export class ValidationError extends DomainError {
  readonly code = 'INVALID_REQUEST';
  readonly category = 'validation';

  constructor(
    message: string,
    readonly details?: unknown
  ) {
    super(message);
  }
}

/**
 * Error thrown when the session host cannot be resolved and no previous
 * address is available.
 */
export class ResolutionError extends DomainError {
  readonly code = 'RESOLUTION_FAILED';
  readonly category = 'resolution';
}

/**
 * Error thrown when a CA certificate of the server chain is not pinned.
 */
export class BadPinError extends DomainError {
  readonly code = 'BAD_PIN';
  readonly category = 'transport';

  constructor(commonName: string) {
    super(`bad public key PIN for ${commonName || '<no common name>'}`);
  }
}

/**
 * Error thrown when the HTTP/2 exchange fails or times out.
 */
export class TransportError extends DomainError {
  readonly code = 'TRANSPORT_FAILED';
  readonly category = 'transport';
}

/**
 * Error thrown when the server answers 403: this client version is no
 * longer accepted. Retrying without an upgrade is pointless.
 */
export class AppUpdateRequiredError extends DomainError {
  readonly code = 'APP_UPDATE_REQUIRED';
  readonly category = 'protocol';

  constructor() {
    super('application update required');
  }
}

/**
 * Error thrown for any non-200 status other than 403.
 */
export class BadHttpStatusError extends DomainError {
  readonly code = 'BAD_HTTP_STATUS';
  readonly category = 'protocol';

  constructor(readonly status: number) {
    super(`bad HTTP status (${status})`);
  }
}

/**
 * Error thrown when the filter endpoint answers `false`.
 */
export class FilterFailedError extends DomainError {
  readonly code = 'FILTER_FAILED';
  readonly category = 'protocol';

  constructor() {
    super('filter failed');
  }
}

/**
 * Error thrown when a response body or stored token cannot be decoded.
 */
export class DecodeError extends DomainError {
  readonly code = 'DECODE_FAILED';
  readonly category = 'decode';
}

/**
 * Error thrown when the access token could not be written to disk.
 * The in-memory token is already updated when this is raised.
 */
export class PersistenceError extends DomainError {
  readonly code = 'PERSISTENCE_FAILED';
  readonly category = 'persistence';
}

/**
 * Error thrown when the client configuration is unusable.
 */
export class ConfigurationError extends DomainError {
  readonly code = 'INVALID_CONFIGURATION';
  readonly category = 'configuration';
}
