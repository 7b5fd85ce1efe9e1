/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  DomainError,
  ValidationError,
  ResolutionError,
  BadPinError,
  TransportError,
  AppUpdateRequiredError,
  BadHttpStatusError,
  FilterFailedError,
  DecodeError,
  PersistenceError,
  ConfigurationError,
} from './domain-errors.js';
export type { ErrorCategory } from './domain-errors.js';
