/**
 * @file constants.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Control API version spoken by this client. Sent as the first path segment.
 */
export const API_VERSION = '1.0.0';

/**
 * Service defaults applied when the configuration leaves a field unset.
 */
export const SERVICE_DEFAULTS = {
  /** Port of the session server's control endpoint */
  PORT: 432,

  /** Service domain sent with every request */
  DOMAIN: 'hide.me',

  /** Resolver used when no DNS servers are configured */
  DNS_SERVER: '1.1.1.1:53',

  /** Suffix stripped from the configured host before it goes on the wire */
  HOST_SUFFIX: '.hideservers.net',

  /**
   * TLS server name used when the host is a literal IP address.
   * Every session server certificate carries it as a SAN.
   */
  FALLBACK_SERVER_NAME: 'hideservers.net',

  /** Policy-filter management endpoint (separate from the session server) */
  FILTER_URL: 'https://vpn.hide.me:4321/filter',
} as const;

/**
 * Timing constants (in milliseconds).
 */
export const CONNECTION_TIMING = {
  /** Default bound for a whole control request */
  REST_TIMEOUT_MS: 10_000,

  /** Default wait before a caller retries a failed connect */
  RECONNECT_WAIT_MS: 30_000,

  /** Default delay before a stale access token gets refreshed */
  ACCESS_TOKEN_UPDATE_DELAY_MS: 2_000,

  /** Bound for the TLS handshake of every control request */
  TLS_HANDSHAKE_TIMEOUT_MS: 5_000,

  /** Bound for response headers once the request is sent */
  RESPONSE_HEADER_TIMEOUT_MS: 5_000,

  /** Bound for the A/AAAA lookup of the session host */
  DNS_LOOKUP_TIMEOUT_MS: 5_000,
} as const;

/**
 * Public key pins of the CA certificates allowed to sign session servers.
 * Keyed by certificate common name, valued by base64 SHA-256 of the SPKI.
 */
export const AUTHORIZED_PINS: ReadonlyMap<string, string> = new Map([
  ['Hide.Me Root CA', 'AdKh8rXi68jeqv5kEzF4wJ9M2R89gFuMILRQ1uwADQI='],
  ['Hide.Me Server CA #1', 'CsEyDelMHMPh9qLGgeQn8sJwdUwvc+fCMhOU9Ne5PbU='],
  ['DigiCert Global Root CA', 'r/mIkG3eEpVdm+u/ko/cwxzOMo1bk4TyHIlByibiA5E='],
  ['DigiCert TLS RSA SHA256 2020 CA1', 'RQeZkB42znUfsDIIFWIRiYEcKl7nHwNFwWCrnMMJbVc='],
]);

/**
 * Length of a WireGuard public key in bytes.
 */
export const PUBLIC_KEY_LENGTH = 32;
