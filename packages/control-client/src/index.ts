/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export * from './application/index.js';
export * from './domain/index.js';
export * from './protocol/index.js';
export { ClientConfigSchema, type ClientConfig, type ClientConfigInput } from './config/client-config.js';
export { API_VERSION, AUTHORIZED_PINS, CONNECTION_TIMING, SERVICE_DEFAULTS } from './config/constants.js';
export { loadEnv, parseEnv, toClientConfig, loadFilterFile, type Env } from './config/env.js';
export { createLogger, type Logger, type LoggerConfig } from './infrastructure/logging/pino-logger.js';
export {
  PinVerifier,
  certificatePin,
  publicKeyPin,
  chainFromPeerCertificate,
  type ChainCertificate,
} from './infrastructure/tls/pin-verifier.js';
export { Dialer, NodeSocketFactory, parseDnsServers, type RandomSource } from './infrastructure/network/dialer.js';
export { DnsHostLookup } from './infrastructure/network/dns-lookup.js';
export {
  EndpointResolver,
  type ResolveOutcome,
  type ResolveSource,
} from './infrastructure/network/endpoint-resolver.js';
export { Http2Transport, loadCaBundle } from './infrastructure/http/http2-transport.js';
export { TokenStore } from './infrastructure/persistence/token-store.js';
