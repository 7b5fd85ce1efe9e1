/**
 * @file env.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { config } from 'dotenv';
import { ConfigurationError } from '../domain/errors/domain-errors.js';
import { FilterSchema, type Filter } from '../protocol/schemas.js';
import type { ClientConfigInput } from './client-config.js';

/**
 * Schema for environment variables validation.
 */
const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // Session server
  VPN_HOST: z.string().min(1, 'VPN_HOST is required'),
  VPN_PORT: z.coerce.number().int().min(0).max(65535).default(0),
  VPN_API_VERSION: z.string().min(1).optional(),
  VPN_DOMAIN: z.string().min(1).optional(),

  // Credentials
  VPN_ACCESS_TOKEN_FILE: z.string().optional(),
  VPN_USERNAME: z.string().optional(),
  VPN_PASSWORD: z.string().optional(),

  // Timing (milliseconds)
  VPN_REST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  VPN_RECONNECT_WAIT_MS: z.coerce.number().int().nonnegative().optional(),
  VPN_ACCESS_TOKEN_UPDATE_DELAY_MS: z.coerce.number().int().nonnegative().optional(),

  // Network
  VPN_CA_FILE: z.string().optional(),
  VPN_FIREWALL_MARK: z.coerce.number().int().nonnegative().default(0),
  /** Comma-separated, e.g. "1.1.1.1:53,9.9.9.9:53" */
  VPN_DNS_SERVERS: z.string().optional(),

  /** JSON file with the filter policy */
  VPN_FILTER_FILE: z.string().optional(),

  /** Base64 WireGuard public key used by the CLI */
  VPN_PUBLIC_KEY: z.string().base64().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Loads and validates environment variables from the given source.
 * Throws ConfigurationError listing every invalid variable.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = EnvSchema.safeParse(source);

  if (!result.success) {
    const problems = result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment variables:\n${problems.join('\n')}`);
  }

  return result.data;
}

/**
 * Loads .env.local and .env, then validates process.env.
 */
export function loadEnv(): Env {
  config({ path: '.env.local' });
  config({ path: '.env' });
  return parseEnv(process.env);
}

/**
 * Reads and validates a filter policy JSON file.
 */
export function loadFilterFile(filePath: string): Filter {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read filter file ${filePath}`, { cause: error });
  }

  const result = FilterSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid filter in ${filePath}: ${result.error.issues.map((issue) => issue.message).join('; ')}`
    );
  }
  return result.data;
}

/**
 * Maps validated environment variables to the client configuration.
 */
export function toClientConfig(env: Env): ClientConfigInput {
  return {
    host: env.VPN_HOST,
    port: env.VPN_PORT,
    apiVersion: env.VPN_API_VERSION,
    domain: env.VPN_DOMAIN,
    accessTokenFile: env.VPN_ACCESS_TOKEN_FILE,
    username: env.VPN_USERNAME,
    password: env.VPN_PASSWORD,
    restTimeoutMs: env.VPN_REST_TIMEOUT_MS,
    reconnectWaitMs: env.VPN_RECONNECT_WAIT_MS,
    accessTokenUpdateDelayMs: env.VPN_ACCESS_TOKEN_UPDATE_DELAY_MS,
    caFile: env.VPN_CA_FILE,
    firewallMark: env.VPN_FIREWALL_MARK,
    dnsServers: env.VPN_DNS_SERVERS,
    filter: env.VPN_FILTER_FILE ? loadFilterFile(env.VPN_FILTER_FILE) : undefined,
  };
}
