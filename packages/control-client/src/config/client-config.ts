/**
 * @file client-config.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { z } from 'zod';
import { API_VERSION, CONNECTION_TIMING, SERVICE_DEFAULTS } from './constants.js';
import { FilterSchema } from '../protocol/schemas.js';

/**
 * Schema for the client configuration. Defaults are applied here, so a
 * parsed config is complete.
 */
export const ClientConfigSchema = z.object({
  /** FQDN or literal IP of the session server */
  host: z.string().trim().min(1, 'Host is required'),
  /** Control port; 0 or unset means the service default */
  port: z
    .number()
    .int()
    .min(0)
    .max(65535)
    .default(0)
    .transform((port) => (port === 0 ? SERVICE_DEFAULTS.PORT : port)),
  apiVersion: z.string().min(1).default(API_VERSION),
  domain: z.string().min(1).default(SERVICE_DEFAULTS.DOMAIN),
  /** Credential file; the access token takes precedence over username/password */
  accessTokenFile: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  restTimeoutMs: z.number().int().positive().default(CONNECTION_TIMING.REST_TIMEOUT_MS),
  reconnectWaitMs: z.number().int().nonnegative().default(CONNECTION_TIMING.RECONNECT_WAIT_MS),
  accessTokenUpdateDelayMs: z
    .number()
    .int()
    .nonnegative()
    .default(CONNECTION_TIMING.ACCESS_TOKEN_UPDATE_DELAY_MS),
  /** CA bundle path; system roots when unset */
  caFile: z.string().optional(),
  /** Firewall mark for the traffic of this client; 0 disables it */
  firewallMark: z.number().int().nonnegative().default(0),
  /** Comma-separated DNS servers used for name lookups */
  dnsServers: z.string().optional(),
  filter: FilterSchema.optional(),
});

export type ClientConfig = z.output<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
