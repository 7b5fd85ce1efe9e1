/**
 * @file schemas.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { z } from 'zod';
import { PUBLIC_KEY_LENGTH } from '../config/constants.js';
import { DecodeError, ValidationError } from '../domain/errors/domain-errors.js';
import type { ConnectResponse } from './messages.js';

// ============================================================================
// Field Schemas
// ============================================================================

const HostSchema = z
  .string()
  .min(1, 'Host is required')
  .regex(/^[^\s/]+$/, 'Host must not contain whitespace or slashes');

const DomainSchema = z.string().min(1, 'Domain is required');

/** Bytes in memory, standard base64 on the wire. */
const BytesSchema = z
  .instanceof(Uint8Array)
  .transform((bytes) => Buffer.from(bytes).toString('base64'));

/** Standard base64 on the wire, bytes in memory. */
const Base64BytesSchema = z
  .string()
  .base64()
  .transform((text) => Buffer.from(text, 'base64'));

// ============================================================================
// Request Schemas
// ============================================================================

export const ConnectRequestSchema = z.object({
  host: HostSchema,
  domain: DomainSchema,
  accessToken: BytesSchema.optional(),
  publicKey: z
    .instanceof(Uint8Array)
    .refine((key) => key.length === PUBLIC_KEY_LENGTH, {
      message: `Public key must be ${PUBLIC_KEY_LENGTH} bytes`,
    })
    .transform((bytes) => Buffer.from(bytes).toString('base64')),
});

export const DisconnectRequestSchema = z.object({
  host: HostSchema,
  domain: DomainSchema,
  sessionToken: z
    .instanceof(Uint8Array)
    .refine((token) => token.length > 0, { message: 'Session token is required' })
    .transform((bytes) => Buffer.from(bytes).toString('base64')),
});

export const AccessTokenRequestSchema = z
  .object({
    host: HostSchema,
    domain: DomainSchema,
    accessToken: BytesSchema.optional(),
    username: z.string().optional(),
    password: z.string().optional(),
  })
  .refine(
    (request) =>
      request.accessToken !== undefined ||
      (Boolean(request.username) && Boolean(request.password)),
    { message: 'Access token or username and password are required' }
  );

// ============================================================================
// Filter Schema
// ============================================================================

const FilterDomainSchema = z
  .string()
  .min(1)
  .regex(/^[a-z0-9*]([a-z0-9-]*[a-z0-9])?(\.[a-z0-9]([a-z0-9-]*[a-z0-9])?)*$/i, 'Invalid domain');

export const FilterSchema = z
  .object({
    ads: z.boolean().default(false),
    trackers: z.boolean().default(false),
    malware: z.boolean().default(false),
    malicious: z.boolean().default(false),
    /** Parental guidance age; 0 disables it */
    pg: z.union([z.literal(0), z.literal(12), z.literal(18)]).default(0),
    safeSearch: z.boolean().default(false),
    risk: z.array(z.enum(['possible', 'medium', 'high'])).default([]),
    illegal: z.array(z.enum(['content', 'warez', 'spyware', 'copyright'])).default([]),
    categories: z.array(z.string().min(1)).default([]),
    whitelist: z.array(FilterDomainSchema).default([]),
    blacklist: z.array(FilterDomainSchema).default([]),
  })
  .strict()
  .superRefine((filter, ctx) => {
    const whitelisted = new Set(filter.whitelist.map((domain) => domain.toLowerCase()));
    for (const domain of filter.blacklist) {
      if (whitelisted.has(domain.toLowerCase())) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['blacklist'],
          message: `Domain is both whitelisted and blacklisted: ${domain}`,
        });
      }
    }
  });

// ============================================================================
// Response Schemas
// ============================================================================

export const ConnectResponseSchema = z.object({
  publicKey: Base64BytesSchema,
  presharedKey: Base64BytesSchema.optional(),
  endpoint: z.object({
    ip: z.string().ip(),
    port: z.number().int().min(1).max(65535),
  }),
  persistentKeepaliveInterval: z.number().int().nonnegative().default(0),
  allowedIps: z.array(z.string().min(1)).default([]),
  dns: z.array(z.string().ip()).default([]),
  gateway: z.array(z.string().ip()).default([]),
  sessionToken: Base64BytesSchema,
  staleAccessToken: z.boolean().default(false),
});

export const AccessTokenResponseSchema = z.string();

// ============================================================================
// Type Exports
// ============================================================================

export type Filter = z.output<typeof FilterSchema>;
export type FilterInput = z.input<typeof FilterSchema>;
export type ConnectRequestBody = z.output<typeof ConnectRequestSchema>;
export type DisconnectRequestBody = z.output<typeof DisconnectRequestSchema>;
export type AccessTokenRequestBody = z.output<typeof AccessTokenRequestSchema>;

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Runs a request's self-check and returns its wire form.
 * Throws ValidationError with the zod issues as details.
 */
export function checkRequest<S extends z.ZodTypeAny>(
  schema: S,
  request: z.input<S>
): z.output<S> {
  const result = schema.safeParse(request);
  if (!result.success) {
    const issues = result.error.issues;
    const first = issues[0];
    const message = first
      ? `${first.path.length > 0 ? `${first.path.join('.')}: ` : ''}${first.message}`
      : 'Invalid request';
    throw new ValidationError(message, issues);
  }
  return result.data;
}

/**
 * Parses a JSON body and validates it against a response schema.
 * Throws DecodeError for malformed JSON or unexpected fields.
 */
export function decodeResponse<S extends z.ZodTypeAny>(
  schema: S,
  body: Buffer
): z.output<S> {
  let data: unknown;
  try {
    data = JSON.parse(body.toString('utf8'));
  } catch (error) {
    throw new DecodeError('Response body is not valid JSON', { cause: error });
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    throw new DecodeError(
      `Unexpected response: ${result.error.issues.map((issue) => issue.message).join('; ')}`,
      { cause: result.error }
    );
  }
  return result.data;
}

/**
 * Decodes the body of a successful connect request.
 */
export function parseConnectResponse(body: Buffer): ConnectResponse {
  return decodeResponse(ConnectResponseSchema, body);
}
