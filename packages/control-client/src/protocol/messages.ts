/**
 * @file messages.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

// ============================================================================
// Operations
// ============================================================================

/**
 * Control operations served by the session server under /<api-version>/.
 */
export type SessionOperation = 'connect' | 'disconnect' | 'accessToken';

// ============================================================================
// Requests (in-memory form, checked and encoded by schemas.ts)
// ============================================================================

/**
 * Client → Session server: open a WireGuard session
 */
export interface ConnectRequest {
  host: string;
  domain: string;
  accessToken?: Uint8Array;
  publicKey: Uint8Array;
}

/**
 * Client → Session server: tear down a session
 */
export interface DisconnectRequest {
  host: string;
  domain: string;
  sessionToken: Uint8Array;
}

/**
 * Client → Session server: issue or refresh the access token.
 * Username/password is the fallback when no token is held.
 */
export interface AccessTokenRequest {
  host: string;
  domain: string;
  accessToken?: Uint8Array;
  username?: string;
  password?: string;
}

// ============================================================================
// Responses
// ============================================================================

/**
 * Session server → Client: WireGuard peer parameters of the new session
 */
export interface ConnectResponse {
  publicKey: Buffer;
  presharedKey?: Buffer;
  endpoint: {
    ip: string;
    port: number;
  };
  /** Keepalive interval in seconds, 0 when disabled */
  persistentKeepaliveInterval: number;
  allowedIps: string[];
  dns: string[];
  gateway: string[];
  sessionToken: Buffer;
  /** Set when the server wants the client to refresh its access token */
  staleAccessToken: boolean;
}
