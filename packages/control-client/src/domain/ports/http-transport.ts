/**
 * @file http-transport.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

export interface HttpPostRequest {
  /** Absolute https URL; its authority is the address that gets dialed */
  url: string;
  /** TLS server name used for SNI and certificate verification */
  serverName: string;
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
}

export interface HttpResponse {
  status: number;
  body: Buffer;
}

/**
 * Port (interface) for the HTTPS transport used by control requests.
 */
export interface HttpTransport {
  /**
   * Sends a POST request and buffers the whole response body.
   * Rejects on dial, TLS, pin or stream failures; never on HTTP status.
   */
  post(request: HttpPostRequest): Promise<HttpResponse>;
}
