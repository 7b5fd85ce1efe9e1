/**
 * @file host-lookup.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

/**
 * Port (interface) for name resolution of the session host.
 */
export interface HostLookup {
  /**
   * Returns the addresses of the host, preferred first.
   * Rejects when the name cannot be resolved at all.
   */
  lookup(host: string, signal: AbortSignal): Promise<string[]>;
}
