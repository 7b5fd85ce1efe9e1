/**
 * @file dns-lookup.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import { Resolver } from 'dns/promises';
import type { HostLookup } from '../../domain/ports/host-lookup.js';
import type { Dialer } from './dialer.js';

type RecordType = 'A' | 'AAAA';

/**
 * Resolves A and AAAA records through the DNS servers of the Dialer.
 * Each query gets its own resolver bound to a freshly picked server.
 */
export class DnsHostLookup implements HostLookup {
  private readonly dialer: Dialer;

  constructor(dialer: Dialer) {
    this.dialer = dialer;
  }

  async lookup(host: string, signal: AbortSignal): Promise<string[]> {
    const results = await Promise.allSettled([
      this.query(host, 'A', signal),
      this.query(host, 'AAAA', signal),
    ]);

    const addresses: string[] = [];
    const errors: unknown[] = [];
    for (const result of results) {
      if (result.status === 'fulfilled') {
        addresses.push(...result.value);
      } else {
        errors.push(result.reason);
      }
    }

    // A host with records of one family only is still resolved
    if (addresses.length === 0 && errors.length === results.length) {
      throw errors[0];
    }
    return addresses;
  }

  private async query(host: string, type: RecordType, signal: AbortSignal): Promise<string[]> {
    signal.throwIfAborted();

    const resolver = new Resolver({ tries: 1 });
    resolver.setServers([this.dialer.pickDnsServer()]);

    const onAbort = (): void => {
      resolver.cancel();
    };
    signal.addEventListener('abort', onAbort, { once: true });
    try {
      return type === 'A' ? await resolver.resolve4(host) : await resolver.resolve6(host);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }
}
