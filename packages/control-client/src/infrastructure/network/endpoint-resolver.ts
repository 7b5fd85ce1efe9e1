/**
 * @file endpoint-resolver.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { isIP } from 'net';
import type { Logger } from 'pino';
import { CONNECTION_TIMING, SERVICE_DEFAULTS } from '../../config/constants.js';
import { ResolutionError } from '../../domain/errors/domain-errors.js';
import type { HostLookup } from '../../domain/ports/host-lookup.js';
import { RemoteAddress } from '../../domain/value-objects/remote-address.js';

export interface EndpointResolverConfig {
  host: string;
  port: number;
  lookupTimeoutMs?: number;
}

export interface EndpointResolverDeps {
  hostLookup: HostLookup;
  logger: Logger;
}

/**
 * Where the address returned by resolve() came from.
 * 'previous' means the lookup failed and the earlier address was kept.
 */
export type ResolveSource = 'literal' | 'dns' | 'previous';

export interface ResolveOutcome {
  remote: RemoteAddress;
  serverName: string;
  source: ResolveSource;
}

/**
 * Resolves the session host once and sticks to the result.
 *
 * The service balances DNS across many servers, so every request of a
 * session must go to the same IP. A failed lookup keeps the previous
 * address instead of failing the session.
 */
export class EndpointResolver {
  private readonly host: string;
  private readonly port: number;
  private readonly lookupTimeoutMs: number;
  private readonly hostLookup: HostLookup;
  private readonly logger: Logger;

  private _remote: RemoteAddress | null = null;
  private _serverName = '';

  constructor(config: EndpointResolverConfig, deps: EndpointResolverDeps) {
    this.host = config.host;
    this.port = config.port;
    this.lookupTimeoutMs = config.lookupTimeoutMs ?? CONNECTION_TIMING.DNS_LOOKUP_TIMEOUT_MS;
    this.hostLookup = deps.hostLookup;
    this.logger = deps.logger.child({ component: 'endpoint-resolver' });
  }

  /**
   * The sticky session address, null until a resolution succeeded.
   */
  get remote(): RemoteAddress | null {
    return this._remote;
  }

  /**
   * TLS server name for the session server, empty until resolved.
   */
  get serverName(): string {
    return this._serverName;
  }

  async resolve(signal?: AbortSignal): Promise<ResolveOutcome> {
    if (isIP(this.host) !== 0) {
      this._remote = RemoteAddress.create(this.host, this.port);
      // No host name to verify against; the fallback name is a SAN of every server
      this._serverName = SERVICE_DEFAULTS.FALLBACK_SERVER_NAME;
      return { remote: this._remote, serverName: this._serverName, source: 'literal' };
    }

    const timeout = AbortSignal.timeout(this.lookupTimeoutMs);
    const lookupSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let addresses: string[];
    try {
      addresses = await this.hostLookup.lookup(this.host, lookupSignal);
    } catch (error) {
      this.logger.warn({ host: this.host, error }, 'Lookup failed');
      if (this._remote) {
        this.logger.info({ remote: this._remote.toString() }, 'Using previous lookup response');
        return { remote: this._remote, serverName: this._serverName, source: 'previous' };
      }
      throw new ResolutionError(`lookup failed for ${this.host}`, { cause: error });
    }

    const [first] = addresses;
    if (first === undefined) {
      throw new ResolutionError(`dns lookup failed for ${this.host}`);
    }
    if (isIP(first) === 0) {
      throw new ResolutionError(`no IP found for ${this.host}`);
    }

    this._serverName = this.host;
    this._remote = RemoteAddress.create(first, this.port);
    this.logger.info({ host: this.host, ip: first }, 'Resolved');
    return { remote: this._remote, serverName: this._serverName, source: 'dns' };
  }
}
