/**
 * @file dialer.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { Socket, isIP } from 'net';
import type { Logger } from 'pino';
import type { SocketFactory, SocketRequest } from '../../domain/ports/socket-factory.js';
import { SERVICE_DEFAULTS } from '../../config/constants.js';

/**
 * Uniform random source in [0, 1), Math.random compatible.
 */
export type RandomSource = () => number;

export interface DialerConfig {
  /** Firewall mark for outgoing sockets; 0 disables marking */
  firewallMark: number;
  /** DNS servers (host or host:port) used for every name lookup */
  dnsServers: readonly string[];
}

export interface DialerDeps {
  logger: Logger;
  socketFactory?: SocketFactory;
  random?: RandomSource;
}

/**
 * Factory used when none is injected. Node's socket API has no setsockopt,
 * so a marked socket cannot be created and every such request fails.
 */
export class NodeSocketFactory implements SocketFactory {
  createSocket(request: SocketRequest): Socket {
    if (request.mark > 0) {
      throw new Error(`SO_MARK ${request.mark} cannot be set through the Node.js socket API`);
    }
    return new Socket();
  }
}

/**
 * Splits a comma-separated DNS server list. Falls back to the default
 * public resolver when nothing usable is given.
 */
export function parseDnsServers(list: string | undefined): string[] {
  const servers = (list ?? '')
    .split(',')
    .map((server) => server.trim())
    .filter((server) => server.length > 0);
  return servers.length > 0 ? servers : [SERVICE_DEFAULTS.DNS_SERVER];
}

/**
 * Opens the outbound connections of the client: TCP for HTTPS and the
 * DNS server choice for name lookups.
 */
export class Dialer {
  private readonly firewallMark: number;
  private readonly dnsServers: readonly string[];
  private readonly socketFactory: SocketFactory;
  private readonly random: RandomSource;
  private readonly logger: Logger;

  constructor(config: DialerConfig, deps: DialerDeps) {
    this.firewallMark = config.firewallMark;
    this.dnsServers = config.dnsServers.length > 0 ? [...config.dnsServers] : [SERVICE_DEFAULTS.DNS_SERVER];
    this.socketFactory = deps.socketFactory ?? new NodeSocketFactory();
    this.random = deps.random ?? Math.random;
    this.logger = deps.logger.child({ component: 'dialer' });
  }

  /**
   * Configured DNS servers, in configuration order.
   */
  get servers(): readonly string[] {
    return this.dnsServers;
  }

  /**
   * Picks the DNS server for one query, uniformly at random.
   * Every call draws again, so the queries of one lookup may hit different servers.
   */
  pickDnsServer(): string {
    const index = Math.min(Math.floor(this.random() * this.dnsServers.length), this.dnsServers.length - 1);
    const server = this.dnsServers[index];
    if (server === undefined) {
      throw new Error('No DNS server configured');
    }
    return server;
  }

  /**
   * Creates a TCP socket through the socket factory, carrying the firewall
   * mark, and connects it. Connect errors reject unchanged; aborting the signal
   * destroys the socket and rejects with the abort reason.
   */
  dialTcp(host: string, port: number, signal: AbortSignal): Promise<Socket> {
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(abortReason(signal));
        return;
      }

      const socket = this.createSocket(host, port);

      const cleanup = (): void => {
        signal.removeEventListener('abort', onAbort);
        socket.off('connect', onConnect);
        socket.off('error', onError);
      };
      const onConnect = (): void => {
        cleanup();
        resolve(socket);
      };
      const onError = (error: Error): void => {
        cleanup();
        socket.destroy();
        reject(error);
      };
      const onAbort = (): void => {
        cleanup();
        const reason = abortReason(signal);
        socket.destroy();
        reject(reason);
      };

      signal.addEventListener('abort', onAbort, { once: true });
      socket.once('connect', onConnect);
      socket.once('error', onError);
      socket.connect({ host, port });
    });
  }

  private createSocket(host: string, port: number): Socket {
    const family = isIP(host);
    const request: SocketRequest = {
      host,
      port,
      family: family === 4 ? 4 : family === 6 ? 6 : 0,
      mark: this.firewallMark,
    };
    try {
      return this.socketFactory.createSocket(request);
    } catch (error) {
      if (request.mark === 0) {
        throw error;
      }
      // An unmarked connection is still usable
      this.logger.warn({ error, mark: request.mark }, 'Set mark failed');
      return new Socket();
    }
  }
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('The operation was aborted');
}
