/**
 * @file control-channel-client.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import { ClientConfigSchema, type ClientConfig, type ClientConfigInput } from '../config/client-config.js';
import { AUTHORIZED_PINS, SERVICE_DEFAULTS } from '../config/constants.js';
import {
  AppUpdateRequiredError,
  BadHttpStatusError,
  ConfigurationError,
  FilterFailedError,
  ValidationError,
} from '../domain/errors/domain-errors.js';
import type { HostLookup } from '../domain/ports/host-lookup.js';
import type { HttpTransport } from '../domain/ports/http-transport.js';
import type { SocketFactory } from '../domain/ports/socket-factory.js';
import type { AccessToken } from '../domain/value-objects/access-token.js';
import type { RemoteAddress } from '../domain/value-objects/remote-address.js';
import { Http2Transport, loadCaBundle } from '../infrastructure/http/http2-transport.js';
import { Dialer, parseDnsServers, type RandomSource } from '../infrastructure/network/dialer.js';
import { DnsHostLookup } from '../infrastructure/network/dns-lookup.js';
import { EndpointResolver, type ResolveOutcome } from '../infrastructure/network/endpoint-resolver.js';
import { TokenStore } from '../infrastructure/persistence/token-store.js';
import { PinVerifier } from '../infrastructure/tls/pin-verifier.js';
import type { ConnectResponse, SessionOperation } from '../protocol/messages.js';
import {
  AccessTokenRequestSchema,
  AccessTokenResponseSchema,
  ConnectRequestSchema,
  DisconnectRequestSchema,
  FilterSchema,
  checkRequest,
  decodeResponse,
  parseConnectResponse,
} from '../protocol/schemas.js';
import { getUserAgent } from '../utils/version.js';

export interface ControlChannelClientDeps {
  logger: Logger;
  /** Replaces the HTTP/2 transport (tests, proxies) */
  transport?: HttpTransport;
  /** Replaces the DNS lookup through the Dialer */
  hostLookup?: HostLookup;
  socketFactory?: SocketFactory;
  random?: RandomSource;
  pins?: ReadonlyMap<string, string>;
}

/**
 * Client of the session server's control API.
 *
 * One instance serves one session: resolve() → connect() → getAccessToken()
 * or applyFilter() as needed → disconnect(). Calls on one instance are
 * expected to be sequential; nothing here locks the sticky remote address
 * or the access token against concurrent writers.
 */
export class ControlChannelClient {
  readonly config: Readonly<ClientConfig>;

  private readonly logger: Logger;
  private readonly dialer: Dialer;
  private readonly resolver: EndpointResolver;
  private readonly tokenStore: TokenStore;
  private readonly transport: HttpTransport;
  private readonly userAgent: string;

  constructor(config: ClientConfigInput, deps: ControlChannelClientDeps) {
    const parsed = ClientConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid client configuration: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`
      );
    }
    this.config = Object.freeze(parsed.data);
    this.logger = deps.logger.child({ component: 'control-channel-client' });
    this.userAgent = getUserAgent();

    this.dialer = new Dialer(
      {
        firewallMark: this.config.firewallMark,
        dnsServers: parseDnsServers(this.config.dnsServers),
      },
      { logger: deps.logger, socketFactory: deps.socketFactory, random: deps.random }
    );

    this.resolver = new EndpointResolver(
      { host: this.config.host, port: this.config.port },
      { hostLookup: deps.hostLookup ?? new DnsHostLookup(this.dialer), logger: deps.logger }
    );

    this.tokenStore = new TokenStore({ filePath: this.config.accessTokenFile }, deps.logger);

    this.transport =
      deps.transport ??
      new Http2Transport(
        { ca: this.config.caFile ? loadCaBundle(this.config.caFile) : undefined },
        {
          dialer: this.dialer,
          pinVerifier: new PinVerifier({ pins: deps.pins ?? AUTHORIZED_PINS, logger: deps.logger }),
          logger: deps.logger,
        }
      );
  }

  /**
   * The sticky session address, null until resolve() succeeded once.
   */
  get remoteAddress(): RemoteAddress | null {
    return this.resolver.remote;
  }

  hasAccessToken(): boolean {
    return this.tokenStore.has();
  }

  /**
   * Resolves the session host and pins the result for the session.
   * A failed lookup after an earlier success resolves with source 'previous'.
   */
  resolve(signal?: AbortSignal): Promise<ResolveOutcome> {
    return this.resolver.resolve(signal);
  }

  /**
   * Opens a session for the given WireGuard public key.
   */
  async connect(publicKey: Uint8Array, signal?: AbortSignal): Promise<ConnectResponse> {
    const body = checkRequest(ConnectRequestSchema, {
      host: this.wireHost(),
      domain: this.config.domain,
      accessToken: this.tokenStore.get()?.bytes,
      publicKey,
    });

    const response = await this.postJson(this.sessionUrl('connect'), this.resolver.serverName, body, signal);
    return parseConnectResponse(response);
  }

  /**
   * Tears down the session identified by the token from connect().
   */
  async disconnect(sessionToken: Uint8Array, signal?: AbortSignal): Promise<void> {
    const body = checkRequest(DisconnectRequestSchema, {
      host: this.wireHost(),
      domain: this.config.domain,
      sessionToken,
    });

    await this.postJson(this.sessionUrl('disconnect'), this.resolver.serverName, body, signal);
  }

  /**
   * Obtains a new access token, using the current one or the configured
   * username/password, and stores it in memory and in the credential file.
   */
  async getAccessToken(signal?: AbortSignal): Promise<AccessToken> {
    const body = checkRequest(AccessTokenRequestSchema, {
      host: this.wireHost(),
      domain: this.config.domain,
      accessToken: this.tokenStore.get()?.bytes,
      username: this.config.username,
      password: this.config.password,
    });

    const response = await this.postJson(this.sessionUrl('accessToken'), this.resolver.serverName, body, signal);
    const encoded = decodeResponse(AccessTokenResponseSchema, response);
    const token = await this.tokenStore.replace(encoded);
    this.logger.info({ token: token.toString() }, 'Access token updated');
    return token;
  }

  /**
   * Sends the configured filter policy to the filter management endpoint.
   */
  async applyFilter(signal?: AbortSignal): Promise<void> {
    if (!this.config.filter) {
      throw new ValidationError('No filter configured');
    }
    const body = checkRequest(FilterSchema, this.config.filter);

    const url = SERVICE_DEFAULTS.FILTER_URL;
    const response = await this.postJson(url, new URL(url).hostname, body, signal);
    if (response.toString('utf8').trim() === 'false') {
      throw new FilterFailedError();
    }
  }

  /**
   * Host as sent on the wire, without the service suffix.
   */
  private wireHost(): string {
    const host = this.config.host;
    return host.endsWith(SERVICE_DEFAULTS.HOST_SUFFIX)
      ? host.slice(0, -SERVICE_DEFAULTS.HOST_SUFFIX.length)
      : host;
  }

  private sessionUrl(operation: SessionOperation): string {
    const remote = this.resolver.remote;
    if (!remote) {
      throw new ValidationError('Remote address is not resolved');
    }
    return `https://${remote.toString()}/${this.config.apiVersion}/${operation}`;
  }

  /**
   * POSTs a JSON body and returns the body of a 200 response.
   * The request timeout is nested inside the caller's signal.
   */
  private async postJson(url: string, serverName: string, payload: unknown, signal?: AbortSignal): Promise<Buffer> {
    const timeout = AbortSignal.timeout(this.config.restTimeoutMs);
    const response = await this.transport.post({
      url,
      serverName,
      headers: {
        'user-agent': this.userAgent,
        'content-type': 'application/json',
      },
      body: JSON.stringify(payload, null, '\t'),
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });

    if (response.status === 403) {
      this.logger.error({ url }, 'Application update required');
      throw new AppUpdateRequiredError();
    }
    if (response.status !== 200) {
      this.logger.error({ url, status: response.status }, 'Bad HTTP response');
      throw new BadHttpStatusError(response.status);
    }
    return response.body;
  }
}
