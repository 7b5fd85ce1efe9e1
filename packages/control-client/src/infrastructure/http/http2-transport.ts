/**
 * @file http2-transport.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { readFileSync } from 'fs';
import { X509Certificate } from 'crypto';
import { connect as http2Connect, constants as http2Constants, type ClientHttp2Session } from 'http2';
import { connect as tlsConnect, type ConnectionOptions, type PeerCertificate, type TLSSocket } from 'tls';
import type { Socket } from 'net';
import type { Logger } from 'pino';
import { CONNECTION_TIMING } from '../../config/constants.js';
import { ConfigurationError, TransportError } from '../../domain/errors/domain-errors.js';
import type { HttpPostRequest, HttpResponse, HttpTransport } from '../../domain/ports/http-transport.js';
import type { Dialer } from '../network/dialer.js';
import type { PinVerifier } from '../tls/pin-verifier.js';

const PEM_CERTIFICATE = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

export interface Http2TransportConfig {
  /** PEM root certificates; system roots when undefined */
  ca?: string[];
  tlsHandshakeTimeoutMs?: number;
  responseHeaderTimeoutMs?: number;
}

export interface Http2TransportDeps {
  dialer: Dialer;
  pinVerifier: PinVerifier;
  logger: Logger;
}

/**
 * Reads a PEM bundle and keeps the certificates that parse.
 * Throws ConfigurationError when the file holds none.
 */
export function loadCaBundle(filePath: string): string[] {
  let pem: string;
  try {
    pem = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read CA bundle ${filePath}`, { cause: error });
  }

  const certificates = (pem.match(PEM_CERTIFICATE) ?? []).filter((block) => {
    try {
      new X509Certificate(block);
      return true;
    } catch {
      return false;
    }
  });

  if (certificates.length === 0) {
    throw new ConfigurationError(`Bad certificate in ${filePath}`);
  }
  return certificates;
}

/**
 * TLS options of every control connection: TLS 1.3 only, HTTP/2 only,
 * standard chain verification plus the pin check.
 */
export function buildTlsOptions(
  socket: Socket,
  serverName: string,
  ca: string[] | undefined,
  checkServerIdentity: (hostname: string, certificate: PeerCertificate) => Error | undefined
): ConnectionOptions {
  return {
    socket,
    servername: serverName,
    minVersion: 'TLSv1.3',
    ALPNProtocols: ['h2'],
    rejectUnauthorized: true,
    checkServerIdentity,
    ...(ca && { ca }),
  };
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new TransportError('Request aborted');
}

/**
 * HTTPS transport speaking HTTP/2 over a fresh TCP + TLS connection per
 * request. Nothing is pooled, so every request goes through the pin check.
 */
export class Http2Transport implements HttpTransport {
  private readonly ca: string[] | undefined;
  private readonly tlsHandshakeTimeoutMs: number;
  private readonly responseHeaderTimeoutMs: number;
  private readonly dialer: Dialer;
  private readonly checkServerIdentity: (hostname: string, certificate: PeerCertificate) => Error | undefined;
  private readonly logger: Logger;

  constructor(config: Http2TransportConfig, deps: Http2TransportDeps) {
    this.ca = config.ca;
    this.tlsHandshakeTimeoutMs = config.tlsHandshakeTimeoutMs ?? CONNECTION_TIMING.TLS_HANDSHAKE_TIMEOUT_MS;
    this.responseHeaderTimeoutMs =
      config.responseHeaderTimeoutMs ?? CONNECTION_TIMING.RESPONSE_HEADER_TIMEOUT_MS;
    this.dialer = deps.dialer;
    this.checkServerIdentity = deps.pinVerifier.serverIdentityCheck();
    this.logger = deps.logger.child({ component: 'http2-transport' });
  }

  async post(request: HttpPostRequest): Promise<HttpResponse> {
    const url = new URL(request.url);
    // URL keeps the brackets of IPv6 literals in hostname
    const host = url.hostname.replace(/^\[(.*)\]$/, '$1');
    const port = url.port ? Number(url.port) : 443;

    const tcpSocket = await this.dialer.dialTcp(host, port, request.signal);
    const tlsSocket = await this.handshake(tcpSocket, request.serverName, request.signal);
    const session = http2Connect(url.origin, { createConnection: () => tlsSocket });

    try {
      return await this.exchange(session, url, request);
    } finally {
      if (!session.destroyed) {
        session.close();
      }
      tlsSocket.end();
    }
  }

  private handshake(socket: Socket, serverName: string, signal: AbortSignal): Promise<TLSSocket> {
    return new Promise((resolve, reject) => {
      const tlsSocket = tlsConnect(buildTlsOptions(socket, serverName, this.ca, this.checkServerIdentity));

      const timer = setTimeout(() => {
        fail(new TransportError(`TLS handshake timed out after ${this.tlsHandshakeTimeoutMs}ms`));
      }, this.tlsHandshakeTimeoutMs);

      const cleanup = (): void => {
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        tlsSocket.off('secureConnect', onSecureConnect);
        tlsSocket.off('error', fail);
      };
      const fail = (error: Error): void => {
        cleanup();
        tlsSocket.destroy();
        reject(error);
      };
      const onAbort = (): void => {
        fail(abortReason(signal));
      };
      const onSecureConnect = (): void => {
        if (tlsSocket.alpnProtocol !== 'h2') {
          fail(new TransportError(`Server did not negotiate h2 (got ${String(tlsSocket.alpnProtocol)})`));
          return;
        }
        cleanup();
        resolve(tlsSocket);
      };

      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      tlsSocket.once('secureConnect', onSecureConnect);
      tlsSocket.once('error', fail);
    });
  }

  private exchange(session: ClientHttp2Session, url: URL, request: HttpPostRequest): Promise<HttpResponse> {
    return new Promise((resolve, reject) => {
      const { signal } = request;
      const body = Buffer.from(request.body, 'utf8');
      const chunks: Buffer[] = [];
      let status = 0;
      let settled = false;

      const stream = session.request({
        ':method': 'POST',
        ':path': `${url.pathname}${url.search}`,
        ...request.headers,
        'content-length': String(body.length),
      });

      const headerTimer = setTimeout(() => {
        fail(new TransportError(`No response headers after ${this.responseHeaderTimeoutMs}ms`));
      }, this.responseHeaderTimeoutMs);

      const finish = (): void => {
        settled = true;
        clearTimeout(headerTimer);
        signal.removeEventListener('abort', onAbort);
      };
      const fail = (error: Error): void => {
        if (settled) {
          return;
        }
        finish();
        stream.close(http2Constants.NGHTTP2_CANCEL);
        session.destroy();
        reject(error);
      };
      const onAbort = (): void => {
        fail(abortReason(signal));
      };

      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });

      session.on('error', fail);
      stream.on('error', fail);
      stream.on('response', (headers) => {
        clearTimeout(headerTimer);
        status = Number(headers[':status']);
      });
      stream.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });
      stream.on('end', () => {
        if (settled) {
          return;
        }
        finish();
        const response = { status, body: Buffer.concat(chunks) };
        this.logger.debug({ url: url.toString(), status }, 'Response received');
        resolve(response);
      });

      stream.end(body);
    });
  }
}
