/**
 * @file pin-verifier.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { X509Certificate, createHash } from 'crypto';
import { checkServerIdentity, type PeerCertificate } from 'tls';
import type { Logger } from 'pino';
import { BadPinError } from '../../domain/errors/domain-errors.js';

/**
 * The parts of a verified certificate the pin check reads.
 * Node's DetailedPeerCertificate satisfies it.
 */
export interface ChainCertificate {
  subject: { CN?: string | string[] };
  ca: boolean;
  /** DER encoded certificate */
  raw: Buffer;
  issuerCertificate?: ChainCertificate;
}

export interface PinVerifierDeps {
  /** Common name → base64 SHA-256 of the certificate's SPKI */
  pins: ReadonlyMap<string, string>;
  logger: Logger;
}

/**
 * Computes the pin of a certificate: base64 SHA-256 of its SPKI bytes.
 */
export function publicKeyPin(spki: Buffer): string {
  return createHash('sha256').update(spki).digest('base64');
}

/**
 * Computes the pin of a DER certificate from its SubjectPublicKeyInfo.
 * Node's `pubkey` holds the bare point for EC keys, not SPKI.
 * Returns undefined when the certificate does not parse.
 */
export function certificatePin(raw: Buffer): string | undefined {
  let spki: Buffer;
  try {
    spki = new X509Certificate(raw).publicKey.export({ type: 'spki', format: 'der' });
  } catch {
    // An unparseable certificate has no pin and fails the check
    return undefined;
  }
  return publicKeyPin(spki);
}

function commonNameOf(certificate: ChainCertificate): string {
  const cn = certificate.subject.CN;
  if (Array.isArray(cn)) {
    return cn[0] ?? '';
  }
  return cn ?? '';
}

/**
 * Flattens the issuer links of a peer certificate into a chain, leaf first.
 * Stops at the self-issued root, which links to itself.
 */
export function chainFromPeerCertificate(leaf: ChainCertificate): ChainCertificate[] {
  const chain: ChainCertificate[] = [];
  const seen = new Set<ChainCertificate>();
  let current: ChainCertificate | undefined = leaf;
  while (current && !seen.has(current)) {
    seen.add(current);
    chain.push(current);
    current = current.issuerCertificate;
  }
  return chain;
}

/**
 * Checks that every CA certificate of the verified chains is pinned.
 * Runs once per TLS handshake, possibly for several handshakes at once,
 * so it keeps no state besides the injected table.
 */
export class PinVerifier {
  private readonly pins: ReadonlyMap<string, string>;
  private readonly logger: Logger;

  constructor(deps: PinVerifierDeps) {
    this.pins = deps.pins;
    this.logger = deps.logger.child({ component: 'pin-verifier' });
  }

  /**
   * Returns undefined when every CA certificate matches the table,
   * or the BadPinError of the first one that does not.
   */
  verify(chains: readonly (readonly ChainCertificate[])[]): BadPinError | undefined {
    for (const chain of chains) {
      for (const certificate of chain) {
        if (!certificate.ca) {
          continue;
        }

        const commonName = commonNameOf(certificate);
        const expected = this.pins.get(commonName);
        const pin = certificatePin(certificate.raw);

        if (expected !== undefined && pin === expected) {
          this.logger.debug({ commonName }, 'pin OK');
          continue;
        }

        this.logger.debug({ commonName, pin }, 'pin failed');
        return new BadPinError(commonName);
      }
    }
    return undefined;
  }

  /**
   * Builds the checkServerIdentity callback for tls.connect: the standard
   * host name check first, then the pins of the peer chain.
   */
  serverIdentityCheck(): (hostname: string, certificate: PeerCertificate) => Error | undefined {
    return (hostname, certificate) => {
      const identityError = checkServerIdentity(hostname, certificate);
      if (identityError) {
        return identityError;
      }
      return this.verify([chainFromPeerCertificate(certificate)]);
    };
  }
}
