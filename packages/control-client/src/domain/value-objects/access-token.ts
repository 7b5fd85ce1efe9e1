/**
 * @file access-token.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import { z } from 'zod';

const Base64Schema = z.string().base64();

/**
 * Value object holding the opaque bearer credential issued by the service.
 * The bytes travel as standard (padded) base64.
 */
export class AccessToken {
  private readonly _bytes: Buffer;

  private constructor(bytes: Buffer) {
    this._bytes = bytes;
  }

  get bytes(): Buffer {
    return Buffer.from(this._bytes);
  }

  get length(): number {
    return this._bytes.length;
  }

  /**
   * Decodes standard base64 text. Returns undefined for anything that is not
   * strictly valid, or that decodes to nothing.
   */
  static fromBase64(text: string): AccessToken | undefined {
    const trimmed = text.trim();
    if (!Base64Schema.safeParse(trimmed).success) {
      return undefined;
    }
    const bytes = Buffer.from(trimmed, 'base64');
    if (bytes.length === 0) {
      return undefined;
    }
    return new AccessToken(bytes);
  }

  static fromBytes(bytes: Uint8Array): AccessToken {
    return new AccessToken(Buffer.from(bytes));
  }

  toBase64(): string {
    return this._bytes.toString('base64');
  }

  equals(other: AccessToken): boolean {
    return this._bytes.equals(other._bytes);
  }

  toString(): string {
    // Never expose the token in logs
    return `${this.toBase64().substring(0, 4)}****`;
  }
}
