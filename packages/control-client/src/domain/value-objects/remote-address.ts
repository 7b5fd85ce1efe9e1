/**
 * @file remote-address.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import { isIP } from 'net';

/**
 * Value object representing the session server's socket address.
 * Once resolved it is reused for every request of the session.
 */
export class RemoteAddress {
  private readonly _ip: string;
  private readonly _port: number;

  private constructor(ip: string, port: number) {
    this._ip = ip;
    this._port = port;
  }

  get ip(): string {
    return this._ip;
  }

  get port(): number {
    return this._port;
  }

  get family(): 4 | 6 {
    return isIP(this._ip) === 6 ? 6 : 4;
  }

  static create(ip: string, port: number): RemoteAddress {
    if (isIP(ip) === 0) {
      throw new Error(`RemoteAddress requires an IP address, got "${ip}"`);
    }
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new Error(`RemoteAddress port out of range: ${port}`);
    }
    return new RemoteAddress(ip, port);
  }

  equals(other: RemoteAddress): boolean {
    return this._ip === other._ip && this._port === other._port;
  }

  /**
   * Formats as host:port, bracketing IPv6 addresses so the result can be
   * used as a URL authority.
   */
  toString(): string {
    return this.family === 6 ? `[${this._ip}]:${this._port}` : `${this._ip}:${this._port}`;
  }
}
