/**
 * @file socket-factory.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { Socket } from 'net';

export interface SocketRequest {
  host: string;
  port: number;
  /** 4 or 6 for a literal address, 0 when the host is a name */
  family: 0 | 4 | 6;
  /** Firewall mark for the connection; 0 means unmarked */
  mark: number;
}

/**
 * Port (interface) creating the sockets of outgoing connections.
 *
 * The socket is returned unconnected. For a non-zero mark the implementation
 * owns the descriptor: it creates it, sets SO_MARK on it and hands it over
 * as `new Socket({ fd })`, so the mark applies from the first packet.
 */
export interface SocketFactory {
  /**
   * Throws when the socket cannot be created with the requested mark.
   */
  createSocket(request: SocketRequest): Socket;
}
