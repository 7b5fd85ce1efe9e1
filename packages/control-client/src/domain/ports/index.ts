/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export type { HttpTransport, HttpPostRequest, HttpResponse } from './http-transport.js';
export type { HostLookup } from './host-lookup.js';
export type { SocketFactory, SocketRequest } from './socket-factory.js';
