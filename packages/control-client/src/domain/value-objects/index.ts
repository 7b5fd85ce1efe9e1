/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export { RemoteAddress } from './remote-address.js';
export { AccessToken } from './access-token.js';
