/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export { ControlChannelClient, type ControlChannelClientDeps } from './control-channel-client.js';
export { connectWithRetry, holdSession, type SessionClient } from './session-lifecycle.js';
