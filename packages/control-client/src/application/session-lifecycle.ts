/**
 * @file session-lifecycle.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { setTimeout as sleep } from 'timers/promises';
import type { Logger } from 'pino';
import { AppUpdateRequiredError } from '../domain/errors/domain-errors.js';
import type { ConnectResponse } from '../protocol/messages.js';
import type { ControlChannelClient } from './control-channel-client.js';

/**
 * The client calls a session needs between connect and disconnect.
 */
export type SessionClient = Pick<
  ControlChannelClient,
  'config' | 'resolve' | 'hasAccessToken' | 'getAccessToken' | 'connect' | 'applyFilter' | 'disconnect'
>;

/**
 * Connects, waiting reconnectWait between attempts. Update-required is final.
 */
export async function connectWithRetry(
  client: SessionClient,
  publicKey: Buffer,
  logger: Logger,
  signal: AbortSignal
): Promise<ConnectResponse> {
  for (let attempt = 1; ; attempt++) {
    try {
      await client.resolve(signal);
      if (!client.hasAccessToken()) {
        await client.getAccessToken(signal);
      }
      return await client.connect(publicKey, signal);
    } catch (error) {
      if (error instanceof AppUpdateRequiredError || signal.aborted) {
        throw error;
      }
      logger.error({ error, attempt, retryInMs: client.config.reconnectWaitMs }, 'Connect failed');
      await sleep(client.config.reconnectWaitMs, undefined, { signal });
    }
  }
}

/**
 * Refreshes a stale access token once, after the configured delay.
 */
async function refreshAccessToken(client: SessionClient, logger: Logger, signal: AbortSignal): Promise<void> {
  try {
    await sleep(client.config.accessTokenUpdateDelayMs, undefined, { signal });
    await client.getAccessToken(signal);
  } catch (error) {
    if (signal.aborted) {
      return;
    }
    logger.error({ error }, 'Access token refresh failed');
  }
}

async function waitForShutdown(signal: AbortSignal): Promise<void> {
  while (!signal.aborted) {
    try {
      await sleep(60_000, undefined, { signal });
    } catch (error) {
      if (!signal.aborted) {
        throw error;
      }
    }
  }
}

/**
 * Disconnects on its own deadline; the run signal may already be aborted.
 * Failures are logged, not thrown.
 */
async function closeSession(client: SessionClient, sessionToken: Buffer, logger: Logger): Promise<void> {
  try {
    await client.disconnect(sessionToken, AbortSignal.timeout(client.config.restTimeoutMs));
    logger.info('Session closed');
  } catch (error) {
    logger.error({ error }, 'Disconnect failed');
  }
}

/**
 * Holds an established session until the signal aborts: applies the
 * configured filter, refreshes a stale access token, then disconnects.
 * The session is disconnected on every exit path, failures included.
 */
export async function holdSession(
  client: SessionClient,
  session: Pick<ConnectResponse, 'sessionToken' | 'staleAccessToken'>,
  logger: Logger,
  signal: AbortSignal
): Promise<void> {
  try {
    if (client.config.filter) {
      await client.applyFilter(signal);
      logger.info('Filter applied');
    }

    const refresh = session.staleAccessToken ? refreshAccessToken(client, logger, signal) : Promise.resolve();

    await waitForShutdown(signal);
    await refresh;
  } finally {
    await closeSession(client, session.sessionToken, logger);
  }
}
