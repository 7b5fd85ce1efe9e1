/**
 * @file main.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { ControlChannelClient } from './application/control-channel-client.js';
import { connectWithRetry, holdSession } from './application/session-lifecycle.js';
import { loadEnv, toClientConfig, type Env } from './config/env.js';
import { DomainError } from './domain/errors/domain-errors.js';
import { createLogger, type Logger } from './infrastructure/logging/pino-logger.js';
import type { ConnectResponse } from './protocol/messages.js';
import { getClientVersion } from './utils/version.js';

type Command = 'connect' | 'disconnect' | 'token' | 'filter';

const USAGE = `Usage: vpn-control <command>

Commands:
  connect                  Open a session and hold it until SIGINT or SIGTERM
  disconnect <token>       Close the session with the given base64 session token
  token                    Obtain or refresh the access token
  filter                   Apply the filter policy from VPN_FILTER_FILE
`;

function parseCommand(argv: string[]): { command: Command; args: string[] } | undefined {
  const [command, ...args] = argv;
  if (command === 'connect' || command === 'disconnect' || command === 'token' || command === 'filter') {
    return { command, args };
  }
  return undefined;
}

function printSession(session: ConnectResponse): void {
  const printable = {
    ...session,
    publicKey: session.publicKey.toString('base64'),
    presharedKey: session.presharedKey?.toString('base64'),
    sessionToken: session.sessionToken.toString('base64'),
  };
  process.stdout.write(`${JSON.stringify(printable, null, 2)}\n`);
}

async function runCommand(
  command: Command,
  args: string[],
  env: Env,
  client: ControlChannelClient,
  logger: Logger,
  signal: AbortSignal
): Promise<void> {
  switch (command) {
    case 'connect': {
      if (!env.VPN_PUBLIC_KEY) {
        throw new Error('VPN_PUBLIC_KEY is required for connect');
      }
      const session = await connectWithRetry(client, Buffer.from(env.VPN_PUBLIC_KEY, 'base64'), logger, signal);
      logger.info(
        { remote: client.remoteAddress?.toString(), endpoint: session.endpoint },
        'Session established'
      );
      printSession(session);

      await holdSession(client, session, logger, signal);
      return;
    }

    case 'disconnect': {
      const [sessionToken] = args;
      if (!sessionToken) {
        throw new Error('disconnect needs the base64 session token');
      }
      await client.resolve(signal);
      await client.disconnect(Buffer.from(sessionToken, 'base64'), signal);
      logger.info('Session closed');
      return;
    }

    case 'token': {
      await client.resolve(signal);
      await client.getAccessToken(signal);
      return;
    }

    case 'filter': {
      await client.applyFilter(signal);
      logger.info('Filter applied');
      return;
    }
  }
}

/**
 * Bootstraps the CLI and runs one command.
 */
async function bootstrap(): Promise<void> {
  const parsed = parseCommand(process.argv.slice(2));
  if (!parsed) {
    process.stderr.write(USAGE);
    process.exit(2);
  }

  const env = loadEnv();
  const logger = createLogger({
    name: 'vpn-control',
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV === 'development',
  });

  logger.info({ version: getClientVersion(), host: env.VPN_HOST, command: parsed.command }, 'Starting');

  const client = new ControlChannelClient(toClientConfig(env), { logger });

  const controller = new AbortController();
  const stop = (signal: string): void => {
    logger.info({ signal }, 'Shutdown signal received');
    controller.abort(new Error(`Interrupted by ${signal}`));
  };
  process.once('SIGTERM', () => stop('SIGTERM'));
  process.once('SIGINT', () => stop('SIGINT'));

  try {
    await runCommand(parsed.command, parsed.args, env, client, logger, controller.signal);
  } catch (error) {
    if (controller.signal.aborted) {
      logger.info('Stopped');
      process.exit(0);
    }
    if (error instanceof DomainError) {
      logger.fatal({ code: error.code, category: error.category, error }, error.message);
    } else {
      logger.fatal({ error }, 'Command failed');
    }
    process.exit(1);
  }
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to bootstrap:', error);
  process.exit(1);
});
