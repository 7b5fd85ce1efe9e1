/**
 * @file pino-logger.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export interface LoggerConfig {
  level: string;
  name: string;
  pretty?: boolean;
}

/**
 * Creates a configured pino logger instance.
 * A destination stream may be passed to capture output (pretty is ignored then).
 */
export function createLogger(config: LoggerConfig, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    name: config.name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Credentials must never reach the logs
    redact: {
      paths: [
        'password',
        'accessToken',
        'sessionToken',
        'request.password',
        'request.accessToken',
        'request.sessionToken',
        '*.password',
        '*.accessToken',
        '*.sessionToken',
      ],
      censor: '****',
    },
  };

  if (destination) {
    return pino(options, destination);
  }

  // Use pino-pretty for development
  if (config.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(options);
}

export type { Logger } from 'pino';
