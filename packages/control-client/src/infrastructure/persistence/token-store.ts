/**
 * @file token-store.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { readFileSync } from 'fs';
import { writeFile } from 'fs/promises';
import type { Logger } from 'pino';
import { DecodeError, PersistenceError } from '../../domain/errors/domain-errors.js';
import { AccessToken } from '../../domain/value-objects/access-token.js';

export interface TokenStoreConfig {
  /** Credential file holding the token as base64 text; empty disables persistence */
  filePath?: string;
}

/**
 * Holds the access token in memory and mirrors it to the credential file.
 */
export class TokenStore {
  private readonly filePath: string | undefined;
  private readonly logger: Logger;
  private token: AccessToken | null = null;

  constructor(config: TokenStoreConfig, logger: Logger) {
    this.filePath = config.filePath ? config.filePath : undefined;
    this.logger = logger.child({ component: 'token-store' });
    this.token = this.load();
  }

  /**
   * Reads the credential file. A missing, unreadable or undecodable file
   * means there is no token yet (first run), not an error.
   */
  private load(): AccessToken | null {
    if (!this.filePath) {
      return null;
    }

    let content: string;
    try {
      content = readFileSync(this.filePath, 'utf8');
    } catch (error) {
      this.logger.debug({ filePath: this.filePath, error }, 'No stored access token');
      return null;
    }

    const token = AccessToken.fromBase64(content);
    if (!token) {
      this.logger.warn({ filePath: this.filePath }, 'Stored access token is not valid base64, ignoring it');
      return null;
    }

    this.logger.debug({ filePath: this.filePath, token: token.toString() }, 'Loaded access token');
    return token;
  }

  has(): boolean {
    return this.token !== null;
  }

  get(): AccessToken | null {
    return this.token;
  }

  /**
   * Replaces the token with a freshly issued one given as base64 text.
   * The text is decoded before anything changes; the file is written after
   * the in-memory update, so a PersistenceError leaves the new token in use.
   */
  async replace(base64Text: string): Promise<AccessToken> {
    const token = AccessToken.fromBase64(base64Text);
    if (!token) {
      throw new DecodeError('Access token is not valid base64');
    }

    this.token = token;

    if (this.filePath) {
      try {
        await writeFile(this.filePath, token.toBase64(), { mode: 0o600 });
      } catch (error) {
        throw new PersistenceError(`Failed to write access token to ${this.filePath}`, { cause: error });
      }
    }

    return token;
  }
}
