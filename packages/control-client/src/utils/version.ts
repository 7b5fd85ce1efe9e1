/**
 * @file version.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

export const PACKAGE_NAME = 'vpn-control-client';

/**
 * Reads the client version from package.json.
 */
export function getClientVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  // "../package.json" when running from dist/, "../../package.json" from src/utils/
  const possiblePaths = [join(__dirname, '../package.json'), join(__dirname, '../../package.json')];
  for (const packageJsonPath of possiblePaths) {
    let packageJson: unknown;
    try {
      packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    } catch {
      // Try next path
      continue;
    }
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'name' in packageJson &&
      'version' in packageJson &&
      packageJson.name === PACKAGE_NAME &&
      typeof packageJson.version === 'string' &&
      packageJson.version.length > 0
    ) {
      return packageJson.version;
    }
  }
  return 'unknown';
}

/**
 * User agent sent with every control request.
 */
export function getUserAgent(): string {
  return `${PACKAGE_NAME}/${getClientVersion()}`;
}
