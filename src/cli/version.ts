/**
 * Version lookup for the gwt-prose CLI.
 *
 * Reads the version directly from package.json.
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { readFileSync } from 'node:fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Reads the version from package.json (two levels up from both src/cli and dist/cli).
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersion(): string {
  try {
    const packageJsonPath = join(__dirname, '../../package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
      ? packageJson.version
      : '(unknown)';
  } catch {
    return '(unknown)';
  }
}
