/**
 * Centralized version management.
 */

import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { readFileSync } from 'fs';

/**
 * Read the package version from npm's environment or package.json beside src/ or dist/.
 */
function getPackageVersion(): string {
  try {
    if (process.env.npm_package_version) {
      return process.env.npm_package_version;
    }

    const __dirname = dirname(fileURLToPath(import.meta.url));
    const packagePath = join(__dirname, '..', 'package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));

    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return '0.1.0';
  } catch {
    // Fallback version - should match package.json
    return '0.1.0';
  }
}

export const VERSION = getPackageVersion();

export const PACKAGE_NAME = 'minebench';
