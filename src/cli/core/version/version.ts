/**
 * Lint Pipeline — Version Management
 *
 * Role:
 *   Read and cache package version information.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { PKG_FILENAME, PKG_VERSION_FALLBACK } from '../../constants/paths.ts';

let cachedPkgVersion: string | undefined;

const pkgPath = fileURLToPath(new URL(`../../../../${PKG_FILENAME}`, import.meta.url));

/**
 * Read and cache the package version from package.json.
 *
 * Falls back to `PKG_VERSION_FALLBACK` when the file cannot be read or has no
 * string version, and logs the failure.
 */
function getPkgVersion(): string {
  if (cachedPkgVersion !== undefined) {
    return cachedPkgVersion;
  }
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf8'));
    const version =
      typeof pkg === 'object' && pkg !== null ? Reflect.get(pkg, 'version') : undefined;
    cachedPkgVersion = typeof version === 'string' ? version : PKG_VERSION_FALLBACK;
  } catch (error) {
    console.error(`[version] Failed to read ${PKG_FILENAME}: ${String(error)}`);
    cachedPkgVersion = PKG_VERSION_FALLBACK;
  }
  return cachedPkgVersion;
}

const PKG_VERSION = getPkgVersion();

/**
 * Public accessor for the resolved package version, computed once at module load.
 */
export function getPackageVersion(): string {
  return PKG_VERSION;
}
