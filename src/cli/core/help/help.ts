/**
 * Lint Pipeline — Help & Version API
 */

import { getPackageVersion } from '../version/version.ts';

export { showHelp } from './formatter.ts';

/**
 * Return the version string printed by `--version`, e.g. `lint-pipeline v1.2.3`.
 */
export function showVersion(): string {
  return `lint-pipeline v${getPackageVersion()}`;
}
