/**
 * Binary availability checks.
 * A step whose executable cannot be located is a ToolMissing condition and
 * is reported before anything is spawned.
 */

import { constants } from 'node:fs';
import { access, realpath, stat } from 'node:fs/promises';
import path from 'node:path';

/** Known Windows directories to use when searching for binaries. */
const WINDOWS_BASE_DIRS = [String.raw`C:\Windows\System32`, String.raw`C:\Windows`] as const;
/** Known POSIX directories to include in the binary search path (plus PATH entries). */
const POSIX_BASE_DIRS = ['/usr/local/bin', '/opt/homebrew/bin', '/usr/bin', '/bin'] as const;

const WINDOWS_EXTENSIONS = ['.exe', '.cmd', '.bat', ''] as const;
const POSIX_EXTENSIONS = [''] as const;

export interface BinarySearchOptions {
  /** Value used in place of `process.env.PATH`. */
  readonly envPath?: string | undefined;
  /** Include the well-known system directories after PATH entries. */
  readonly includeDefaults?: boolean;
  readonly platform?: NodeJS.Platform;
}

/**
 * Enumerate directories used when searching for binaries, PATH order first.
 */
export function getBaseDirs(options: BinarySearchOptions = {}): Set<string> {
  const isWindows = (options.platform ?? process.platform) === 'win32';
  const envPath = 'envPath' in options ? options.envPath : process.env['PATH'];
  const entries: string[] = [];

  if (envPath !== undefined && envPath.length > 0) {
    for (const entry of envPath.split(path.delimiter)) {
      if (entry && path.isAbsolute(entry)) {
        entries.push(entry);
      }
    }
  }

  if (options.includeDefaults !== false) {
    entries.push(...(isWindows ? WINDOWS_BASE_DIRS : POSIX_BASE_DIRS));
  }

  return new Set(entries);
}

/**
 * Build candidate paths for a binary by combining base directories with extensions.
 */
function getCandidates(binary: string, isWindows: boolean, baseDirs: Set<string>): string[] {
  if (binary.includes('/') || binary.includes('\\')) {
    return [binary];
  }

  const extensions = isWindows ? WINDOWS_EXTENSIONS : POSIX_EXTENSIONS;
  const candidates: string[] = [];
  for (const dir of baseDirs) {
    for (const ext of extensions) {
      candidates.push(path.join(dir, `${binary}${ext}`));
    }
  }
  return candidates;
}

/**
 * Resolve a candidate path when it exists, is a regular file and is accessible.
 */
async function resolveCandidate(candidate: string, mode: number): Promise<string | null> {
  try {
    await access(candidate, mode);
    const stats = await stat(candidate);
    if (!stats.isFile()) {
      return null;
    }
    return await realpath(candidate);
  } catch {
    // Missing or unreadable candidates are simply not matches.
    return null;
  }
}

/**
 * Resolve a binary name to an absolute filesystem path by searching the
 * entries of `PATH` followed by common system directories.
 *
 * @returns The fully-resolved path, or `null` when the binary cannot be located.
 */
export async function resolveBinary(
  binary: string,
  options: BinarySearchOptions = {},
): Promise<string | null> {
  const isWindows = (options.platform ?? process.platform) === 'win32';
  const candidates = getCandidates(binary, isWindows, getBaseDirs(options));
  const mode = isWindows ? constants.F_OK : constants.X_OK;

  for (const candidate of candidates) {
    const resolved = await resolveCandidate(candidate, mode);
    if (resolved !== null) {
      return resolved;
    }
  }

  return null;
}

/**
 * Check whether the given binary is available on the host system.
 */
export async function checkBinaryExists(
  binary: string,
  options: BinarySearchOptions = {},
): Promise<boolean> {
  return (await resolveBinary(binary, options)) !== null;
}
