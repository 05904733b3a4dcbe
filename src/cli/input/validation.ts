/**
 * Lint Pipeline — CLI Validation
 *
 * Role:
 *   Validate the directories a run depends on.
 *
 * Responsibilities:
 *   - Ensure the log directory stays inside the working directory
 *   - Ensure the target source tree exists and is readable before any tool runs
 */

import fs from 'node:fs';
import path from 'node:path';
import { CliError } from '../../errors/errors.ts';

function isOutside(relativePath: string): boolean {
  return (
    relativePath === '..' ||
    relativePath.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relativePath)
  );
}

/**
 * Ensure that `inputPath` resolves to a directory that lives under `baseDir`.
 *
 * Checks the resolved path and, when it already exists, its realpath, so a
 * symlink cannot point the logs elsewhere.
 *
 * @returns Resolved, safe path string.
 * @throws {CliError} when the resolved path escapes the base directory.
 */
export function ensureSafeDirectoryPath(baseDir: string, inputPath: string): string {
  const resolvedBase = path.resolve(baseDir);
  const outsideError = () =>
    new CliError('CLI_INVALID_PATH', `Log directory must be within ${resolvedBase}`, {
      details: { resolvedBase, inputPath },
    });

  // Reject Windows-style separators on POSIX; they would be taken literally.
  if (path.sep !== '\\' && inputPath.includes('\\')) {
    throw outsideError();
  }

  const resolvedPath = path.resolve(resolvedBase, inputPath);
  if (isOutside(path.relative(resolvedBase, resolvedPath))) {
    throw outsideError();
  }

  if (fs.existsSync(resolvedPath)) {
    const realResolved = fs.realpathSync(resolvedPath);
    const realBase = fs.realpathSync(resolvedBase);
    if (isOutside(path.relative(realBase, realResolved))) {
      throw outsideError();
    }
  }

  return resolvedPath;
}

/**
 * Ensure the target source tree exists, is a directory and is readable.
 *
 * The pipeline never creates the target; a missing tree stops the run before
 * any tool is invoked.
 *
 * @returns Absolute path of the target.
 * @throws {CliError} `CLI_INVALID_PATH` when the target is unusable.
 */
export function ensureTargetDirectory(baseDir: string, targetPath: string): string {
  const resolved = path.resolve(baseDir, targetPath);

  let stats: fs.Stats;
  try {
    stats = fs.statSync(resolved);
  } catch (error) {
    throw new CliError('CLI_INVALID_PATH', `Target directory does not exist: ${resolved}`, {
      cause: error,
      details: { targetPath, resolved },
    });
  }

  if (!stats.isDirectory()) {
    throw new CliError('CLI_INVALID_PATH', `Target is not a directory: ${resolved}`, {
      details: { targetPath, resolved },
    });
  }

  try {
    fs.accessSync(resolved, fs.constants.R_OK);
  } catch (error) {
    throw new CliError('CLI_INVALID_PATH', `Target directory is not readable: ${resolved}`, {
      cause: error,
      details: { targetPath, resolved },
    });
  }

  return resolved;
}
