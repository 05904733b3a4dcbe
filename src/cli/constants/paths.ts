/**
 * @packageDocumentation
 * File path and package-related constants used across the CLI.
 *
 * @remarks
 * Keep this file focused on literal values that are unlikely to change per
 * execution; avoid introducing logic here.
 */
/** Filename for the package manifest used when resolving project metadata. */
export const PKG_FILENAME = 'package.json';

/** Fallback value to use when a package version cannot be determined. */
export const PKG_VERSION_FALLBACK = 'unknown';

/** Directory (relative to the working directory) receiving one log per step. */
export const DEFAULT_LOG_DIR = './logs';
