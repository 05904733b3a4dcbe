/**
 * Input handling utilities: argument parsing and validation helpers.
 */

export { type CLIArgs, parseCliArgs } from './args.ts';
export { ensureSafeDirectoryPath, ensureTargetDirectory } from './validation.ts';
