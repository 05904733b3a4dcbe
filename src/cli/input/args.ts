/**
 * Lint Pipeline — CLI Argument Parsing
 *
 * Role:
 *   Handle all argument parsing, validation, and normalization.
 *
 * Responsibilities:
 *   - Parse raw argv into structured CLIArgs
 *   - Reject positionals and unknown options
 *   - Map parse errors to descriptive CliErrors
 */

import { parseArgs } from 'node:util';
import { CliError } from '../../errors/errors.ts';
import { DEFAULT_LOG_DIR } from '../constants/paths.ts';

/* -------------------------------------------------------------------------- */
/* CLI argument model                                                          */
/* -------------------------------------------------------------------------- */

/**
 * Parsed CLI arguments normalized into strongly typed properties.
 *
 * The step list and target path are fixed; flags only affect logging and
 * informational output.
 */
export interface CLIArgs {
  readonly verifyLogs: boolean;
  readonly logDir: string;
  readonly help: boolean;
  readonly version: boolean;
  readonly verbose: boolean;
}

/* -------------------------------------------------------------------------- */
/* Argument parsing                                                            */
/* -------------------------------------------------------------------------- */

/**
 * Parse the raw argv array into structured CLI arguments.
 *
 * @param argv - Raw arguments (defaults to `process.argv.slice(2)`).
 * @throws {CliError} when parsing fails or validation rejects the inputs.
 */
export function parseCliArgs(argv: readonly string[] = process.argv.slice(2)): CLIArgs {
  try {
    const { values, positionals } = parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: true,
      options: {
        'verify-logs': { type: 'boolean', default: false },
        help: { type: 'boolean', default: false },
        version: { type: 'boolean', default: false },
        'log-dir': { type: 'string', default: DEFAULT_LOG_DIR },
        verbose: { type: 'boolean', default: false },
        debug: { type: 'boolean', default: false },
      },
    });

    return normalizeCliArgs(values, positionals);
  } catch (error) {
    throw mapParseArgsError(error);
  }
}

type RawCliValues = {
  readonly 'verify-logs'?: boolean;
  readonly help?: boolean;
  readonly version?: boolean;
  readonly 'log-dir'?: string;
  readonly verbose?: boolean;
  readonly debug?: boolean;
};

/**
 * Normalize the `parseArgs` output into our CLI shape and enforce validation rules.
 */
function normalizeCliArgs(values: RawCliValues, positionals: readonly string[]): CLIArgs {
  if (positionals.length > 0) {
    throw new CliError('CLI_INVALID_ARGUMENT', `Unexpected argument: ${positionals[0]}`);
  }

  const logDir = values['log-dir'] ?? DEFAULT_LOG_DIR;
  if (logDir.trim().length === 0) {
    throw new CliError('CLI_INVALID_ARGUMENT', '--log-dir requires a path');
  }

  return {
    verifyLogs: values['verify-logs'] === true,
    logDir,
    help: values.help === true,
    version: values.version === true,
    verbose: values.verbose === true || values.debug === true,
  };
}

function readStringProperty(error: Error, key: 'code' | 'option'): string | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Translate `parseArgs` errors into `CliError` instances with user-friendly messages.
 */
function mapParseArgsError(error: unknown): Error {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof Error) {
    const code = readStringProperty(error, 'code');
    const option = readStringProperty(error, 'option') ?? /'([\w-]+)/.exec(error.message)?.[1];

    if (code === 'ERR_PARSE_ARGS_UNKNOWN_OPTION') {
      return new CliError('CLI_UNKNOWN_OPTION', `Unknown option: ${option ?? error.message}`, {
        cause: error,
      });
    }

    if (code === 'ERR_PARSE_ARGS_INVALID_OPTION_VALUE' && option?.startsWith('--log-dir')) {
      return new CliError('CLI_INVALID_ARGUMENT', '--log-dir requires a path', { cause: error });
    }

    return new CliError('CLI_PARSE_ERROR', error.message, { cause: error });
  }

  return new CliError('CLI_PARSE_ERROR', String(error));
}
