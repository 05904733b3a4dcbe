/**
 * Lint Pipeline — CLI Entrypoint
 *
 * Role:
 *   Handle process-level concerns (broken pipe, signals, uncaught errors).
 *
 * Responsibilities:
 *   - Set up EPIPE error handling
 *   - Translate the run result into `process.exitCode`
 *   - Enable module self-execution detection
 */

import type { EventEmitter } from 'node:events';
import { pathToFileURL } from 'node:url';
import { AppError } from '../../../errors/errors.ts';
import { executeWithArgs } from '../../execution/execution.ts';
import { parseCliArgs } from '../../input/args.ts';
import { showHelp, showVersion } from '../help/help.ts';

export interface EntrypointDeps {
  readonly mainFn?: () => Promise<{ exitCode: number }>;
  readonly console?: Pick<typeof console, 'error'>;
  /** Optional graceful shutdown handler invoked on SIGINT/SIGTERM */
  readonly onSignal?: (signal: 'SIGINT' | 'SIGTERM') => Promise<void> | void;
  /** Where SIGINT/SIGTERM are listened for (defaults to `process`). */
  readonly signalSource?: Pick<EventEmitter, 'on' | 'off'>;
}

/**
 * Ignore EPIPE (output piped into a closed reader) and rethrow anything else.
 */
function handleBrokenPipe(err: NodeJS.ErrnoException): void {
  if (err.code === 'EPIPE') {
    return;
  }

  throw err;
}

function setupBrokenPipeHandlers(): () => void {
  process.stdout.on('error', handleBrokenPipe);
  process.stderr.on('error', handleBrokenPipe);

  return () => {
    process.stdout.off('error', handleBrokenPipe);
    process.stderr.off('error', handleBrokenPipe);
  };
}

interface SignalHandlers {
  /** Exit code of the first signal received, if any. */
  readonly signalExitCode: () => number | undefined;
  readonly remove: () => void;
}

/**
 * Register SIGINT/SIGTERM handlers.
 *
 * The first signal fixes the exit code at 128 + signal number; later ones
 * are ignored.
 */
function setupSignalHandlers(
  deps: EntrypointDeps,
  errorConsole: Pick<typeof console, 'error'>,
): SignalHandlers {
  let received: number | undefined;

  const createHandler = (signal: 'SIGINT' | 'SIGTERM') => () => {
    if (received !== undefined) {
      return;
    }

    received = signal === 'SIGINT' ? 130 : 143;
    process.exitCode = received;

    if (deps.onSignal) {
      Promise.resolve()
        .then(() => deps.onSignal?.(signal))
        .catch((e: unknown) => errorConsole.error('\nWARN: signal handler failed:', e));
    }
  };

  const sigintHandler = createHandler('SIGINT');
  const sigtermHandler = createHandler('SIGTERM');

  const source = deps.signalSource ?? process;
  source.on('SIGINT', sigintHandler);
  source.on('SIGTERM', sigtermHandler);

  return {
    signalExitCode: () => received,
    remove: () => {
      source.off('SIGINT', sigintHandler);
      source.off('SIGTERM', sigtermHandler);
    },
  };
}

/**
 * Scrub argv values for logging; flag values and positionals are redacted.
 */
export function sanitizeArgs(argv: readonly string[]): string[] {
  return argv.map((arg) => {
    if (arg.startsWith('--')) {
      const [key = arg, val] = arg.split('=', 2);
      return val === undefined ? key : `${key}=<redacted>`;
    }
    if (arg.startsWith('-')) {
      return arg;
    }
    return '<redacted>';
  });
}

/**
 * Run the CLI: wire broken pipes and signal handling, await `mainFn`, set the
 * process exit code and report unexpected errors. A signal received during
 * the run takes precedence over the run's own exit code.
 *
 * @returns A promise that settles once the run and its cleanup are done.
 */
export function runEntrypoint(deps: EntrypointDeps = {}): Promise<void> {
  const { mainFn = main, console: injectedConsole } = deps;
  const errorConsole = injectedConsole ?? console;

  const removePipeHandlers = setupBrokenPipeHandlers();
  const signals = setupSignalHandlers(deps, errorConsole);

  return mainFn()
    .then(({ exitCode }) => {
      process.exitCode = signals.signalExitCode() ?? exitCode;
    })
    .catch((error: unknown) => {
      const wrapped = new AppError(
        'UNEXPECTED_ERROR',
        error instanceof Error ? error.message : String(error),
        {
          cause: error,
          details: { context: { argv: sanitizeArgs(process.argv.slice(2)) } },
        },
      );

      errorConsole.error('\n❌ Fatal error:', wrapped);
      process.exitCode = signals.signalExitCode() ?? 1;
    })
    .finally(() => {
      signals.remove();
      removePipeHandlers();
    });
}

/**
 * Default `mainFn`: parse argv, answer --help/--version, otherwise run the
 * pipeline.
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<{
  exitCode: number;
}> {
  const args = parseCliArgs(argv);

  if (args.help) {
    console.log(showHelp());
    return { exitCode: 0 };
  }

  if (args.version) {
    console.log(showVersion());
    return { exitCode: 0 };
  }

  return executeWithArgs(args);
}

/* -------------------------------------------------------------------------- */
/* Module self-execution detection                                            */
/* -------------------------------------------------------------------------- */

const entryUrl = process.argv[1] === undefined ? null : pathToFileURL(process.argv[1]).href;

if (entryUrl !== null && import.meta.url === entryUrl) {
  void runEntrypoint();
}
