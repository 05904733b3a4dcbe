/**
 * Lint Pipeline — Step Logging
 *
 * Role:
 *   Deterministic logging of each step's tool output.
 *
 * Guarantees:
 *   - One log file per step
 *   - Ordered, complete output
 *   - Verification mode preserves byte-for-byte output
 *   - Standard mode prefixes every line with a timestamp and the step id
 *
 * Non-goals:
 *   - No buffering of entire streams
 *   - No interpretation of tool output
 */

import { createWriteStream, type WriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { pipeline, Transform } from 'node:stream';
import { StringDecoder } from 'node:string_decoder';
import { promisify } from 'node:util';

const pipelineAsync = promisify(pipeline);

export interface LogOptions {
  readonly logDir: string;
  readonly stepId: string;
  readonly verifyMode: boolean;
  /** Injected clock, used by tests to pin timestamps. */
  readonly now?: () => Date;
}

/**
 * Build `LogOptions` with optional fields in a type-safe manner.
 */
export function makeLogOptions(opts: {
  logDir: string;
  stepId: string;
  verifyMode: boolean;
  now?: () => Date;
}): LogOptions {
  const { logDir, stepId, verifyMode, now } = opts;

  return {
    logDir,
    stepId,
    verifyMode,
    ...(now === undefined ? {} : { now }),
  };
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

/**
 * Determine a log path for the provided step under the configured log dir.
 */
export function getLogPath(logDir: string, stepId: string): string {
  return path.join(logDir, `${stepId}.log`);
}

async function ensureLogDirectory(logDir: string): Promise<void> {
  await mkdir(logDir, { recursive: true });
}

function formatLine(line: string, stepId: string, now: () => Date): string {
  const suffix = line.length === 0 ? '' : ` ${line}`;
  return `[${now().toISOString()}] [${stepId}]${suffix}`;
}

/* -------------------------------------------------------------------------- */
/* Normalizing transform (line-safe, chunk-safe)                               */
/* -------------------------------------------------------------------------- */

/**
 * Build a transform that buffers chunks until line boundaries appear and
 * prefixes each complete line.
 *
 * One decoder spans the whole stream, so a multi-byte character split across
 * chunks is reassembled before the line is written.
 */
export function createNormalizingTransform(stepId: string, now: () => Date = () => new Date()) {
  const decoder = new StringDecoder('utf8');
  let buffer = '';

  return new Transform({
    transform(chunk: Buffer | string, _enc, cb): void {
      buffer += typeof chunk === 'string' ? chunk : decoder.write(chunk);

      for (;;) {
        const newlineIndex = buffer.indexOf('\n');
        if (newlineIndex < 0) {
          break;
        }

        const line = buffer.slice(0, newlineIndex);
        buffer = buffer.slice(newlineIndex + 1);
        this.push(`${formatLine(line, stepId, now)}\n`);
      }

      cb();
    },

    flush(cb): void {
      buffer += decoder.end();
      if (buffer.length > 0) {
        this.push(`${formatLine(buffer, stepId, now)}\n`);
      }
      cb();
    },
  });
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                  */
/* -------------------------------------------------------------------------- */

/**
 * Create a logger function for a single step run.
 *
 * The log file is truncated when the logger is created. The returned
 * function consumes a readable stream and resolves once everything has been
 * flushed to disk.
 */
export async function createLogger(
  options: LogOptions,
): Promise<(readStream: NodeJS.ReadableStream) => Promise<void>> {
  await ensureLogDirectory(options.logDir);

  const logPath = getLogPath(options.logDir, options.stepId);
  const writeStream: WriteStream = createWriteStream(logPath, { flags: 'w' });

  return async (readStream: NodeJS.ReadableStream): Promise<void> => {
    if (options.verifyMode) {
      await pipelineAsync(readStream, writeStream);
    } else {
      await pipelineAsync(
        readStream,
        createNormalizingTransform(options.stepId, options.now),
        writeStream,
      );
    }
  };
}

/**
 * Replace a step log with a single orchestrator-level message.
 *
 * Used when the tool never ran (missing binary, skipped step), so the file
 * does not keep output from an earlier run.
 */
export async function writeLogMessage(
  logDir: string,
  stepId: string,
  message: string,
): Promise<void> {
  await ensureLogDirectory(logDir);

  const logPath = getLogPath(logDir, stepId);
  const writeStream = createWriteStream(logPath, { flags: 'w' });

  return new Promise<void>((resolve, reject) => {
    writeStream.on('error', reject);
    writeStream.write(`${message}\n`, (error) => {
      if (error) {
        reject(error);
        return;
      }
      writeStream.end(() => resolve());
    });
  });
}
