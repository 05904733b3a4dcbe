/**
 * Process execution for a single pipeline step.
 */

import { spawn } from 'node:child_process';
import { Readable } from 'node:stream';

import { ProcessError } from '../../../errors/errors.ts';
import { createLogger, makeLogOptions } from '../../observability/logger.ts';
import type { LintStepConfig } from '../types.ts';

export interface ProcessExecutionResult {
  readonly exitCode: number;
}

export interface RunProcessOptions {
  readonly logDir: string;
  readonly verifyMode: boolean;
  readonly cwd?: string;
}

/**
 * Run a step's tool to completion, streaming its combined output into the
 * step log.
 *
 * Blocks until the process exits. There is no timeout: a step runs until the
 * tool finishes on its own.
 *
 * @returns The exit code (1 when the process was terminated by a signal).
 * @throws {ProcessError} `PROCESS_SPAWN_FAILED` when the tool cannot be started.
 * @throws The log stream error, once the process has exited.
 */
export async function runProcess(
  step: LintStepConfig,
  options: RunProcessOptions,
): Promise<ProcessExecutionResult> {
  const logger = await createLogger(
    makeLogOptions({ logDir: options.logDir, stepId: step.id, verifyMode: options.verifyMode }),
  );

  const proc = spawn(step.binary, step.args, {
    stdio: ['ignore', 'pipe', 'pipe'],
    ...(options.cwd === undefined ? {} : { cwd: options.cwd }),
  });

  const combined = new Readable({ read() {} });
  let combinedEnded = false;

  const endCombined = (): void => {
    if (combinedEnded) {
      return;
    }
    combinedEnded = true;
    combined.push(null);
  };

  const forward = (chunk: Buffer): void => {
    if (!combinedEnded) {
      combined.push(chunk);
    }
  };

  proc.stdout?.on('data', forward);
  proc.stderr?.on('data', forward);

  const exitPromise = new Promise<number>((resolve, reject) => {
    proc.on('close', (code) => {
      endCombined();
      resolve(code ?? 1);
    });

    proc.on('error', (err) => {
      endCombined();
      reject(
        new ProcessError('PROCESS_SPAWN_FAILED', `Process spawn failed: ${err.message}`, {
          cause: err,
          details: { binary: step.binary, stepId: step.id },
        }),
      );
    });
  });

  // Wait for the process even when the log write fails first.
  const [exitOutcome, logOutcome] = await Promise.allSettled([exitPromise, logger(combined)]);
  if (exitOutcome.status === 'rejected') {
    throw exitOutcome.reason;
  }
  if (logOutcome.status === 'rejected') {
    throw logOutcome.reason;
  }
  return { exitCode: exitOutcome.value };
}
