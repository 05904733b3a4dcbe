/**
 * Lint Pipeline — Sequential Execution Engine
 *
 * Role:
 *   Deterministic, policy-aware execution of the pipeline steps, one at a time.
 *
 * Responsibilities:
 *   - Verify each step's tool is available before spawning it
 *   - Run steps strictly in registry order, never concurrently
 *   - Stop invoking tools after a fatal failure or a missing tool
 *   - Report normalized results for every step, including skipped ones
 *
 * Non-responsibilities:
 *   - No interpretation of tool output
 *   - No exit-code decisions for the process
 */

import pMap from 'p-map';

import { BinaryError, formatErrorMessage, isToolMissingError } from '../../errors/errors.ts';
import {
  buildResult,
  checkBinaryExists,
  determineStatus,
  type ExecutionOptions,
  isAbortingStatus,
  type LintStepConfig,
  runProcess,
  type StepResult,
} from '../modules/index.ts';
import { getLogPath, writeLogMessage } from '../observability/logger.ts';

export type { ExecutionSummary, StepResult, StepStatus } from '../modules/index.ts';
export { calculateSummary } from '../modules/index.ts';

/**
 * Outcome of a full pipeline run.
 */
export interface PipelineResult {
  /** One entry per step, in registry order. */
  readonly results: readonly StepResult[];
  readonly aborted: boolean;
  /** Id of the step whose outcome stopped the pipeline. */
  readonly abortedBy?: string;
}

/**
 * Execute a single step: check its binary, run it, classify the exit code.
 *
 * Never throws for tool problems; a missing binary or a failed spawn comes
 * back as an `ERROR` result. Anything else (e.g. the log directory becoming
 * unwritable) propagates.
 */
export async function executeStep(
  step: LintStepConfig,
  options: ExecutionOptions,
): Promise<StepResult> {
  const start = Date.now();
  const logPath = getLogPath(options.logDir, step.id);
  const ctx = { step, logPath, start };

  options.onStatusChange?.(step.id, 'RUNNING');

  const fail = async (message: string): Promise<StepResult> => {
    await writeLogMessage(options.logDir, step.id, `ERROR: ${message}`);
    options.onStatusChange?.(step.id, 'ERROR');
    return buildResult(ctx, 'ERROR', null, message);
  };

  if (!(await checkBinaryExists(step.binary))) {
    const missing = new BinaryError('BINARY_NOT_FOUND', `Binary not found: ${step.binary}`, {
      details: { binary: step.binary, stepId: step.id },
    });
    return fail(formatErrorMessage(missing));
  }

  try {
    const { exitCode } = await runProcess(step, {
      logDir: options.logDir,
      verifyMode: options.verifyMode,
      ...(options.cwd === undefined ? {} : { cwd: options.cwd }),
    });
    const status = determineStatus(step.policy, exitCode);
    options.onStatusChange?.(step.id, status);
    return buildResult(ctx, status, exitCode);
  } catch (err: unknown) {
    if (isToolMissingError(err)) {
      return fail(formatErrorMessage(err));
    }
    throw err;
  }
}

/**
 * Record a step that was never invoked because an earlier step stopped the run.
 */
async function skipStep(
  step: LintStepConfig,
  options: ExecutionOptions,
  abortedBy: string,
): Promise<StepResult> {
  const start = Date.now();
  const logPath = getLogPath(options.logDir, step.id);
  const reason = `Not run: pipeline stopped at step "${abortedBy}"`;

  await writeLogMessage(options.logDir, step.id, `SKIPPED: ${reason}`);
  options.onStatusChange?.(step.id, 'SKIPPED');
  return buildResult({ step, logPath, start }, 'SKIPPED', null, reason);
}

/**
 * Execute the steps in order with a concurrency of one.
 *
 * Once a step ends `FAIL` or `ERROR`, every later step is reported as
 * `SKIPPED` without its tool being invoked. `WARN` never stops the run.
 */
export async function executePipeline(
  steps: readonly LintStepConfig[],
  options: ExecutionOptions,
): Promise<PipelineResult> {
  const state: { abortedBy?: string } = {};

  const results = await pMap(
    steps,
    async (step) => {
      if (state.abortedBy !== undefined) {
        return skipStep(step, options, state.abortedBy);
      }

      const result = await executeStep(step, options);
      if (isAbortingStatus(result.status)) {
        state.abortedBy = step.id;
      }
      return result;
    },
    { concurrency: 1 },
  );

  return state.abortedBy === undefined
    ? { results, aborted: false }
    : { results, aborted: true, abortedBy: state.abortedBy };
}
