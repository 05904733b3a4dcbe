/**
 * Result building and status determination utilities used by the executor.
 *
 * Responsibilities:
 *   - Normalize execution metadata into `StepResult` payloads
 *   - Translate exit codes + failure policy into normalized statuses
 *   - Aggregate results into a run summary
 */

import type { LintStepConfig, StepPolicy, StepResult, StepStatus } from '../types.ts';

export interface ResultContext {
  readonly step: LintStepConfig;
  readonly logPath: string;
  readonly start: number;
}

/**
 * Create a `StepResult` value from execution context and status.
 */
export function buildResult(
  ctx: ResultContext,
  status: StepStatus,
  exitCode: number | null,
  error?: string,
): StepResult {
  const result: StepResult = {
    id: ctx.step.id,
    name: ctx.step.name,
    policy: ctx.step.policy,
    status,
    exitCode,
    duration: Date.now() - ctx.start,
    logPath: ctx.logPath,
  };
  if (error !== undefined) {
    return { ...result, error };
  }
  return result;
}

/**
 * Compute a status from an exit code and the step's failure policy.
 *
 * Zero is always PASS. A non-zero exit is FAIL for fatal steps and WARN for
 * tolerated ones.
 */
export function determineStatus(policy: StepPolicy, exitCode: number): StepStatus {
  if (exitCode === 0) {
    return 'PASS';
  }
  return policy === 'fatal' ? 'FAIL' : 'WARN';
}

/**
 * True when a status must stop the pipeline.
 */
export function isAbortingStatus(status: StepStatus): boolean {
  return status === 'FAIL' || status === 'ERROR';
}

export interface ExecutionSummary {
  readonly total: number;
  readonly passed: number;
  readonly warned: number;
  readonly failed: number;
  readonly errors: number;
  readonly skipped: number;
  readonly duration: number;
}

/**
 * Summarize a sequence of `StepResult` objects into run metrics.
 */
export function calculateSummary(
  results: readonly StepResult[],
  duration: number,
): ExecutionSummary {
  const count = (status: StepStatus): number => results.filter((r) => r.status === status).length;

  return {
    total: results.length,
    passed: count('PASS'),
    warned: count('WARN'),
    failed: count('FAIL'),
    errors: count('ERROR'),
    skipped: count('SKIPPED'),
    duration,
  };
}
