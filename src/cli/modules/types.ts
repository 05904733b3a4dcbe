/**
 * Shared types for executor modules.
 */

import type { LintStepConfig, StepPolicy } from '../config/index.ts';

/**
 * Statuses a step moves through during a run.
 *
 * `WARN` is a non-zero exit from a tolerated step; `FAIL` is a non-zero exit
 * from a fatal step; `ERROR` means the tool could not be run at all.
 */
export type StepStatus = 'PENDING' | 'RUNNING' | 'PASS' | 'WARN' | 'FAIL' | 'ERROR' | 'SKIPPED';

/** Normalized execution result emitted by the executor per step. */
export interface StepResult {
  readonly id: string;
  readonly name: string;
  readonly policy: StepPolicy;
  readonly status: StepStatus;
  /** Process exit code when the tool ran. */
  readonly exitCode: number | null;
  readonly error?: string;
  /** Milliseconds elapsed since the step started. */
  readonly duration: number;
  /** Path of the log file written for the step. */
  readonly logPath: string;
}

/**
 * Options consumed by `executeStep` and `executePipeline`.
 */
export interface ExecutionOptions {
  /** Directory where each step writes its log file. */
  readonly logDir: string;
  /** Write tool output byte-for-byte instead of line-prefixed. */
  readonly verifyMode: boolean;
  /** Working directory handed to every spawned tool. */
  readonly cwd?: string;
  /** Callback invoked each time a step status changes. */
  readonly onStatusChange?: (id: string, status: StepStatus) => void;
}

export type { LintStepConfig, StepPolicy } from '../config/index.ts';
