/**
 * Lint Pipeline - Main Entry Point
 *
 * Runs a fixed sequence of external quality tools (formatter, import
 * orderer, style checker, type checker) against one source tree.
 */

export {
  type CLIArgs,
  calculateSummary,
  type ExecutionSummary,
  executePipeline,
  executeStep,
  executeWithArgs,
  getAllStepIds,
  getStepById,
  LINT_STEPS,
  type LintStepConfig,
  main,
  type MainDeps,
  type MainResult,
  parseCliArgs,
  type PipelineResult,
  runEntrypoint,
  type StepResult,
  type StepStatus,
  TARGET_PATH,
} from './cli/core/index.ts';
export { EXCLUDED_PATHS, type StepPolicy } from './cli/config/index.ts';
export {
  AppError,
  BinaryError,
  CliError,
  type ErrorCode,
  formatErrorMessage,
  isAppError,
  isToolMissingError,
  ProcessError,
} from './errors/errors.ts';
