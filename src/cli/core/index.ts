/**
 * Lint Pipeline — CLI
 *
 * Role:
 *   Orchestration layer that runs the formatter, import orderer, style
 *   checker and type checker against the target tree, in order.
 *
 * Authority:
 *   - This CLI orchestrates only.
 *   - Tool invocations and policies are defined in the step registry.
 *
 * Principles:
 *   - Fail fast on invalid input
 *   - Deterministic execution and exit codes
 *   - No implicit behaviour
 */

export {
  getAllStepIds,
  getStepById,
  LINT_STEPS,
  type LintStepConfig,
  TARGET_PATH,
} from '../config/index.ts';
export {
  calculateSummary,
  type ExecutionSummary,
  executePipeline,
  executeStep,
  executeWithArgs,
  type MainDeps,
  type MainResult,
  type PipelineResult,
  type StepResult,
  type StepStatus,
} from '../execution/index.ts';
export {
  type CLIArgs,
  ensureSafeDirectoryPath,
  ensureTargetDirectory,
  parseCliArgs,
} from '../input/index.ts';
export { createLogger, makeLogOptions, writeLogMessage } from '../observability/index.ts';
export { renderDashboard } from '../output/ui.tsx';
export { type EntrypointDeps, main, runEntrypoint } from './entrypoint/entrypoint.ts';
export { showHelp, showVersion } from './help/help.ts';
