/**
 * Execution orchestration and coordination
 */

export { executeWithArgs, type MainDeps, type MainResult } from './execution.ts';
export {
  calculateSummary,
  type ExecutionSummary,
  executePipeline,
  executeStep,
  type PipelineResult,
  type StepResult,
  type StepStatus,
} from './executor.ts';
