/**
 * Public configuration exports for step registry data and helpers.
 */

export {
  ALLOWED_POLICIES,
  EXCLUDED_PATHS,
  getAllStepIds,
  getStepById,
  LINT_STEPS,
  type LintStepConfig,
  STEP_MAP,
  type StepPolicy,
  TARGET_PATH,
} from './step-registry.ts';
