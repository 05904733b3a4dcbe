/**
 * Lint Pipeline — Step Registry
 *
 * Role: Authoritative, ordered list of the quality-check steps.
 *
 * This file is:
 *   - A single source of truth for tool invocations and failure policy
 *   - Execution-agnostic
 *   - Immutable and side-effect free (apart from load-time validation)
 */

import { CliError } from '../../errors/errors.ts';

/**
 * Failure policies a step can carry.
 *
 * `fatal` steps stop the pipeline on a non-zero exit; `tolerated` steps are
 * advisory and never affect the outcome.
 */
export const ALLOWED_POLICIES = ['fatal', 'tolerated'] as const;

export type StepPolicy = (typeof ALLOWED_POLICIES)[number];

/**
 * Canonical description of one pipeline step.
 */
export interface LintStepConfig {
  /** Stable identifier, also used as the log file name */
  readonly id: string;

  /** Human-readable name (UI only) */
  readonly name: string;

  /** Executable resolved on PATH */
  readonly binary: string;

  /** Command-line arguments */
  readonly args: readonly string[];

  readonly policy: StepPolicy;

  readonly description: string;
}

/** Source tree every step operates on, relative to the working directory. */
export const TARGET_PATH = 'app/';

/** Path fragments the import orderer must leave alone. */
export const EXCLUDED_PATHS: readonly string[] = ['.history', 'venv'];

const PYTHON = 'python';

/**
 * Ordered pipeline. Order is execution order.
 */
export const LINT_STEPS: readonly LintStepConfig[] = [
  {
    id: 'format',
    name: 'Black',
    binary: PYTHON,
    args: ['-m', 'black', TARGET_PATH],
    policy: 'fatal',
    description: 'Code formatter (rewrites files in place)',
  },

  {
    id: 'imports',
    name: 'isort',
    binary: PYTHON,
    args: ['-m', 'isort', TARGET_PATH, ...EXCLUDED_PATHS.flatMap((p) => ['--skip', p])],
    policy: 'fatal',
    description: 'Import orderer (rewrites files in place)',
  },

  {
    id: 'style',
    name: 'Flake8',
    binary: PYTHON,
    args: ['-m', 'flake8', TARGET_PATH],
    policy: 'tolerated',
    description: 'Style checker (advisory)',
  },

  {
    id: 'types',
    name: 'mypy',
    binary: PYTHON,
    args: ['-m', 'mypy', TARGET_PATH, '--explicit-package-bases'],
    policy: 'tolerated',
    description: 'Static type checker (advisory)',
  },
];

/**
 * Map keyed by step id for lookups.
 */
export const STEP_MAP: ReadonlyMap<string, LintStepConfig> = new Map(
  LINT_STEPS.map((s) => [s.id, s] as const),
);

/* -------------------------------------------------------------------------- */
/* Registry validation                                                         */
/* -------------------------------------------------------------------------- */

/**
 * Validate registry invariants: unique ids, a binary for every step and a
 * known policy.
 *
 * @throws {CliError} when an invariant is violated.
 */
function assertValidRegistry(registry: readonly LintStepConfig[]): void {
  const ids = new Set<string>();

  for (const step of registry) {
    if (ids.has(step.id)) {
      throw new CliError('REGISTRY_INVALID', `Duplicate step id detected: ${step.id}`);
    }

    ids.add(step.id);

    if (step.binary.trim().length === 0) {
      throw new CliError('REGISTRY_INVALID', `Binary must be non-empty for step: ${step.id}`);
    }

    if (!ALLOWED_POLICIES.includes(step.policy)) {
      throw new CliError('REGISTRY_INVALID', `Unknown policy for step: ${step.id}`);
    }
  }
}

// Exposed for tests to validate registry invariants without reloading the module.
export const __test__assertValidRegistry = assertValidRegistry;

assertValidRegistry(LINT_STEPS);

/* -------------------------------------------------------------------------- */
/* Accessors                                                                   */
/* -------------------------------------------------------------------------- */

export function getStepById(id: string): LintStepConfig | undefined {
  return STEP_MAP.get(id);
}

/**
 * Return every step id in execution order.
 */
export function getAllStepIds(): readonly string[] {
  return [...STEP_MAP.keys()];
}
