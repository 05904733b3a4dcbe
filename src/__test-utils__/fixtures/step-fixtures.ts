/**
 * Lint Pipeline — Step Test Fixtures
 *
 * Test-only builders for step configurations.
 */

import type { LintStepConfig } from '../../cli/config/index.ts';

/**
 * Create a minimal valid step config.
 */
export function createStepConfig(overrides: Partial<LintStepConfig> = {}): LintStepConfig {
  return {
    id: 'test-step',
    name: 'Test Step',
    binary: 'test-bin',
    args: [],
    policy: 'fatal',
    description: 'Test step for unit testing',
    ...overrides,
  };
}

/**
 * Four steps mirroring the production pipeline's policy layout:
 * two fatal steps followed by two tolerated ones.
 */
export function createPipelineSteps(): readonly LintStepConfig[] {
  return [
    createStepConfig({ id: 'format', name: 'Formatter', binary: 'fmt', policy: 'fatal' }),
    createStepConfig({ id: 'imports', name: 'Imports', binary: 'imp', policy: 'fatal' }),
    createStepConfig({ id: 'style', name: 'Style', binary: 'sty', policy: 'tolerated' }),
    createStepConfig({ id: 'types', name: 'Types', binary: 'typ', policy: 'tolerated' }),
  ];
}
