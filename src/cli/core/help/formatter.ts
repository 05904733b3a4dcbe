/**
 * Lint Pipeline — Help Text Formatter
 *
 * Role:
 *   Format help information, including the fixed step list.
 */

import { LINT_STEPS, type LintStepConfig, TARGET_PATH } from '../../config/index.ts';
import { DEFAULT_LOG_DIR } from '../../constants/paths.ts';

/**
 * Keep only printable ASCII so registry values cannot inject terminal escapes.
 */
export const escapeHelpToken = (value: string): string => value.replaceAll(/[^ -~]/g, '');

/**
 * Static help message template. `[STEPS]` and `[TARGET]` are filled in by
 * `showHelp()`.
 */
const HELP_MESSAGE = `
Lint Pipeline — runs formatter, import orderer, style checker and type checker

USAGE:
  lint [OPTIONS]

TARGET:
  [TARGET]

STEPS (in order):
[STEPS]

OPTIONS:
  --log-dir <path>      Directory for per-step log files (default: ${DEFAULT_LOG_DIR})
  --verify-logs         Write tool output byte-for-byte (no line prefixes)
  --verbose             Print the exact tool invocations (alias: --debug)
  --help                Show this help message
  --version             Show version number

EXIT STATUS:
  0  formatter and import orderer succeeded (style and type findings are advisory)
  1  a fatal step failed, a tool is missing, or the run could not start
`;

function formatStep(step: LintStepConfig, index: number): string {
  const command = [step.binary, ...step.args].map(escapeHelpToken).join(' ');
  return `  ${index + 1}. ${escapeHelpToken(step.id).padEnd(9)} ${step.policy.padEnd(10)} ${command}`;
}

/**
 * Build the help message from the step registry.
 */
export function showHelp(steps: readonly LintStepConfig[] = LINT_STEPS): string {
  return HELP_MESSAGE.replace('[TARGET]', escapeHelpToken(TARGET_PATH)).replace(
    '[STEPS]',
    steps.map((step, index) => formatStep(step, index)).join('\n'),
  );
}
