/**
 * Lint Pipeline — CLI Main Execution
 *
 * Role:
 *   Run the pipeline once with proper validation, rendering and exit code.
 *
 * Responsibilities:
 *   - Validate the target tree and log directory before any tool runs
 *   - Execute the steps and drive the dashboard
 *   - Derive the exit code from fatal outcomes only
 */

import { Console } from 'node:console';
import { mkdir } from 'node:fs/promises';
import { LINT_STEPS, type LintStepConfig, TARGET_PATH } from '../config/index.ts';
import type { CLIArgs } from '../input/args.ts';
import { ensureSafeDirectoryPath, ensureTargetDirectory } from '../input/validation.ts';
import { renderDashboard } from '../output/ui.tsx';
import type { ExecutionSummary, StepStatus } from './executor.ts';
import { calculateSummary, executePipeline } from './executor.ts';

/**
 * Dependency overrides supplied when invoking `executeWithArgs`.
 */
export interface MainDeps {
  readonly steps?: readonly LintStepConfig[];
  readonly targetPath?: string;
  readonly mkdirFn?: typeof mkdir;
  readonly renderDashboardFn?: typeof renderDashboard;
  readonly executePipelineFn?: typeof executePipeline;
  readonly cwd?: string;
  readonly console?: Pick<Console, 'log' | 'error'>;
}

/**
 * Result returned from `executeWithArgs`.
 */
export interface MainResult {
  readonly exitCode: number;
  readonly summary?: ExecutionSummary;
  readonly abortedBy?: string;
}

/**
 * Execute the pipeline with parsed args and optional dependency overrides.
 *
 * Exit code is 0 unless a fatal step failed, a tool was missing, or the run
 * could not start. Tolerated steps never change it.
 */
export async function executeWithArgs(args: CLIArgs, deps: MainDeps = {}): Promise<MainResult> {
  const {
    steps = LINT_STEPS,
    targetPath = TARGET_PATH,
    mkdirFn = mkdir,
    renderDashboardFn = renderDashboard,
    executePipelineFn = executePipeline,
    cwd = process.cwd(),
    console: injectedConsole,
  } = deps;

  const stdout = process.stdout;
  const stderr = process.stderr;
  const scopedConsole = injectedConsole ?? new Console({ stdout, stderr });
  const log = scopedConsole.log.bind(scopedConsole);
  const error = scopedConsole.error.bind(scopedConsole);
  let dashboard: ReturnType<typeof renderDashboard> | undefined;

  try {
    const target = ensureTargetDirectory(cwd, targetPath);
    const logDir = ensureSafeDirectoryPath(cwd, args.logDir);

    await mkdirFn(logDir, { recursive: true });

    log(`Target: ${target}`);
    log(`Steps: ${steps.map((s) => s.id).join(' → ')}`);
    log(`Log directory: ${logDir}`);
    if (args.verbose) {
      log(`Working directory: ${cwd}`);
      log(`Verification mode: ${args.verifyLogs ? 'ENABLED' : 'DISABLED'}`);
      for (const step of steps) {
        log(`  [${step.policy}] ${step.binary} ${step.args.join(' ')}`);
      }
    }
    log('');

    const activeDashboard = renderDashboardFn(steps, logDir, { stdout, stderr });
    dashboard = activeDashboard;
    const startTime = Date.now();

    const pipeline = await executePipelineFn(steps, {
      logDir,
      verifyMode: args.verifyLogs,
      cwd,
      onStatusChange: (id: string, status: StepStatus) => {
        activeDashboard.updateStatus(id, status);
      },
    });

    await activeDashboard.waitForExit();
    dashboard = undefined;

    const summary = calculateSummary(pipeline.results, Date.now() - startTime);

    if (pipeline.aborted) {
      error(`\n❌ Lint failed at step "${pipeline.abortedBy ?? 'unknown'}"`);
      return {
        exitCode: 1,
        summary,
        ...(pipeline.abortedBy === undefined ? {} : { abortedBy: pipeline.abortedBy }),
      };
    }

    if (summary.warned > 0) {
      log(`\n⚠️  ${summary.warned} advisory step(s) reported findings; see their logs`);
    }
    log('\n✅ Lint passed');
    return { exitCode: 0, summary };
  } catch (err) {
    error('\n❌ Fatal error:', err);
    return { exitCode: 1 };
  } finally {
    dashboard?.close();
  }
}
