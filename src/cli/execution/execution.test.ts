/**
 * Tests for `executeWithArgs`: validation before any tool runs, dashboard
 * wiring and exit codes.
 */

import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createPipelineSteps } from '../../__test-utils__/index.ts';
import { CliError } from '../../errors/errors.ts';
import type { CLIArgs } from '../input/args.ts';
import type { StepResult, StepStatus } from '../modules/index.ts';
import type { DashboardHandle, renderDashboard } from '../output/ui.tsx';
import { executeWithArgs } from './execution.ts';
import type { executePipeline, PipelineResult } from './executor.ts';

const buildArgs = (overrides: Partial<CLIArgs> = {}): CLIArgs => ({
  verifyLogs: false,
  logDir: './logs',
  help: false,
  version: false,
  verbose: false,
  ...overrides,
});

const steps = createPipelineSteps();

let tempDir = '';

beforeEach(async () => {
  tempDir = await mkdtemp(path.join(tmpdir(), 'lint-pipeline-exec-'));
  await mkdir(path.join(tempDir, 'app'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

function result(id: string, status: StepStatus): StepResult {
  return {
    id,
    name: id,
    policy: 'fatal',
    status,
    exitCode: status === 'PASS' ? 0 : 1,
    duration: 5,
    logPath: path.join(tempDir, 'logs', `${id}.log`),
  };
}

function pipelineOf(statuses: readonly StepStatus[], abortedBy?: string): PipelineResult {
  const results = statuses.map((status, i) => result(steps[i]?.id ?? `step-${i}`, status));
  return abortedBy === undefined
    ? { results, aborted: false }
    : { results, aborted: true, abortedBy };
}

function setup(pipeline: PipelineResult | Error) {
  const dashboard = {
    updateStatus: vi.fn<DashboardHandle['updateStatus']>(),
    waitForExit: vi.fn<DashboardHandle['waitForExit']>().mockResolvedValue(undefined),
    close: vi.fn<DashboardHandle['close']>(),
  };
  const renderDashboardFn = vi.fn<typeof renderDashboard>().mockReturnValue(dashboard);
  const executePipelineFn = vi.fn<typeof executePipeline>(async (_steps, options) => {
    options.onStatusChange?.('format', 'RUNNING');
    if (pipeline instanceof Error) {
      throw pipeline;
    }
    return pipeline;
  });
  const output = { log: vi.fn(), error: vi.fn() };

  const deps = { steps, cwd: tempDir, renderDashboardFn, executePipelineFn, console: output };
  return { deps, dashboard, renderDashboardFn, executePipelineFn, output };
}

describe('executeWithArgs', () => {
  it('exits 0 when every step passes', async () => {
    const { deps, output } = setup(pipelineOf(['PASS', 'PASS', 'PASS', 'PASS']));

    const outcome = await executeWithArgs(buildArgs(), deps);

    expect(outcome.exitCode).toBe(0);
    expect(outcome.summary).toMatchObject({ total: 4, passed: 4, failed: 0 });
    expect(output.log).toHaveBeenCalledWith('\n✅ Lint passed');
    expect(output.error).not.toHaveBeenCalled();
  });

  it('creates the log directory and hands it to the pipeline', async () => {
    const { deps, executePipelineFn } = setup(pipelineOf(['PASS', 'PASS', 'PASS', 'PASS']));

    await executeWithArgs(buildArgs({ logDir: './out/logs', verifyLogs: true }), deps);

    const logDir = path.join(tempDir, 'out', 'logs');
    expect(existsSync(logDir)).toBe(true);
    expect(executePipelineFn).toHaveBeenCalledWith(
      steps,
      expect.objectContaining({ logDir, verifyMode: true, cwd: tempDir }),
    );
  });

  it('forwards status changes to the dashboard and waits for it', async () => {
    const { deps, dashboard, renderDashboardFn } = setup(
      pipelineOf(['PASS', 'PASS', 'PASS', 'PASS']),
    );

    await executeWithArgs(buildArgs(), deps);

    expect(renderDashboardFn).toHaveBeenCalledWith(
      steps,
      path.join(tempDir, 'logs'),
      expect.any(Object),
    );
    expect(dashboard.updateStatus).toHaveBeenCalledWith('format', 'RUNNING');
    expect(dashboard.waitForExit).toHaveBeenCalledTimes(1);
    expect(dashboard.close).not.toHaveBeenCalled();
  });

  it('exits 0 with an advisory note when tolerated steps warn', async () => {
    const { deps, output } = setup(pipelineOf(['PASS', 'PASS', 'WARN', 'WARN']));

    const outcome = await executeWithArgs(buildArgs(), deps);

    expect(outcome.exitCode).toBe(0);
    expect(output.log).toHaveBeenCalledWith(
      '\n⚠️  2 advisory step(s) reported findings; see their logs',
    );
  });

  it('exits 1 when a fatal step fails', async () => {
    const { deps, output } = setup(
      pipelineOf(['PASS', 'FAIL', 'SKIPPED', 'SKIPPED'], 'imports'),
    );

    const outcome = await executeWithArgs(buildArgs(), deps);

    expect(outcome).toMatchObject({ exitCode: 1, abortedBy: 'imports' });
    expect(outcome.summary).toMatchObject({ failed: 1, skipped: 2 });
    expect(output.error).toHaveBeenCalledWith('\n❌ Lint failed at step "imports"');
  });

  it('exits 1 when a tool is missing', async () => {
    const { deps } = setup(pipelineOf(['ERROR', 'SKIPPED', 'SKIPPED', 'SKIPPED'], 'format'));

    await expect(executeWithArgs(buildArgs(), deps)).resolves.toMatchObject({
      exitCode: 1,
      abortedBy: 'format',
    });
  });

  it('exits 1 without running anything when the target is missing', async () => {
    await rm(path.join(tempDir, 'app'), { recursive: true });
    const { deps, executePipelineFn, renderDashboardFn, output } = setup(
      pipelineOf(['PASS', 'PASS', 'PASS', 'PASS']),
    );

    const outcome = await executeWithArgs(buildArgs(), deps);

    expect(outcome).toEqual({ exitCode: 1 });
    expect(executePipelineFn).not.toHaveBeenCalled();
    expect(renderDashboardFn).not.toHaveBeenCalled();
    const [label, error] = output.error.mock.calls[0] ?? [];
    expect(label).toBe('\n❌ Fatal error:');
    expect(error).toBeInstanceOf(CliError);
    expect(error).toMatchObject({
      code: 'CLI_INVALID_PATH',
      message: `Target directory does not exist: ${path.join(tempDir, 'app')}`,
    });
  });

  it('exits 1 when the target is a file', async () => {
    await rm(path.join(tempDir, 'app'), { recursive: true });
    await writeFile(path.join(tempDir, 'app'), '');
    const { deps, executePipelineFn } = setup(pipelineOf([]));

    await expect(executeWithArgs(buildArgs(), deps)).resolves.toEqual({ exitCode: 1 });
    expect(executePipelineFn).not.toHaveBeenCalled();
  });

  it('rejects a log directory outside the working directory', async () => {
    const { deps, executePipelineFn } = setup(pipelineOf([]));

    await expect(executeWithArgs(buildArgs({ logDir: '../escape' }), deps)).resolves.toEqual({
      exitCode: 1,
    });
    expect(executePipelineFn).not.toHaveBeenCalled();
  });

  it('closes the dashboard and exits 1 when the pipeline throws', async () => {
    const { deps, dashboard, output } = setup(new Error('EACCES: permission denied'));

    await expect(executeWithArgs(buildArgs(), deps)).resolves.toEqual({ exitCode: 1 });
    expect(dashboard.close).toHaveBeenCalledTimes(1);
    expect(output.error).toHaveBeenCalledWith('\n❌ Fatal error:', expect.any(Error));
  });

  it('prints the tool invocations in verbose mode', async () => {
    const { deps, output } = setup(pipelineOf(['PASS', 'PASS', 'PASS', 'PASS']));

    await executeWithArgs(buildArgs({ verbose: true }), deps);

    expect(output.log).toHaveBeenCalledWith('Steps: format → imports → style → types');
    expect(output.log).toHaveBeenCalledWith('  [tolerated] sty ');
    expect(output.log).toHaveBeenCalledWith('Verification mode: DISABLED');
  });
});
