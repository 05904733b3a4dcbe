/**
 * Tests for step process execution with a stubbed `spawn`.
 */

import { spawn } from 'node:child_process';
import { mkdirSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createFakeChild, createStepConfig, type FakeChild } from '../../../__test-utils__/index.ts';
import { ProcessError } from '../../../errors/errors.ts';
import { runProcess } from './process-manager.ts';

vi.mock('node:child_process', () => ({ spawn: vi.fn() }));

let logDir = '';

beforeEach(() => {
  logDir = mkdtempSync(path.join(tmpdir(), 'lint-pipeline-proc-'));
});

afterEach(() => {
  rmSync(logDir, { recursive: true, force: true });
});

function stubSpawn(script: (child: FakeChild) => void): FakeChild {
  const child = createFakeChild();
  vi.mocked(spawn).mockImplementation(() => {
    setImmediate(() => script(child));
    return child.proc;
  });
  return child;
}

const step = createStepConfig({
  id: 'format',
  binary: 'python',
  args: ['-m', 'black', 'app/'],
});

describe('runProcess', () => {
  it('spawns the configured binary with its arguments', async () => {
    stubSpawn((child) => child.exit(0));

    await runProcess(step, { logDir, verifyMode: true, cwd: '/work' });

    expect(spawn).toHaveBeenCalledWith('python', ['-m', 'black', 'app/'], {
      stdio: ['ignore', 'pipe', 'pipe'],
      cwd: '/work',
    });
  });

  it('returns the tool exit code', async () => {
    stubSpawn((child) => child.exit(123));

    await expect(runProcess(step, { logDir, verifyMode: true })).resolves.toEqual({
      exitCode: 123,
    });
  });

  it('treats a signal termination as exit 1', async () => {
    stubSpawn((child) => child.exit(null));

    await expect(runProcess(step, { logDir, verifyMode: true })).resolves.toEqual({
      exitCode: 1,
    });
  });

  it('writes combined output verbatim in verify mode', async () => {
    stubSpawn((child) => {
      child.writeStdout('would reformat app/main.py\n');
      child.writeStderr('1 file would be reformatted\n');
      child.exit(1);
    });

    await runProcess(step, { logDir, verifyMode: true });

    expect(readFileSync(path.join(logDir, 'format.log'), 'utf8')).toBe(
      'would reformat app/main.py\n1 file would be reformatted\n',
    );
  });

  it('prefixes each line with a timestamp and step id otherwise', async () => {
    stubSpawn((child) => {
      child.writeStdout('All done!\n');
      child.exit(0);
    });

    await runProcess(step, { logDir, verifyMode: false });

    const lines = readFileSync(path.join(logDir, 'format.log'), 'utf8').split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[format\] All done!$/);
    expect(lines[1]).toBe('');
  });

  it('rejects with PROCESS_SPAWN_FAILED when the tool cannot start', async () => {
    stubSpawn((child) => child.failToSpawn(new Error('spawn python ENOENT')));

    const promise = runProcess(step, { logDir, verifyMode: true });

    await expect(promise).rejects.toBeInstanceOf(ProcessError);
    await expect(promise).rejects.toMatchObject({
      code: 'PROCESS_SPAWN_FAILED',
      message: 'Process spawn failed: spawn python ENOENT',
    });
  });

  it('waits for the tool to exit when the log file cannot be written', async () => {
    mkdirSync(path.join(logDir, 'format.log'));
    let exited = false;
    stubSpawn((child) => {
      child.writeStdout('reformatted app/main.py\n');
      setTimeout(() => {
        exited = true;
        child.exit(0);
      }, 50);
    });

    await expect(runProcess(step, { logDir, verifyMode: true })).rejects.toThrow(/EISDIR/);
    expect(exited).toBe(true);
  });
});
