/**
 * Tests for dashboard helpers and the non-TTY renderer.
 */

import path from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { createPipelineSteps } from '../../__test-utils__/index.ts';
import { __test__, renderDashboard, type StepState } from './ui.tsx';

const { supportsOsc8, supportsColor, formatStaticDashboard, summarizeStates } = __test__;

const stripAnsi = (text: string): string => text.replaceAll(/\u001b\[[0-9;]*m/g, '');

const row = (name: string, policy: string, status: string, log: string): string =>
  name.padEnd(16) + policy.padEnd(12) + status.padEnd(14) + log;

const states: StepState[] = [
  { id: 'format', name: 'Black', policy: 'fatal', status: 'PASS', logPath: '/logs/format.log' },
  { id: 'imports', name: 'isort', policy: 'fatal', status: 'FAIL', logPath: '/logs/imports.log' },
  {
    id: 'style',
    name: 'Flake8',
    policy: 'tolerated',
    status: 'SKIPPED',
    logPath: '/logs/style.log',
  },
  { id: 'types', name: 'mypy', policy: 'tolerated', status: 'PENDING', logPath: '/logs/types.log' },
];

function fakeStdout() {
  const write = vi.fn((_chunk: string) => true);
  const stream = { isTTY: false, write } as unknown as NodeJS.WriteStream;
  return { stream, write };
}

describe('supportsColor', () => {
  it('honours NO_COLOR', () => {
    expect(supportsColor({ NO_COLOR: '1', TERM: 'xterm-256color' })).toBe(false);
  });

  it('disables color on dumb terminals', () => {
    expect(supportsColor({ TERM: 'dumb' })).toBe(false);
  });

  it('enables color otherwise', () => {
    expect(supportsColor({ TERM: 'xterm-256color' })).toBe(true);
  });
});

describe('supportsOsc8', () => {
  it.each([
    [{ TERM_PROGRAM: 'iTerm.app' }, true],
    [{ TERM_PROGRAM: 'WezTerm', TERM: 'dumb' }, true],
    [{ TERM: 'linux' }, false],
    [{ TERM: 'xterm-256color' }, true],
    [{ TERM: 'dumb' }, false],
    [{}, false],
  ])('%o -> %s', (env, expected) => {
    expect(supportsOsc8(env)).toBe(expected);
  });
});

describe('summarizeStates', () => {
  it('counts each terminal status', () => {
    expect(summarizeStates(states)).toEqual({
      total: 4,
      pass: 1,
      warn: 0,
      fail: 1,
      error: 0,
      skipped: 1,
    });
  });
});

describe('formatStaticDashboard', () => {
  it('renders a table with summary and duration', () => {
    const output = stripAnsi(formatStaticDashboard(states, 1234));

    expect(output.split('\n')).toEqual([
      'LINT PIPELINE',
      '',
      row('Step', 'Policy', 'Status', 'Log'),
      row('Black', 'fatal', '✔ PASS', '/logs/format.log'),
      row('isort', 'fatal', '✘ FAIL', '/logs/imports.log'),
      row('Flake8', 'tolerated', '⊝ SKIPPED', '/logs/style.log'),
      row('mypy', 'tolerated', '○ PENDING', '-'),
      '',
      'Summary',
      'Total: 4 | Pass: 1 | Warn: 0 | Fail: 1 | Error: 0 | Skipped: 1',
      'Duration: 1.23s',
      '',
      '',
    ]);
  });
});

describe('renderDashboard (non-TTY)', () => {
  it('writes the final table once on waitForExit', async () => {
    const { stream, write } = fakeStdout();
    const dashboard = renderDashboard(createPipelineSteps(), '/logs', {
      stdout: stream,
      stderr: stream,
    });

    dashboard.updateStatus('format', 'PASS');
    dashboard.updateStatus('imports', 'PASS');
    dashboard.updateStatus('style', 'WARN');
    dashboard.updateStatus('types', 'PASS');
    expect(write).not.toHaveBeenCalled();

    await dashboard.waitForExit();
    await dashboard.waitForExit();
    dashboard.close();

    expect(write).toHaveBeenCalledTimes(1);
    const lines = stripAnsi(String(write.mock.calls[0]?.[0])).split('\n');
    expect(lines[5]).toBe(row('Style', 'tolerated', '! WARN', path.join('/logs', 'style.log')));
    expect(lines[9]).toBe('Total: 4 | Pass: 3 | Warn: 1 | Fail: 0 | Error: 0 | Skipped: 0');
  });
});
