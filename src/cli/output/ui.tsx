/**
 * Lint Pipeline — Ink Dashboard
 *
 * Role:
 *   Read-only rendering of step execution state.
 *
 * Guarantees:
 *   - No business logic
 *   - No policy decisions
 *   - Stable rendering under rapid updates
 */

import pathLib from 'node:path';
import { pathToFileURL } from 'node:url';

import { Box, render, Text } from 'ink';
import Spinner from 'ink-spinner';
import React, { useEffect, useMemo, useState } from 'react';
import type { LintStepConfig, StepPolicy } from '../config/index.ts';
import type { StepStatus } from '../modules/index.ts';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface StepState {
  readonly id: string;
  readonly name: string;
  readonly policy: StepPolicy;
  readonly status: StepStatus;
  readonly logPath: string;
}

interface DashboardProps {
  readonly steps: readonly LintStepConfig[];
  readonly logDir: string;
  readonly onComplete: () => void;
  readonly subscribe: (listener: (id: string, status: StepStatus) => void) => void;
}

interface DashboardStreams {
  readonly stdout: NodeJS.WriteStream;
  readonly stderr: NodeJS.WriteStream;
}

export interface DashboardHandle {
  updateStatus: (this: void, id: string, status: StepStatus) => void;
  waitForExit: (this: void) => Promise<void>;
  /** Tear the view down without waiting, e.g. when the run throws. */
  close: (this: void) => void;
}

/* -------------------------------------------------------------------------- */
/* Utilities                                                                  */
/* -------------------------------------------------------------------------- */

function supportsOsc8(env: NodeJS.ProcessEnv = process.env): boolean {
  const term = env['TERM'];
  const termProgram = env['TERM_PROGRAM'];

  if (termProgram === 'iTerm.app' || termProgram === 'WezTerm') {
    return true;
  }

  // Linux console doesn't support OSC8
  if (typeof term === 'string' && term.includes('linux')) {
    return false;
  }

  return typeof term === 'string' && term !== '' && term !== 'dumb';
}

function createHyperlink(text: string, url: string): string {
  return `\u001b]8;;${url}\u0007${text}\u001b]8;;\u0007`;
}

/**
 * Detects if color output is supported.
 * Respects the NO_COLOR convention: https://no-color.org/
 */
function supportsColor(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env['NO_COLOR'] !== undefined) {
    return false;
  }
  return env['TERM'] !== 'dumb';
}

const ANSI = supportsColor()
  ? {
      reset: '\u001b[0m',
      bold: '\u001b[1m',
      dim: '\u001b[2m',
      underline: '\u001b[4m',
      red: '\u001b[31m',
      green: '\u001b[32m',
      yellow: '\u001b[33m',
      blue: '\u001b[34m',
      cyan: '\u001b[36m',
    }
  : {
      reset: '',
      bold: '',
      dim: '',
      underline: '',
      red: '',
      green: '',
      yellow: '',
      blue: '',
      cyan: '',
    };

function colorize(text: string, ...codes: readonly string[]): string {
  return `${codes.join('')}${text}${ANSI.reset}`;
}

/* -------------------------------------------------------------------------- */
/* Status rendering (shared between TTY and non-TTY)                         */
/* -------------------------------------------------------------------------- */

/**
 * Each status uses both a color and a symbol.
 */
const STATUS_CONFIG = {
  PENDING: { symbol: '○', label: 'PENDING', color: 'gray', ansiColor: ANSI.dim },
  RUNNING: { symbol: '◐', label: 'RUNNING', color: 'blue', ansiColor: ANSI.blue },
  PASS: { symbol: '✔', label: 'PASS', color: 'green', ansiColor: ANSI.green },
  WARN: { symbol: '!', label: 'WARN', color: 'yellow', ansiColor: ANSI.yellow },
  FAIL: { symbol: '✘', label: 'FAIL', color: 'red', ansiColor: ANSI.red },
  ERROR: { symbol: '⚠', label: 'ERROR', color: 'red', ansiColor: ANSI.red },
  SKIPPED: { symbol: '⊝', label: 'SKIPPED', color: 'yellow', ansiColor: ANSI.dim },
} as const satisfies Record<
  StepStatus,
  { symbol: string; label: string; color: string; ansiColor: string }
>;

const TERMINAL_STATUSES: readonly StepStatus[] = ['PASS', 'WARN', 'FAIL', 'ERROR', 'SKIPPED'];

const UI_CONSTANTS = {
  COLUMN_WIDTH: {
    STEP: 16,
    POLICY: 12,
    STATUS: 14,
    LOG: 40,
  },
  TITLE: 'LINT PIPELINE',
  HEADERS: {
    STEP: 'Step',
    POLICY: 'Policy',
    STATUS: 'Status',
    LOG: 'Log',
  },
} as const;

interface StepSummary {
  readonly total: number;
  readonly pass: number;
  readonly warn: number;
  readonly fail: number;
  readonly error: number;
  readonly skipped: number;
}

function summarizeStates(states: readonly StepState[]): StepSummary {
  const count = (status: StepStatus): number => states.filter((s) => s.status === status).length;
  return {
    total: states.length,
    pass: count('PASS'),
    warn: count('WARN'),
    fail: count('FAIL'),
    error: count('ERROR'),
    skipped: count('SKIPPED'),
  };
}

function initialStates(steps: readonly LintStepConfig[], logDir: string): StepState[] {
  return steps.map((s) => ({
    id: s.id,
    name: s.name,
    policy: s.policy,
    status: 'PENDING',
    logPath: pathLib.join(logDir, `${s.id}.log`),
  }));
}

/* -------------------------------------------------------------------------- */
/* Components                                                                 */
/* -------------------------------------------------------------------------- */

const Header: React.FC = () => (
  <Box borderStyle="double" borderColor="cyan" paddingX={2} justifyContent="center">
    <Text bold>{UI_CONSTANTS.TITLE}</Text>
  </Box>
);

const StatusIndicator: React.FC<{ readonly status: StepStatus }> = ({ status }) => {
  const config = STATUS_CONFIG[status];

  if (status === 'RUNNING') {
    return (
      <Text color={config.color}>
        <Spinner type="dots" /> {config.label}
      </Text>
    );
  }

  return (
    <Text color={config.color}>
      {config.symbol} {config.label}
    </Text>
  );
};

const LogLink: React.FC<{ readonly path: string; readonly status: StepStatus }> = ({
  path,
  status,
}) => {
  if (status === 'PENDING') {
    return <Text dimColor>-</Text>;
  }

  const display = supportsOsc8()
    ? createHyperlink('View Log', pathToFileURL(pathLib.resolve(path)).href)
    : path;

  return <Text>{display}</Text>;
};

const StatusTable: React.FC<{ readonly states: readonly StepState[] }> = ({ states }) => {
  const width = UI_CONSTANTS.COLUMN_WIDTH;
  return (
    <Box flexDirection="column" marginY={1}>
      <Box>
        <Box width={width.STEP}>
          <Text bold underline>
            {UI_CONSTANTS.HEADERS.STEP}
          </Text>
        </Box>
        <Box width={width.POLICY}>
          <Text bold underline>
            {UI_CONSTANTS.HEADERS.POLICY}
          </Text>
        </Box>
        <Box width={width.STATUS}>
          <Text bold underline>
            {UI_CONSTANTS.HEADERS.STATUS}
          </Text>
        </Box>
        <Box width={width.LOG}>
          <Text bold underline>
            {UI_CONSTANTS.HEADERS.LOG}
          </Text>
        </Box>
      </Box>

      {states.map((s) => (
        <Box key={s.id}>
          <Box width={width.STEP}>
            <Text>{s.name}</Text>
          </Box>
          <Box width={width.POLICY}>
            <Text dimColor>{s.policy}</Text>
          </Box>
          <Box width={width.STATUS}>
            <StatusIndicator status={s.status} />
          </Box>
          <Box width={width.LOG}>
            <LogLink path={s.logPath} status={s.status} />
          </Box>
        </Box>
      ))}
    </Box>
  );
};

const SummaryFooter: React.FC<{
  readonly states: readonly StepState[];
  readonly duration: number;
}> = ({ states, duration }) => {
  const summary = useMemo(() => summarizeStates(states), [states]);

  return (
    <Box borderStyle="single" borderColor="gray" paddingX={1} flexDirection="column">
      <Text bold>Summary</Text>
      <Text>
        Total: {summary.total} | <Text color="green">Pass: {summary.pass}</Text> |{' '}
        <Text color="yellow">Warn: {summary.warn}</Text> |{' '}
        <Text color="red">Fail: {summary.fail}</Text> |{' '}
        <Text color="red">Error: {summary.error}</Text> |{' '}
        <Text dimColor>Skipped: {summary.skipped}</Text>
      </Text>
      <Text>Duration: {(duration / 1000).toFixed(2)}s</Text>
    </Box>
  );
};

/* -------------------------------------------------------------------------- */
/* Non-TTY renderer                                                           */
/* -------------------------------------------------------------------------- */

function statusLabel(status: StepStatus): string {
  const config = STATUS_CONFIG[status];
  return `${config.symbol} ${config.label}`;
}

/**
 * Build the plain-text dashboard written when stdout is not a TTY.
 */
function formatStaticDashboard(states: readonly StepState[], duration: number): string {
  const width = UI_CONSTANTS.COLUMN_WIDTH;

  const headerRow = colorize(
    UI_CONSTANTS.HEADERS.STEP.padEnd(width.STEP) +
      UI_CONSTANTS.HEADERS.POLICY.padEnd(width.POLICY) +
      UI_CONSTANTS.HEADERS.STATUS.padEnd(width.STATUS) +
      UI_CONSTANTS.HEADERS.LOG,
    ANSI.bold,
    ANSI.underline,
  );

  const lines = [colorize(UI_CONSTANTS.TITLE, ANSI.bold, ANSI.cyan), '', headerRow];

  for (const state of states) {
    const config = STATUS_CONFIG[state.status];
    // Pad before colorizing so escape codes do not count toward the width.
    const status = colorize(statusLabel(state.status).padEnd(width.STATUS), config.ansiColor);
    const logDisplay = state.status === 'PENDING' ? '-' : state.logPath;
    lines.push(
      state.name.padEnd(width.STEP) + state.policy.padEnd(width.POLICY) + status + logDisplay,
    );
  }

  const summary = summarizeStates(states);
  lines.push(
    '',
    colorize('Summary', ANSI.bold),
    `Total: ${summary.total} | Pass: ${summary.pass} | Warn: ${summary.warn} | Fail: ${summary.fail} | Error: ${summary.error} | Skipped: ${summary.skipped}`,
    `Duration: ${(duration / 1000).toFixed(2)}s`,
    '',
  );

  return `${lines.join('\n')}\n`;
}

// Exposed for tests to exercise utility branches.
export const __test__ = {
  supportsOsc8,
  supportsColor,
  formatStaticDashboard,
  summarizeStates,
};

/* -------------------------------------------------------------------------- */
/* Dashboard                                                                  */
/* -------------------------------------------------------------------------- */

const Dashboard: React.FC<DashboardProps> = ({ steps, logDir, subscribe, onComplete }) => {
  const [states, setStates] = useState<StepState[]>(() => initialStates(steps, logDir));
  const [startTime] = useState(() => Date.now());
  const [done, setDone] = useState(false);
  const [duration, setDuration] = useState(0);

  useEffect(() => {
    subscribe((id, status) => {
      setStates((prev) =>
        prev.map((s) => (s.id === id && s.status !== status ? { ...s, status } : s)),
      );
    });
  }, [subscribe]);

  useEffect(() => {
    if (!done && states.every((s) => TERMINAL_STATUSES.includes(s.status))) {
      setDone(true);
      setDuration(Date.now() - startTime);
      onComplete();
    }
  }, [states, done, startTime, onComplete]);

  return (
    <Box flexDirection="column" paddingX={1}>
      <Header />
      <StatusTable states={states} />
      {done && <SummaryFooter states={states} duration={duration} />}
    </Box>
  );
};

function createStaticRenderer(
  steps: readonly LintStepConfig[],
  logDir: string,
  streams: DashboardStreams,
): DashboardHandle {
  let states = initialStates(steps, logDir);
  const startTime = Date.now();
  let rendered = false;

  return {
    updateStatus: (id, status) => {
      states = states.map((s) => (s.id === id ? { ...s, status } : s));
    },
    waitForExit: () => {
      if (!rendered) {
        rendered = true;
        streams.stdout.write(formatStaticDashboard(states, Date.now() - startTime));
      }
      return Promise.resolve();
    },
    close: () => {},
  };
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Render the step dashboard: live Ink view on a TTY, a single static table
 * written on `waitForExit` otherwise.
 *
 * `waitForExit` resolves once every step has reached a terminal status.
 */
export function renderDashboard(
  steps: readonly LintStepConfig[],
  logDir: string,
  streams?: { readonly stdout?: NodeJS.WriteStream; readonly stderr?: NodeJS.WriteStream },
): DashboardHandle {
  const stdout = streams?.stdout ?? process.stdout;
  const stderr = streams?.stderr ?? process.stderr;

  if (!stdout.isTTY) {
    return createStaticRenderer(steps, logDir, { stdout, stderr });
  }

  let listener: ((id: string, status: StepStatus) => void) | undefined;
  const pending: Array<{ readonly id: string; readonly status: StepStatus }> = [];
  let resolveExit: () => void = () => {};

  const exitPromise = new Promise<void>((resolve) => {
    resolveExit = resolve;
  });

  const { unmount } = render(
    <Dashboard
      steps={steps}
      logDir={logDir}
      subscribe={(l) => {
        listener = l;
        for (const event of pending.splice(0)) {
          l(event.id, event.status);
        }
      }}
      onComplete={() => resolveExit()}
    />,
    { stdout, stderr },
  );

  return {
    updateStatus: (id, status) => {
      if (listener) {
        listener(id, status);
      } else {
        pending.push({ id, status });
      }
    },
    waitForExit: async () => {
      await exitPromise;
      unmount();
    },
    close: () => unmount(),
  };
}
