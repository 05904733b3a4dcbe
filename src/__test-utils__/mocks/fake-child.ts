/**
 * Lint Pipeline — Fake Child Process
 *
 * EventEmitter-based stand-in for the object returned by
 * `child_process.spawn`, so tests can drive output, exit and spawn errors
 * without starting a real tool.
 */

import type { ChildProcess } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';

export interface FakeChild {
  /** Value to hand back from a mocked `spawn`. */
  readonly proc: ChildProcess;
  writeStdout: (text: string) => void;
  writeStderr: (text: string) => void;
  /** Emit `close` with the given exit code (null simulates a signal kill). */
  exit: (code: number | null) => void;
  /** Emit `error` as `spawn` does when the executable cannot be started. */
  failToSpawn: (error: Error) => void;
}

export function createFakeChild(): FakeChild {
  const stdout = new PassThrough();
  const stderr = new PassThrough();
  const emitter = new EventEmitter();
  const proc: ChildProcess = Object.assign(emitter, {
    pid: 4242,
    stdout,
    stderr,
    kill: () => true,
  }) as unknown as ChildProcess;

  return {
    proc,
    writeStdout: (text) => {
      stdout.emit('data', Buffer.from(text));
    },
    writeStderr: (text) => {
      stderr.emit('data', Buffer.from(text));
    },
    exit: (code) => {
      emitter.emit('close', code);
    },
    failToSpawn: (error) => {
      emitter.emit('error', error);
    },
  };
}
