/**
 * Tests for the help and version API.
 */

import { describe, expect, it } from 'vitest';
import { showHelp, showVersion } from './help.ts';

describe('help API', () => {
  it('prints the package name and version', () => {
    expect(showVersion()).toBe('lint-pipeline v0.1.0');
  });

  it('re-exports showHelp', () => {
    expect(showHelp()).toContain('USAGE:\n  lint [OPTIONS]');
  });
});
