/**
 * @file CLI — Executor module re-exports
 *
 * Thin re-export layer with no executable behavior.
 */

export * from './binary-checker/binary-checker.ts';
export * from './process-manager/process-manager.ts';
export * from './result-builder/result-builder.ts';
export * from './types.ts';
