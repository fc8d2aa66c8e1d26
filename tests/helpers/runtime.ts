/**
 * Test utilities for Pebble runtime tests
 */

import {
  createRuntimeContext,
  execute,
  parse,
  type ExecutionMode,
  type ExecutionResult,
  type PebbleError,
  type RuntimeContext,
  type RuntimeOptions,
} from '../../src/index.js';

/** Both engines, for `describe.each` */
export const MODES: readonly ExecutionMode[] = ['vm', 'tree'];

/** Options for test execution */
export interface TestOptions extends Omit<RuntimeOptions, 'callbacks'> {
  mode?: ExecutionMode | undefined;
}

export interface TestRun extends ExecutionResult {
  /** Lines written by print() */
  readonly output: string[];
  readonly context: RuntimeContext;
}

/** Execute a program and return the full result plus captured output */
export function runFull(source: string, options: TestOptions = {}): TestRun {
  const { mode, ...runtime } = options;
  const output: string[] = [];
  const context = createRuntimeContext({
    ...runtime,
    callbacks: { onPrint: (text) => output.push(text) },
  });
  const result = execute(parse(source), context, { mode });
  return { ...result, output, context };
}

/** Execute a program and return the display text of its final value */
export function run(source: string, options: TestOptions = {}): string {
  const result = runFull(source, options);
  const [error] = result.errors;
  if (error) throw error;
  return result.text;
}

/** Execute a program that must fail and return its first error */
export function runError(source: string, options: TestOptions = {}): PebbleError {
  const [error] = runFull(source, options).errors;
  if (!error) throw new Error(`Expected ${source} to fail`);
  return error;
}
