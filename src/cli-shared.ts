/**
 * CLI Shared Utilities
 * Common formatting functions for the pebble binary
 */

import { EXECUTION_STATUS, isNull } from './runtime/index.js';
import type { ExecutionResult } from './runtime/index.js';
import {
  CompileError,
  HeapExhaustedError,
  LexerError,
  ParseError,
  RuntimeError,
} from './types.js';
import { VERSION } from './version.js';

const LOCATION_SUFFIX = / at \d+:\d+$/;

/**
 * Text to print for a finished program, or null when the final value is
 * nil (nothing is printed).
 */
export function formatOutput(result: ExecutionResult): string | null {
  if (isNull(result.value)) return null;
  return result.text;
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  const baseMessage = err.message.replace(LOCATION_SUFFIX, '');

  if (err instanceof LexerError) {
    return `Lexer error at line ${err.location.line}: ${baseMessage}`;
  }

  if (err instanceof ParseError) {
    const location = err.location;
    if (location) {
      return `Parse error at line ${location.line}: ${baseMessage}`;
    }
    return `Parse error: ${baseMessage}`;
  }

  if (err instanceof CompileError) {
    if (err.line > 0) {
      return `Compile error at line ${err.line}: ${baseMessage}`;
    }
    return `Compile error: ${baseMessage}`;
  }

  if (err instanceof HeapExhaustedError) {
    return `Fatal: ${baseMessage}`;
  }

  if (err instanceof RuntimeError) {
    const location = err.location;
    if (location) {
      return `Runtime error at line ${location.line}: ${baseMessage}`;
    }
    return `Runtime error: ${baseMessage}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Exit code for a finished program: 0 on success, 1 on a compile or
 * runtime error.
 */
export function determineExitCode(result: ExecutionResult): number {
  return result.status === EXECUTION_STATUS.OK ? 0 : 1;
}

export { VERSION };
