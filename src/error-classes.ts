/**
 * Pebble Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './types.js';
import {
  ERROR_REGISTRY,
  getHelpUrl,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface PebbleErrorData {
  readonly errorId: string;
  readonly helpUrl?: string | undefined;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Pebble errors.
 * Provides structured data for host applications to format as needed.
 */
export class PebbleError extends Error {
  readonly errorId: string;
  readonly helpUrl: string | undefined;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: PebbleErrorData) {
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'PebbleError';
    this.errorId = data.errorId;
    this.helpUrl = data.helpUrl ?? (getHelpUrl(data.errorId) || undefined);
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): PebbleErrorData {
    return {
      errorId: this.errorId,
      helpUrl: this.helpUrl,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: PebbleErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

function checkCategory(errorId: string, expected: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== expected) {
    throw new TypeError(`Expected ${expected} error ID, got: ${errorId}`);
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Tokenization errors; always located */
export class LexerError extends PebbleError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'lexer');
    super({ errorId, message, location, context });
    this.name = 'LexerError';
    this.location = location;
  }
}

/** Parse-time errors */
export class ParseError extends PebbleError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'parse');
    super({ errorId, message, location, context });
    this.name = 'ParseError';
  }
}

/** Bytecode compilation diagnostics, collected rather than thrown */
export class CompileError extends PebbleError {
  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'compile');
    super({ errorId, message, location, context });
    this.name = 'CompileError';
  }

  /** Source line of the offending node, or 0 when unknown */
  get line(): number {
    return this.location?.line ?? 0;
  }
}

/** Runtime execution errors */
export class RuntimeError extends PebbleError {
  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'runtime');
    super({ errorId, message, location, context });
    this.name = 'RuntimeError';
  }

  /** Create from an AST node */
  static fromNode(
    errorId: string,
    message: string,
    node?: { span: { start: SourceLocation } },
    context?: Record<string, unknown>
  ): RuntimeError {
    return new RuntimeError(errorId, message, node?.span.start, context);
  }
}

/**
 * The heap cannot hold another object. Fatal: the VM and the interpreter
 * never convert it into a language-level runtime error.
 */
export class HeapExhaustedError extends PebbleError {
  readonly live: number;
  readonly limit: number;

  constructor(live: number, limit: number) {
    super({
      errorId: 'PEB-R015',
      message: renderMessage(
        ERROR_REGISTRY.get('PEB-R015')?.messageTemplate ?? 'Heap exhausted',
        { live, limit }
      ),
      context: { live, limit },
    });
    this.name = 'HeapExhaustedError';
    this.live = live;
    this.limit = limit;
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error of the matching class from the registry template.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("PEB-R001", { name: "foo" }, location)
 * // RuntimeError: "Undefined variable foo at 1:5"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation
): PebbleError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);

  switch (definition.category) {
    case 'lexer':
      if (location) return new LexerError(errorId, message, location, context);
      return new PebbleError({ errorId, message, context });
    case 'parse':
      if (location) return new ParseError(errorId, message, location, context);
      return new PebbleError({ errorId, message, context });
    case 'compile':
      return new CompileError(errorId, message, location, context);
    case 'runtime':
      return new RuntimeError(errorId, message, location, context);
  }
}
