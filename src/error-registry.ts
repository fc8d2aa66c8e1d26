/**
 * Error Registry
 * Central error definition registry with template rendering and help URL generation.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'compile' | 'runtime';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: PEB-{category}{3-digit} (e.g., PEB-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();
    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }
    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (PEB-L0xx)
  {
    errorId: 'PEB-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause: 'String opened with a double quote but not closed before end of line.',
    resolution: 'Add the closing quote. Strings cannot span lines; use \\n.',
    examples: [{ description: 'Missing closing quote', code: 'let s = "hello;' }],
  },
  {
    errorId: 'PEB-L002',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: 'Unexpected character: {char}',
    cause: 'Character is not part of the language syntax.',
    resolution: 'Remove or replace the character.',
    examples: [{ description: 'Modulo is not an operator', code: 'let r = 7 % 2;' }],
  },
  {
    errorId: 'PEB-L003',
    category: 'lexer',
    description: 'Invalid escape sequence',
    messageTemplate: 'Invalid escape sequence: \\{char}',
    resolution: 'Use one of \\n, \\t, \\r, \\\\ or \\".',
  },

  // Parse Errors (PEB-P0xx)
  {
    errorId: 'PEB-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Unexpected token: {token}',
    cause: 'Parser found a token that cannot start or continue an expression.',
    resolution: 'Check for missing operands or misplaced punctuation.',
    examples: [{ description: 'Dangling operator', code: 'let x = 1 +;' }],
  },
  {
    errorId: 'PEB-P002',
    category: 'parse',
    description: 'Expected token',
    messageTemplate: 'Expected {expected}',
    cause: 'A required token such as ";" or "}" is missing.',
    resolution: 'Insert the expected token.',
    examples: [
      { description: 'Missing semicolon', code: 'let x = 1' },
      { description: 'Unclosed block', code: 'while true { x = 1;' },
    ],
  },
  {
    errorId: 'PEB-P003',
    category: 'parse',
    description: 'Invalid assignment target',
    messageTemplate: 'Invalid assignment target',
    cause: 'Left side of "=" is not a variable or index expression.',
    resolution: 'Assign to a name (x = 1) or an element (xs[0] = 1).',
  },

  // Compile Errors (PEB-C0xx)
  {
    errorId: 'PEB-C001',
    category: 'compile',
    description: 'Unknown operator',
    messageTemplate: 'No opcode for operator {operator}',
  },
  {
    errorId: 'PEB-C002',
    category: 'compile',
    description: 'Malformed literal',
    messageTemplate: 'Malformed literal: {literal}',
    cause: 'Integer literal does not fit in 32 bits.',
    resolution: 'Write the value as a float (e.g. 3000000000.0).',
  },
  {
    errorId: 'PEB-C003',
    category: 'compile',
    description: 'Unsupported construct',
    messageTemplate: '{construct} is not supported by the bytecode compiler',
    cause: 'The construct is only available in the tree-walking interpreter.',
    resolution: 'Rewrite with while, or run with --tree.',
    examples: [{ description: 'For loop', code: 'for x in [1, 2] { print(x); }' }],
  },
  {
    errorId: 'PEB-C004',
    category: 'compile',
    description: 'Assignment to immutable binding',
    messageTemplate: 'Cannot assign to immutable variable {name}',
    resolution: 'Declare the variable with var instead of let.',
  },
  {
    errorId: 'PEB-C005',
    category: 'compile',
    description: 'Return outside function',
    messageTemplate: 'Cannot return from top-level code',
  },

  // Runtime Errors (PEB-R0xx)
  {
    errorId: 'PEB-R001',
    category: 'runtime',
    description: 'Undefined variable',
    messageTemplate: 'Undefined variable {name}',
    cause: 'Variable read or assigned before it was declared.',
    resolution: 'Declare the variable with let or var first.',
    examples: [{ description: 'Typo in name', code: 'let count = 1;\ncont;' }],
  },
  {
    errorId: 'PEB-R002',
    category: 'runtime',
    description: 'Assignment to immutable variable',
    messageTemplate: 'Cannot assign to immutable variable {name}',
    resolution: 'Declare the variable with var instead of let.',
  },
  {
    errorId: 'PEB-R003',
    category: 'runtime',
    description: 'Type mismatch',
    messageTemplate: 'Operands must be numbers for {operator}',
    cause: 'Arithmetic or comparison applied to non-numeric values.',
  },
  {
    errorId: 'PEB-R004',
    category: 'runtime',
    description: 'Division by zero',
    messageTemplate: 'Division by zero',
  },
  {
    errorId: 'PEB-R005',
    category: 'runtime',
    description: 'Value is not callable',
    messageTemplate: 'Can only call functions, got {type}',
  },
  {
    errorId: 'PEB-R006',
    category: 'runtime',
    description: 'Arity mismatch',
    messageTemplate: '{name}() expects {expected} arguments, got {actual}',
  },
  {
    errorId: 'PEB-R007',
    category: 'runtime',
    description: 'Stack overflow',
    messageTemplate: 'Stack overflow ({limit} {unit})',
    cause: 'Recursion too deep or too many values pushed.',
    resolution: 'Raise stackMax or framesMax in .pebblerc.yaml, or reduce recursion.',
  },
  {
    errorId: 'PEB-R008',
    category: 'runtime',
    description: 'Stack underflow',
    messageTemplate: 'Stack underflow',
  },
  {
    errorId: 'PEB-R009',
    category: 'runtime',
    description: 'Invalid operand',
    messageTemplate: 'Invalid {table} index {index}',
  },
  {
    errorId: 'PEB-R010',
    category: 'runtime',
    description: 'Index out of range',
    messageTemplate: 'Index {index} out of range for length {length}',
  },
  {
    errorId: 'PEB-R011',
    category: 'runtime',
    description: 'Key not found',
    messageTemplate: 'Key "{key}" not found',
  },
  {
    errorId: 'PEB-R012',
    category: 'runtime',
    description: 'Builtin failure',
    messageTemplate: '{message}',
  },
  {
    errorId: 'PEB-R013',
    category: 'runtime',
    description: 'Return outside function',
    messageTemplate: 'Cannot return from top-level code',
  },
  {
    errorId: 'PEB-R014',
    category: 'runtime',
    description: 'Unknown instruction',
    messageTemplate: 'Unknown instruction: {opcode}',
  },
  {
    errorId: 'PEB-R015',
    category: 'runtime',
    description: 'Heap exhausted',
    messageTemplate: 'Heap exhausted: {live} live objects exceed limit {limit}',
    cause: 'Reachable objects exceed the configured maxObjects.',
    resolution: 'Raise maxObjects in .pebblerc.yaml.',
  },
  {
    errorId: 'PEB-R016',
    category: 'runtime',
    description: 'Value is not indexable',
    messageTemplate: 'Cannot index {type} with {indexType}',
    cause: 'Only arrays and strings take integer indices, and only dicts take string keys.',
  },
  {
    errorId: 'PEB-R017',
    category: 'runtime',
    description: 'Value is not iterable',
    messageTemplate: 'Cannot iterate over {type}',
    cause: 'for loops walk array elements or dict keys.',
  },
];

/** Frozen registry of every error the runtime can report */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing {placeholder} with context values.
 *
 * Missing placeholders render as empty strings. Non-string values are
 * coerced with String(). An unclosed brace returns the template unchanged.
 *
 * @example
 * renderMessage("Undefined variable {name}", { name: "x" })
 * // Returns: "Undefined variable x"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }
      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }
      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}

/**
 * Documentation anchor for an error ID.
 *
 * @example
 * getHelpUrl("PEB-R001")
 * // Returns: "docs/errors.md#peb-r001"
 */
export function getHelpUrl(errorId: string): string {
  if (!/^PEB-[LPCR]\d{3}$/.test(errorId)) {
    return '';
  }
  return `docs/errors.md#${errorId.toLowerCase()}`;
}
