/**
 * Pebble Module
 * Exports lexer, parser, runtime, configuration and AST types
 */

export { LexerError, tokenize } from './lexer/index.js';
export { parse, Parser } from './parser/index.js';
export * from './runtime/index.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  ERROR_REGISTRY,
  renderMessage,
  getHelpUrl,
  createError,
} from './types.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  loadConfig,
  parseConfig,
  type PebbleConfig,
} from './config.js';

export { err, ok, type Err, type Ok, type Result } from './result.js';
export { VERSION } from './version.js';

export * from './types.js';
