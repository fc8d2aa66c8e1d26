/**
 * Configuration Loader
 * Loads and validates .pebblerc.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { EXECUTION_MODES, type ExecutionMode } from './runtime/execute.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.pebblerc.yaml';

// ============================================================
// TYPES
// ============================================================

export interface PebbleConfig {
  readonly mode: ExecutionMode;
  readonly gcThreshold?: number | undefined;
  readonly maxObjects?: number | undefined;
  readonly stackMax?: number | undefined;
  readonly framesMax?: number | undefined;
  readonly disassemble: boolean;
}

export const DEFAULT_CONFIG: PebbleConfig = {
  mode: 'vm',
  disassemble: false,
};

const POSITIVE_INT_KEYS = [
  'gcThreshold',
  'maxObjects',
  'stackMax',
  'framesMax',
] as const;

const KNOWN_KEYS: ReadonlySet<string> = new Set([
  'mode',
  'disassemble',
  ...POSITIVE_INT_KEYS,
]);

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isExecutionMode(value: unknown): value is ExecutionMode {
  return EXECUTION_MODES.some((mode) => mode === value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): asserts data is Record<string, unknown> {
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  if ('mode' in data && !isExecutionMode(data['mode'])) {
    throw new Error(
      `Invalid configuration: mode must be one of ${EXECUTION_MODES.join(', ')}`
    );
  }

  if ('disassemble' in data && typeof data['disassemble'] !== 'boolean') {
    throw new Error('Invalid configuration: disassemble must be a boolean');
  }

  for (const key of POSITIVE_INT_KEYS) {
    if (key in data && !isPositiveInteger(data[key])) {
      throw new Error(`Invalid configuration: ${key} must be a positive integer`);
    }
  }
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

function parseYaml(text: string): unknown {
  try {
    return yaml.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid configuration: ${reason}`);
  }
}

/**
 * Parse and validate configuration text. Keys left out take their defaults.
 *
 * @throws Error with "Invalid configuration: {reason}"
 */
export function parseConfig(text: string): PebbleConfig {
  const data = parseYaml(text);

  // An empty document is an empty configuration
  if (data === null || data === undefined) return DEFAULT_CONFIG;

  validateConfig(data);

  const positive = (key: (typeof POSITIVE_INT_KEYS)[number]): number | undefined => {
    const value = data[key];
    return isPositiveInteger(value) ? value : undefined;
  };
  const mode = data['mode'];
  const disassemble = data['disassemble'];

  return {
    mode: isExecutionMode(mode) ? mode : DEFAULT_CONFIG.mode,
    gcThreshold: positive('gcThreshold'),
    maxObjects: positive('maxObjects'),
    stackMax: positive('stackMax'),
    framesMax: positive('framesMax'),
    disassemble: typeof disassemble === 'boolean' ? disassemble : DEFAULT_CONFIG.disassemble,
  };
}

/**
 * Load configuration from .pebblerc.yaml in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns Defaults when the file does not exist
 * @throws Error with "Invalid configuration: {reason}" if the file is invalid
 */
export function loadConfig(cwd: string): PebbleConfig {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  return parseConfig(readFileSync(configPath, 'utf-8'));
}
