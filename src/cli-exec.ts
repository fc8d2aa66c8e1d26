#!/usr/bin/env node
/**
 * CLI Execution Entry Point
 *
 * Implements main(), parseArgs() and runSource() for the pebble binary.
 * Handles file execution, stdin input and inline source.
 */

import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import { loadConfig, type PebbleConfig } from './config.js';
import { determineExitCode, formatError, formatOutput, VERSION } from './cli-shared.js';
import { parse } from './parser/index.js';
import {
  createRuntimeContext,
  execute,
  type ExecutionMode,
} from './runtime/index.js';

/** Flags that override .pebblerc.yaml */
export interface RunFlags {
  readonly engine?: ExecutionMode | undefined;
  readonly disassemble: boolean;
}

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'exec'; file: string; flags: RunFlags }
  | { mode: 'eval'; source: string; flags: RunFlags }
  | { mode: 'help' | 'version' };

/** Where program output and diagnostics go */
export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

const USAGE = `Usage:
  pebble <file.peb>        Execute a Pebble program
  pebble -                 Read the program from stdin
  pebble -e <source>       Execute inline source
  pebble --help            Show this help message
  pebble --version         Show version information

Options:
  --vm                     Compile to bytecode and run on the VM (default)
  --tree                   Run on the tree-walking interpreter
  --disassemble            Print the compiled bytecode before running

Settings are read from .pebblerc.yaml in the working directory; flags win.

Examples:
  pebble program.peb
  pebble -e 'print(1 + 2 * 3);'
  echo 'length([1, 2, 3]);' | pebble -`;

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseArgs(argv: string[]): ParsedArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let engine: ExecutionMode | undefined;
  let disassemble = false;
  let source: string | undefined;
  let file: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--vm') {
      engine = 'vm';
    } else if (arg === '--tree') {
      engine = 'tree';
    } else if (arg === '--disassemble') {
      disassemble = true;
    } else if (arg === '-e') {
      source = argv[++i];
      if (source === undefined) {
        throw new Error('Missing source after -e');
      }
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    } else if (file === undefined) {
      file = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  const flags: RunFlags = { engine, disassemble };

  if (source !== undefined) {
    if (file !== undefined) {
      throw new Error('Cannot combine -e with a file argument');
    }
    return { mode: 'eval', source, flags };
  }

  if (file === undefined) {
    throw new Error('Missing file argument');
  }

  return { mode: 'exec', file, flags };
}

/** Apply command-line flags over the loaded configuration */
export function mergeFlags(config: PebbleConfig, flags: RunFlags): PebbleConfig {
  return {
    ...config,
    mode: flags.engine ?? config.mode,
    disassemble: flags.disassemble || config.disassemble,
  };
}

/**
 * Parse and run one program. Program output and the final value go to
 * `io.out`; diagnostics go to `io.err`.
 *
 * @returns Process exit code
 */
export function runSource(
  source: string,
  config: PebbleConfig,
  io: CliIO = consoleIO
): number {
  const context = createRuntimeContext({
    callbacks: { onPrint: (text) => io.out(text) },
    gcThreshold: config.gcThreshold,
    maxObjects: config.maxObjects,
    stackMax: config.stackMax,
    framesMax: config.framesMax,
  });

  try {
    const program = parse(source);
    const result = execute(program, context, {
      mode: config.mode,
      onDisassemble: config.disassemble ? (listing) => io.out(listing) : undefined,
    });

    for (const error of result.errors) {
      io.err(formatError(error));
    }

    const output = formatOutput(result);
    if (output !== null) io.out(output);

    return determineExitCode(result);
  } catch (error) {
    io.err(formatError(error instanceof Error ? error : new Error(String(error))));
    return 1;
  } finally {
    context.dispose();
  }
}

/**
 * Read a program from a file, or from stdin when `file` is '-'
 *
 * @throws Error if the file does not exist
 */
export async function readSource(file: string): Promise<string> {
  if (file === '-') {
    // Read from stdin (must use sync API for stdin)
    return fsSync.readFileSync(0, 'utf-8');
  }

  try {
    await fs.access(file);
  } catch {
    throw new Error(`File not found: ${file}`);
  }

  return fs.readFile(file, 'utf-8');
}

/**
 * Entry point for the pebble binary
 *
 * Parses command-line arguments, executes programs, and handles errors.
 * Writes results to stdout and errors to stderr.
 * Sets exit code 1 on any error.
 */
export async function main(): Promise<void> {
  try {
    const parsed = parseArgs(process.argv.slice(2));

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return;

      case 'version':
        console.log(VERSION);
        return;

      case 'eval':
      case 'exec': {
        const config = mergeFlags(loadConfig(process.cwd()), parsed.flags);
        const source =
          parsed.mode === 'eval' ? parsed.source : await readSource(parsed.file);
        process.exit(runSource(source, config));
      }
    }
  } catch (err) {
    if (err instanceof Error) {
      console.error(formatError(err));
    } else {
      console.error(formatError(new Error(String(err))));
    }
    process.exit(1);
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
