/**
 * Pebble CLI Tests: pebble command
 */

import { describe, expect, it, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  mergeFlags,
  parseArgs,
  readSource,
  runSource,
  type CliIO,
} from '../../src/cli-exec.js';
import { determineExitCode, formatError, formatOutput } from '../../src/cli-shared.js';
import {
  CompileError,
  DEFAULT_CONFIG,
  EXECUTION_STATUS,
  makeInt32,
  NIL,
  RuntimeError,
  type ExecutionResult,
  type PebbleConfig,
} from '../../src/index.js';

interface Captured {
  readonly io: CliIO;
  readonly out: string[];
  readonly err: string[];
}

function capture(): Captured {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: { out: (text) => out.push(text), err: (text) => err.push(text) },
    out,
    err,
  };
}

function runWith(source: string, config: Partial<PebbleConfig> = {}) {
  const captured = capture();
  const code = runSource(source, { ...DEFAULT_CONFIG, ...config }, captured.io);
  return { code, out: captured.out, err: captured.err };
}

describe('pebble', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pebble-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true });
  });

  describe('parseArgs', () => {
    it('parses a file argument', () => {
      expect(parseArgs(['prog.peb'])).toEqual({
        mode: 'exec',
        file: 'prog.peb',
        flags: { engine: undefined, disassemble: false },
      });
    });

    it('parses stdin mode', () => {
      expect(parseArgs(['-'])).toEqual({
        mode: 'exec',
        file: '-',
        flags: { engine: undefined, disassemble: false },
      });
    });

    it('parses inline source with engine flags', () => {
      expect(parseArgs(['-e', 'print(1);', '--tree'])).toEqual({
        mode: 'eval',
        source: 'print(1);',
        flags: { engine: 'tree', disassemble: false },
      });
      expect(parseArgs(['--vm', '--disassemble', 'x.peb'])).toEqual({
        mode: 'exec',
        file: 'x.peb',
        flags: { engine: 'vm', disassemble: true },
      });
    });

    it('parses help and version flags', () => {
      expect(parseArgs(['--help']).mode).toBe('help');
      expect(parseArgs(['x.peb', '-h']).mode).toBe('help');
      expect(parseArgs(['--version']).mode).toBe('version');
      expect(parseArgs(['-v']).mode).toBe('version');
    });

    it('rejects malformed command lines', () => {
      expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus');
      expect(() => parseArgs(['-e'])).toThrow('Missing source after -e');
      expect(() => parseArgs([])).toThrow('Missing file argument');
      expect(() => parseArgs(['a.peb', 'b.peb'])).toThrow('Unexpected argument: b.peb');
      expect(() => parseArgs(['-e', '1;', 'f.peb'])).toThrow(
        'Cannot combine -e with a file argument'
      );
    });
  });

  describe('mergeFlags', () => {
    const config: PebbleConfig = { mode: 'tree', disassemble: false, gcThreshold: 16 };

    it('lets flags override the configuration', () => {
      expect(mergeFlags(config, { engine: 'vm', disassemble: true })).toEqual({
        mode: 'vm',
        disassemble: true,
        gcThreshold: 16,
      });
    });

    it('keeps configured values when flags are absent', () => {
      expect(mergeFlags(config, { disassemble: false })).toEqual(config);
    });
  });

  describe('runSource', () => {
    it('writes program output and then the final value', () => {
      const { code, out, err } = runWith('print("a"); print(1, 2); 3 + 4;');
      expect(out).toEqual(['a', '1 2', '7']);
      expect(err).toEqual([]);
      expect(code).toBe(0);
    });

    it('prints nothing for a nil result', () => {
      expect(runWith('print("x");').out).toEqual(['x']);
    });

    it('runs on the tree-walker when configured', () => {
      const { code, out } = runWith('var s = 0; for x in [1, 2] { s = s + x; } s;', {
        mode: 'tree',
      });
      expect(out).toEqual(['3']);
      expect(code).toBe(0);
    });

    it('formats runtime errors', () => {
      const { code, out, err } = runWith('let x = 1;\nx();');
      expect(err).toEqual(['Runtime error at line 2: Can only call functions, got integer']);
      expect(out).toEqual([]);
      expect(code).toBe(1);
    });

    it('formats compile errors', () => {
      const { code, err } = runWith('return 1;');
      expect(err).toEqual(['Compile error at line 1: Cannot return from top-level code']);
      expect(code).toBe(1);
    });

    it('reports the same program as a runtime error on the tree-walker', () => {
      expect(runWith('return 1;', { mode: 'tree' }).err).toEqual([
        'Runtime error at line 1: Cannot return from top-level code',
      ]);
    });

    it('formats parse errors', () => {
      const { code, err } = runWith('let x = 1 +;');
      expect(err).toEqual(["Parse error at line 1: Unexpected token: ';'"]);
      expect(code).toBe(1);
    });

    it('formats lexer errors', () => {
      expect(runWith('"abc').err).toEqual([
        'Lexer error at line 1: Unterminated string literal',
      ]);
    });

    it('reports heap exhaustion as fatal', () => {
      const { code, err } = runWith(
        'var a = []; var i = 0; while i < 30 { push(a, [i]); i = i + 1; }',
        { maxObjects: 10 }
      );
      expect(err).toHaveLength(1);
      expect(err[0]).toMatch(/^Fatal: Heap exhausted: \d+ live objects exceed limit 10$/);
      expect(code).toBe(1);
    });

    it('prints the disassembly before running', () => {
      const { out } = runWith('1 + 2;', { disassemble: true });
      expect(out).toEqual([
        [
          '=== <script> ===',
          '0000  LOAD_CONST 0 (1)',
          '0001  LOAD_CONST 1 (2)',
          '0002  ADD',
          '0003  HALT',
        ].join('\n'),
        '3',
      ]);
    });

    it('does not disassemble on the tree-walker', () => {
      expect(runWith('1 + 2;', { disassemble: true, mode: 'tree' }).out).toEqual(['3']);
    });
  });

  describe('readSource', () => {
    it('reads a program file', async () => {
      const file = path.join(tempDir, 'prog.peb');
      await fs.writeFile(file, 'print("hi");');
      await expect(readSource(file)).resolves.toBe('print("hi");');
    });

    it('reports a missing file', async () => {
      const file = path.join(tempDir, 'missing.peb');
      await expect(readSource(file)).rejects.toThrow(`File not found: ${file}`);
    });
  });

  describe('formatError', () => {
    it('omits the line when the location is unknown', () => {
      expect(formatError(new RuntimeError('PEB-R008', 'Stack underflow'))).toBe(
        'Runtime error: Stack underflow'
      );
      expect(
        formatError(new CompileError('PEB-C001', 'No opcode for operator %'))
      ).toBe('Compile error: No opcode for operator %');
    });

    it('passes other errors through', () => {
      expect(formatError(new Error('boom'))).toBe('boom');
    });
  });

  describe('formatOutput and determineExitCode', () => {
    const result = (overrides: Partial<ExecutionResult>): ExecutionResult => ({
      status: EXECUTION_STATUS.OK,
      value: NIL,
      text: 'nil',
      errors: [],
      ...overrides,
    });

    it('prints non-nil values only', () => {
      expect(formatOutput(result({}))).toBeNull();
      expect(formatOutput(result({ value: makeInt32(3), text: '3' }))).toBe('3');
    });

    it('maps status to exit code', () => {
      expect(determineExitCode(result({}))).toBe(0);
      expect(determineExitCode(result({ status: EXECUTION_STATUS.COMPILE_ERROR }))).toBe(1);
      expect(determineExitCode(result({ status: EXECUTION_STATUS.RUNTIME_ERROR }))).toBe(1);
    });
  });
});
