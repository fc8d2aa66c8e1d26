/**
 * Pebble Runtime Tests: Garbage Collection Under Execution
 * Both engines must keep live values rooted while the collector runs
 */

import { describe, expect, it, vi } from 'vitest';
import { HeapExhaustedError, type CollectionStats } from '../../src/index.js';
import { MODES, run, runFull } from '../helpers/runtime.js';

describe.each(MODES)('Pebble GC: %s engine', (mode) => {
  it('collects while a loop allocates', () => {
    const result = runFull(
      'var i = 0; var last = ""; while i < 50 { last = str(i); i = i + 1; } last;',
      { mode, gcThreshold: 4 }
    );
    expect(result.text).toBe('49');
    expect(result.context.heap.stats().collections).toBeGreaterThan(0);
  });

  it('keeps globals reachable across collections', () => {
    expect(
      run('let keep = [1, 2]; var i = 0; while i < 20 { str(i); i = i + 1; } keep;', {
        mode,
        gcThreshold: 2,
      })
    ).toBe('[1, 2]');
  });

  it('keeps operands alive while indexing allocates', () => {
    expect(
      run(
        'let s = "abcdef"; var n = 0; var i = 0; while i < length(s) { let c = s[i]; n = n + length(c); i = i + 1; } n;',
        { mode, gcThreshold: 2 }
      )
    ).toBe('6');
  });

  it('frees unreachable cycles', () => {
    const { context, errors } = runFull(
      'func cyc() { let a = []; let b = [a]; push(a, b); 0 } cyc(); cyc();',
      { mode }
    );
    expect(errors).toEqual([]);
    // Six builtins and cyc itself
    expect(context.heap.collect().live).toBe(7);
  });

  it('throws when live objects exceed maxObjects', () => {
    expect(() =>
      runFull('var a = []; var i = 0; while i < 30 { push(a, [i]); i = i + 1; }', {
        mode,
        maxObjects: 20,
      })
    ).toThrow(HeapExhaustedError);
  });

  it('reports every collection', () => {
    const onCollect = vi.fn<(stats: CollectionStats) => void>();
    runFull('var i = 0; while i < 20 { str(i); i = i + 1; }', {
      mode,
      gcThreshold: 4,
      observability: { onCollect },
    });

    expect(onCollect).toHaveBeenCalled();
    onCollect.mock.calls.forEach(([stats], i) => {
      expect(stats.collection).toBe(i + 1);
      expect(stats.before - stats.freed).toBe(stats.live);
      expect(stats.nextThreshold).toBe(Math.max(stats.live * 2, 4));
    });
  });
});
