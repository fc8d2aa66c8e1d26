/**
 * Pebble Heap Tests
 * Allocation, handles, rooting and mark-and-sweep collection
 */

import { describe, expect, it, vi } from 'vitest';
import {
  ArrayObject,
  DictObject,
  Environment,
  FunctionObject,
  Heap,
  HeapExhaustedError,
  makeInt32,
  NIL,
  StringObject,
  type BlockStatementNode,
  type CollectionStats,
} from '../../src/index.js';

const origin = { line: 1, column: 1, offset: 0 };
const emptyBlock: BlockStatementNode = {
  type: 'BlockStatement',
  statements: [],
  tail: null,
  span: { start: origin, end: origin },
};

describe('Pebble Heap', () => {
  describe('allocation', () => {
    it('assigns a handle that resolves to the object', () => {
      const heap = new Heap();
      const str = heap.allocate(StringObject, 'hello');
      expect(heap.get(str.ref)).toBe(str);
      expect(heap.getAs(str.ref, StringObject)?.value).toBe('hello');
      expect(heap.getAs(str.ref, ArrayObject)).toBeUndefined();
      expect(heap.getAs(makeInt32(1), StringObject)).toBeUndefined();
      expect(heap.liveObjects).toBe(1);
    });

    it('invalidates handles to freed slots', () => {
      const heap = new Heap({ gcThreshold: 100 });
      const first = heap.allocate(StringObject, 'first');
      heap.collect();
      const second = heap.allocate(StringObject, 'second');

      expect(second.ref).not.toBe(first.ref);
      expect(heap.isLive(first.ref)).toBe(false);
      expect(heap.isLive(second.ref)).toBe(true);
      expect(() => heap.get(first.ref)).toThrow('Stale heap reference (slot 0, generation 0)');
    });

    it('refuses to allocate during a collection', () => {
      const heap = new Heap({ gcThreshold: 100 });
      const unregister = heap.addRootTracer(() => {
        heap.allocate(StringObject, 'late');
      });
      expect(() => heap.collect()).toThrow('Cannot allocate while a collection is running');
      unregister();
      expect(heap.collect().live).toBe(0);
    });
  });

  describe('collection', () => {
    it('frees unrooted objects and keeps rooted ones', () => {
      const heap = new Heap({ gcThreshold: 100 });
      const kept = heap.allocate(StringObject, 'kept');
      heap.allocate(StringObject, 'garbage');
      heap.allocate(StringObject, 'garbage');
      const root = heap.root(kept.ref);

      expect(heap.collect()).toEqual({
        collection: 1,
        before: 3,
        freed: 2,
        live: 1,
        nextThreshold: 100,
      });
      expect(heap.isLive(kept.ref)).toBe(true);

      root.release();
      expect(heap.collect().freed).toBe(1);
    });

    it('keeps a chain of nested arrays alive through its head', () => {
      const heap = new Heap({ gcThreshold: 100 });
      const leaf = heap.allocate(StringObject, 'leaf');
      const third = heap.allocate(ArrayObject, [leaf.ref]);
      const second = heap.allocate(ArrayObject, [third.ref]);
      const head = heap.allocate(ArrayObject, [second.ref, makeInt32(1)]);
      const root = heap.root(head.ref);

      expect(heap.collect().live).toBe(4);
      expect(heap.isLive(leaf.ref)).toBe(true);

      root.release();
      const stats = heap.collect();
      expect(stats.freed).toBe(4);
      expect(stats.live).toBe(0);
    });

    it('marks a chain far deeper than the call stack allows', () => {
      const depth = 100_000;
      const heap = new Heap({ gcThreshold: depth * 2 });
      let head = heap.allocate(ArrayObject);
      for (let i = 1; i < depth; i++) {
        head = heap.allocate(ArrayObject, [head.ref]);
      }

      const root = heap.root(head.ref);
      const kept = heap.collect();
      expect(kept.freed).toBe(0);
      expect(kept.live).toBe(depth);

      root.release();
      const swept = heap.collect();
      expect(swept.freed).toBe(depth);
      expect(heap.liveObjects).toBe(0);
    });

    it('collects unreachable cycles', () => {
      const heap = new Heap({ gcThreshold: 100 });
      const a = heap.allocate(ArrayObject);
      const b = heap.allocate(ArrayObject, [a.ref]);
      a.elements.push(b.ref);
      const dict = heap.allocate(DictObject);
      dict.entries.set('self', dict.ref);

      const root = heap.root(a.ref);
      expect(heap.collect().live).toBe(2);
      root.release();
      expect(heap.collect().freed).toBe(2);
      expect(heap.liveObjects).toBe(0);
    });

    it('marks environments through root tracers', () => {
      const heap = new Heap({ gcThreshold: 100 });
      const env = new Environment(new Environment());
      const outer = heap.allocate(StringObject, 'outer');
      const inner = heap.allocate(StringObject, 'inner');
      env.parent?.define('outer', outer.ref);
      env.define('inner', inner.ref);

      const unregister = heap.addRootTracer((tracer) => tracer.markEnvironment(env));
      expect(heap.collect().live).toBe(2);
      unregister();
      expect(heap.collect().live).toBe(0);
    });

    it('keeps values captured by a closure', () => {
      const heap = new Heap({ gcThreshold: 100 });
      const scope = new Environment();
      const captured = heap.allocate(StringObject, 'captured');
      scope.define('x', captured.ref);
      const fn = heap.allocate(FunctionObject, 'f', [], { kind: 'ast', block: emptyBlock }, scope);

      const root = heap.root(fn.ref);
      expect(heap.collect().live).toBe(2);
      root.release();
      expect(heap.collect().live).toBe(0);
    });
  });

  describe('thresholds', () => {
    it('collects when the live count reaches the threshold', () => {
      const onCollect = vi.fn<(stats: CollectionStats) => void>();
      const heap = new Heap({ gcThreshold: 4, onCollect });
      let last = heap.allocate(StringObject, 'a');
      for (const text of ['b', 'c', 'd']) {
        last = heap.allocate(StringObject, text);
      }

      expect(onCollect).toHaveBeenCalledTimes(1);
      expect(onCollect).toHaveBeenCalledWith({
        collection: 1,
        before: 4,
        freed: 3,
        live: 1,
        nextThreshold: 4,
      });
      // The allocation that triggered the collection survives it
      expect(heap.isLive(last.ref)).toBe(true);
    });

    it('doubles the threshold from the surviving count', () => {
      const heap = new Heap({ gcThreshold: 2 });
      const roots = [1, 2, 3].map((n) => heap.root(heap.allocate(StringObject, String(n)).ref));
      expect(heap.stats()).toMatchObject({ liveObjects: 3, threshold: 4, collections: 1 });
      for (const root of roots) root.release();
    });

    it('fails when rooted objects exceed maxObjects', () => {
      const heap = new Heap({ gcThreshold: 100, maxObjects: 2 });
      heap.root(heap.allocate(StringObject, 'a').ref);
      heap.root(heap.allocate(StringObject, 'b').ref);
      expect(() => heap.allocate(StringObject, 'c')).toThrow(HeapExhaustedError);
    });

    it('reclaims garbage before giving up on maxObjects', () => {
      const heap = new Heap({ gcThreshold: 100, maxObjects: 2 });
      heap.allocate(StringObject, 'a');
      heap.allocate(StringObject, 'b');
      heap.allocate(StringObject, 'c');
      expect(heap.stats()).toEqual({
        liveObjects: 1,
        threshold: 100,
        collections: 1,
        totalAllocated: 3,
        totalFreed: 2,
      });
    });

    it('ignores non-pointer roots', () => {
      const heap = new Heap();
      const root = heap.root(NIL);
      expect(heap.collect().live).toBe(0);
      root.release();
    });
  });
});
