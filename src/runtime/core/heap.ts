/**
 * Heap and Garbage Collector
 *
 * Owns every HeapObject. Objects live in an arena addressed by
 * generational index (slot + generation) and are chained on an intrusive
 * allocation list. Collection is stop-the-world mark and sweep with an
 * iterative worklist tracer.
 */

import { HeapExhaustedError } from '../../error-classes.js';
import type { Environment } from './environment.js';
import type { HeapObject, Tracer } from './objects.js';
import { asGcPtr, isGcPtr, makeGcPtr, type Value } from './value.js';

// ============================================================
// TYPES
// ============================================================

/** A storage location the collector treats as always reachable */
export interface RootSlot {
  value: Value;
}

/** Marks an embedder's own roots (operand stacks, environments, chunks) */
export type RootTracer = (tracer: Tracer) => void;

export interface CollectionStats {
  /** 1-based collection counter */
  readonly collection: number;
  readonly before: number;
  readonly freed: number;
  readonly live: number;
  readonly nextThreshold: number;
}

export interface HeapStats {
  readonly liveObjects: number;
  readonly threshold: number;
  readonly collections: number;
  readonly totalAllocated: number;
  readonly totalFreed: number;
}

export interface HeapOptions {
  /** Live count that triggers the first collection; also the threshold floor (default 8) */
  gcThreshold?: number | undefined;
  /** Hard ceiling on live objects; exceeding it is fatal */
  maxObjects?: number | undefined;
  onCollect?: ((stats: CollectionStats) => void) | undefined;
}

export const DEFAULT_GC_THRESHOLD = 8;

const SLOT_MASK = 0xffffffffn;
const GENERATION_SHIFT = 32n;
const GENERATION_MASK = 0xffff;

// ============================================================
// TRACER
// ============================================================

/**
 * Marks reachable objects. `mark` is idempotent, so cycles are visited
 * once; nested references are queued on a worklist instead of recursing.
 */
export class GcTracer implements Tracer {
  private readonly worklist: HeapObject[] = [];
  private readonly visitedEnvironments = new Set<Environment>();
  private draining = false;

  constructor(private readonly heap: Heap) {}

  mark(obj: HeapObject | null): void {
    if (obj === null || obj.marked) return;
    obj.marked = true;
    this.worklist.push(obj);
    this.drain();
  }

  markValue(value: Value): void {
    if (isGcPtr(value)) this.mark(this.heap.get(value));
  }

  markValues(values: Iterable<Value>): void {
    for (const value of values) this.markValue(value);
  }

  markEnvironment(env: Environment): void {
    for (
      let scope: Environment | null = env;
      scope !== null && !this.visitedEnvironments.has(scope);
      scope = scope.parent
    ) {
      this.visitedEnvironments.add(scope);
      scope.forEachValue((value) => this.markValue(value));
    }
  }

  private drain(): void {
    if (this.draining) return;
    this.draining = true;
    try {
      for (let obj = this.worklist.pop(); obj; obj = this.worklist.pop()) {
        obj.trace(this);
      }
    } finally {
      this.draining = false;
    }
  }
}

// ============================================================
// ROOT HANDLE
// ============================================================

/**
 * Keeps a value alive until released. Use it to protect an object between
 * allocation and storing it somewhere the collector already sees.
 */
export class RootHandle implements RootSlot {
  constructor(
    private readonly heap: Heap,
    public value: Value
  ) {
    heap.addRoot(this);
  }

  release(): void {
    this.heap.removeRoot(this);
  }
}

// ============================================================
// HEAP
// ============================================================

export class Heap {
  private head: HeapObject | null = null;
  private readonly slots: (HeapObject | null)[] = [];
  private readonly generations: number[] = [];
  private readonly freeSlots: number[] = [];
  private readonly roots = new Set<RootSlot>();
  private readonly rootTracers = new Set<RootTracer>();
  private readonly minThreshold: number;
  private readonly maxObjects: number | undefined;
  private readonly onCollect: ((stats: CollectionStats) => void) | undefined;
  private threshold: number;
  private live = 0;
  private collecting = false;
  private collections = 0;
  private totalAllocated = 0;
  private totalFreed = 0;

  constructor(options: HeapOptions = {}) {
    this.minThreshold = options.gcThreshold ?? DEFAULT_GC_THRESHOLD;
    this.threshold = this.minThreshold;
    this.maxObjects = options.maxObjects;
    this.onCollect = options.onCollect;
  }

  // ============================================================
  // ALLOCATION
  // ============================================================

  /**
   * Construct an object, link it, count it, then collect if the threshold
   * is reached. The new object survives the collection it triggers.
   *
   * @throws HeapExhaustedError when live objects exceed maxObjects
   */
  allocate<A extends unknown[], T extends HeapObject>(
    ctor: new (...args: A) => T,
    ...args: A
  ): T {
    if (this.collecting) {
      throw new Error('Cannot allocate while a collection is running');
    }

    const obj = new ctor(...args);
    const reused = this.freeSlots.pop();
    const slot = reused ?? this.slots.length;
    if (reused === undefined) {
      this.slots.push(obj);
      this.generations.push(0);
    } else {
      this.slots[slot] = obj;
    }
    const generation = this.generations[slot] ?? 0;
    obj.ref = makeGcPtr((BigInt(generation) << GENERATION_SHIFT) | BigInt(slot));

    obj.next = this.head;
    this.head = obj;
    this.live++;
    this.totalAllocated++;

    const limit = this.maxObjects;
    if (this.live >= this.threshold || (limit !== undefined && this.live > limit)) {
      this.runCollection(obj);
    }
    if (limit !== undefined && this.live > limit) {
      throw new HeapExhaustedError(this.live, limit);
    }

    return obj;
  }

  // ============================================================
  // HANDLE RESOLUTION
  // ============================================================

  /** Resolve a GC_PTR. A dangling or stale handle is a contract violation. */
  get(value: Value): HeapObject {
    const handle = asGcPtr(value);
    const slot = Number(handle & SLOT_MASK);
    const generation = Number(handle >> GENERATION_SHIFT);
    const obj = this.slots[slot];
    if (!obj || this.generations[slot] !== generation) {
      throw new Error(
        `Stale heap reference (slot ${slot}, generation ${generation})`
      );
    }
    return obj;
  }

  /** Resolve a value to a specific object class, or undefined */
  getAs<T extends HeapObject>(
    value: Value,
    ctor: abstract new (...args: never[]) => T
  ): T | undefined {
    if (!isGcPtr(value)) return undefined;
    const obj = this.get(value);
    return obj instanceof ctor ? obj : undefined;
  }

  /** Whether a GC_PTR still names a live object */
  isLive(value: Value): boolean {
    if (!isGcPtr(value)) return false;
    const handle = asGcPtr(value);
    const slot = Number(handle & SLOT_MASK);
    return (
      (this.slots[slot] ?? null) !== null &&
      this.generations[slot] === Number(handle >> GENERATION_SHIFT)
    );
  }

  // ============================================================
  // ROOTS
  // ============================================================

  addRoot(slot: RootSlot): void {
    this.roots.add(slot);
  }

  removeRoot(slot: RootSlot): void {
    this.roots.delete(slot);
  }

  /** Register a root tracer; call the returned function to unregister */
  addRootTracer(tracer: RootTracer): () => void {
    this.rootTracers.add(tracer);
    return () => {
      this.rootTracers.delete(tracer);
    };
  }

  /** Root a value until the handle is released */
  root(value: Value): RootHandle {
    return new RootHandle(this, value);
  }

  // ============================================================
  // COLLECTION
  // ============================================================

  collect(): CollectionStats {
    return this.runCollection(null);
  }

  private runCollection(fresh: HeapObject | null): CollectionStats {
    this.collecting = true;
    try {
      const before = this.live;
      const tracer = new GcTracer(this);

      for (const slot of this.roots) {
        tracer.markValue(slot.value);
      }
      for (const rootTracer of this.rootTracers) {
        rootTracer(tracer);
      }
      tracer.mark(fresh);

      const freed = this.sweep();
      this.threshold = Math.max(this.live * 2, this.minThreshold);
      this.collections++;

      const stats: CollectionStats = {
        collection: this.collections,
        before,
        freed,
        live: this.live,
        nextThreshold: this.threshold,
      };
      this.onCollect?.(stats);
      return stats;
    } finally {
      this.collecting = false;
    }
  }

  /** Unlink and free unmarked objects; clear marks on survivors */
  private sweep(): number {
    let freed = 0;
    let live = 0;
    let previous: HeapObject | null = null;
    let obj = this.head;

    while (obj) {
      const next: HeapObject | null = obj.next;
      if (obj.marked) {
        obj.marked = false;
        previous = obj;
        live++;
      } else {
        if (previous) {
          previous.next = next;
        } else {
          this.head = next;
        }
        this.release(obj);
        freed++;
      }
      obj = next;
    }

    this.live = live;
    this.totalFreed += freed;
    return freed;
  }

  private release(obj: HeapObject): void {
    const slot = Number(asGcPtr(obj.ref) & SLOT_MASK);
    this.slots[slot] = null;
    this.generations[slot] = ((this.generations[slot] ?? 0) + 1) & GENERATION_MASK;
    this.freeSlots.push(slot);
    obj.next = null;
  }

  // ============================================================
  // INTROSPECTION
  // ============================================================

  get liveObjects(): number {
    return this.live;
  }

  stats(): HeapStats {
    return {
      liveObjects: this.live,
      threshold: this.threshold,
      collections: this.collections,
      totalAllocated: this.totalAllocated,
      totalFreed: this.totalFreed,
    };
  }
}
