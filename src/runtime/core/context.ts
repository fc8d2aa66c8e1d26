/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for script execution.
 * Public API for host applications.
 */

import { installBuiltins } from './builtins.js';
import { Environment } from './environment.js';
import { Heap } from './heap.js';
import { stringify } from './stringify.js';
import {
  DEFAULT_LIMITS,
  type RuntimeCallbacks,
  type RuntimeContext,
  type RuntimeOptions,
} from './types.js';

const defaultCallbacks: RuntimeCallbacks = {
  onPrint: (text) => {
    console.log(text);
  },
};

/**
 * Create a runtime context for script execution.
 * The global environment is rooted for the lifetime of the context.
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const callbacks: RuntimeCallbacks = {
    ...defaultCallbacks,
    ...options.callbacks,
  };
  const observability = options.observability ?? {};

  const heap = new Heap({
    gcThreshold: options.gcThreshold,
    maxObjects: options.maxObjects,
    onCollect: (stats) => observability.onCollect?.(stats),
  });

  const globals = new Environment();
  const unregister = heap.addRootTracer((tracer) => {
    tracer.markEnvironment(globals);
  });

  // Root first: installing the builtins allocates and may collect
  installBuiltins(heap, globals);

  return {
    heap,
    globals,
    callbacks,
    observability,
    limits: {
      stackMax: options.stackMax ?? DEFAULT_LIMITS.stackMax,
      framesMax: options.framesMax ?? DEFAULT_LIMITS.framesMax,
    },
    services: {
      heap,
      print: (text) => callbacks.onPrint(text),
      stringify: (value) => stringify(heap, value),
    },
    dispose: unregister,
  };
}
