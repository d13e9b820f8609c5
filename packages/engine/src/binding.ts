/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * NativeObjectBinding: exposes a DynamicObject inside the engine.
 *
 * Architecture:
 * - No snapshot: every property read or write goes to the live host object
 * - Each exposed name gets a small-integer ordinal; engine callbacks carry
 *   the ordinal and resolve it back to the name when they run
 * - The engine object is tagged with its binding id in a WeakMap private to
 *   the intrinsics, so scripts can neither see nor forge the tag; a
 *   process-wide registry of live bindings decides whether an id still
 *   refers to a bound object
 * - quickjs-emscripten gives host code no per-object finalizer, so bindings
 *   are finalized when their engine is disposed
 */

import type { QuickJSHandle } from 'quickjs-emscripten';
import { DynamicObject, createLogger, describeHostValue, invariant } from '@quickbridge/values';
import type { BridgeContext } from './context.js';
import { toEngine, toHostOrUndefined } from './codec.js';
import { argumentsToHost } from './function-bridge.js';
import type { AccessorHandles } from './intrinsics.js';

const log = createLogger('NativeObjectBinding');

/** Ordinals must fit a signed 16-bit tag */
export const MAX_ORDINAL = 0x7fff;

// ============================================================================
// Live binding registry
// ============================================================================

/** Registry of live bindings, shared by every engine in the process */
const liveBindings = (() => {
  let nextId = 1;
  const bindings = new Map<number, NativeObjectBinding>();
  return {
    register(binding: NativeObjectBinding): number {
      const id = nextId++;
      bindings.set(id, binding);
      return id;
    },
    get(id: number): NativeObjectBinding | undefined {
      return bindings.get(id);
    },
    remove(id: number): void {
      bindings.delete(id);
    },
    values(): NativeObjectBinding[] {
      return [...bindings.values()];
    },
    get size(): number {
      return bindings.size;
    },
  };
})();

/** Number of bindings currently live across all engines */
export function liveBindingCount(): number {
  return liveBindings.size;
}

// ============================================================================
// Binding
// ============================================================================

export class NativeObjectBinding {
  readonly id: number;
  private readonly ordinals = new Map<string, number>();
  private readonly names: string[] = [];

  constructor(
    readonly ctx: BridgeContext,
    readonly object: DynamicObject,
  ) {
    this.id = liveBindings.register(this);
  }

  get isLive(): boolean {
    return liveBindings.get(this.id) === this;
  }

  /** Ordinal of `name`, assigned on first use */
  getOrdinal(name: string): number {
    const existing = this.ordinals.get(name);
    if (existing !== undefined) return existing;

    const ordinal = this.names.length;
    invariant(ordinal <= MAX_ORDINAL, 'NativeObjectBinding', `Too many properties on one bound object (${ordinal})`);
    this.names.push(name);
    this.ordinals.set(name, ordinal);
    return ordinal;
  }

  getName(ordinal: number): string {
    const name = this.names[ordinal];
    invariant(name !== undefined, 'NativeObjectBinding', `Unknown ordinal ${ordinal}`);
    return name ?? '';
  }

  get ordinalCount(): number {
    return this.names.length;
  }

  // ── dispatch ─────────────────────────────────────────────

  getDispatch(ordinal: number): QuickJSHandle {
    const name = this.getName(ordinal);
    const value = this.object.getProperty(name);
    log.debug(`#${this.id} get '${name}': ${describeHostValue(value)}`);
    return toEngine(this.ctx, value);
  }

  setDispatch(ordinal: number, value: QuickJSHandle): void {
    const name = this.getName(ordinal);
    const converted = toHostOrUndefined(this.ctx, value);
    log.debug(`#${this.id} set '${name}': ${describeHostValue(converted)}`);
    this.object.setProperty(name, converted);
  }

  callDispatch(ordinal: number, args: readonly QuickJSHandle[]): QuickJSHandle {
    const name = this.getName(ordinal);
    const result = this.object.invokeMethod(name, {
      thisObject: this.object,
      arguments: argumentsToHost(this.ctx, args),
    });
    return toEngine(this.ctx, result);
  }

  /** Drop out of the live registry; the engine object is no longer recognised */
  finalize(): void {
    if (!this.isLive) return;
    liveBindings.remove(this.id);
    log.debug(`Finalized binding #${this.id}`);
  }
}

// ============================================================================
// Registration
// ============================================================================

interface AccessorDefinition {
  name: string;
  ordinal: number;
}

/**
 * Expose `object` as property `name` of `parent`.
 *
 * Methods become engine functions, nested DynamicObjects become bound child
 * objects, and all other properties become getter/setter pairs defined in
 * one engine call.
 */
export function registerNativeObject(
  ctx: BridgeContext,
  name: string,
  object: DynamicObject,
  parent: QuickJSHandle,
): NativeObjectBinding {
  const { vm } = ctx;
  const binding = new NativeObjectBinding(ctx, object);
  const engineObject = vm.newObject();

  try {
    ctx.intrinsics.markBound(engineObject, binding.id);

    const accessors: AccessorDefinition[] = [];

    for (const [propertyName, value] of object.entries()) {
      if (typeof value === 'function') {
        const ordinal = binding.getOrdinal(propertyName);
        const fn = vm.newFunction(propertyName, function (this: QuickJSHandle, ...args: QuickJSHandle[]) {
          return receiverBinding(ctx, binding, this, propertyName).callDispatch(ordinal, args);
        });
        vm.setProp(engineObject, propertyName, fn);
        fn.dispose();
      } else if (value instanceof DynamicObject) {
        registerNativeObject(ctx, propertyName, value, engineObject);
      } else {
        accessors.push({ name: propertyName, ordinal: binding.getOrdinal(propertyName) });
      }
    }

    installAccessors(ctx, binding, engineObject, accessors);
    vm.setProp(parent, name, engineObject);
  } catch (error) {
    binding.finalize();
    throw error;
  } finally {
    engineObject.dispose();
  }

  log.debug(`Registered '${name}' as binding #${binding.id}`, { properties: binding.ordinalCount });
  return binding;
}

function installAccessors(
  ctx: BridgeContext,
  binding: NativeObjectBinding,
  engineObject: QuickJSHandle,
  accessors: readonly AccessorDefinition[],
): void {
  const { vm } = ctx;
  const handles: AccessorHandles[] = [];
  try {
    for (const { name, ordinal } of accessors) {
      handles.push({
        name,
        get: vm.newFunction(`get ${name}`, function (this: QuickJSHandle) {
          return receiverBinding(ctx, binding, this, name).getDispatch(ordinal);
        }),
        set: vm.newFunction(`set ${name}`, function (this: QuickJSHandle, value: QuickJSHandle) {
          receiverBinding(ctx, binding, this, name).setDispatch(ordinal, value);
        }),
      });
    }
    ctx.intrinsics.defineAccessors(engineObject, handles);
  } finally {
    for (const { get, set } of handles) {
      get.dispose();
      set.dispose();
    }
  }
}

/**
 * The binding a callback runs against. The receiver must be the bound object
 * the callback was installed on; the error becomes a script exception.
 */
function receiverBinding(
  ctx: BridgeContext,
  expected: NativeObjectBinding,
  receiver: QuickJSHandle,
  name: string,
): NativeObjectBinding {
  const binding = findBinding(ctx, receiver);
  if (binding !== expected) {
    throw new TypeError(`'${name}' called on an object that is not its bound host object`);
  }
  return binding;
}

// ============================================================================
// Lookup and teardown
// ============================================================================

/** The live binding of this engine attached to `handle`, if any */
export function findBinding(ctx: BridgeContext, handle: QuickJSHandle): NativeObjectBinding | undefined {
  const id = ctx.intrinsics.bindingTag(handle);
  if (id === undefined) return undefined;
  const binding = liveBindings.get(id);
  return binding?.ctx === ctx ? binding : undefined;
}

/** Finalize every binding that belongs to `ctx`; returns how many there were */
export function finalizeBindings(ctx: BridgeContext): number {
  let count = 0;
  for (const binding of liveBindings.values()) {
    if (binding.ctx !== ctx) continue;
    binding.finalize();
    count++;
  }
  return count;
}
