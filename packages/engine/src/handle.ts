/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { QuickJSHandle } from 'quickjs-emscripten';
import { createLogger, errorMessage, fail, invariant, valueOr } from '@quickbridge/values';
import type { HostValue, Result } from '@quickbridge/values';
import type { BridgeContext } from './context.js';
import { settleCall, toEngine, toHost } from './codec.js';
import { ArgumentBuffer } from './function-bridge.js';
import { findBinding } from './binding.js';

const log = createLogger('ScriptValueHandle');

/**
 * An owning handle over one live engine value.
 *
 * The constructor takes ownership of the QuickJS handle it is given. clone()
 * duplicates the engine value, dispose() releases it. A handle that is never
 * disposed is released when it is garbage-collected or when its engine is
 * disposed, whichever comes first.
 */
export class ScriptValueHandle {
  private released = false;

  constructor(
    private readonly ctx: BridgeContext,
    private readonly handle: QuickJSHandle,
  ) {
    ctx.adopt(this, [handle]);
  }

  get alive(): boolean {
    return !this.released && this.ctx.alive;
  }

  clone(): ScriptValueHandle {
    return new ScriptValueHandle(this.ctx, this.value.dup());
  }

  /** @internal The underlying QuickJS handle, still owned by this object */
  get raw(): QuickJSHandle {
    return this.value;
  }

  dispose(): void {
    if (this.released) return;
    this.released = true;
    this.ctx.release(this, [this.handle]);
  }

  /**
   * Child handle.
   *
   * By name: the property is created as an empty object when missing.
   * By index: the value must be an array.
   *
   * @throws EngineException when a getter or proxy trap on the way throws
   */
  getChild(key: string | number): ScriptValueHandle {
    const { vm } = this.ctx;

    if (typeof key === 'number') {
      invariant(this.isArray(), 'ScriptValueHandle', `getChild(${key}) on a value that is not an array`);
      return new ScriptValueHandle(this.ctx, this.read(key));
    }

    if (!this.hasProperty(key) && invariant(this.isObject(), 'ScriptValueHandle', `getChild('${key}') on a primitive value`)) {
      const created = vm.newObject();
      try {
        vm.setProp(this.value, key, created);
      } finally {
        created.dispose();
      }
    }
    return new ScriptValueHandle(this.ctx, this.read(key));
  }

  /** `name in value`, including inherited properties */
  hasProperty(name: string): boolean {
    try {
      const value = this.value;
      return this.ctx.guarded(() => this.ctx.intrinsics.has(value, name));
    } catch (error) {
      log.caught(`hasProperty('${name}') failed`, error);
      return false;
    }
  }

  setProperty(key: string | number, value: HostValue): void {
    const { vm } = this.ctx;
    const handle = toEngine(this.ctx, value);
    try {
      vm.setProp(this.value, key, handle);
    } finally {
      handle.dispose();
    }
  }

  /** Host copy of the value; a bound object returns its own DynamicObject */
  get(): HostValue {
    const binding = findBinding(this.ctx, this.value);
    if (binding) return binding.object;
    const value = this.value;
    return valueOr(this.ctx.guarded(() => toHost(this.ctx, value)), undefined);
  }

  /** Call method `name` with this value as receiver */
  invokeMethod(name: string, args: readonly HostValue[] = []): Result<HostValue> {
    const { vm } = this.ctx;

    if (!this.hasProperty(name)) {
      invariant(false, 'ScriptValueHandle', `invokeMethod('${name}'): no such property`);
      return fail(`TypeError: ${name} is not a function`);
    }

    let method: QuickJSHandle;
    try {
      method = this.read(name);
    } catch (error) {
      return fail(errorMessage(error));
    }

    try {
      if (vm.typeof(method) !== 'function') {
        return fail(`TypeError: ${name} is not a function`);
      }
      const receiver = this.value;
      return ArgumentBuffer.use(this.ctx, args, handles =>
        this.ctx.guarded(() => settleCall(this.ctx, vm.callFunction(method, receiver, ...handles))),
      );
    } finally {
      method.dispose();
    }
  }

  /**
   * Own enumerable string-keyed properties, in engine order.
   *
   * @throws EngineException when a getter throws
   */
  getProperties(): Map<string, HostValue> {
    const properties = new Map<string, HostValue>();

    const value = this.value;
    let names: string[];
    try {
      names = this.ctx.guarded(() => this.ctx.intrinsics.ownKeys(value));
    } catch (error) {
      log.caught('Property enumeration failed', error);
      return properties;
    }

    for (const name of names) {
      const child = this.getChild(name);
      try {
        properties.set(name, child.get());
      } finally {
        child.dispose();
      }
    }
    return properties;
  }

  isArray(): boolean {
    return this.ctx.intrinsics.isArray(this.value);
  }

  /** Array length; 0 for values that are not arrays */
  getSize(): number {
    if (!invariant(this.isArray(), 'ScriptValueHandle', 'getSize() on a value that is not an array')) {
      return 0;
    }
    const lengthHandle = this.read('length');
    try {
      return this.ctx.vm.getNumber(lengthHandle) >>> 0;
    } finally {
      lengthHandle.dispose();
    }
  }

  /** Property read under the deadline; getter exceptions are thrown */
  private read(key: string | number): QuickJSHandle {
    const value = this.value;
    return this.ctx.guarded(() => this.ctx.intrinsics.read(value, key));
  }

  private isObject(): boolean {
    const type = this.ctx.vm.typeof(this.value);
    return (type === 'object' && this.ctx.intrinsics.objectKind(this.value) !== 'null') || type === 'function';
  }

  private get value(): QuickJSHandle {
    if (!this.alive) {
      throw new Error('ScriptValueHandle used after dispose');
    }
    return this.handle;
  }
}
