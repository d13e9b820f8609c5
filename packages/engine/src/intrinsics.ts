/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Intrinsics: engine-side helpers captured before any user script runs.
 *
 * The bridge needs a few operations the QuickJS handle API does not offer
 * directly (own-key enumeration, prototype walks, array tests, `in` tests).
 * They are evaluated once per context from BOOTSTRAP_SOURCE, which keeps its
 * own references to Object.keys and friends, so later changes user code makes
 * to the global builtins do not reach the bridge.
 */

import type { QuickJSContext, QuickJSHandle } from 'quickjs-emscripten';
import { EngineException } from './errors.js';
import type { EngineCallResult } from './types.js';

const NUL = '\u0000';
const UNKNOWN_ERROR = 'Unknown script error';

const BOOTSTRAP_SOURCE = `(function () {
  "use strict";
  const keys = Object.keys;
  const create = Object.create;
  const defineProperties = Object.defineProperties;
  const getPrototypeOf = Object.getPrototypeOf;
  const apply = Reflect.apply;
  const isArray = Array.isArray;
  const join = Array.prototype.join;
  const split = String.prototype.split;
  const stringify = JSON.stringify;
  const toText = String;
  const ErrorType = Error;
  const bound = new WeakMap();
  const boundGet = WeakMap.prototype.get;
  const boundSet = WeakMap.prototype.set;
  const root = globalThis;
  const isObject = (o) => o !== null && (typeof o === "object" || typeof o === "function");

  return {
    collectKeys(o) {
      const names = [];
      for (let level = o; isObject(level); level = getPrototypeOf(level)) {
        const own = keys(level);
        for (let i = 0; i < own.length; i++) names[names.length] = own[i];
      }
      return names;
    },
    ownKeys(o) {
      return isObject(o) ? keys(o) : [];
    },
    objectKind(o) {
      if (o === null) return "null";
      return isArray(o) ? "array" : "object";
    },
    isArray(o) {
      return isArray(o);
    },
    has(o, name) {
      return isObject(o) && name in o;
    },
    read(o, key) {
      return o[key];
    },
    markBound(o, id) {
      apply(boundSet, bound, [o, id]);
    },
    bindingTag(o) {
      return isObject(o) ? apply(boundGet, bound, [o]) : undefined;
    },
    defineAccessors(o, names, getters, setters) {
      const descriptors = create(null);
      for (let i = 0; i < names.length; i++) {
        descriptors[names[i]] = { __proto__: null, get: getters[i], set: setters[i], enumerable: true, configurable: true };
      }
      defineProperties(o, descriptors);
    },
    isGlobal(o) {
      return o === root;
    },
    joinSegments(parts) {
      return apply(join, parts, ["\\u0000"]);
    },
    splitSegments(text) {
      return apply(split, text, ["\\u0000"]);
    },
    describe(e) {
      try {
        if (e instanceof ErrorType) return toText(e);
        if (isObject(e)) {
          const json = stringify(e);
          return json === undefined ? toText(e) : json;
        }
        return toText(e);
      } catch (_) {
        return "Unknown script error";
      }
    },
  };
})`;

const HELPER_NAMES = [
  'collectKeys',
  'ownKeys',
  'objectKind',
  'isArray',
  'has',
  'read',
  'markBound',
  'bindingTag',
  'defineAccessors',
  'isGlobal',
  'joinSegments',
  'splitSegments',
  'describe',
] as const;

type HelperName = typeof HELPER_NAMES[number];

/** One getter/setter pair for defineAccessors; the caller keeps ownership */
export interface AccessorHandles {
  name: string;
  get: QuickJSHandle;
  set: QuickJSHandle;
}

export type ObjectKind = 'null' | 'array' | 'object';

export class EngineIntrinsics {
  private constructor(
    private readonly vm: QuickJSContext,
    private readonly helpers: ReadonlyMap<HelperName, QuickJSHandle>,
  ) {}

  /** Evaluate the bootstrap source in `vm` and keep the helper functions */
  static install(vm: QuickJSContext): EngineIntrinsics {
    const factory = vm.unwrapResult(vm.evalCode(BOOTSTRAP_SOURCE, 'quickbridge-intrinsics.js'));
    const helpers = new Map<HelperName, QuickJSHandle>();
    try {
      const table = vm.unwrapResult(vm.callFunction(factory, vm.undefined));
      try {
        for (const name of HELPER_NAMES) {
          helpers.set(name, vm.getProp(table, name));
        }
      } finally {
        table.dispose();
      }
    } catch (error) {
      for (const handle of helpers.values()) handle.dispose();
      throw error;
    } finally {
      factory.dispose();
    }
    return new EngineIntrinsics(vm, helpers);
  }

  /** Enumerable string keys of `handle` and of every prototype above it */
  collectKeys(handle: QuickJSHandle): string[] {
    const names = this.call('collectKeys', handle);
    try {
      return this.readStrings(names);
    } finally {
      names.dispose();
    }
  }

  /** Own enumerable string keys */
  ownKeys(handle: QuickJSHandle): string[] {
    const names = this.call('ownKeys', handle);
    try {
      return this.readStrings(names);
    } finally {
      names.dispose();
    }
  }

  /** Only meaningful for handles whose typeof is 'object' */
  objectKind(handle: QuickJSHandle): ObjectKind {
    const kind = this.callForString('objectKind', handle);
    return kind === 'null' || kind === 'array' ? kind : 'object';
  }

  isArray(handle: QuickJSHandle): boolean {
    return this.callForBoolean('isArray', handle);
  }

  /** `name in handle`, false for primitives */
  has(handle: QuickJSHandle, name: string): boolean {
    const key = this.newString(name);
    try {
      return this.callForBoolean('has', handle, key);
    } finally {
      key.dispose();
    }
  }

  /**
   * `handle[key]`, running getters and proxy traps.
   * Throws an EngineException when they raise one.
   */
  read(handle: QuickJSHandle, key: string | number): QuickJSHandle {
    return this.settle(this.tryRead(handle, key));
  }

  /** `handle[key]` with the engine exception returned instead of thrown */
  tryRead(handle: QuickJSHandle, key: string | number): EngineCallResult {
    const keyHandle = typeof key === 'number' ? this.vm.newNumber(key) : this.newString(key);
    try {
      return this.invoke('read', handle, keyHandle);
    } finally {
      keyHandle.dispose();
    }
  }

  /** Attach binding id `id` to `handle`; only bindingTag can see it */
  markBound(handle: QuickJSHandle, id: number): void {
    const idHandle = this.vm.newNumber(id);
    try {
      this.call('markBound', handle, idHandle).dispose();
    } finally {
      idHandle.dispose();
    }
  }

  /** Binding id attached by markBound, if any */
  bindingTag(handle: QuickJSHandle): number | undefined {
    const tag = this.call('bindingTag', handle);
    try {
      return this.vm.typeof(tag) === 'number' ? this.vm.getNumber(tag) : undefined;
    } finally {
      tag.dispose();
    }
  }

  /** Define enumerable, configurable accessors on `handle` in one engine call */
  defineAccessors(handle: QuickJSHandle, accessors: readonly AccessorHandles[]): void {
    const names = this.vm.newArray();
    const getters = this.vm.newArray();
    const setters = this.vm.newArray();
    try {
      accessors.forEach((accessor, index) => {
        const name = this.newString(accessor.name);
        this.vm.setProp(names, index, name);
        name.dispose();
        this.vm.setProp(getters, index, accessor.get);
        this.vm.setProp(setters, index, accessor.set);
      });
      this.call('defineAccessors', handle, names, getters, setters).dispose();
    } finally {
      names.dispose();
      getters.dispose();
      setters.dispose();
    }
  }

  isGlobal(handle: QuickJSHandle): boolean {
    return this.callForBoolean('isGlobal', handle);
  }

  /** newString that keeps embedded NUL characters */
  newString(text: string): QuickJSHandle {
    if (!text.includes(NUL)) return this.vm.newString(text);

    const parts = this.vm.newArray();
    try {
      text.split(NUL).forEach((segment, index) => {
        const part = this.vm.newString(segment);
        this.vm.setProp(parts, index, part);
        part.dispose();
      });
      return this.call('joinSegments', parts);
    } finally {
      parts.dispose();
    }
  }

  /** getString that keeps embedded NUL characters */
  getString(handle: QuickJSHandle): string {
    const text = this.vm.getString(handle);
    if (text.length === this.readLength(handle)) return text;

    const parts = this.call('splitSegments', handle);
    try {
      return this.readStrings(parts).join(NUL);
    } finally {
      parts.dispose();
    }
  }

  /** Human-readable text for a thrown engine value; never throws */
  describe(exception: QuickJSHandle): string {
    let result: EngineCallResult;
    try {
      result = this.invoke('describe', exception);
    } catch {
      return UNKNOWN_ERROR;
    }
    if (result.error) {
      result.error.dispose();
      return UNKNOWN_ERROR;
    }
    try {
      return this.vm.typeof(result.value) === 'string' ? this.vm.getString(result.value) : UNKNOWN_ERROR;
    } finally {
      result.value.dispose();
    }
  }

  dispose(): void {
    for (const handle of this.helpers.values()) {
      if (handle.alive) handle.dispose();
    }
  }

  // ── helpers ───────────────────────────────────────────────

  private invoke(name: HelperName, ...args: QuickJSHandle[]): EngineCallResult {
    const helper = this.helpers.get(name);
    if (!helper) throw new Error(`Missing engine intrinsic: ${name}`);
    return this.vm.callFunction(helper, this.vm.undefined, ...args);
  }

  /** Call a helper; an engine exception is rethrown as an EngineException */
  private call(name: HelperName, ...args: QuickJSHandle[]): QuickJSHandle {
    return this.settle(this.invoke(name, ...args));
  }

  private settle(result: EngineCallResult): QuickJSHandle {
    if (result.error) {
      const text = this.describe(result.error);
      result.error.dispose();
      throw new EngineException(text);
    }
    return result.value;
  }

  private callForBoolean(name: HelperName, ...args: QuickJSHandle[]): boolean {
    const result = this.call(name, ...args);
    try {
      return this.vm.dump(result) === true;
    } finally {
      result.dispose();
    }
  }

  private callForString(name: HelperName, ...args: QuickJSHandle[]): string {
    const result = this.call(name, ...args);
    try {
      return this.vm.getString(result);
    } finally {
      result.dispose();
    }
  }

  private readLength(handle: QuickJSHandle): number {
    const length = this.read(handle, 'length');
    try {
      return this.vm.getNumber(length);
    } finally {
      length.dispose();
    }
  }

  private readStrings(array: QuickJSHandle): string[] {
    const length = this.readLength(array);
    const strings: string[] = [];
    for (let i = 0; i < length; i++) {
      const item = this.read(array, i);
      try {
        strings.push(this.vm.getString(item));
      } finally {
        item.dispose();
      }
    }
    return strings;
  }
}
