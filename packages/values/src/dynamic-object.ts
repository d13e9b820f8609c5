/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { HostValue, NativeFunction, NativeFunctionArgs } from './host-value.js';

/**
 * An ordered set of named host values.
 *
 * Properties keep their insertion order; overwriting an existing property keeps
 * its original position. A property whose value is a NativeFunction is a method.
 */
export class DynamicObject {
  private readonly properties = new Map<string, HostValue>();

  /** Build an object from [name, value] pairs, in order */
  static fromEntries(entries: Iterable<readonly [string, HostValue]>): DynamicObject {
    const object = new DynamicObject();
    for (const [name, value] of entries) {
      object.setProperty(name, value);
    }
    return object;
  }

  get size(): number {
    return this.properties.size;
  }

  /** Returns undefined when the property does not exist */
  getProperty(name: string): HostValue {
    return this.properties.get(name);
  }

  setProperty(name: string, value: HostValue): void {
    this.properties.set(name, value);
  }

  hasProperty(name: string): boolean {
    return this.properties.has(name);
  }

  removeProperty(name: string): boolean {
    return this.properties.delete(name);
  }

  hasMethod(name: string): boolean {
    return typeof this.properties.get(name) === 'function';
  }

  setMethod(name: string, method: NativeFunction): void {
    this.properties.set(name, method);
  }

  /**
   * Call the method stored under `name`.
   * Returns undefined when there is no such method.
   */
  invokeMethod(name: string, args: NativeFunctionArgs): HostValue {
    const method = this.properties.get(name);
    if (typeof method !== 'function') return undefined;
    return method(args);
  }

  getProperties(): ReadonlyMap<string, HostValue> {
    return this.properties;
  }

  entries(): IterableIterator<[string, HostValue]> {
    return this.properties.entries();
  }

  keys(): string[] {
    return [...this.properties.keys()];
  }

  /** Shallow copy: nested objects and arrays stay shared */
  clone(): DynamicObject {
    return DynamicObject.fromEntries(this.properties);
  }
}

export function isDynamicObject(value: HostValue): value is DynamicObject {
  return value instanceof DynamicObject;
}
