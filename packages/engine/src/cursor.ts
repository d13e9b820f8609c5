/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { fail, invariant } from '@quickbridge/values';
import type { HostValue, Result } from '@quickbridge/values';
import type { ScriptValueHandle } from './handle.js';

/** A property name or an array index */
export type PropertyStep = string | number;

function isIndex(step: number): boolean {
  return Number.isInteger(step) && step >= 0;
}

interface PartialResolution {
  /** Owned by the caller */
  object: ScriptValueHandle;
  /** Undefined for the root cursor */
  property: PropertyStep | undefined;
}

/**
 * A lazily resolved path of property steps rooted at a handle.
 *
 * Cursors are immutable; getChild() returns a new cursor. Nothing is resolved
 * until a value is read, written or invoked, and the path is walked again on
 * every call. The root handle is shared with the cursor's creator, which keeps
 * ownership of it.
 */
export class PropertyCursor {
  constructor(
    private readonly root: ScriptValueHandle,
    readonly path: readonly PropertyStep[] = [],
  ) {}

  getChild(step: PropertyStep): PropertyCursor {
    return new PropertyCursor(this.root, [...this.path, step]);
  }

  /** Value at the end of the path, or undefined if any step is missing */
  get(): HostValue {
    const resolved = this.getFullResolution();
    if (!resolved) return undefined;
    try {
      return resolved.get();
    } finally {
      resolved.dispose();
    }
  }

  /** Write the last step; does nothing for the root or an unresolvable path */
  set(value: HostValue): void {
    const resolved = this.getPartialResolution();
    if (!resolved) {
      invariant(false, 'PropertyCursor', `set(): cannot resolve ${this.describePath()}`);
      return;
    }

    const { object, property } = resolved;
    try {
      if (property === undefined) {
        invariant(false, 'PropertyCursor', 'set(): cannot set the root object');
        return;
      }
      object.setProperty(property, value);
    } finally {
      object.dispose();
    }
  }

  /**
   * Handle for the object at the end of the path, created as an empty object
   * when the last step is a missing name. The caller owns the handle.
   */
  getOrCreateObject(): ScriptValueHandle | null {
    const resolved = this.getPartialResolution();
    if (!resolved) {
      invariant(false, 'PropertyCursor', `getOrCreateObject(): cannot resolve ${this.describePath()}`);
      return null;
    }

    const { object, property } = resolved;
    if (property === undefined) return object;

    try {
      if (
        typeof property === 'number' &&
        !invariant(
          isIndex(property) && object.isArray() && property < object.getSize(),
          'PropertyCursor',
          `getOrCreateObject(): index ${property} is out of range`,
        )
      ) {
        return null;
      }
      return object.getChild(property);
    } finally {
      object.dispose();
    }
  }

  /** Call the method named by the last step on the object before it */
  invoke(args: readonly HostValue[] = []): Result<HostValue> {
    const resolved = this.getPartialResolution();
    if (!resolved) {
      invariant(false, 'PropertyCursor', `invoke(): cannot resolve ${this.describePath()}`);
      return fail(`Cannot resolve ${this.describePath()}`);
    }

    const { object, property } = resolved;
    try {
      if (typeof property !== 'string') {
        invariant(false, 'PropertyCursor', 'invoke(): the last step must be a method name');
        return fail('The last step of an invoked path must be a method name');
      }
      return object.invokeMethod(property, args);
    } finally {
      object.dispose();
    }
  }

  /** True when every step but the last resolves */
  isValid(): boolean {
    const resolved = this.getPartialResolution();
    if (!resolved) return false;
    resolved.object.dispose();
    return true;
  }

  isArray(): boolean {
    const resolved = this.getFullResolution();
    if (!resolved) return false;
    try {
      return resolved.isArray();
    } finally {
      resolved.dispose();
    }
  }

  // ── resolution ───────────────────────────────────────────

  private getPartialResolution(): PartialResolution | null {
    let object = this.root.clone();

    for (let i = 0; i < this.path.length - 1; i++) {
      const next = PropertyCursor.resolve(object, this.path[i]);
      object.dispose();
      if (!next) return null;
      object = next;
    }

    return {
      object,
      property: this.path.length > 0 ? this.path[this.path.length - 1] : undefined,
    };
  }

  private getFullResolution(): ScriptValueHandle | null {
    const resolved = this.getPartialResolution();
    if (!resolved) return null;
    if (resolved.property === undefined) return resolved.object;

    try {
      return PropertyCursor.resolve(resolved.object, resolved.property);
    } finally {
      resolved.object.dispose();
    }
  }

  /** One step; null when the index is not a valid array index or the name is absent */
  private static resolve(object: ScriptValueHandle, step: PropertyStep): ScriptValueHandle | null {
    if (typeof step === 'number') {
      if (!isIndex(step) || !object.isArray()) return null;
      if (step >= object.getSize()) return null;
      return object.getChild(step);
    }

    if (!object.hasProperty(step)) return null;
    return object.getChild(step);
  }

  private describePath(): string {
    return this.path.map(step => (typeof step === 'number' ? `[${step}]` : `.${step}`)).join('') || '<root>';
  }
}
