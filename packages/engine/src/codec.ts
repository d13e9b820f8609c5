/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * ValueCodec: conversion between host values and QuickJS handles.
 *
 * toEngine never fails. toHost reports engine exceptions raised while reading
 * the value (throwing getters, proxies, interrupts) as a failed Result.
 *
 * Handle ownership: toEngine returns a handle the caller must dispose;
 * toHost only reads the handle it is given.
 */

import type { QuickJSHandle } from 'quickjs-emscripten';
import {
  DynamicObject,
  createLogger,
  errorMessage,
  fail,
  ok,
  valueOr,
} from '@quickbridge/values';
import type { HostValue, Result } from '@quickbridge/values';
import type { BridgeContext } from './context.js';
import type { EngineCallResult } from './types.js';
import { newEngineFunction, wrapEngineFunction } from './function-bridge.js';
import { findBinding } from './binding.js';

const log = createLogger('ValueCodec');

/** Deepest engine value graph toHost will follow */
export const MAX_CONVERSION_DEPTH = 256;

// ============================================================================
// Host → engine
// ============================================================================

export function toEngine(ctx: BridgeContext, value: HostValue): QuickJSHandle {
  return toEngineValue(ctx, value, new Set());
}

function toEngineValue(ctx: BridgeContext, value: HostValue, ancestors: Set<object>): QuickJSHandle {
  const { vm } = ctx;

  if (value === null) return vm.null;
  if (value === undefined) return vm.undefined;
  if (typeof value === 'number') return vm.newNumber(value);
  // 64-bit integers become engine numbers, exact up to 2^53
  if (typeof value === 'bigint') return vm.newNumber(Number(value));
  if (typeof value === 'boolean') return value ? vm.true : vm.false;
  if (typeof value === 'string') return ctx.intrinsics.newString(value);
  if (typeof value === 'function') return newEngineFunction(ctx, value);

  if (ancestors.has(value)) {
    log.warn('Cyclic host value; back reference converted to null', { operation: 'toEngine' });
    return vm.null;
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      const arr = vm.newArray();
      try {
        for (let i = 0; i < value.length; i++) {
          const item = toEngineValue(ctx, value[i], ancestors);
          vm.setProp(arr, i, item);
          item.dispose();
        }
      } catch (error) {
        arr.dispose();
        throw error;
      }
      return arr;
    }

    const obj = vm.newObject();
    try {
      for (const [name, property] of value.entries()) {
        const handle = toEngineValue(ctx, property, ancestors);
        vm.setProp(obj, name, handle);
        handle.dispose();
      }
    } catch (error) {
      obj.dispose();
      throw error;
    }
    return obj;
  } finally {
    ancestors.delete(value);
  }
}

// ============================================================================
// Engine → host
// ============================================================================

/**
 * Convert an engine value.
 *
 * @param receiver Object the value was read from; functions are bound to it
 * (the global object when omitted).
 */
export function toHost(ctx: BridgeContext, handle: QuickJSHandle, receiver?: QuickJSHandle): Result<HostValue> {
  try {
    return ok(toHostValue(ctx, handle, receiver, 0));
  } catch (error) {
    log.caught('Conversion failed', error, { operation: 'toHost' });
    return fail(errorMessage(error));
  }
}

/** toHost, with failures mapped to undefined */
export function toHostOrUndefined(ctx: BridgeContext, handle: QuickJSHandle, receiver?: QuickJSHandle): HostValue {
  return valueOr(toHost(ctx, handle, receiver), undefined);
}

/**
 * Turn an evalCode/callFunction outcome into a host result.
 * Disposes the value or exception handle.
 */
export function settleCall(ctx: BridgeContext, result: EngineCallResult): Result<HostValue> {
  if (result.error) {
    const text = ctx.intrinsics.describe(result.error);
    result.error.dispose();
    return fail(text);
  }
  try {
    return toHost(ctx, result.value);
  } finally {
    result.value.dispose();
  }
}

function toHostValue(
  ctx: BridgeContext,
  handle: QuickJSHandle,
  receiver: QuickJSHandle | undefined,
  depth: number,
): HostValue {
  if (depth > MAX_CONVERSION_DEPTH) {
    throw new Error(`Value graph deeper than ${MAX_CONVERSION_DEPTH} levels (cyclic value?)`);
  }

  const { vm, intrinsics } = ctx;

  switch (vm.typeof(handle)) {
    case 'undefined':
      return undefined;
    case 'number':
      return vm.getNumber(handle);
    case 'bigint':
      return vm.getBigInt(handle);
    case 'boolean':
      return vm.dump(handle) === true;
    case 'string':
      return intrinsics.getString(handle);
    case 'function':
      return wrapEngineFunction(ctx, handle, receiver);
    case 'object':
      break;
    default:
      // symbols have no host counterpart
      return undefined;
  }

  const kind = intrinsics.objectKind(handle);
  if (kind === 'null') return null;
  if (kind === 'array') return arrayToHost(ctx, handle, depth);

  const binding = findBinding(ctx, handle);
  if (binding) return binding.object;

  return objectToHost(ctx, handle, depth);
}

function arrayToHost(ctx: BridgeContext, handle: QuickJSHandle, depth: number): HostValue[] {
  const { vm, intrinsics } = ctx;
  const lengthHandle = intrinsics.read(handle, 'length');
  const length = vm.getNumber(lengthHandle) >>> 0;
  lengthHandle.dispose();

  const items: HostValue[] = [];
  for (let i = 0; i < length; i++) {
    const item = intrinsics.read(handle, i);
    try {
      items.push(toHostValue(ctx, item, handle, depth + 1));
    } finally {
      item.dispose();
    }
  }
  return items;
}

/**
 * Names come from the whole prototype chain; values are always read through
 * the original object so the most-derived definition wins.
 */
function objectToHost(ctx: BridgeContext, handle: QuickJSHandle, depth: number): DynamicObject {
  const { intrinsics } = ctx;

  let names: string[];
  try {
    names = intrinsics.collectKeys(handle);
  } catch (error) {
    log.caught('Property enumeration failed, using an empty object', error, { operation: 'toHost' });
    return new DynamicObject();
  }

  const result = new DynamicObject();
  for (const name of names) {
    if (result.hasProperty(name)) continue;
    const child = intrinsics.read(handle, name);
    try {
      result.setProperty(name, toHostValue(ctx, child, handle, depth + 1));
    } finally {
      child.dispose();
    }
  }
  return result;
}
