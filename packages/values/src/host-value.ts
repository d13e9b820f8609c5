/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Host value model: the dynamic value type exchanged with the script engine.
 *
 * Mapping of the host variants onto TypeScript:
 * - absent          → null
 * - undefined       → undefined
 * - 32-bit integer  → number (see isInt32)
 * - 64-bit integer  → bigint
 * - double          → number
 * - bool            → boolean
 * - string          → string
 * - sequence        → HostValue[]
 * - object          → DynamicObject
 * - native callable → NativeFunction
 */

import type { DynamicObject } from './dynamic-object.js';

export type HostValue =
  | null
  | undefined
  | number
  | bigint
  | boolean
  | string
  | HostValue[]
  | DynamicObject
  | NativeFunction;

/** Arguments passed to a native callable */
export interface NativeFunctionArgs {
  /** The receiver the callable was invoked on (undefined for the global object) */
  thisObject: HostValue;
  arguments: readonly HostValue[];
}

export type NativeFunction = (args: NativeFunctionArgs) => HostValue;

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

export function isNativeFunction(value: HostValue): value is NativeFunction {
  return typeof value === 'function';
}

export function isHostArray(value: HostValue): value is HostValue[] {
  return Array.isArray(value);
}

/** True for numbers the host would store as a 32-bit integer */
export function isInt32(value: HostValue): value is number {
  return typeof value === 'number'
    && Number.isInteger(value)
    && value >= INT32_MIN
    && value <= INT32_MAX
    && !Object.is(value, -0);
}

/** Build a NativeFunctionArgs record */
export function nativeArgs(thisObject: HostValue, args: readonly HostValue[] = []): NativeFunctionArgs {
  return { thisObject, arguments: args };
}

/** Short type name used in log messages */
export function describeHostValue(value: HostValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return `array(${value.length})`;
  if (typeof value === 'function') return 'function';
  if (typeof value === 'object') return 'object';
  if (typeof value === 'number') return isInt32(value) ? 'int' : 'double';
  return typeof value;
}
