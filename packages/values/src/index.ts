/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @quickbridge/values: the host side of the script engine bridge
 *
 * Dynamic host values, ordered objects with methods, result values,
 * component logging and consistency checks.
 *
 * @example
 * ```ts
 * import { DynamicObject } from '@quickbridge/values';
 *
 * const counter = DynamicObject.fromEntries([['count', 0]]);
 * counter.setMethod('increment', ({ thisObject }) => {
 *   if (thisObject instanceof DynamicObject) {
 *     thisObject.setProperty('count', Number(thisObject.getProperty('count')) + 1);
 *   }
 *   return undefined;
 * });
 * ```
 */

export type { HostValue, NativeFunction, NativeFunctionArgs } from './host-value.js';
export {
  isNativeFunction,
  isHostArray,
  isInt32,
  nativeArgs,
  describeHostValue,
} from './host-value.js';

export { DynamicObject, isDynamicObject } from './dynamic-object.js';

export type { Result } from './result.js';
export { ok, fail, valueOr, errorMessage } from './result.js';

export type { LogLevel, LogContext, Logger } from './logger.js';
export { createLogger, isDebugEnabled } from './logger.js';

export { invariant, InvariantError } from './invariant.js';
