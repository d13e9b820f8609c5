/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * NativeFunctionBridge: host callables in the engine, engine functions on the host.
 */

import type { QuickJSHandle } from 'quickjs-emscripten';
import { createLogger, valueOr } from '@quickbridge/values';
import type { HostValue, NativeFunction } from '@quickbridge/values';
import type { BridgeContext } from './context.js';
import { settleCall, toEngine, toHostOrUndefined } from './codec.js';

const log = createLogger('NativeFunctionBridge');

// ============================================================================
// Argument buffer
// ============================================================================

/**
 * Engine copies of a host argument list.
 *
 * Every argument is converted on construction and every handle is released by
 * dispose(). Prefer ArgumentBuffer.use(), which disposes on every exit path.
 */
export class ArgumentBuffer {
  readonly handles: QuickJSHandle[] = [];

  constructor(ctx: BridgeContext, args: readonly HostValue[]) {
    try {
      for (const arg of args) {
        this.handles.push(toEngine(ctx, arg));
      }
    } catch (error) {
      this.dispose();
      throw error;
    }
  }

  static use<T>(ctx: BridgeContext, args: readonly HostValue[], fn: (handles: QuickJSHandle[]) => T): T {
    const buffer = new ArgumentBuffer(ctx, args);
    try {
      return fn(buffer.handles);
    } finally {
      buffer.dispose();
    }
  }

  dispose(): void {
    for (const handle of this.handles) {
      if (handle.alive) handle.dispose();
    }
    this.handles.length = 0;
  }
}

// ============================================================================
// Host → engine
// ============================================================================

export interface EngineFunctionOptions {
  /** Function name seen by scripts */
  name?: string;
  /** Convert `this` into NativeFunctionArgs.thisObject (default: true) */
  convertReceiver?: boolean;
}

/**
 * Wrap a host callable as an engine function.
 *
 * quickjs-emscripten keeps the closure for the lifetime of the context.
 * A call on the global object passes `undefined` as thisObject. A host
 * exception becomes an engine exception.
 */
export function newEngineFunction(
  ctx: BridgeContext,
  callable: NativeFunction,
  options: EngineFunctionOptions = {},
): QuickJSHandle {
  const convertReceiver = options.convertReceiver ?? true;

  return ctx.vm.newFunction(options.name ?? '', function (this: QuickJSHandle, ...args: QuickJSHandle[]) {
    const thisObject = convertReceiver && !ctx.intrinsics.isGlobal(this)
      ? toHostOrUndefined(ctx, this)
      : undefined;
    return toEngine(ctx, callable({ thisObject, arguments: argumentsToHost(ctx, args) }));
  });
}

// ============================================================================
// Engine → host
// ============================================================================

/**
 * Wrap an engine function as a host callable.
 *
 * The function and its receiver stay retained until the returned callable is
 * garbage-collected or the engine is disposed. The callable ignores
 * thisObject and always calls with the captured receiver.
 */
export function wrapEngineFunction(
  ctx: BridgeContext,
  fn: QuickJSHandle,
  receiver?: QuickJSHandle,
): NativeFunction {
  const fnHandle = fn.dup();
  const self = (receiver ?? ctx.vm.global).dup();

  const callable: NativeFunction = (args) => {
    if (!ctx.alive) {
      log.warn('Engine disposed, call ignored', { operation: 'call' });
      return undefined;
    }
    const settled = ArgumentBuffer.use(ctx, args.arguments, handles =>
      ctx.guarded(() => settleCall(ctx, ctx.vm.callFunction(fnHandle, self, ...handles))),
    );
    if (!settled.ok) {
      log.debug('Engine function failed', settled.error, { operation: 'call' });
    }
    return valueOr(settled, undefined);
  };

  ctx.adopt(callable, [fnHandle, self]);
  return callable;
}

/** Convert a host argument list read from engine callback arguments */
export function argumentsToHost(ctx: BridgeContext, args: readonly QuickJSHandle[]): HostValue[] {
  return args.map(arg => toHostOrUndefined(ctx, arg));
}
