/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @quickbridge/engine: QuickJS script engine with a live host object bridge
 *
 * Runs JavaScript in a QuickJS-in-WASM context and exchanges values with the
 * host through @quickbridge/values. Host objects registered with
 * registerNativeObject() are read and written live from scripts.
 *
 * @example
 * ```ts
 * import { DynamicObject } from '@quickbridge/values';
 * import { createScriptEngine } from '@quickbridge/engine';
 *
 * const engine = await createScriptEngine({ limits: { timeoutMs: 1000 } });
 * const counter = DynamicObject.fromEntries([['count', 0]]);
 * engine.registerNativeObject('counter', counter);
 * engine.evaluate('counter.count += 1');
 * counter.getProperty('count'); // 1
 * engine.dispose();
 * ```
 */

export { ScriptEngine, createScriptEngine } from './engine.js';
export { ScriptError, EngineException, classifyException } from './errors.js';
export type { ScriptErrorKind } from './errors.js';
export { ExecutionDeadline } from './deadline.js';
export { ScriptValueHandle } from './handle.js';
export { PropertyCursor } from './cursor.js';
export type { PropertyStep } from './cursor.js';
export { NativeObjectBinding, MAX_ORDINAL, liveBindingCount } from './binding.js';
export { ArgumentBuffer } from './function-bridge.js';
export { MAX_CONVERSION_DEPTH } from './codec.js';

export type {
  EngineConfig,
  EngineLimits,
  EngineState,
  EvaluationResult,
  ExecutionOptions,
  ExecutionOutcome,
  LogEntry,
} from './types.js';
export { DEFAULT_LIMITS } from './types.js';
