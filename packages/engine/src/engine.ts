/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * ScriptEngine: one QuickJS runtime and context with a host bridge.
 *
 * Architecture:
 * - One WASM module loaded per process (shared across engines)
 * - Each engine creates its own runtime and context
 * - Scripts run synchronously on the calling thread
 * - Memory and stack limits enforced per runtime
 * - CPU limit via an atomic deadline polled by the interrupt handler; stop()
 *   and other threads expire it through the same cell
 */

import {
  getQuickJS,
  type QuickJSContext,
  type QuickJSRuntime,
  type QuickJSWASMModule,
} from 'quickjs-emscripten';
import { createLogger, errorMessage } from '@quickbridge/values';
import type { DynamicObject, HostValue } from '@quickbridge/values';
import type {
  EngineCallResult,
  EngineConfig,
  EngineLimits,
  EngineState,
  EvaluationResult,
  ExecutionOptions,
  ExecutionOutcome,
  LogEntry,
} from './types.js';
import { DEFAULT_LIMITS } from './types.js';
import { ScriptError, classifyException, type ScriptErrorKind } from './errors.js';
import { ExecutionDeadline } from './deadline.js';
import { EngineIntrinsics } from './intrinsics.js';
import { BridgeContext } from './context.js';
import { toHost } from './codec.js';
import { ArgumentBuffer } from './function-bridge.js';
import { NativeObjectBinding, finalizeBindings, registerNativeObject } from './binding.js';
import { ScriptValueHandle } from './handle.js';
import { PropertyCursor } from './cursor.js';
import { installConsole } from './console.js';

const log = createLogger('ScriptEngine');

const INTERRUPTED_MESSAGE = 'InternalError: interrupted';

/** Cached WASM module promise: deduplicates concurrent init calls */
let modulePromise: Promise<QuickJSWASMModule> | null = null;

function getModule(): Promise<QuickJSWASMModule> {
  if (!modulePromise) {
    modulePromise = getQuickJS();
  }
  return modulePromise;
}

type Settled =
  | { ok: true; value: HostValue }
  | { ok: false; text: string; kind: ScriptErrorKind };

interface EngineParts {
  runtime: QuickJSRuntime;
  vm: QuickJSContext;
  intrinsics: EngineIntrinsics;
  bridge: BridgeContext;
  rootObject: ScriptValueHandle;
}

export class ScriptEngine {
  private parts: EngineParts | null = null;
  private disposed = false;
  private readonly limits: Required<EngineLimits>;
  private readonly captureConsole: boolean;
  private readonly deadline = new ExecutionDeadline();
  private readonly logs: LogEntry[] = [];
  private guardDepth = 0;
  private interrupted = false;
  private currentState: EngineState = 'idle';

  constructor(config: EngineConfig = {}) {
    this.limits = { ...DEFAULT_LIMITS, ...config.limits };
    this.captureConsole = config.captureConsole ?? true;
  }

  /** Initialize the engine (loads the WASM module if not cached) */
  async init(): Promise<void> {
    if (this.disposed) throw new Error('Script engine has been disposed');
    if (this.parts) return;

    const module = await getModule();
    const runtime = module.newRuntime();

    runtime.setMemoryLimit(this.limits.memoryBytes);
    runtime.setMaxStackSize(this.limits.maxStackBytes);
    runtime.setInterruptHandler(() => this.shouldInterrupt());

    const vm = runtime.newContext();
    const intrinsics = EngineIntrinsics.install(vm);
    const bridge = new BridgeContext(vm, intrinsics, fn => this.guarded(this.limits.timeoutMs, fn));

    if (this.captureConsole) {
      installConsole(bridge, entry => this.logs.push(entry));
    }

    const rootObject = new ScriptValueHandle(bridge, vm.global.dup());
    this.parts = { runtime, vm, intrinsics, bridge, rootObject };
    log.debug('Engine initialized', this.limits);
  }

  get state(): EngineState {
    return this.currentState;
  }

  /** Buffer holding the execution deadline; expire it from any thread to stop the engine */
  get stopSignal(): SharedArrayBuffer {
    return this.deadline.buffer;
  }

  /** Evaluate `code` as a global script and convert its completion value */
  evaluate(code: string, options: ExecutionOptions = {}): EvaluationResult {
    const { vm } = this.require();
    return this.run(options, () => vm.evalCode(code, options.filename ?? 'script.js'));
  }

  /** Evaluate `code` for its side effects */
  execute(code: string, options: ExecutionOptions = {}): ExecutionOutcome {
    const { error } = this.evaluate(code, options);
    return error ? { ok: false, error } : { ok: true };
  }

  /**
   * Call the global function `name` with the global object as receiver.
   * Looking `name` up runs under the same deadline as the call.
   */
  callFunction(name: string, args: readonly HostValue[] = [], options: ExecutionOptions = {}): EvaluationResult {
    const { vm, bridge, intrinsics } = this.require();

    return this.run(options, () => {
      const lookup = intrinsics.tryRead(vm.global, name);
      if (lookup.error) return lookup;

      const fn = lookup.value;
      try {
        if (vm.typeof(fn) !== 'function') {
          return { error: vm.newError({ name: 'TypeError', message: `${name} is not a function` }) };
        }
        return ArgumentBuffer.use(bridge, args, handles => vm.callFunction(fn, vm.global, ...handles));
      } finally {
        fn.dispose();
      }
    });
  }

  /** Interrupt the running script at its next poll */
  stop(): void {
    this.deadline.expire();
    log.debug('Stop requested');
  }

  /**
   * Expose `object` as property `name` of `parent` (the global object when
   * omitted). The engine object reads and writes `object` live.
   */
  registerNativeObject(name: string, object: DynamicObject, parent?: ScriptValueHandle): NativeObjectBinding {
    const { vm, bridge } = this.require();
    return registerNativeObject(bridge, name, object, parent ? parent.raw : vm.global);
  }

  /** Handle to the global object; the caller owns it */
  getRootObject(): ScriptValueHandle {
    return this.require().rootObject.clone();
  }

  getRootCursor(): PropertyCursor {
    return new PropertyCursor(this.require().rootObject);
  }

  /** Own enumerable properties of the global object */
  getRootObjectProperties(): Map<string, HostValue> {
    return this.require().rootObject.getProperties();
  }

  /** Dispose the engine and free WASM memory */
  dispose(): void {
    const parts = this.parts;
    this.parts = null;
    this.disposed = true;
    if (!parts) return;

    const finalized = finalizeBindings(parts.bridge);
    parts.bridge.releaseAll();
    parts.intrinsics.dispose();
    parts.vm.dispose();
    parts.runtime.dispose();
    log.debug('Engine disposed', { finalizedBindings: finalized });
  }

  // ── execution ────────────────────────────────────────────

  /**
   * Run one engine entry point and settle its outcome. Describing an error and
   * converting the result run under the same deadline as the call.
   */
  private run(options: ExecutionOptions, call: () => EngineCallResult): EvaluationResult {
    const { bridge, intrinsics } = this.require();
    if (this.guardDepth === 0) this.logs.length = 0;

    const start = Date.now();
    let settled: Settled;
    try {
      settled = this.guarded(options.timeoutMs ?? this.limits.timeoutMs, (): Settled => {
        const result = call();
        if (result.error) {
          const text = this.interrupted ? INTERRUPTED_MESSAGE : intrinsics.describe(result.error);
          result.error.dispose();
          return { ok: false, text, kind: classifyException(text, this.interrupted) };
        }

        try {
          const converted = toHost(bridge, result.value);
          if (converted.ok) return converted;
          if (this.interrupted) return { ok: false, text: INTERRUPTED_MESSAGE, kind: 'interrupted' };
          return { ok: false, text: converted.error, kind: 'conversion' };
        } finally {
          result.value.dispose();
        }
      });
    } catch (error) {
      return this.failure(new ScriptError(errorMessage(error), 'runtime', Date.now() - start));
    }

    const durationMs = Date.now() - start;
    if (!settled.ok) {
      return this.failure(new ScriptError(settled.text, settled.kind, durationMs));
    }
    return { value: settled.value, error: null, logs: [...this.logs], durationMs };
  }

  private failure(error: ScriptError): EvaluationResult {
    log.debug(`Script failed (${error.kind})`, error.message);
    return { value: undefined, error, logs: [...this.logs], durationMs: error.durationMs };
  }

  /**
   * Run `fn` with the deadline armed. The outermost call arms it; a nested
   * call (a host callback re-entering the engine) can only move it earlier.
   */
  private guarded<T>(timeoutMs: number, fn: () => T): T {
    if (this.guardDepth === 0) {
      this.interrupted = false;
      this.deadline.arm(timeoutMs);
      this.currentState = 'executing';
    } else {
      this.deadline.tighten(timeoutMs);
    }

    this.guardDepth++;
    try {
      return fn();
    } finally {
      this.guardDepth--;
      if (this.guardDepth === 0) {
        this.currentState = this.interrupted ? 'interrupted' : 'idle';
      }
    }
  }

  /** Interrupt poll; only a guarded call can be interrupted */
  private shouldInterrupt(): boolean {
    if (this.guardDepth === 0 || !this.deadline.hasPassed()) return false;
    if (!this.interrupted) {
      this.interrupted = true;
      this.currentState = 'interrupted';
      log.debug('Execution interrupted');
    }
    return true;
  }

  private require(): EngineParts {
    if (this.disposed) throw new Error('Script engine has been disposed');
    if (!this.parts) throw new Error('Script engine not initialized. Call init() first.');
    return this.parts;
  }
}

/**
 * Create and initialize an engine.
 *
 * Usage:
 *   const engine = await createScriptEngine({ limits: { timeoutMs: 1000 } })
 *   const result = engine.evaluate('[1, 2, 3].map(x => x * 2)')
 *   engine.dispose()
 */
export async function createScriptEngine(config?: EngineConfig): Promise<ScriptEngine> {
  const engine = new ScriptEngine(config);
  await engine.init();
  return engine;
}
