/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { QuickJSContext, QuickJSHandle } from 'quickjs-emscripten';
import type { EngineIntrinsics } from './intrinsics.js';

/** Runs `fn` with an execution deadline armed */
export type ExecutionGuard = <T>(fn: () => T) => T;

/**
 * Per-engine state shared by the codec, bindings, handles and cursors.
 *
 * Owns the retained-handle registry: every QuickJS handle that outlives the
 * call that created it is adopted here together with a host owner object.
 * A handle is released exactly once, by release(), by the finalizer when its
 * owner is garbage-collected, or by releaseAll() when the engine shuts down.
 */
export class BridgeContext {
  private readonly retained = new Set<QuickJSHandle>();
  private readonly finalizer = new FinalizationRegistry<readonly QuickJSHandle[]>(
    (handles) => this.releaseHandles(handles),
  );

  constructor(
    readonly vm: QuickJSContext,
    readonly intrinsics: EngineIntrinsics,
    private readonly guard: ExecutionGuard,
  ) {}

  get alive(): boolean {
    return this.vm.alive;
  }

  /** Run script code under the engine's deadline */
  guarded<T>(fn: () => T): T {
    return this.guard(fn);
  }

  /** Keep `handles` alive until `owner` releases them or is collected */
  adopt(owner: object, handles: readonly QuickJSHandle[]): void {
    for (const handle of handles) this.retained.add(handle);
    this.finalizer.register(owner, handles, owner);
  }

  release(owner: object, handles: readonly QuickJSHandle[]): void {
    this.finalizer.unregister(owner);
    this.releaseHandles(handles);
  }

  /** Release everything still retained; called once before the context is disposed */
  releaseAll(): void {
    const handles = [...this.retained];
    this.releaseHandles(handles);
  }

  private releaseHandles(handles: readonly QuickJSHandle[]): void {
    for (const handle of handles) {
      if (!this.retained.delete(handle)) continue;
      if (this.vm.alive && handle.alive) handle.dispose();
    }
  }
}
