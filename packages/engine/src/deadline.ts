/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Execution deadline shared between the engine thread and any thread that
 * wants to stop it.
 *
 * Layout of the shared buffer: one BigInt64 slot holding the deadline as
 * milliseconds since the Unix epoch (Date.now() scale). Writers use
 * Atomics.store; the interrupt poll uses Atomics.load. A worker that only has
 * the buffer stops the engine with:
 *
 *   Atomics.store(new BigInt64Array(buffer), 0, BigInt(Date.now()))
 */

const SLOT = 0;
const NEVER = BigInt(Number.MAX_SAFE_INTEGER);

function toMillis(value: number): bigint {
  if (!Number.isFinite(value) || value >= Number.MAX_SAFE_INTEGER) return NEVER;
  return BigInt(Math.floor(value));
}

export class ExecutionDeadline {
  private readonly cell: BigInt64Array;

  constructor(
    readonly buffer: SharedArrayBuffer = new SharedArrayBuffer(BigInt64Array.BYTES_PER_ELEMENT),
  ) {
    this.cell = new BigInt64Array(buffer, 0, 1);
    if (Atomics.load(this.cell, SLOT) === 0n) {
      Atomics.store(this.cell, SLOT, NEVER);
    }
  }

  /** Expire the deadline held in `buffer` (usable from any thread) */
  static expire(buffer: SharedArrayBuffer, now: number = Date.now()): void {
    Atomics.store(new BigInt64Array(buffer, 0, 1), SLOT, toMillis(now));
  }

  /** Deadline in milliseconds since the epoch */
  get value(): number {
    return Number(Atomics.load(this.cell, SLOT));
  }

  arm(timeoutMs: number, now: number = Date.now()): void {
    Atomics.store(this.cell, SLOT, toMillis(now + Math.max(0, timeoutMs)));
  }

  /** Move the deadline earlier, never later; a concurrent expire() is kept */
  tighten(timeoutMs: number, now: number = Date.now()): void {
    const candidate = toMillis(now + Math.max(0, timeoutMs));
    let current = Atomics.load(this.cell, SLOT);
    while (candidate < current) {
      const previous = Atomics.compareExchange(this.cell, SLOT, current, candidate);
      if (previous === current) return;
      current = previous;
    }
  }

  expire(now: number = Date.now()): void {
    Atomics.store(this.cell, SLOT, toMillis(now));
  }

  hasPassed(now: number = Date.now()): boolean {
    return toMillis(now) >= Atomics.load(this.cell, SLOT);
  }
}
