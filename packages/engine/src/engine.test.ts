/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { once } from 'node:events';
import { Worker } from 'node:worker_threads';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DynamicObject } from '@quickbridge/values';
import { ScriptEngine, createScriptEngine } from './engine.js';
import type { ScriptErrorKind } from './errors.js';

/** Waits until the engine arms its deadline, then expires it */
const STOP_WORKER_SOURCE = `
const { workerData } = require('node:worker_threads');
const cell = new BigInt64Array(workerData);
const never = BigInt(Number.MAX_SAFE_INTEGER);
while (Atomics.load(cell, 0) === never) {}
Atomics.store(cell, 0, BigInt(Date.now()));
`;

describe('ScriptEngine', () => {
  let engine: ScriptEngine;

  beforeEach(async () => {
    vi.stubEnv('QUICKBRIDGE_DEBUG', '');
    engine = await createScriptEngine();
  });

  afterEach(() => {
    engine.dispose();
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  describe('lifecycle', () => {
    it('throws when used before init()', () => {
      const fresh = new ScriptEngine();
      expect(() => fresh.evaluate('1')).toThrow('Script engine not initialized. Call init() first.');
    });

    it('throws when used after dispose()', () => {
      engine.dispose();
      expect(() => engine.evaluate('1')).toThrow('Script engine has been disposed');
    });

    it('starts idle', () => {
      expect(engine.state).toBe('idle');
    });
  });

  describe('evaluate', () => {
    it('increments a registered counter', () => {
      const counter = DynamicObject.fromEntries([['count', 0]]);
      counter.setMethod('increment', ({ thisObject }) => {
        if (thisObject instanceof DynamicObject) {
          thisObject.setProperty('count', Number(thisObject.getProperty('count')) + 1);
        }
        return undefined;
      });
      engine.registerNativeObject('obj', counter);

      const result = engine.evaluate('obj.increment(); obj.increment(); obj.count');

      expect(result.error).toBeNull();
      expect(result.value).toBe(2);
    });

    it('returns converted arrays', () => {
      expect(engine.evaluate('[1, 2, 3].map(x => x * 2)').value).toEqual([2, 4, 6]);
    });

    it('returns undefined for statements without a value', () => {
      const result = engine.evaluate('var unused = 1;');
      expect(result.error).toBeNull();
      expect(result.value).toBeUndefined();
    });

    it('reports syntax errors', () => {
      const result = engine.evaluate('let = ;');
      expect(result.value).toBeUndefined();
      expect(result.error?.kind).toBe('syntax');
      expect(result.error?.message.startsWith('SyntaxError')).toBe(true);
    });

    it('reports thrown errors', () => {
      const result = engine.evaluate('throw new Error("boom")');
      expect(result.error?.kind).toBe('runtime');
      expect(result.error?.message).toBe('Error: boom');
    });

    it('reports thrown plain objects as JSON', () => {
      expect(engine.evaluate('throw { code: 7 }').error?.message).toBe('{"code":7}');
    });

    it('reports host exceptions as script exceptions', () => {
      const host = new DynamicObject();
      host.setMethod('explode', () => {
        throw new Error('host failure');
      });
      engine.registerNativeObject('host', host);

      const result = engine.evaluate('host.explode()');

      expect(result.error?.kind).toBe('runtime');
      expect(result.error?.message).toContain('host failure');
    });

    it('lets scripts catch host exceptions', () => {
      const host = new DynamicObject();
      host.setMethod('explode', () => {
        throw new Error('host failure');
      });
      engine.registerNativeObject('host', host);

      const result = engine.evaluate('try { host.explode(); "not reached" } catch (e) { e.message }');

      expect(result.value).toBe('host failure');
    });
  });

  describe('execute', () => {
    it('returns ok for scripts that complete', () => {
      expect(engine.execute('var done = true;')).toEqual({ ok: true });
      expect(engine.evaluate('done').value).toBe(true);
    });

    it('returns the error for scripts that fail', () => {
      const outcome = engine.execute('undefinedFunction()');
      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error.kind).toBe('runtime');
      expect(outcome.error.message.startsWith('ReferenceError')).toBe(true);
      expect(outcome.error.message).toContain('undefinedFunction');
    });
  });

  describe('callFunction', () => {
    it('calls a global function by name', () => {
      engine.evaluate('function f(x) { return x + 1; }');
      const result = engine.callFunction('f', [5]);
      expect(result.error).toBeNull();
      expect(result.value).toBe(6);
    });

    it('calls with the global object as receiver', () => {
      engine.evaluate('var marker = "global"; function whoami() { return this.marker; }');
      expect(engine.callFunction('whoami').value).toBe('global');
    });

    it('reports a missing function', () => {
      const result = engine.callFunction('nope', []);
      expect(result.error?.kind).toBe('runtime');
      expect(result.error?.message).toBe('TypeError: nope is not a function');
    });

    it('reports the error of a throwing global getter', () => {
      engine.execute('Object.defineProperty(globalThis, "lazy", { get() { throw new Error("not ready"); } }); undefined');

      const result = engine.callFunction('lazy');

      expect(result.error?.kind).toBe('runtime');
      expect(result.error?.message).toBe('Error: not ready');
    });
  });

  describe('interruption', () => {
    it('interrupts a script that runs past its deadline', () => {
      const start = Date.now();
      const outcome = engine.execute('while (true) {}', { timeoutMs: 10 });

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error.kind).toBe('interrupted');
      expect(outcome.error.durationMs).toBeGreaterThanOrEqual(10);
      expect(Date.now() - start).toBeLessThan(5000);
      expect(engine.state).toBe('interrupted');
    });

    it('interrupts a result getter that runs past the deadline', () => {
      const result = engine.evaluate(
        '({ get x() { const t = Date.now(); while (Date.now() - t < 5000) {} return 1; } })',
        { timeoutMs: 50 },
      );

      expect(result.value).toBeUndefined();
      expect(result.error?.kind).toBe('interrupted');
      expect(result.durationMs).toBeLessThan(5000);
      expect(engine.state).toBe('interrupted');
    });

    it('interrupts a global getter read by callFunction', () => {
      engine.execute(`
        Object.defineProperty(globalThis, 'slow', {
          get() { const t = Date.now(); while (Date.now() - t < 5000) {} return () => 1; },
        });
        undefined;
      `);

      const result = engine.callFunction('slow', [], { timeoutMs: 50 });

      expect(result.error?.kind).toBe('interrupted');
      expect(result.durationMs).toBeLessThan(5000);
    });

    it('runs normally again after an interrupt', () => {
      engine.execute('while (true) {}', { timeoutMs: 10 });

      expect(engine.evaluate('1 + 1').value).toBe(2);
      expect(engine.state).toBe('idle');
    });

    it('stops when a host callback calls stop()', () => {
      const host = new DynamicObject();
      host.setMethod('halt', () => {
        engine.stop();
        return undefined;
      });
      engine.registerNativeObject('host', host);

      const result = engine.evaluate('host.halt(); while (true) {}', { timeoutMs: 60_000 });

      expect(result.error?.kind).toBe('interrupted');
      expect(result.durationMs).toBeLessThan(60_000);
    });

    it('stops when another thread expires the stop signal', async () => {
      const worker = new Worker(STOP_WORKER_SOURCE, { eval: true, workerData: engine.stopSignal });
      await once(worker, 'online');

      const result = engine.evaluate('while (true) {}', { timeoutMs: 60_000 });
      await worker.terminate();

      expect(result.error?.kind).toBe('interrupted');
      expect(result.durationMs).toBeLessThan(60_000);
    });

    it('keeps the earlier deadline for nested calls', () => {
      let innerKind: ScriptErrorKind | undefined;
      const host = new DynamicObject();
      host.setMethod('reenter', () => {
        innerKind = engine.evaluate('while (true) {}', { timeoutMs: 60_000 }).error?.kind;
        return undefined;
      });
      engine.registerNativeObject('host', host);

      const result = engine.evaluate('host.reenter(); while (true) {}', { timeoutMs: 20 });

      expect(innerKind).toBe('interrupted');
      expect(result.error?.kind).toBe('interrupted');
      expect(result.durationMs).toBeLessThan(60_000);
    });
  });

  describe('console capture', () => {
    it('collects console output on the result', () => {
      const result = engine.evaluate('console.log("hello", 1); console.warn("careful"); 5');

      expect(result.value).toBe(5);
      expect(result.logs.map(entry => [entry.level, entry.args])).toEqual([
        ['log', ['hello', 1]],
        ['warn', ['careful']],
      ]);
    });

    it('starts every call with an empty log', () => {
      engine.evaluate('console.info("first")');
      expect(engine.evaluate('1').logs).toEqual([]);
    });

    it('keeps logs written before a failure', () => {
      const result = engine.evaluate('console.error("about to fail"); throw new Error("x")');
      expect(result.logs.map(entry => entry.args)).toEqual([['about to fail']]);
    });

    it('leaves console undefined when capture is disabled', async () => {
      const quiet = await createScriptEngine({ captureConsole: false });
      try {
        expect(quiet.evaluate('typeof console').value).toBe('undefined');
      } finally {
        quiet.dispose();
      }
    });
  });

  describe('root object', () => {
    it('lists global variables', () => {
      engine.evaluate('var answer = 42');
      expect(engine.getRootObjectProperties().get('answer')).toBe(42);
    });

    it('hands out independent root handles', () => {
      const root = engine.getRootObject();
      root.setProperty('fromHost', 'yes');
      root.dispose();

      expect(engine.evaluate('fromHost').value).toBe('yes');
      expect(engine.getRootCursor().getChild('fromHost').get()).toBe('yes');
    });
  });
});
