/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DynamicObject } from '@quickbridge/values';
import { createScriptEngine, type ScriptEngine } from './engine.js';
import { liveBindingCount } from './binding.js';

function createCounter(): DynamicObject {
  const counter = DynamicObject.fromEntries([['count', 0]]);
  counter.setMethod('increment', ({ thisObject }) => {
    if (!(thisObject instanceof DynamicObject)) return undefined;
    const next = Number(thisObject.getProperty('count')) + 1;
    thisObject.setProperty('count', next);
    return next;
  });
  return counter;
}

describe('NativeObjectBinding', () => {
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

  it('dispatches method calls to the host object', () => {
    const counter = createCounter();
    engine.registerNativeObject('obj', counter);

    const result = engine.evaluate('obj.increment(); obj.increment(); obj.count');

    expect(result.error).toBeNull();
    expect(result.value).toBe(2);
    expect(counter.getProperty('count')).toBe(2);
  });

  it('reads the live host value on every access', () => {
    const counter = createCounter();
    engine.registerNativeObject('obj', counter);

    counter.setProperty('count', 7);
    expect(engine.evaluate('obj.count').value).toBe(7);
  });

  it('writes script assignments into the host object', () => {
    const settings = DynamicObject.fromEntries([['label', 'before']]);
    engine.registerNativeObject('settings', settings);

    engine.evaluate('settings.label = "after"');

    expect(settings.getProperty('label')).toBe('after');
  });

  it('exposes properties in registration order', () => {
    const obj = DynamicObject.fromEntries([['a', 1], ['b', 2], ['c', 3]]);
    engine.registerNativeObject('obj', obj);

    expect(engine.evaluate('Object.keys(obj)').value).toEqual(['a', 'b', 'c']);

    const handle = engine.getRootCursor().getChild('obj').getOrCreateObject();
    expect(handle).not.toBeNull();
    if (!handle) return;
    try {
      expect([...handle.getProperties().keys()]).toEqual(['a', 'b', 'c']);
    } finally {
      handle.dispose();
    }
  });

  it('leaves no binding attribute on the engine object', () => {
    engine.registerNativeObject('obj', DynamicObject.fromEntries([['a', 1]]));

    expect(engine.evaluate('Reflect.ownKeys(obj).map(String)').value).toEqual(['a']);
    expect(engine.evaluate('JSON.stringify(obj)').value).toBe('{"a":1}');
  });

  it('defines properties as enumerable, configurable accessors', () => {
    engine.registerNativeObject('obj', DynamicObject.fromEntries([['a', 1]]));

    expect(engine.evaluate('JSON.stringify(Object.getOwnPropertyDescriptor(obj, "a"))').value)
      .toBe('{"enumerable":true,"configurable":true}');
  });

  it('does not accept objects that imitate a bound object', () => {
    const secret = DynamicObject.fromEntries([['token', 'host-only']]);
    const binding = engine.registerNativeObject('secret', secret);

    const forged = engine.evaluate(`
      WeakMap.prototype.get = function () { return ${binding.id}; };
      Object.defineProperty({ token: 'forged' }, '__quickbridge_binding__', { value: ${binding.id} })
    `);

    expect(forged.value).not.toBe(secret);
    expect(forged.value instanceof DynamicObject && forged.value.getProperty('token')).toBe('forged');
    expect(engine.evaluate('secret').value).toBe(secret);
    expect(engine.evaluate('secret.token').value).toBe('host-only');

    const borrowed = engine.evaluate(`
      Object.getOwnPropertyDescriptor(secret, 'token').get.call({ __quickbridge_binding__: ${binding.id} })
    `);

    expect(borrowed.error?.kind).toBe('runtime');
    expect(borrowed.error?.message).toContain("'token' called on an object that is not its bound host object");
  });

  it('returns the bound host object itself when the engine object is read back', () => {
    const counter = createCounter();
    engine.registerNativeObject('obj', counter);

    expect(engine.evaluate('obj').value).toBe(counter);
    expect(engine.getRootCursor().getChild('obj').get()).toBe(counter);
  });

  it('registers nested objects as bound children', () => {
    const inner = DynamicObject.fromEntries([['x', 1]]);
    const outer = DynamicObject.fromEntries([['inner', inner], ['y', 2]]);
    engine.registerNativeObject('outer', outer);

    engine.evaluate('outer.inner.x = 5');

    expect(inner.getProperty('x')).toBe(5);
    expect(engine.evaluate('outer.inner').value).toBe(inner);
  });

  it('registers under a parent handle', () => {
    engine.evaluate('var app = {}');
    const app = engine.getRootCursor().getChild('app').getOrCreateObject();
    expect(app).not.toBeNull();
    if (!app) return;

    try {
      engine.registerNativeObject('counter', createCounter(), app);
      expect(engine.evaluate('app.counter.increment()').value).toBe(1);
    } finally {
      app.dispose();
    }
  });

  it('rejects a method called on another receiver', () => {
    engine.registerNativeObject('obj', createCounter());

    const result = engine.evaluate('var detached = obj.increment; detached()');

    expect(result.error?.kind).toBe('runtime');
    expect(result.error?.message).toContain("'increment' called on an object that is not its bound host object");
  });

  it('logs the kind of each dispatched value at debug level', () => {
    vi.stubEnv('QUICKBRIDGE_DEBUG', 'true');
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const binding = engine.registerNativeObject('obj', DynamicObject.fromEntries([['a', 1]]));

    engine.evaluate('obj.a = [1, 2]; obj.a');

    expect(debug).toHaveBeenCalledWith(`[NativeObjectBinding] #${binding.id} set 'a': array(2)`);
    expect(debug).toHaveBeenCalledWith(`[NativeObjectBinding] #${binding.id} get 'a': array(2)`);
  });

  it('assigns stable ordinals that never collide', () => {
    const binding = engine.registerNativeObject('obj', DynamicObject.fromEntries([['a', 1], ['b', 2]]));

    expect(binding.getOrdinal('a')).toBe(0);
    expect(binding.getOrdinal('b')).toBe(1);
    expect(binding.getOrdinal('a')).toBe(0);
    expect(binding.getOrdinal('c')).toBe(2);
    expect(binding.getName(1)).toBe('b');
    expect(binding.ordinalCount).toBe(3);
  });

  it('finalizes every binding when the engine is disposed', () => {
    const before = liveBindingCount();
    const inner = new DynamicObject();
    const binding = engine.registerNativeObject('outer', DynamicObject.fromEntries([['inner', inner]]));

    expect(liveBindingCount()).toBe(before + 2);
    expect(binding.isLive).toBe(true);

    engine.dispose();

    expect(liveBindingCount()).toBe(before);
    expect(binding.isLive).toBe(false);
  });
});
