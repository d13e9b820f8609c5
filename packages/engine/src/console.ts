/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { createLogger } from '@quickbridge/values';
import type { BridgeContext } from './context.js';
import type { LogEntry } from './types.js';
import { newEngineFunction } from './function-bridge.js';

const log = createLogger('Console');

const LEVELS = ['log', 'info', 'warn', 'error'] as const;

/**
 * Install `console.log / info / warn / error` in the engine's global scope.
 * Arguments are converted to host values and handed to `sink`.
 */
export function installConsole(ctx: BridgeContext, sink: (entry: LogEntry) => void): void {
  const { vm } = ctx;
  const consoleHandle = vm.newObject();

  try {
    for (const level of LEVELS) {
      const fn = newEngineFunction(ctx, ({ arguments: args }) => {
        const entry: LogEntry = { level, args: [...args], timestamp: Date.now() };
        log.debug(`console.${level}`, entry.args);
        sink(entry);
        return undefined;
      }, { name: level, convertReceiver: false });
      vm.setProp(consoleHandle, level, fn);
      fn.dispose();
    }

    vm.setProp(vm.global, 'console', consoleHandle);
  } finally {
    consoleHandle.dispose();
  }
}
