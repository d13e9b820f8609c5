/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { createLogger, isDebugEnabled } from './logger.js';

/** Thrown for a broken precondition while QUICKBRIDGE_DEBUG=true */
export class InvariantError extends Error {
  constructor(
    message: string,
    public readonly component: string,
  ) {
    super(`[${component}] ${message}`);
    this.name = 'InvariantError';
  }
}

/**
 * Internal consistency check for programmer errors.
 *
 * Debug runs throw an InvariantError. Otherwise the failure is logged as a
 * warning and the caller continues with its fallback. Returns `condition`.
 */
export function invariant(condition: boolean, component: string, message: string): boolean {
  if (condition) return true;
  if (isDebugEnabled()) {
    throw new InvariantError(message, component);
  }
  createLogger(component).warn(message);
  return false;
}
