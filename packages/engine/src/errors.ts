/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * - syntax: the source text did not parse
 * - runtime: an exception escaped the script
 * - interrupted: the deadline passed or stop() was called
 * - conversion: the result could not be converted to a host value
 */
export type ScriptErrorKind = 'syntax' | 'runtime' | 'interrupted' | 'conversion';

/** Failure reported by a script engine entry point */
export class ScriptError extends Error {
  constructor(
    message: string,
    public readonly kind: ScriptErrorKind,
    public readonly durationMs: number = 0,
  ) {
    super(message);
    this.name = 'ScriptError';
  }
}

/** Classify the text of an engine exception */
export function classifyException(text: string, interrupted: boolean): ScriptErrorKind {
  if (interrupted) return 'interrupted';
  if (text.startsWith('SyntaxError')) return 'syntax';
  return 'runtime';
}

/**
 * An engine exception raised while the host reads or inspects a value
 * (a throwing getter or proxy trap, an interrupt). The message is the
 * described exception, e.g. `Error: boom`.
 */
export class EngineException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineException';
  }
}
