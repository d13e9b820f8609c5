/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Types for @quickbridge/engine
 */

import type { QuickJSHandle } from 'quickjs-emscripten';
import type { HostValue } from '@quickbridge/values';
import type { ScriptError } from './errors.js';

/** Outcome of a QuickJS evalCode/callFunction */
export type EngineCallResult =
  | { value: QuickJSHandle; error?: undefined }
  | { error: QuickJSHandle };

/** Resource limits for one engine */
export interface EngineLimits {
  /** Maximum heap memory in bytes (default: 64MB) */
  memoryBytes?: number;
  /** Default execution deadline in milliseconds (default: 15000) */
  timeoutMs?: number;
  /** Maximum stack size in bytes (default: 512KB) */
  maxStackBytes?: number;
}

/** Configuration for creating an engine */
export interface EngineConfig {
  /** Resource limits */
  limits?: EngineLimits;
  /** Install a `console` object whose output is collected on each result (default: true) */
  captureConsole?: boolean;
}

/** Per-call options for evaluate, execute and callFunction */
export interface ExecutionOptions {
  /** Deadline for this call in milliseconds (default: limits.timeoutMs) */
  timeoutMs?: number;
  /** File name reported in stack traces */
  filename?: string;
}

export type EngineState = 'idle' | 'executing' | 'interrupted';

/** A captured console entry */
export interface LogEntry {
  level: 'log' | 'info' | 'warn' | 'error';
  args: HostValue[];
  timestamp: number;
}

/** Result of evaluate and callFunction */
export interface EvaluationResult {
  /** Converted return value (undefined on failure) */
  value: HostValue;
  /** Null on success */
  error: ScriptError | null;
  /** Console output captured during the call */
  logs: LogEntry[];
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Result of execute */
export type ExecutionOutcome =
  | { ok: true }
  | { ok: false; error: ScriptError };

/** Default resource limits */
export const DEFAULT_LIMITS: Required<EngineLimits> = {
  memoryBytes: 64 * 1024 * 1024,     // 64 MB
  timeoutMs: 15_000,                   // 15 seconds
  maxStackBytes: 512 * 1024,           // 512 KB
};
