/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * quickbridge logger: consistent console logging across packages
 *
 * Log levels:
 * - error: Always logged - failures that affect the caller
 * - warn: Always logged - misuse and degraded results
 * - info: Logged when QUICKBRIDGE_DEBUG=true
 * - debug: Logged when QUICKBRIDGE_DEBUG=true
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  /** Component name (e.g., 'ScriptEngine', 'ValueCodec') */
  component: string;
  /** Operation being performed (e.g., 'evaluate', 'toHost') */
  operation?: string;
  /** Additional context data */
  data?: Record<string, unknown>;
}

export function isDebugEnabled(): boolean {
  return typeof process !== 'undefined' && process.env.QUICKBRIDGE_DEBUG === 'true';
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
  }
  return String(error);
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string) {
  return {
    /** Log an error - always visible */
    error(message: string, error?: unknown, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      const text = error !== undefined ? `${prefix} ${message}: ${formatError(error)}` : `${prefix} ${message}`;
      if (ctx?.data !== undefined) {
        console.error(text, ctx.data);
      } else {
        console.error(text);
      }
    },

    /** Log a warning - always visible */
    warn(message: string, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    /** Log info - only visible when QUICKBRIDGE_DEBUG=true */
    info(message: string, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    /** Log debug - only visible when QUICKBRIDGE_DEBUG=true */
    debug(message: string, data?: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (data !== undefined) {
        console.debug(`${prefix} ${message}`, data);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },

    /**
     * Log a caught error that was turned into a result value.
     * Only visible when QUICKBRIDGE_DEBUG=true.
     */
    caught(message: string, error: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      console.debug(`${prefix} ${message} (recovered):`, formatError(error));
    },
  };
}
