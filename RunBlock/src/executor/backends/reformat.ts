/**
 * Reformat backend: pretty-print a JSON block. Runs in-process.
 */

import { errorMessage } from '@margin/shared/Types/errors.js';
import type { ExecutionWindow } from '../window.js';
import {
  EXIT_CANCELED,
  EXIT_FAILURE,
  EXIT_SUCCESS,
  EXIT_TIMEOUT,
  type BackendOutput,
} from '../types.js';

/** Replacer that emits object keys in sorted order. */
function sortedKeys(_key: string, value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return value;
  const entries: [string, unknown][] = Object.entries(value);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
}

export function formatJson(code: string): string {
  const value: unknown = JSON.parse(code);
  return JSON.stringify(value, sortedKeys, 2);
}

export function runReformat(code: string, window: ExecutionWindow): BackendOutput {
  if (window.cancelled) return { output: window.cancelNotice(), exitCode: EXIT_CANCELED };
  if (window.expired()) return { output: window.timeoutNotice(), exitCode: EXIT_TIMEOUT };

  try {
    return { output: formatJson(code), exitCode: EXIT_SUCCESS };
  } catch (err) {
    return { output: errorMessage(err), exitCode: EXIT_FAILURE };
  }
}
