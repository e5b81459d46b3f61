/**
 * Execution dispatcher: route a block to its backend under one deadline and
 * fold the outcome into a RunResult.
 */

import { Logger } from '@margin/shared/Utils/logger.js';
import { BaseError, ValidationError, errorMessage } from '@margin/shared/Types/errors.js';
import { MAX_TIMER_MS, getConfig, type ExecutionConfig } from '../config.js';
import { ExecutionFailureError, SqlUnsupportedError, UnsupportedLanguageError } from '../errors.js';
import type { Block } from '../parser/types.js';
import { runCommand } from './backends/command.js';
import { runReformat } from './backends/reformat.js';
import { runScript } from './backends/script.js';
import { runShell } from './backends/shell.js';
import { ExecutionWindow } from './window.js';
import {
  LANGUAGE_TAGS,
  type BackendKind,
  type BackendOutput,
  type LanguageTable,
  type RunResult,
} from './types.js';

const logger = new Logger('runblock:dispatch');

const BACKEND_KINDS: readonly BackendKind[] = ['shell', 'script', 'reformat', 'command'];

export interface ExecuteOptions {
  /** Whole-dispatch budget; defaults to the configured timeoutMs */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Replaces the built-in tag table */
  languages?: LanguageTable;
}

/**
 * Backend for a tag, compared lower-cased; undefined when nothing matches.
 */
export function resolveBackend(
  language: string,
  languages: LanguageTable = LANGUAGE_TAGS,
): BackendKind | undefined {
  const tag = language.toLowerCase();
  return BACKEND_KINDS.find((kind) => languages[kind].includes(tag));
}

async function runBackend(
  kind: BackendKind,
  block: Block,
  config: ExecutionConfig,
  window: ExecutionWindow,
): Promise<BackendOutput> {
  switch (kind) {
    case 'shell':
      return runShell(block.code, config.shellPath, window);
    case 'script':
      return runScript(block.code, window, { interpreter: config.pythonInterpreter });
    case 'reformat':
      return runReformat(block.code, window);
    case 'command':
      return runCommand(config.sqlCommand ?? '', block.code, window);
    default: {
      const unreachable: never = kind;
      throw new Error(`unhandled backend: ${String(unreachable)}`);
    }
  }
}

export async function executeBlock(
  block: Block,
  config: ExecutionConfig,
  options: ExecuteOptions = {},
): Promise<RunResult> {
  const language = block.language.toLowerCase();
  const kind = resolveBackend(language, options.languages);
  if (!kind) {
    throw new UnsupportedLanguageError(block.language);
  }
  if (kind === 'command' && !config.sqlCommand?.trim()) {
    throw new SqlUnsupportedError(language);
  }

  const timeoutMs = options.timeoutMs ?? getConfig().timeoutMs;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMER_MS) {
    throw new ValidationError(
      `timeout must be positive and at most ${MAX_TIMER_MS} milliseconds, got ${timeoutMs}`,
      { timeoutMs },
    );
  }

  const window = new ExecutionWindow(timeoutMs, options.signal);
  const ranAt = new Date(window.startedAt).toISOString();
  logger.debug(`dispatching ${language} block to ${kind}`, {
    start: block.start,
    end: block.end,
    timeoutMs: window.timeoutMs,
  });

  let result: BackendOutput;
  try {
    result = await runBackend(kind, block, config, window);
  } catch (err) {
    if (err instanceof BaseError) throw err;
    throw new ExecutionFailureError(`${kind} backend failed: ${errorMessage(err)}`, err);
  }

  return {
    language,
    output: result.output,
    exit_code: result.exitCode,
    ran_at: ranAt,
    block_end: block.end,
  };
}
