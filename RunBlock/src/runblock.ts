/**
 * runBlock: read a document, find the fenced block under the cursor and run it.
 */

import { readFile } from 'node:fs/promises';
import { ValidationError } from '@margin/shared/Types/errors.js';
import { Logger } from '@margin/shared/Utils/logger.js';
import { parseExecutionConfig } from './config.js';
import { NoBlockFoundError, NoBlockSelectableError } from './errors.js';
import { executeBlock, type ExecuteOptions } from './executor/dispatch.js';
import type { RunResult } from './executor/types.js';
import { recordRun } from './logging/history.js';
import { parseBlocks } from './parser/fences.js';
import { pickBlock } from './parser/select.js';
import type { Block } from './parser/types.js';
import { generateRunId } from './utils/id-generator.js';

const logger = new Logger('runblock');

export type RunOptions = ExecuteOptions;

function assertCursor(cursor: number): void {
  if (!Number.isInteger(cursor) || cursor < 0) {
    throw new ValidationError(`cursor must be a non-negative integer, got ${cursor}`, { cursor });
  }
}

function locateBlock(text: string | Uint8Array, cursor: number): Block {
  const blocks = parseBlocks(text);
  if (blocks.length === 0) {
    throw new NoBlockFoundError();
  }
  const block = pickBlock(blocks, cursor);
  if (!block) {
    throw new NoBlockSelectableError(cursor, blocks.length);
  }
  return block;
}

/**
 * Run the block selected by `cursor` in already-read document text.
 * `config` is validated; blank fields mean backend defaults.
 */
export async function runBlockText(
  text: string | Uint8Array,
  cursor: number,
  config: unknown,
  options: RunOptions = {},
): Promise<RunResult> {
  assertCursor(cursor);
  const executionConfig = parseExecutionConfig(config);
  return executeBlock(locateBlock(text, cursor), executionConfig, options);
}

/**
 * Read `filePath` and run the block under `cursor` (a UTF-8 byte offset).
 * Read errors propagate unchanged.
 */
export async function runBlock(
  filePath: string,
  cursor: number,
  config: unknown,
  options: RunOptions = {},
): Promise<RunResult> {
  assertCursor(cursor);
  const executionConfig = parseExecutionConfig(config);
  const block = locateBlock(await readFile(filePath), cursor);

  const runId = generateRunId();
  const started = Date.now();
  const result = await executeBlock(block, executionConfig, options);
  const durationMs = Date.now() - started;

  logger.info(`${runId} ${result.language} exited ${result.exit_code}`, {
    file: filePath,
    duration_ms: durationMs,
  });
  await recordRun({ runId, file: filePath, blockStart: block.start, durationMs, result });

  return result;
}

export { parseBlocks } from './parser/fences.js';
export { pickBlock } from './parser/select.js';
export { executeBlock, resolveBackend, type ExecuteOptions } from './executor/dispatch.js';
export { ExecutionWindow } from './executor/window.js';
export {
  LANGUAGE_TAGS,
  EXIT_CANCELED,
  EXIT_FAILURE,
  EXIT_TIMEOUT,
  type BackendKind,
  type LanguageTable,
  type RunResult,
} from './executor/types.js';
export type { Block } from './parser/types.js';
export {
  DEFAULT_TIMEOUT_MS,
  MAX_TIMER_MS,
  DEFAULT_WINDOWS_SHELLS,
  DEFAULT_PYTHON_INTERPRETER,
  getConfig,
  resetConfig,
  type ExecutionConfig,
} from './config.js';
export * from './errors.js';
