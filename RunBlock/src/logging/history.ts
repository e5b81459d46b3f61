/**
 * Run history: one JSONL line per completed run, when RUNBLOCK_HISTORY_FILE is set.
 */

import { JsonlLogger, createTimestamp, type BaseLogEntry } from '@margin/shared/Logging/jsonl.js';
import { Logger } from '@margin/shared/Utils/logger.js';
import { getConfig } from '../config.js';
import type { RunResult } from '../executor/types.js';

const logger = new Logger('runblock:history');

export interface RunHistoryEntry extends BaseLogEntry {
  run_id: string;
  file: string;
  language: string;
  exit_code: number;
  duration_ms: number;
  block_start: number;
  block_end: number;
  output_chars: number;
}

export function isRunHistoryEntry(value: unknown): value is RunHistoryEntry {
  if (typeof value !== 'object' || value === null) return false;
  const entry: Record<string, unknown> = { ...value };
  return (
    typeof entry.timestamp === 'string' &&
    typeof entry.run_id === 'string' &&
    typeof entry.file === 'string' &&
    typeof entry.language === 'string' &&
    typeof entry.exit_code === 'number' &&
    typeof entry.duration_ms === 'number' &&
    typeof entry.block_start === 'number' &&
    typeof entry.block_end === 'number' &&
    typeof entry.output_chars === 'number'
  );
}

function historyLog(path: string | undefined = getConfig().historyFile): JsonlLogger<RunHistoryEntry> | null {
  return path ? new JsonlLogger<RunHistoryEntry>(path, isRunHistoryEntry) : null;
}

export interface RecordRunInput {
  runId: string;
  file: string;
  blockStart: number;
  durationMs: number;
  result: RunResult;
}

/**
 * Append a run to the history file. A failed write is logged; the run it
 * describes has already succeeded.
 */
export async function recordRun(input: RecordRunInput, path?: string): Promise<void> {
  const log = historyLog(path);
  if (!log) return;

  try {
    await log.write({
      timestamp: createTimestamp(),
      run_id: input.runId,
      file: input.file,
      language: input.result.language,
      exit_code: input.result.exit_code,
      duration_ms: input.durationMs,
      block_start: input.blockStart,
      block_end: input.result.block_end,
      output_chars: input.result.output.length,
    });
  } catch (err) {
    logger.error(`Failed to write run history to ${log.getPath()}`, err);
  }
}

/** Newest first. Empty when history is not configured. */
export async function readHistory(limit = 20, path?: string): Promise<RunHistoryEntry[]> {
  const log = historyLog(path);
  if (!log) return [];
  return log.read({ limit });
}
