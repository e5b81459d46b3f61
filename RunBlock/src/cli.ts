/**
 * runblock command line.
 *
 *   runblock run-block --file <path> [--cursor <n>] [--python <bin>]
 *                      [--shell <path>] [--sql-cmd <cmd>] [--timeout-ms <n>]
 *   runblock history [--limit <n>]
 *   runblock version
 *
 * Results and failures are printed to stdout as a StandardResponse envelope.
 * Exit codes: 0 ran (whatever the block's own status), 1 failed, 2 usage.
 */

import { parseArgs } from 'node:util';
import { createErrorFromException, createSuccess } from '@margin/shared/Types/StandardResponse.js';
import { ConfigurationError, errorMessage } from '@margin/shared/Types/errors.js';
import { Logger } from '@margin/shared/Utils/logger.js';
import { MAX_TIMER_MS, getConfig, getExecutionConfigFromEnv, type ExecutionConfig } from './config.js';
import { readHistory } from './logging/history.js';
import { runBlock } from './runblock.js';

const logger = new Logger('runblock:cli');

export const VERSION = '0.3.0';

export const USAGE = [
  'usage: runblock run-block --file <path> [--cursor <n>] [--python <bin>] [--shell <path>] [--sql-cmd <cmd>] [--timeout-ms <n>]',
  '       runblock history [--limit <n>]',
  '       runblock version',
].join('\n');

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Aborting it cancels a running block */
  signal?: AbortSignal;
}

const RUN_BLOCK_FLAGS = {
  file: { type: 'string' },
  cursor: { type: 'string' },
  python: { type: 'string' },
  shell: { type: 'string' },
  'sql-cmd': { type: 'string' },
  'timeout-ms': { type: 'string' },
} as const;

const HISTORY_FLAGS = {
  limit: { type: 'string' },
} as const;

function parseRunBlockFlags(args: string[]) {
  return parseArgs({ args, options: RUN_BLOCK_FLAGS, strict: true, allowPositionals: false }).values;
}

function parseHistoryFlags(args: string[]) {
  return parseArgs({ args, options: HISTORY_FLAGS, strict: true, allowPositionals: false }).values;
}

/** Digits only; undefined for anything else. */
function parseCount(value: string): number | undefined {
  return /^\d+$/.test(value) ? Number(value) : undefined;
}

function printEnvelope(io: CliIO, envelope: unknown): void {
  io.stdout(JSON.stringify(envelope, null, 2) + '\n');
}

function usageError(io: CliIO, message: string): number {
  io.stderr(`${message}\n${USAGE}\n`);
  return 2;
}

async function handleRunBlock(args: string[], io: CliIO): Promise<number> {
  let flags: ReturnType<typeof parseRunBlockFlags>;
  try {
    flags = parseRunBlockFlags(args);
  } catch (err) {
    return usageError(io, errorMessage(err));
  }

  if (!flags.file) return usageError(io, '--file required');
  const cursorFlag = flags.cursor ?? '0';
  const cursor = parseCount(cursorFlag);
  if (cursor === undefined) return usageError(io, `invalid --cursor: ${cursorFlag}`);

  const timeoutFlag = flags['timeout-ms'];
  let timeoutMs: number | undefined;
  if (timeoutFlag !== undefined) {
    timeoutMs = parseCount(timeoutFlag);
    if (!timeoutMs || timeoutMs > MAX_TIMER_MS) return usageError(io, `invalid --timeout-ms: ${timeoutFlag}`);
  }

  const fromEnv = getExecutionConfigFromEnv();
  const config: ExecutionConfig = {
    pythonInterpreter: flags.python ?? fromEnv.pythonInterpreter,
    shellPath: flags.shell ?? fromEnv.shellPath,
    sqlCommand: flags['sql-cmd'] ?? fromEnv.sqlCommand,
  };

  try {
    const result = await runBlock(flags.file, cursor, config, { signal: io.signal, timeoutMs });
    printEnvelope(io, createSuccess(result));
    return 0;
  } catch (err) {
    logger.error('run-block failed', err);
    printEnvelope(io, createErrorFromException(err));
    return 1;
  }
}

async function handleHistory(args: string[], io: CliIO): Promise<number> {
  let flags: ReturnType<typeof parseHistoryFlags>;
  try {
    flags = parseHistoryFlags(args);
  } catch (err) {
    return usageError(io, errorMessage(err));
  }
  const limitFlag = flags.limit ?? '20';
  const limit = parseCount(limitFlag);
  if (!limit) return usageError(io, `invalid --limit: ${limitFlag}`);

  try {
    const { historyFile } = getConfig();
    if (!historyFile) {
      throw new ConfigurationError('run history is disabled; set RUNBLOCK_HISTORY_FILE');
    }
    const entries = await readHistory(limit, historyFile);
    printEnvelope(io, createSuccess({ entries }));
    return 0;
  } catch (err) {
    printEnvelope(io, createErrorFromException(err));
    return 1;
  }
}

export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  const [command, ...rest] = argv;
  switch (command) {
    case undefined:
    case 'version':
    case '--version':
    case '-v':
      printEnvelope(io, createSuccess({ version: VERSION }));
      return 0;
    case 'run-block':
      return handleRunBlock(rest, io);
    case 'history':
      return handleHistory(rest, io);
    default:
      return usageError(io, `unknown subcommand: ${command}`);
  }
}
