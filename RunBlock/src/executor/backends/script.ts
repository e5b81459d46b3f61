/**
 * Script backend: write the block to a temp file and hand its path to an
 * interpreter. The file is removed on every path out.
 */

import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Logger } from '@margin/shared/Utils/logger.js';
import { errorMessage } from '@margin/shared/Types/errors.js';
import { DEFAULT_PYTHON_INTERPRETER, getConfig } from '../../config.js';
import { generateRunId } from '../../utils/id-generator.js';
import { normalizeOutcome, runProcess } from '../subprocess.js';
import type { ExecutionWindow } from '../window.js';
import { EXIT_FAILURE, type BackendOutput } from '../types.js';

const logger = new Logger('runblock:script');

export interface ScriptOptions {
  /** Blank means `python` */
  interpreter?: string;
  /** Script file extension, leading dot included */
  extension?: string;
  /** Defaults to the configured tempDir */
  tempDir?: string;
}

/** A leftover temp file is logged; it never replaces the run's result. */
async function removeScript(scriptPath: string): Promise<void> {
  try {
    await rm(scriptPath, { force: true });
  } catch (err) {
    logger.warn(`could not remove temp script ${scriptPath}`, err);
  }
}

export async function runScript(
  code: string,
  window: ExecutionWindow,
  options: ScriptOptions = {},
): Promise<BackendOutput> {
  const interpreter = options.interpreter?.trim() || DEFAULT_PYTHON_INTERPRETER;
  const scriptPath = join(
    options.tempDir ?? getConfig().tempDir,
    `${generateRunId()}${options.extension ?? '.py'}`,
  );

  try {
    // 'wx' so an existing file is never reused
    await writeFile(scriptPath, code, { encoding: 'utf-8', flag: 'wx' });
    const outcome = await runProcess({ command: interpreter, args: [scriptPath], window });
    return normalizeOutcome(outcome, window);
  } catch (err) {
    logger.warn(`could not prepare script for ${interpreter}`, err);
    return { output: errorMessage(err), exitCode: EXIT_FAILURE };
  } finally {
    await removeScript(scriptPath);
  }
}
