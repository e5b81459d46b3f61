/**
 * External-command backend: run a configured command with the block on stdin.
 */

import { ConfigurationError } from '@margin/shared/Types/errors.js';
import { tokenizeCommand } from '../../utils/tokenize.js';
import { normalizeOutcome, runProcess } from '../subprocess.js';
import type { ExecutionWindow } from '../window.js';
import type { BackendOutput } from '../types.js';

export async function runCommand(
  commandLine: string,
  input: string,
  window: ExecutionWindow,
): Promise<BackendOutput> {
  const [program, ...args] = tokenizeCommand(commandLine);
  if (!program) {
    throw new ConfigurationError('configured command is empty after parsing', { command: commandLine });
  }

  const outcome = await runProcess({ command: program, args, input, window });
  return normalizeOutcome(outcome, window);
}
