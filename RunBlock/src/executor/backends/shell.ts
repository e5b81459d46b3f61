/**
 * Shell backend: run the block as an inline command through the first shell
 * that exists on this host.
 */

import { win32 } from 'node:path';
import { Logger } from '@margin/shared/Utils/logger.js';
import { getConfig } from '../../config.js';
import { NoShellFoundError } from '../../errors.js';
import { normalizeOutcome, runProcess } from '../subprocess.js';
import type { ExecutionWindow } from '../window.js';
import type { BackendOutput } from '../types.js';

const logger = new Logger('runblock:shell');

/** One attempt at one candidate. Only `not_found` moves on to the next. */
export type ShellAttempt =
  | { kind: 'not_found'; shell: string }
  | { kind: 'ran'; result: BackendOutput }
  | { kind: 'launch_error'; result: BackendOutput };

/**
 * Ordered, de-duplicated shells to try: configured, bash, sh, then the
 * Windows extras on Windows.
 */
export function shellCandidates(
  configured: string | undefined,
  platform: NodeJS.Platform = process.platform,
  windowsShells: readonly string[] = getConfig().windowsShells,
): string[] {
  const raw = [configured ?? '', 'bash', 'sh'];
  if (platform === 'win32') raw.push(...windowsShells);

  const seen = new Set<string>();
  const candidates: string[] = [];
  for (const entry of raw) {
    const shell = entry.trim();
    if (!shell || seen.has(shell)) continue;
    seen.add(shell);
    candidates.push(shell);
  }
  return candidates;
}

/**
 * Argument style by shell family, matched on the lower-cased basename.
 */
export function shellInvocation(shell: string, code: string): { command: string; args: string[] } {
  switch (win32.basename(shell).toLowerCase()) {
    case 'wsl.exe':
    case 'wsl':
      return { command: shell, args: ['bash', '-lc', code] };
    case 'cmd.exe':
    case 'cmd':
      return { command: shell, args: ['/C', code] };
    default:
      return { command: shell, args: ['-lc', code] };
  }
}

export async function attemptShell(
  shell: string,
  code: string,
  window: ExecutionWindow,
): Promise<ShellAttempt> {
  const { command, args } = shellInvocation(shell, code);
  const outcome = await runProcess({ command, args, window });
  switch (outcome.status) {
    case 'not_found':
      return { kind: 'not_found', shell };
    case 'launch_error':
      return { kind: 'launch_error', result: normalizeOutcome(outcome, window) };
    default:
      return { kind: 'ran', result: normalizeOutcome(outcome, window) };
  }
}

export async function runShell(
  code: string,
  configuredShell: string | undefined,
  window: ExecutionWindow,
  candidates: readonly string[] = shellCandidates(configuredShell),
): Promise<BackendOutput> {
  for (const shell of candidates) {
    const attempt = await attemptShell(shell, code, window);
    if (attempt.kind === 'not_found') {
      logger.debug(`shell not found, trying next: ${shell}`);
      continue;
    }
    if (attempt.kind === 'launch_error') {
      logger.warn(`could not launch ${shell}`, { output: attempt.result.output });
    }
    return attempt.result;
  }
  throw new NoShellFoundError(candidates);
}
