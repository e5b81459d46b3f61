/**
 * Child process runner shared by the shell, script and command backends.
 *
 * - stdout and stderr appended to one buffer in arrival order
 * - completion raced against the window's deadline and abort signal
 * - stop: SIGTERM → grace → SIGKILL, sent to the whole process group on POSIX
 * - after a clean exit, output drains for OUTPUT_DRAIN_MS; pipes a background
 *   grandchild still holds are then closed and the child's status stands
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { constants } from 'node:os';
import { Logger } from '@margin/shared/Utils/logger.js';
import { isErrnoException } from '@margin/shared/Types/errors.js';
import { getConfig } from '../config.js';
import { appendNotice, type ExecutionWindow } from './window.js';
import {
  EXIT_CANCELED,
  EXIT_FAILURE,
  EXIT_TIMEOUT,
  type BackendOutput,
  type ProcessOutcome,
} from './types.js';

const logger = new Logger('runblock:process');

/** How long output may keep flowing after the child exits. */
export const OUTPUT_DRAIN_MS = 200;

/** On POSIX the child leads its own group so a stop reaches what it spawned. */
const USE_PROCESS_GROUP = process.platform !== 'win32';

export interface ProcessRequest {
  command: string;
  args: readonly string[];
  window: ExecutionWindow;
  /** Written to stdin, which is then closed. Without it stdin is ignored. */
  input?: string;
  /** Defaults to the configured killGraceMs */
  killGraceMs?: number;
}

type StopReason = 'timed_out' | 'cancelled';

function isSignalName(name: string): name is keyof typeof constants.signals {
  return Object.hasOwn(constants.signals, name);
}

/** Shell convention: 128 + signal number. */
function signalExitCode(signal: NodeJS.Signals | null): number {
  if (signal && isSignalName(signal)) {
    return 128 + constants.signals[signal];
  }
  return EXIT_FAILURE;
}

function launch(request: ProcessRequest): ChildProcess | Error {
  try {
    return spawn(request.command, [...request.args], {
      stdio: [request.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
      detached: USE_PROCESS_GROUP,
      windowsHide: true,
    });
  } catch (err) {
    // spawn throws synchronously for malformed arguments (e.g. NUL bytes)
    return err instanceof Error ? err : new Error(String(err));
  }
}

export function runProcess(request: ProcessRequest): Promise<ProcessOutcome> {
  const { window } = request;
  if (window.cancelled) return Promise.resolve({ status: 'cancelled', output: '' });
  if (window.expired()) return Promise.resolve({ status: 'timed_out', output: '' });

  const graceMs = request.killGraceMs ?? getConfig().killGraceMs;

  return new Promise<ProcessOutcome>((resolve) => {
    const launched = launch(request);
    if (launched instanceof Error) {
      resolve({ status: 'launch_error', output: '', error: launched });
      return;
    }
    const child: ChildProcess = launched;

    const chunks: Buffer[] = [];
    let stopReason: StopReason | null = null;
    let settled = false;
    let killTimer: ReturnType<typeof setTimeout> | null = null;
    let drainTimer: ReturnType<typeof setTimeout> | null = null;
    let exitCode: number | null = null;

    const captured = (): string => Buffer.concat(chunks).toString('utf-8');

    child.stdout?.on('data', (chunk: Buffer) => chunks.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => chunks.push(chunk));

    if (request.input !== undefined && child.stdin) {
      // EPIPE when the child exits without reading everything
      child.stdin.on('error', (err) => logger.debug('stdin closed early', err));
      child.stdin.end(request.input);
    }

    const deadlineTimer = setTimeout(() => stop('timed_out'), window.remainingMs());
    const onAbort = (): void => stop('cancelled');
    window.signal?.addEventListener('abort', onAbort, { once: true });

    function finish(outcome: ProcessOutcome): void {
      if (settled) return;
      settled = true;
      clearTimeout(deadlineTimer);
      if (killTimer) clearTimeout(killTimer);
      if (drainTimer) clearTimeout(drainTimer);
      window.signal?.removeEventListener('abort', onAbort);
      resolve(outcome);
    }

    function sendSignal(signal: NodeJS.Signals): void {
      const pid = child.pid;
      if (pid === undefined) return;
      try {
        if (USE_PROCESS_GROUP) {
          process.kill(-pid, signal);
        } else {
          child.kill(signal);
        }
      } catch (err) {
        // ESRCH once the group is gone
        logger.debug(`could not send ${signal} to ${pid}`, err);
      }
    }

    function releasePipes(): void {
      child.stdout?.destroy();
      child.stderr?.destroy();
    }

    function stop(reason: StopReason): void {
      if (settled || stopReason || exitCode !== null) return;
      stopReason = reason;
      logger.debug(`stopping ${request.command}`, { reason, pid: child.pid });
      sendSignal('SIGTERM');
      killTimer = setTimeout(() => sendSignal('SIGKILL'), graceMs);
    }

    child.on('error', (err) => {
      if (child.pid !== undefined) {
        logger.warn(`process error from ${request.command}`, err);
        return;
      }
      if (isErrnoException(err) && err.code === 'ENOENT') {
        finish({ status: 'not_found', error: err });
      } else {
        finish({ status: 'launch_error', output: captured(), error: err });
      }
    });

    // A detached grandchild may hold the pipes open past the child's exit, so
    // exit never waits on close for longer than the drain delay.
    child.on('exit', (code, signal) => {
      if (stopReason) {
        finish({ status: stopReason, output: captured() });
        releasePipes();
        return;
      }
      // The child ran to completion: its status stands, whatever the deadline does now
      exitCode = code ?? signalExitCode(signal);
      clearTimeout(deadlineTimer);
      window.signal?.removeEventListener('abort', onAbort);
      const status = exitCode;
      drainTimer = setTimeout(() => {
        logger.debug(`output of ${request.command} still open after exit; closing it`);
        finish({ status: 'exited', output: captured(), exitCode: status });
        releasePipes();
      }, OUTPUT_DRAIN_MS);
    });

    child.on('close', (code, signal) => {
      if (stopReason) {
        finish({ status: stopReason, output: captured() });
        return;
      }
      finish({ status: 'exited', output: captured(), exitCode: exitCode ?? code ?? signalExitCode(signal) });
    });
  });
}

/**
 * Collapse a process outcome into the output/exit-code pair every backend returns.
 */
export function normalizeOutcome(outcome: ProcessOutcome, window: ExecutionWindow): BackendOutput {
  switch (outcome.status) {
    case 'exited':
      return { output: outcome.output, exitCode: outcome.exitCode };
    case 'timed_out':
      return { output: appendNotice(outcome.output, window.timeoutNotice()), exitCode: EXIT_TIMEOUT };
    case 'cancelled':
      return { output: appendNotice(outcome.output, window.cancelNotice()), exitCode: EXIT_CANCELED };
    case 'not_found':
      return { output: outcome.error.message, exitCode: EXIT_FAILURE };
    case 'launch_error':
      return { output: appendNotice(outcome.output, outcome.error.message), exitCode: EXIT_FAILURE };
  }
}
