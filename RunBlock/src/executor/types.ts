/**
 * Core types for block execution.
 */

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_TIMEOUT = 124;
export const EXIT_CANCELED = 130;

/** One variant per backend; routing falls through to "unsupported" when no tag matches. */
export type BackendKind = 'shell' | 'script' | 'reformat' | 'command';

export type LanguageTable = Readonly<Record<BackendKind, readonly string[]>>;

/** Lower-case tags routed to each backend */
export const LANGUAGE_TAGS = {
  shell: ['bash', 'sh', 'shell'],
  script: ['python', 'py'],
  reformat: ['json'],
  command: ['sql'],
} as const satisfies LanguageTable;

export interface RunResult {
  /** Case-folded language tag */
  language: string;
  /** stdout and stderr interleaved in arrival order, plus any notice */
  output: string;
  exit_code: number;
  /** ISO-8601 time dispatch started */
  ran_at: string;
  /** Byte offset just past the executed block */
  block_end: number;
}

/** What a backend hands back to the dispatcher. */
export interface BackendOutput {
  output: string;
  exitCode: number;
}

/**
 * How a single child process ended. `not_found` is kept apart from other
 * launch errors so the shell backend can move on to its next candidate.
 */
export type ProcessOutcome =
  | { status: 'exited'; output: string; exitCode: number }
  | { status: 'timed_out'; output: string }
  | { status: 'cancelled'; output: string }
  | { status: 'not_found'; error: NodeJS.ErrnoException }
  | { status: 'launch_error'; output: string; error: Error };
