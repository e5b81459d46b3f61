/**
 * ExecutionWindow: the one deadline and abort signal shared by all work done
 * for a single dispatch.
 */
export class ExecutionWindow {
  readonly startedAt: number;
  readonly deadlineAt: number;

  constructor(
    readonly timeoutMs: number,
    readonly signal?: AbortSignal,
    now: number = Date.now(),
  ) {
    this.startedAt = now;
    this.deadlineAt = now + timeoutMs;
  }

  remainingMs(now: number = Date.now()): number {
    return Math.max(0, this.deadlineAt - now);
  }

  get cancelled(): boolean {
    return this.signal?.aborted ?? false;
  }

  expired(now: number = Date.now()): boolean {
    return this.remainingMs(now) === 0;
  }

  timeoutNotice(): string {
    const ms = this.timeoutMs;
    return `command timed out after ${ms % 1000 === 0 ? `${ms / 1000}s` : `${ms}ms`}`;
  }

  cancelNotice(): string {
    return 'command canceled';
  }
}

/**
 * Join a notice onto captured output, on its own line.
 */
export function appendNotice(output: string, notice: string): string {
  if (output === '') return notice;
  return output.endsWith('\n') ? output + notice : `${output}\n${notice}`;
}
