/**
 * Failures raised while locating or dispatching a block.
 *
 * Timeouts and cancellations are not here: they come back as a RunResult
 * with exit code 124 or 130.
 */

import { BaseError } from '@margin/shared/Types/errors.js';

export class NoBlockFoundError extends BaseError {
  constructor() {
    super('no fenced code block found', 'NO_BLOCK_FOUND');
    this.name = 'NoBlockFoundError';
  }
}

/** Blocks exist but none could be chosen for the cursor. */
export class NoBlockSelectableError extends BaseError {
  constructor(cursor: number, blockCount: number) {
    super('unable to select code block', 'NO_BLOCK_SELECTABLE', { cursor, blockCount });
    this.name = 'NoBlockSelectableError';
  }
}

export class UnsupportedLanguageError extends BaseError {
  /** @param language - the tag exactly as written in the document */
  constructor(public readonly language: string) {
    super(`unsupported language: ${language}`, 'UNSUPPORTED_LANGUAGE', { language });
    this.name = 'UnsupportedLanguageError';
  }
}

export class SqlUnsupportedError extends BaseError {
  constructor(language: string) {
    super(
      `${language} execution unsupported without a configured sql command`,
      'SQL_UNSUPPORTED',
      { language },
    );
    this.name = 'SqlUnsupportedError';
  }
}

export class NoShellFoundError extends BaseError {
  constructor(public readonly candidates: readonly string[]) {
    super(
      `no shell found to run block (tried: ${candidates.join(', ') || 'none'})`,
      'NO_SHELL_FOUND',
      { candidates: [...candidates] },
    );
    this.name = 'NoShellFoundError';
  }
}

export class ExecutionFailureError extends BaseError {
  constructor(message: string, cause: unknown) {
    super(message, 'EXECUTION_FAILURE', { cause: cause instanceof Error ? cause.message : String(cause) });
    this.name = 'ExecutionFailureError';
  }
}
