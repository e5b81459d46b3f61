/**
 * RunBlock configuration
 *
 * Zod-validated environment config for the dispatcher, plus the execution
 * record (interpreter, shell, sql command) the caller hands in.
 */

import { z } from 'zod';
import { homedir, tmpdir } from 'node:os';
import { resolve } from 'node:path';
import { ConfigurationError, ValidationError } from '@margin/shared/Types/errors.js';

// ── Named defaults ───────────────────────────────────────────────────────────

export const DEFAULT_TIMEOUT_MS = 30_000;
/** Longest delay a Node timer honors; anything above fires after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;
export const DEFAULT_KILL_GRACE_MS = 2_000;
export const DEFAULT_PYTHON_INTERPRETER = 'python';

/** Tried after the configured shell, bash and sh when running on Windows */
export const DEFAULT_WINDOWS_SHELLS: readonly string[] = [
  'C:\\Program Files\\Git\\bin\\bash.exe',
  'C:\\Program Files\\Git\\usr\\bin\\bash.exe',
  'wsl.exe',
];

// ── Schema ───────────────────────────────────────────────────────────────────

function splitList(value: string): string[] {
  return value
    .split(';')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

const configSchema = z.object({
  timeoutMs: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(DEFAULT_TIMEOUT_MS),
  killGraceMs: z.coerce.number().int().nonnegative().max(MAX_TIMER_MS).default(DEFAULT_KILL_GRACE_MS),
  tempDir: z.string().min(1).default(tmpdir()),
  historyFile: z.string().min(1).optional(),
  windowsShells: z.string().default(DEFAULT_WINDOWS_SHELLS.join(';')).transform(splitList),
});

export type RunBlockSettings = z.infer<typeof configSchema>;

/**
 * What the caller supplies per run. Blank and absent are the same thing.
 */
export const executionConfigSchema = z.object({
  pythonInterpreter: z.string().optional(),
  shellPath: z.string().optional(),
  sqlCommand: z.string().optional(),
});

export type ExecutionConfig = z.infer<typeof executionConfigSchema>;

// ── Helpers ──────────────────────────────────────────────────────────────────

export function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return p.replace('~', homedir());
  }
  return p;
}

function withoutUndefined(raw: Record<string, string | undefined>): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value !== undefined && value !== '') cleaned[key] = value;
  }
  return cleaned;
}

// ── Singleton ────────────────────────────────────────────────────────────────

let cached: RunBlockSettings | null = null;

export function getConfig(): RunBlockSettings {
  if (cached) return cached;

  // Empty and unset keys are dropped so Zod defaults kick in
  const raw = withoutUndefined({
    timeoutMs: process.env.RUNBLOCK_TIMEOUT_MS,
    killGraceMs: process.env.RUNBLOCK_KILL_GRACE_MS,
    tempDir: process.env.RUNBLOCK_TEMP_DIR,
    historyFile: process.env.RUNBLOCK_HISTORY_FILE,
    windowsShells: process.env.RUNBLOCK_WINDOWS_SHELLS,
  });

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`RunBlock config error: ${result.error.message}`, {
      issues: result.error.issues,
    });
  }

  const config = result.data;
  config.tempDir = resolve(expandHome(config.tempDir));
  if (config.historyFile) {
    config.historyFile = resolve(expandHome(config.historyFile));
  }

  cached = config;
  return config;
}

/** Reset cached config (for testing) */
export function resetConfig(): void {
  cached = null;
}

/**
 * Execution record from RUNBLOCK_PYTHON, RUNBLOCK_SHELL and RUNBLOCK_SQL_CMD.
 */
export function getExecutionConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ExecutionConfig {
  return {
    pythonInterpreter: env.RUNBLOCK_PYTHON,
    shellPath: env.RUNBLOCK_SHELL,
    sqlCommand: env.RUNBLOCK_SQL_CMD,
  };
}

export function parseExecutionConfig(input: unknown): ExecutionConfig {
  const result = executionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid execution config: ${result.error.message}`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}
