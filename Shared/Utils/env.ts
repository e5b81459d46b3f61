import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Load `.env` from a package root if one exists. Quiet, so nothing lands on
 * stdout ahead of the JSON envelope.
 *
 * @param importMetaUrl - pass `import.meta.url` from the entry point
 * @param levelsUp - directories from the entry file up to the package root
 * @returns the path that was loaded, or null when there is no file
 */
export function loadEnvFile(importMetaUrl: string, levelsUp = 1): string | null {
  let dir = dirname(fileURLToPath(importMetaUrl));
  for (let i = 0; i < levelsUp; i++) {
    dir = dirname(dir);
  }
  const envPath = resolve(dir, '.env');
  if (!existsSync(envPath)) return null;

  // Values already in the environment win over the file.
  dotenvConfig({ path: envPath, quiet: true, override: false });
  return envPath;
}
