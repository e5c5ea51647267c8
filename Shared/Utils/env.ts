import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Load `.env` files without letting dotenv print to stdout.
 *
 * The working directory's `.env` is read first; the package root's `.env`
 * (found `levelsUp` directories above the calling module) only fills in
 * variables that are still unset. Returns the files that were loaded.
 *
 * @param importMetaUrl - pass `import.meta.url` from the entry point
 * @param levelsUp - directories up from the calling file to the package root
 */
export function loadEnvSafely(importMetaUrl: string, levelsUp = 1, cwd = process.cwd()): string[] {
  let dir = dirname(fileURLToPath(importMetaUrl));
  for (let i = 0; i < levelsUp; i++) {
    dir = dirname(dir);
  }

  const candidates = [resolve(cwd, '.env'), resolve(dir, '.env')];
  const loaded: string[] = [];
  for (const envPath of candidates) {
    if (loaded.includes(envPath) || !existsSync(envPath)) continue;
    dotenvConfig({ path: envPath, quiet: true });
    loaded.push(envPath);
  }
  return loaded;
}
