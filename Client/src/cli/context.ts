import { writeFileSync } from 'node:fs';
import { InvalidArgumentError } from 'commander';
import { errorMessage } from '@guarded-mcp/shared/Types/errors.js';
import { logger } from '@guarded-mcp/shared/Utils/logger.js';
import { getConfigPath, loadConfig } from '../config/store.js';
import type { ClientConfig } from '../config/schema.js';
import { SecurityViolation } from '../utils/errors.js';

/** Where command output goes: results on `out`, problems on `err`. */
export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

export type GlobalOptions = {
  config?: string;
  verbose?: boolean;
};

export interface CliContext {
  io: CliIO;
  globals(): GlobalOptions;
}

export function resolveConfigPath(ctx: CliContext): string {
  return ctx.globals().config ?? getConfigPath();
}

export function loadCliConfig(ctx: CliContext): ClientConfig {
  return loadConfig(resolveConfigPath(ctx));
}

/**
 * Report a failure and mark the process as failed without exiting,
 * so pending output and cleanup still run.
 */
export function fail(ctx: CliContext, message: string): void {
  ctx.io.err(message);
  process.exitCode = 1;
}

/**
 * Run a command body, turning anything it throws into an error line and exit code 1.
 */
export async function runCommand(ctx: CliContext, body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (error) {
    logger.debug('Command failed', { error });
    if (error instanceof SecurityViolation) {
      fail(ctx, `Security violation: ${error.message}`);
    } else {
      fail(ctx, `Error: ${errorMessage(error)}`);
    }
  }
}

export function writeJsonFile(path: string, data: unknown): void {
  writeFileSync(path, JSON.stringify(data, null, 2), 'utf-8');
}

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}
