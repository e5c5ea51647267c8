#!/usr/bin/env node
import { loadEnvSafely } from '@guarded-mcp/shared/Utils/env.js';
import { logger } from '@guarded-mcp/shared/Utils/logger.js';
import { buildProgram } from './program.js';

loadEnvSafely(import.meta.url, 2);

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Unexpected CLI failure', { error });
    process.exitCode = 1;
  });
