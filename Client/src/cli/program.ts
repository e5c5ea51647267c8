import { Command } from 'commander';
import { logger } from '@guarded-mcp/shared/Utils/logger.js';
import { consoleIO, type CliContext, type CliIO, type GlobalOptions } from './context.js';
import { multiCommand } from './commands/multi.js';
import { screenCommand } from './commands/screen.js';
import { serverCommand } from './commands/server.js';

export const VERSION = '0.1.0';

/**
 * Build the `guarded-mcp` command tree. Output goes through `io` so the
 * program can be driven from tests.
 */
export function buildProgram(io: CliIO = consoleIO): Command {
  const program = new Command();

  const ctx: CliContext = {
    io,
    globals: () => program.opts<GlobalOptions>(),
  };

  program
    .name('guarded-mcp')
    .description('Client for MCP tool servers with Lakera Guard screening')
    .version(VERSION)
    .option('--config <path>', 'Config file (default: GUARDED_MCP_CONFIG or ~/.guarded-mcp/config.json)')
    .option('--verbose', 'Enable debug logging')
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    })
    .hook('preAction', () => {
      if (program.opts<GlobalOptions>().verbose) {
        logger.setLevel('debug');
      }
    });

  program.addCommand(serverCommand(ctx));
  program.addCommand(multiCommand(ctx));
  program.addCommand(screenCommand(ctx));

  return program;
}
