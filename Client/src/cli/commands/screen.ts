import { Command } from 'commander';
import { LakeraClient } from '../../security/guard-client.js';
import { runCommand, type CliContext } from '../context.js';

interface ScreenOptions {
  content: string;
  lakeraApiKey?: string;
  detailed?: boolean;
}

export function screenCommand(ctx: CliContext): Command {
  return new Command('screen')
    .description('Screen content with Lakera Guard')
    .requiredOption('-c, --content <text>', 'Content to screen')
    .option('--lakera-api-key <key>', 'Lakera API key (overrides LAKERA_GUARD_API_KEY)')
    .option('--detailed', 'Show threat categories and scores')
    .action(async (options: ScreenOptions) => {
      await runCommand(ctx, async () => {
        const client = new LakeraClient({ apiKey: options.lakeraApiKey });
        try {
          const result = await client.screenContent(options.content, options.detailed ?? false);

          ctx.io.out(result.flagged ? 'Content flagged as potentially unsafe' : 'Content appears safe');
          if (!options.detailed) return;

          if (result.flagged) {
            ctx.io.out(`Categories: ${JSON.stringify(result.categories)}`);
            ctx.io.out(`Scores: ${JSON.stringify(result.categoryScores)}`);
          }
          if (result.devInfo) {
            const version = typeof result.devInfo.version === 'string' ? result.devInfo.version : 'Unknown';
            ctx.io.out(`Guard version: ${version}`);
          }
        } finally {
          await client.close();
        }
      });
    });
}
