import { Command } from 'commander';
import { MCPClient } from '../../mcp-clients/http-client.js';
import type { SecurityManager } from '../../security/security-manager.js';
import { parseToolArguments, validateUrl, isJsonObject } from '../../utils/helpers.js';
import {
  fail,
  loadCliConfig,
  parseInteger,
  runCommand,
  writeJsonFile,
  type CliContext,
} from '../context.js';
import { setUpSecurity, type SecurityOptions } from '../security.js';

interface ServerOptions extends SecurityOptions {
  serverUrl: string;
  timeout?: number;
}

interface ListToolsOptions extends ServerOptions {
  output?: string;
}

interface CallToolOptions extends ServerOptions {
  toolName: string;
  arguments?: string;
  output?: string;
}

function addServerOptions(command: Command): Command {
  return command
    .requiredOption('-u, --server-url <url>', 'Tool server URL')
    .option('-t, --timeout <ms>', 'Request timeout in milliseconds', parseInteger)
    .option('--disable-security', 'Disable security screening')
    .option('--lakera-api-key <key>', 'Lakera API key (overrides LAKERA_GUARD_API_KEY)');
}

/**
 * Open a client for one command, closing it and the security manager afterwards.
 */
async function withClient(
  ctx: CliContext,
  options: ServerOptions,
  body: (client: MCPClient) => Promise<void>
): Promise<void> {
  const config = loadCliConfig(ctx);
  const securityManager: SecurityManager | undefined = setUpSecurity(options, config, ctx.io);
  const client = new MCPClient(options.serverUrl, {
    timeout: options.timeout ?? config.defaultTimeout,
    securityManager,
    enableSecurity: securityManager !== undefined,
  });

  try {
    await body(client);
  } finally {
    await client.close();
    await securityManager?.close();
  }
}

export function serverCommand(ctx: CliContext): Command {
  const server = new Command('server').description('Single server operations');

  addServerOptions(server.command('connect').description('Test the connection to a tool server')).action(
    async (options: ServerOptions) => {
      if (!validateUrl(options.serverUrl)) {
        fail(ctx, `Error: Invalid URL format: ${options.serverUrl}`);
        return;
      }

      await runCommand(ctx, () =>
        withClient(ctx, options, async (client) => {
          if (!(await client.connect())) {
            fail(ctx, `Failed to connect to ${client.serverUrl}`);
            return;
          }
          ctx.io.out(`Successfully connected to ${client.serverUrl}`);
        })
      );
    }
  );

  addServerOptions(server.command('list-tools').description('List the tools a server advertises'))
    .option('-o, --output <file>', 'Write the tool list as JSON to a file')
    .action(async (options: ListToolsOptions) => {
      if (!validateUrl(options.serverUrl)) {
        fail(ctx, `Error: Invalid URL format: ${options.serverUrl}`);
        return;
      }

      await runCommand(ctx, () =>
        withClient(ctx, options, async (client) => {
          const response = await client.listTools();
          if (response.error) {
            fail(ctx, `Error: ${JSON.stringify(response.error)}`);
            return;
          }

          const advertised = response.result?.tools;
          const tools = Array.isArray(advertised) ? advertised.filter(isJsonObject) : [];

          if (options.output) {
            writeJsonFile(options.output, tools);
            ctx.io.out(`Tools list saved to ${options.output}`);
          } else if (tools.length > 0) {
            ctx.io.out(`Found ${tools.length} tool(s):`);
            for (const tool of tools) {
              const name = typeof tool.name === 'string' ? tool.name : 'Unknown';
              const description = typeof tool.description === 'string' ? tool.description : 'No description';
              ctx.io.out(`  - ${name}: ${description}`);
            }
          } else {
            ctx.io.out('No tools available');
          }

          const stats = client.getSecurityStats();
          if (stats && stats.toolsScreened > 0) {
            ctx.io.out(
              `Security: ${stats.toolsScreened} tools screened, ${stats.violationsDetected} violations detected`
            );
          }
        })
      );
    });

  addServerOptions(server.command('call-tool').description('Call a tool on a server'))
    .requiredOption('-n, --tool-name <name>', 'Name of the tool to call')
    .option('-a, --arguments <json>', 'Tool arguments as a JSON object')
    .option('-o, --output <file>', 'Write the result as JSON to a file')
    .action(async (options: CallToolOptions) => {
      if (!validateUrl(options.serverUrl)) {
        fail(ctx, `Error: Invalid URL format: ${options.serverUrl}`);
        return;
      }

      await runCommand(ctx, async () => {
        const toolArgs = parseToolArguments(options.arguments);

        await withClient(ctx, options, async (client) => {
          const response = await client.callTool(options.toolName, toolArgs);
          if (response.error) {
            fail(ctx, `Error: ${JSON.stringify(response.error)}`);
            return;
          }

          const result = response.result ?? {};
          if (options.output) {
            writeJsonFile(options.output, result);
            ctx.io.out(`Tool result saved to ${options.output}`);
          } else {
            ctx.io.out(JSON.stringify(result, null, 2));
          }

          const stats = client.getSecurityStats();
          if (stats && stats.interactionsScreened > 0) {
            ctx.io.out(
              `Security: ${stats.interactionsScreened} interactions screened, ` +
                `${stats.violationsDetected} violations detected`
            );
          }
        });
      });
    });

  return server;
}
