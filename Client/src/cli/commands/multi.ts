import { Command } from 'commander';
import { MultiMCPClient } from '../../core/multi-client.js';
import { addServerConfig, getEnabledServers, listServerConfigs, removeServerConfig } from '../../config/store.js';
import type { ServerConfig } from '../../config/schema.js';
import { parseToolArguments, validateUrl } from '../../utils/helpers.js';
import {
  fail,
  loadCliConfig,
  parseInteger,
  resolveConfigPath,
  runCommand,
  writeJsonFile,
  type CliContext,
} from '../context.js';
import { setUpSecurity, type SecurityOptions } from '../security.js';

interface AddServerOptions {
  name: string;
  url: string;
  description?: string;
  timeout?: number;
  priority: number;
  tags?: string;
  disabled?: boolean;
}

interface ListAllToolsOptions extends SecurityOptions {
  output?: string;
}

interface CallToolOptions extends SecurityOptions {
  toolName: string;
  arguments?: string;
  output?: string;
}

export function parseTags(tags?: string): string[] {
  if (!tags) return [];
  return tags
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

/**
 * Connect to every enabled server for one command, then close everything.
 */
async function withMultiClient(
  ctx: CliContext,
  options: SecurityOptions,
  servers: ServerConfig[],
  body: (client: MultiMCPClient) => Promise<void>
): Promise<void> {
  const config = loadCliConfig(ctx);
  const securityManager = setUpSecurity(options, config, ctx.io);
  const client = new MultiMCPClient({
    securityManager,
    enableSecurity: securityManager !== undefined,
    timeout: config.defaultTimeout,
    autoDiscover: config.autoDiscover,
    refreshInterval: config.refreshInterval,
  });

  try {
    const results = await client.addServers(servers);
    for (const result of results) {
      ctx.io.out(`${result.added ? 'Connected to' : 'Failed to connect to'} ${result.name} (${result.url})`);
    }
    if (!config.autoDiscover) {
      // Servers were added without discovery; list them all in one pass
      await client.refreshTools();
    }
    await body(client);
  } finally {
    await client.close();
    await securityManager?.close();
  }
}

export function multiCommand(ctx: CliContext): Command {
  const multi = new Command('multi').description('Multi-server operations');

  multi
    .command('add-server')
    .description('Add a server to the configuration')
    .requiredOption('-n, --name <name>', 'Server name')
    .requiredOption('-u, --url <url>', 'Server URL')
    .option('-d, --description <text>', 'Server description')
    .option('-t, --timeout <ms>', 'Request timeout in milliseconds', parseInteger)
    .option('-p, --priority <n>', 'Server priority (higher is preferred)', parseInteger, 0)
    .option('--tags <list>', 'Comma-separated tags')
    .option('--disabled', 'Add the server disabled')
    .action(async (options: AddServerOptions) => {
      if (!validateUrl(options.url)) {
        fail(ctx, `Error: Invalid URL format: ${options.url}`);
        return;
      }

      await runCommand(ctx, async () => {
        const configPath = resolveConfigPath(ctx);
        const added = addServerConfig(
          {
            name: options.name,
            url: options.url,
            description: options.description,
            enabled: !options.disabled,
            timeout: options.timeout ?? loadCliConfig(ctx).defaultTimeout,
            priority: options.priority,
            tags: parseTags(options.tags),
          },
          configPath
        );

        if (!added) {
          fail(ctx, `Error: A server named '${options.name}' or with URL ${options.url} is already configured`);
          return;
        }
        ctx.io.out(`Added server '${options.name}' (${options.url})`);
      });
    });

  multi
    .command('remove-server')
    .description('Remove a server from the configuration')
    .requiredOption('-n, --name <name>', 'Server name to remove')
    .action(async (options: { name: string }) => {
      await runCommand(ctx, async () => {
        if (!removeServerConfig(options.name, resolveConfigPath(ctx))) {
          fail(ctx, `Error: Server '${options.name}' not found`);
          return;
        }
        ctx.io.out(`Removed server '${options.name}'`);
      });
    });

  multi
    .command('list-servers')
    .description('List configured servers')
    .action(async () => {
      await runCommand(ctx, async () => {
        const servers = listServerConfigs(resolveConfigPath(ctx));
        if (servers.length === 0) {
          ctx.io.out('No servers configured');
          return;
        }

        ctx.io.out(`Configured servers (${servers.length}):`);
        for (const server of servers) {
          ctx.io.out(`  - ${server.name} (${server.url}) [${server.enabled ? 'enabled' : 'disabled'}]`);
          if (server.description) ctx.io.out(`    Description: ${server.description}`);
          if (server.tags.length > 0) ctx.io.out(`    Tags: ${server.tags.join(', ')}`);
          ctx.io.out(`    Priority: ${server.priority}, Timeout: ${server.timeout}ms`);
        }
      });
    });

  multi
    .command('list-all-tools')
    .description('List the tools of every enabled server')
    .option('-o, --output <file>', 'Write the tool list as JSON to a file')
    .option('--disable-security', 'Disable security screening')
    .option('--lakera-api-key <key>', 'Lakera API key (overrides LAKERA_GUARD_API_KEY)')
    .action(async (options: ListAllToolsOptions) => {
      await runCommand(ctx, async () => {
        const servers = getEnabledServers(resolveConfigPath(ctx));
        if (servers.length === 0) {
          ctx.io.out('No enabled servers configured');
          return;
        }

        await withMultiClient(ctx, options, servers, async (client) => {
          const tools = client.listTools();

          if (options.output) {
            writeJsonFile(
              options.output,
              tools.map((tool) => ({
                name: tool.name,
                description: tool.description,
                server: tool.serverUrl,
                parameters: tool.parameters,
              }))
            );
            ctx.io.out(`Tools list saved to ${options.output}`);
          } else if (tools.length > 0) {
            ctx.io.out(`Found ${tools.length} tool(s) across ${client.getServerCount()} server(s):`);
            for (const tool of tools) {
              ctx.io.out(`  - ${tool.name}: ${tool.description}`);
              ctx.io.out(`    Server: ${tool.serverUrl}`);
            }
          } else {
            ctx.io.out('No tools available');
          }

          const stats = client.getStats();
          ctx.io.out(`Statistics: ${stats.totalServers} servers, ${stats.totalTools} tools`);
        });
      });
    });

  multi
    .command('call-tool')
    .description('Call a tool by name on whichever configured server provides it')
    .requiredOption('-n, --tool-name <name>', 'Name of the tool to call')
    .option('-a, --arguments <json>', 'Tool arguments as a JSON object')
    .option('-o, --output <file>', 'Write the result as JSON to a file')
    .option('--disable-security', 'Disable security screening')
    .option('--lakera-api-key <key>', 'Lakera API key (overrides LAKERA_GUARD_API_KEY)')
    .action(async (options: CallToolOptions) => {
      await runCommand(ctx, async () => {
        const servers = getEnabledServers(resolveConfigPath(ctx));
        if (servers.length === 0) {
          fail(ctx, 'No enabled servers configured');
          return;
        }

        const toolArgs = parseToolArguments(options.arguments);

        await withMultiClient(ctx, options, servers, async (client) => {
          const tool = client.findTool(options.toolName);
          if (!tool) {
            fail(ctx, `Error: Tool '${options.toolName}' not found on any server`);
            return;
          }
          ctx.io.out(`Found tool '${tool.name}' on server ${tool.serverUrl}`);

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

          ctx.io.out(`Statistics: ${client.getStats().requestsRouted} requests routed`);
        });
      });
    });

  return multi;
}
