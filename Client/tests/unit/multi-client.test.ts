import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MultiMCPClient, type MultiMCPClientOptions } from '../../src/core/multi-client.js';
import { ServerConfigSchema } from '../../src/config/schema.js';
import { SecurityManager } from '../../src/security/security-manager.js';
import { ServerUnavailableError, ToolNotFoundError } from '../../src/utils/errors.js';
import type { JsonObject } from '../../src/mcp-clients/types.js';
import { FakeMCPClient, type FakeBackend } from '../helpers/fake-client.js';
import { FakeScreener } from '../helpers/screener.js';

const ALPHA = 'http://alpha.test:8001';
const BETA = 'http://beta.test:8002';

function tool(name: string, description = `${name} tool`, extra: JsonObject = {}): JsonObject {
  return { name, description, ...extra };
}

function setup(options: MultiMCPClientOptions = {}) {
  const backends = new Map<string, FakeBackend>();
  const clients = new Map<string, FakeMCPClient>();

  const multi = new MultiMCPClient({
    enableSecurity: false,
    ...options,
    createClient: (url, clientOptions) => {
      const backend = backends.get(url) ?? { healthy: false, tools: [] };
      const client = new FakeMCPClient(url, clientOptions, backend);
      clients.set(url, client);
      return client;
    },
  });

  function serve(url: string, tools: unknown[]): FakeBackend {
    const backend: FakeBackend = { healthy: true, tools };
    backends.set(url, backend);
    return backend;
  }

  function clientFor(url: string): FakeMCPClient {
    const client = clients.get(url);
    if (!client) throw new Error(`no client created for ${url}`);
    return client;
  }

  return { multi, serve, clientFor };
}

describe('MultiMCPClient', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('addServer', () => {
    it('registers a healthy server under its origin and discovers its tools', async () => {
      const { multi, serve } = setup();
      serve(ALPHA, [tool('search'), tool('fetch')]);

      expect(await multi.addServer(`${ALPHA}/mcp/v1`, { name: 'alpha' })).toBe(true);

      expect(multi.getServerInfo()).toEqual({
        [ALPHA]: { name: 'alpha', connected: true, priority: 0, toolCount: 2, tools: ['search', 'fetch'] },
      });
      expect(multi.listTools().map((t) => t.name)).toEqual(['search', 'fetch']);
      expect(multi.getStats()).toEqual({
        serversAdded: 1,
        toolsDiscovered: 2,
        requestsRouted: 0,
        routingErrors: 0,
        totalServers: 1,
        totalTools: 2,
      });
    });

    it('passes timeout and security settings to the client it creates', async () => {
      const securityManager = new SecurityManager({ guardClient: new FakeScreener() });
      const { multi, serve, clientFor } = setup({ securityManager, enableSecurity: true, timeout: 5000 });
      serve(ALPHA, []);
      serve(BETA, []);

      await multi.addServer(ALPHA);
      await multi.addServer(BETA, { timeout: 750 });

      expect(clientFor(ALPHA).options).toEqual({ timeout: 5000, securityManager, enableSecurity: true });
      expect(clientFor(BETA).options.timeout).toBe(750);
    });

    it('rejects a server that is already registered', async () => {
      const { multi, serve } = setup();
      serve(ALPHA, [tool('search')]);

      await multi.addServer(ALPHA);

      expect(await multi.addServer(`${ALPHA}/other-path`)).toBe(false);
      expect(multi.getStats().serversAdded).toBe(1);
    });

    it('rejects an unhealthy server and closes its client', async () => {
      const { multi, clientFor } = setup();

      expect(await multi.addServer(ALPHA)).toBe(false);
      expect(multi.getServerCount()).toBe(0);
      expect(clientFor(ALPHA).closed).toBe(true);
    });

    it('closes the client when connecting throws', async () => {
      const { multi, serve, clientFor } = setup();
      serve(ALPHA, []).connectFailure = new Error('socket hang up');

      expect(await multi.addServer(ALPHA)).toBe(false);
      expect(multi.getServerCount()).toBe(0);
      expect(clientFor(ALPHA).closed).toBe(true);
    });

    it('rejects an unparseable URL', async () => {
      const { multi } = setup();

      expect(await multi.addServer('not a url')).toBe(false);
    });

    it('skips discovery when autoDiscover is off', async () => {
      const { multi, serve, clientFor } = setup({ autoDiscover: false });
      serve(ALPHA, [tool('search')]);

      await multi.addServer(ALPHA);

      expect(clientFor(ALPHA).listCalls).toBe(0);
      expect(multi.listTools()).toEqual([]);

      await multi.refreshTools();
      expect(multi.findTool('search')?.serverUrl).toBe(ALPHA);
    });
  });

  describe('addServers', () => {
    it('adds enabled entries in order and reports each result', async () => {
      const { multi, serve } = setup();
      serve(ALPHA, [tool('search')]);

      const results = await multi.addServers([
        ServerConfigSchema.parse({ name: 'alpha', url: ALPHA, priority: 2 }),
        ServerConfigSchema.parse({ name: 'beta', url: BETA }),
        ServerConfigSchema.parse({ name: 'off', url: 'http://off.test', enabled: false }),
      ]);

      expect(results).toEqual([
        { name: 'alpha', url: ALPHA, added: true },
        { name: 'beta', url: BETA, added: false },
      ]);
      expect(multi.getServerInfo()[ALPHA]).toMatchObject({ name: 'alpha', priority: 2 });
    });
  });

  describe('tool discovery', () => {
    it('fills in missing tool fields', async () => {
      const { multi, serve } = setup();
      serve(ALPHA, [
        { description: 'no name' },
        { name: 'schema', inputSchema: { type: 'object' } },
        { name: 'legacy', description: 'old style', parameters: { q: 'string' } },
        'not-an-object',
      ]);

      await multi.addServer(ALPHA);

      expect(multi.listTools()).toEqual([
        { name: 'Unknown', description: 'no name', serverUrl: ALPHA, parameters: {} },
        { name: 'schema', description: '', serverUrl: ALPHA, parameters: { type: 'object' } },
        { name: 'legacy', description: 'old style', serverUrl: ALPHA, parameters: { q: 'string' } },
      ]);
    });

    it('returns frozen tool records', async () => {
      const { multi, serve } = setup();
      serve(ALPHA, [tool('search')]);
      await multi.addServer(ALPHA);

      expect(Object.isFrozen(multi.findTool('search'))).toBe(true);
    });

    it('keeps the previous tools when tools/list answers with an error', async () => {
      const { multi, serve } = setup();
      const backend = serve(ALPHA, [tool('search')]);
      await multi.addServer(ALPHA);

      backend.listErrorMember = true;
      backend.tools = [];
      await multi.refreshTools(ALPHA);

      expect(multi.findTool('search')?.serverUrl).toBe(ALPHA);
      expect(multi.getStats().toolsDiscovered).toBe(1);
    });

    it('keeps the previous tools when tools/list throws', async () => {
      const { multi, serve } = setup();
      const backend = serve(ALPHA, [tool('search')]);
      await multi.addServer(ALPHA);

      backend.listFailure = new Error('connection reset');
      await multi.refreshTools();

      expect(multi.listTools().map((t) => t.name)).toEqual(['search']);
    });

    it('replaces the tool list on refresh and drops tools that went away', async () => {
      const { multi, serve } = setup();
      const backend = serve(ALPHA, [tool('search'), tool('fetch')]);
      await multi.addServer(ALPHA);

      backend.tools = [tool('search', 'Search v2'), tool('summarize')];
      await multi.refreshTools(`${ALPHA}/anything`);

      expect(multi.listTools().map((t) => [t.name, t.description])).toEqual([
        ['search', 'Search v2'],
        ['summarize', 'summarize tool'],
      ]);
      expect(multi.findTool('fetch')).toBeUndefined();
      expect(multi.getStats().toolsDiscovered).toBe(4);
    });

    it('ignores a refresh for an unknown server', async () => {
      const { multi } = setup();

      await expect(multi.refreshTools(BETA)).resolves.toBeUndefined();
    });
  });

  describe('tool ownership', () => {
    it('gives a shared tool name to the higher-priority server', async () => {
      const { multi, serve } = setup();
      serve(ALPHA, [tool('search'), tool('fetch')]);
      serve(BETA, [tool('search')]);

      await multi.addServer(ALPHA, { priority: 0 });
      await multi.addServer(BETA, { priority: 5 });

      expect(multi.findTool('search')?.serverUrl).toBe(BETA);
      expect(multi.findTool('fetch')?.serverUrl).toBe(ALPHA);
      expect(multi.getStats().totalTools).toBe(2);
    });

    it('keeps the higher-priority owner regardless of add order', async () => {
      const { multi, serve } = setup();
      serve(ALPHA, [tool('search')]);
      serve(BETA, [tool('search')]);

      await multi.addServer(BETA, { priority: 5 });
      await multi.addServer(ALPHA, { priority: 0 });

      expect(multi.findTool('search')?.serverUrl).toBe(BETA);
    });

    it('lets the later server win at equal priority', async () => {
      const { multi, serve } = setup();
      serve(ALPHA, [tool('search')]);
      serve(BETA, [tool('search')]);

      await multi.addServer(ALPHA);
      await multi.addServer(BETA);

      expect(multi.findTool('search')?.serverUrl).toBe(BETA);
    });

    it('hands a shadowed tool back when the owner is removed', async () => {
      const { multi, serve, clientFor } = setup();
      serve(ALPHA, [tool('search')]);
      serve(BETA, [tool('search'), tool('translate')]);
      await multi.addServer(ALPHA);
      await multi.addServer(BETA, { priority: 1 });

      expect(await multi.removeServer(`${BETA}/mcp`)).toBe(true);

      expect(multi.findTool('search')?.serverUrl).toBe(ALPHA);
      expect(multi.findTool('translate')).toBeUndefined();
      expect(clientFor(BETA).closed).toBe(true);
      expect(multi.getServerCount()).toBe(1);
    });

    it('reports false when removing an unknown server', async () => {
      const { multi } = setup();

      expect(await multi.removeServer(ALPHA)).toBe(false);
      expect(await multi.removeServer('::bad::')).toBe(false);
    });
  });

  describe('searchTools', () => {
    it('matches names and descriptions case-insensitively', async () => {
      const { multi, serve } = setup();
      serve(ALPHA, [tool('web_search', 'Search the web'), tool('weather', 'Get a FORECAST'), tool('fetch', 'Download')]);
      await multi.addServer(ALPHA);

      expect(multi.searchTools('SEARCH').map((t) => t.name)).toEqual(['web_search']);
      expect(multi.searchTools('forecast').map((t) => t.name)).toEqual(['weather']);
      expect(multi.searchTools('nothing')).toEqual([]);
    });
  });

  describe('callTool', () => {
    it('routes the call to the owning server', async () => {
      const { multi, serve, clientFor } = setup();
      serve(ALPHA, [tool('search')]);
      serve(BETA, [tool('translate')]);
      await multi.addServer(ALPHA);
      await multi.addServer(BETA);

      const response = await multi.callTool('translate', { text: 'hei', to: 'en' });

      expect(response.result).toEqual({ content: `translate from ${BETA}` });
      expect(clientFor(BETA).calls).toEqual([{ toolName: 'translate', args: { text: 'hei', to: 'en' } }]);
      expect(clientFor(ALPHA).calls).toEqual([]);
      expect(multi.getStats().requestsRouted).toBe(1);
    });

    it('throws ToolNotFoundError for unknown tools', async () => {
      const { multi } = setup();

      await expect(multi.callTool('missing', {})).rejects.toBeInstanceOf(ToolNotFoundError);
      await expect(multi.callTool('missing', {})).rejects.toThrow("Tool 'missing' not found");
      expect(multi.getStats().requestsRouted).toBe(0);
    });

    it('counts and rethrows failures from the server', async () => {
      const { multi, serve } = setup();
      const backend = serve(ALPHA, [tool('search')]);
      await multi.addServer(ALPHA);
      backend.callFailure = new Error('upstream exploded');

      await expect(multi.callTool('search', {})).rejects.toThrow('upstream exploded');
      expect(multi.getStats()).toMatchObject({ requestsRouted: 1, routingErrors: 1 });
    });

    it('exposes ServerUnavailableError for a tool whose server is gone', () => {
      const error = new ServerUnavailableError('search', ALPHA);
      expect(error.message).toBe("Server for tool 'search' not available");
      expect(error.code).toBe('SERVER_UNAVAILABLE');
    });
  });

  describe('auto refresh', () => {
    it('refreshes on the interval until stopped', async () => {
      vi.useFakeTimers();
      const { multi, serve, clientFor } = setup();
      const backend = serve(ALPHA, [tool('search')]);
      await multi.addServer(ALPHA);
      expect(clientFor(ALPHA).listCalls).toBe(1);

      backend.tools = [tool('search'), tool('summarize')];
      multi.startAutoRefresh(1000);
      await vi.advanceTimersByTimeAsync(1000);

      expect(clientFor(ALPHA).listCalls).toBe(2);
      expect(multi.findTool('summarize')?.serverUrl).toBe(ALPHA);

      multi.stopAutoRefresh();
      await vi.advanceTimersByTimeAsync(5000);
      expect(clientFor(ALPHA).listCalls).toBe(2);
    });

    it('starts refreshing at construction when given a refreshInterval', async () => {
      vi.useFakeTimers();
      const { multi, serve, clientFor } = setup({ refreshInterval: 500 });
      serve(ALPHA, [tool('search')]);
      await multi.addServer(ALPHA);

      await vi.advanceTimersByTimeAsync(1000);
      expect(clientFor(ALPHA).listCalls).toBe(3);

      await multi.close();
      await vi.advanceTimersByTimeAsync(1000);
      expect(clientFor(ALPHA).listCalls).toBe(3);
    });
  });

  describe('close', () => {
    it('closes every client and forgets servers and tools', async () => {
      const { multi, serve, clientFor } = setup();
      serve(ALPHA, [tool('search')]);
      serve(BETA, [tool('translate')]);
      await multi.addServer(ALPHA);
      await multi.addServer(BETA);

      await multi.close();

      expect(clientFor(ALPHA).closed).toBe(true);
      expect(clientFor(BETA).closed).toBe(true);
      expect(multi.getServerCount()).toBe(0);
      expect(multi.listTools()).toEqual([]);
    });
  });
});
