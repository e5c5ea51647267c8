/**
 * JSON file store for server entries and client settings.
 *
 * The file lives at GUARDED_MCP_CONFIG, or config.json in the client's home
 * directory. Every operation takes an explicit path to override that.
 * A missing or broken file reads as the defaults; writes are never partial
 * objects, the whole config is rewritten.
 */
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '@guarded-mcp/shared/Utils/logger.js';
import { PathManager } from '@guarded-mcp/shared/Utils/paths.js';
import { errorMessage } from '@guarded-mcp/shared/Types/errors.js';
import { ConfigurationError, ValidationError } from '../utils/errors.js';
import {
  ClientConfigSchema,
  ServerConfigSchema,
  defaultClientConfig,
  type ClientConfig,
  type ServerConfig,
  type ServerConfigInput,
} from './schema.js';

const log = logger.child('config');

export function getConfigPath(): string {
  return PathManager.getInstance().getConfigPath();
}

export function loadConfig(configPath: string = getConfigPath()): ClientConfig {
  if (!existsSync(configPath)) {
    log.debug('No config file, using defaults', { path: configPath });
    return defaultClientConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    log.error('Failed to read config file, using defaults', { path: configPath, error: errorMessage(error) });
    return defaultClientConfig();
  }

  const result = ClientConfigSchema.safeParse(raw);
  if (!result.success) {
    log.error('Invalid config file, using defaults', { path: configPath, errors: result.error.flatten() });
    return defaultClientConfig();
  }

  return result.data;
}

export function saveConfig(config: ClientConfig, configPath: string = getConfigPath()): void {
  try {
    mkdirSync(dirname(configPath), { recursive: true });
    writeFileSync(configPath, JSON.stringify(config, null, 2), 'utf-8');
  } catch (error) {
    log.error('Failed to save config file', { path: configPath, error: errorMessage(error) });
    throw new ConfigurationError(`Failed to save config to ${configPath}: ${errorMessage(error)}`, {
      path: configPath,
    });
  }
  log.debug('Config saved', { path: configPath });
}

/**
 * Append a server entry. False when an entry with the same name or URL exists.
 */
export function addServerConfig(entry: ServerConfigInput, configPath: string = getConfigPath()): boolean {
  const parsed = ServerConfigSchema.safeParse(entry);
  if (!parsed.success) {
    throw new ValidationError('Invalid server config', parsed.error.flatten());
  }
  const server = parsed.data;

  const config = loadConfig(configPath);
  const duplicate = config.servers.find((s) => s.name === server.name || s.url === server.url);
  if (duplicate) {
    log.warn(`Server '${server.name}' not added: name or URL already configured`, {
      existing: duplicate.name,
    });
    return false;
  }

  config.servers.push(server);
  saveConfig(config, configPath);
  log.info(`Added server '${server.name}'`, { url: server.url });
  return true;
}

export function removeServerConfig(name: string, configPath: string = getConfigPath()): boolean {
  const config = loadConfig(configPath);
  const remaining = config.servers.filter((s) => s.name !== name);
  if (remaining.length === config.servers.length) {
    return false;
  }

  config.servers = remaining;
  saveConfig(config, configPath);
  log.info(`Removed server '${name}'`);
  return true;
}

export function listServerConfigs(configPath: string = getConfigPath()): ServerConfig[] {
  return loadConfig(configPath).servers;
}

export function getServerConfig(name: string, configPath: string = getConfigPath()): ServerConfig | undefined {
  return loadConfig(configPath).servers.find((s) => s.name === name);
}

/**
 * Enabled entries, highest priority first. Equal priorities keep file order.
 */
export function getEnabledServers(configPath: string = getConfigPath()): ServerConfig[] {
  return loadConfig(configPath)
    .servers.filter((s) => s.enabled)
    .sort((a, b) => b.priority - a.priority);
}
