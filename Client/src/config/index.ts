export {
  ServerConfigSchema,
  ClientConfigSchema,
  defaultClientConfig,
  type ServerConfig,
  type ServerConfigInput,
  type ClientConfig,
} from './schema.js';

export {
  getConfigPath,
  loadConfig,
  saveConfig,
  addServerConfig,
  removeServerConfig,
  listServerConfigs,
  getServerConfig,
  getEnabledServers,
} from './store.js';
