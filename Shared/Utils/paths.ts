import { homedir } from 'node:os';
import { resolve, join } from 'node:path';
import { expandPath } from './config.js';

/**
 * Resolves the client's home directory (GUARDED_MCP_HOME, default ~/.guarded-mcp)
 * and the files kept under it.
 */
export class PathManager {
  private static instance: PathManager | undefined;
  private homeDir: string;

  private constructor() {
    this.homeDir = process.env.GUARDED_MCP_HOME
      ? resolve(expandPath(process.env.GUARDED_MCP_HOME))
      : join(homedir(), '.guarded-mcp');
  }

  public static getInstance(): PathManager {
    if (!PathManager.instance) {
      PathManager.instance = new PathManager();
    }
    return PathManager.instance;
  }

  /** Drop the cached instance so the next lookup re-reads the environment. */
  public static reset(): void {
    PathManager.instance = undefined;
  }

  public getHomeDir(): string {
    return this.homeDir;
  }

  /**
   * Server config file: GUARDED_MCP_CONFIG when set, otherwise config.json in the home dir.
   */
  public getConfigPath(): string {
    const override = process.env.GUARDED_MCP_CONFIG;
    return override ? resolve(expandPath(override)) : join(this.homeDir, 'config.json');
  }
}
