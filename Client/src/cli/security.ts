import { SecurityManager } from '../security/security-manager.js';
import { LakeraClient } from '../security/guard-client.js';
import type { ClientConfig } from '../config/schema.js';
import { ConfigurationError } from '../utils/errors.js';
import type { CliIO } from './context.js';

export interface SecurityOptions {
  disableSecurity?: boolean;
  lakeraApiKey?: string;
}

/**
 * Build the security manager for a command, or undefined when screening is off.
 * A missing API key disables screening for the command instead of failing it.
 */
export function setUpSecurity(
  options: SecurityOptions,
  config: ClientConfig,
  io: CliIO
): SecurityManager | undefined {
  if (options.disableSecurity || !config.enableSecurity) {
    io.out('Security screening disabled');
    return undefined;
  }

  try {
    const guardClient = new LakeraClient({ apiKey: options.lakeraApiKey });
    const manager = new SecurityManager({
      guardClient,
      failOnViolation: config.securityFailOnViolation,
      failMode: config.securityFailMode,
    });
    io.out('Security screening enabled');
    return manager;
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    io.err(`Security disabled: ${error.message}`);
    return undefined;
  }
}
