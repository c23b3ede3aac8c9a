import { resolve } from 'node:path';

import { loadServiceConfig, type ServiceConfig } from './config.js';
import { Logger } from './utils/logger.js';

/**
 * Read-only runtime context created once at startup and passed explicitly to
 * the loader, registry, agent factory, orchestrator and persister.
 */
export interface AppContext {
  readonly config: ServiceConfig;
  readonly logger: Logger;
  /** Absolute sandbox root for the file-system tools */
  readonly workspaceRoot: string;
}

export interface CreateContextOptions {
  config?: ServiceConfig;
  logger?: Logger;
  /** Base directory for relative paths in the configuration (default: cwd) */
  cwd?: string;
}

export function createContext(options: CreateContextOptions = {}): AppContext {
  const config = options.config ?? loadServiceConfig();
  const logger =
    options.logger ??
    new Logger({ level: config.logging.level, structured: config.logging.structured });
  const cwd = options.cwd ?? process.cwd();

  return Object.freeze({
    config,
    logger,
    workspaceRoot: resolve(cwd, config.session.workspaceDir),
  });
}
