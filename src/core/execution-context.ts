/**
 * Execution Context Module
 *
 * Resolves directories and configuration once per command invocation.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { ENV_VARS } from '../constants/index.js';
import { ConfigManager } from './config.js';
import { ensurePkUpdatesDirectories, getPkUpdatesDirectories } from './directory.js';
import { logger } from '../utils/logger.js';

/**
 * Create an ExecutionContext from command options.
 * Directories are created if missing; the config file is written with
 * defaults on first use.
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const env = options.home
    ? { ...process.env, [ENV_VARS.HOME_OVERRIDE]: options.home }
    : process.env;
  const directories = await ensurePkUpdatesDirectories(getPkUpdatesDirectories(env));
  const config = await new ConfigManager(directories).load();

  const context: ExecutionContext = {
    directories,
    config,
    interactive: options.interactive ?? false
  };

  logger.debug('Created execution context', { directories, config });
  return context;
}
