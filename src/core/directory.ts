import * as os from 'os';
import * as path from 'path';
import { PkUpdatesDirectories } from '../types/index.js';
import { DIR_PATTERNS, ENV_VARS } from '../constants/index.js';
import { ensureDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Directory resolution. Everything lives under ~/.pkupdates (dotfile
 * convention on every platform); PKUPDATES_HOME points it elsewhere.
 */
export function getPkUpdatesDirectories(env: NodeJS.ProcessEnv = process.env): PkUpdatesDirectories {
  const override = env[ENV_VARS.HOME_OVERRIDE];
  const baseDir = override && override.trim()
    ? path.resolve(override.trim())
    : path.join(os.homedir(), DIR_PATTERNS.PKUPDATES);

  return {
    config: baseDir,
    state: baseDir
  };
}

/**
 * Ensure all pkupdates directories exist
 */
export async function ensurePkUpdatesDirectories(
  dirs: PkUpdatesDirectories = getPkUpdatesDirectories()
): Promise<PkUpdatesDirectories> {
  try {
    await Promise.all([
      ensureDir(dirs.config),
      ensureDir(dirs.state)
    ]);

    logger.debug('pkupdates directories ensured', { directories: dirs });
    return dirs;
  } catch (error) {
    logger.error('Failed to create pkupdates directories', { error, directories: dirs });
    throw error;
  }
}
