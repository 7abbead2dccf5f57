/**
 * Shared constants for the pkupdates application
 * This file provides a single source of truth for directory names,
 * file names, and defaults used throughout the application.
 */

export const DIR_PATTERNS = {
  PKUPDATES: '.pkupdates'
} as const;

export const FILE_PATTERNS = {
  CONFIG_FILES: ['config.jsonc', 'config.json'],
  DEFAULT_CONFIG_FILE: 'config.jsonc',
  STATE_FILE: 'state.json'
} as const;

export const ENV_VARS = {
  HOME_OVERRIDE: 'PKUPDATES_HOME',
  VERBOSE: 'PKUPDATES_VERBOSE'
} as const;

export const CONFIG_DEFAULTS = {
  cacheMaxAgeMinutes: 60,
  checkOnBattery: true,
  checkOnMobile: false,
  retryUntrusted: true
} as const;

/**
 * When a check includes a cache refresh, the refresh reports into the
 * first half of the overall percentage and enumeration into the second.
 */
export const CHECK_STAGE_SPLIT = 50;

/** Field separator of daemon package ids: `name;version;arch;data`. */
export const PACKAGE_ID_SEPARATOR = ';';
