/**
 * Shared constants for the devshell CLI
 */

export const DIR_PATTERNS = {
  DEVSHELL: '.devshell'
} as const;

export const FILE_PATTERNS = {
  DECLARATION_YML: 'devshell.yml',
  CONFIG_JSONC: 'config.jsonc',
  CONFIG_JSON: 'config.json',
  TEMPLATE_DIR: 'templates'
} as const;

export const PLATFORM_KINDS = ['macos', 'linux', 'other'] as const;

/**
 * Separator used when joining path lists on every supported platform.
 */
export const DEFAULT_PATH_SEPARATOR = ':';

export const DEFAULT_STORE_DIR = '/nix/store';

export const ENV_OVERRIDES = {
  STORE_DIR: 'DEVSHELL_STORE_DIR',
  SHELL: 'DEVSHELL_SHELL',
  LOG_LEVEL: 'DEVSHELL_LOG_LEVEL',
  VERBOSE: 'DEVSHELL_VERBOSE'
} as const;

export const EXPORT_FORMATS = ['sh', 'fish', 'json'] as const;

export const VARIABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
