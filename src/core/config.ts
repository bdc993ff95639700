import { join } from 'path';
import { DevshellConfig } from '../types/index.js';
import { DEFAULT_STORE_DIR, ENV_OVERRIDES, FILE_PATTERNS } from '../constants/index.js';
import { exists, readTextFile } from '../utils/fs.js';
import { parseJsoncObject, type JsonObject } from '../utils/jsonc.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { getDevshellDirectories } from './directory.js';

/**
 * User configuration for the devshell CLI
 * Supports both JSON and JSONC formats
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON];

const DEFAULT_CONFIG: DevshellConfig = {
  declarationFile: FILE_PATTERNS.DECLARATION_YML,
  storeDir: DEFAULT_STORE_DIR
};

type ConfigEnvironment = Readonly<Record<string, string | undefined>>;

class ConfigManager {
  private config: DevshellConfig | null = null;

  constructor(
    private readonly configDir: string = getDevshellDirectories().config,
    private readonly env: ConfigEnvironment = process.env
  ) {}

  /**
   * Find the existing config file, preferring .jsonc
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.configDir, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration; defaults when no file exists. Environment overrides
   * are applied last.
   */
  async load(): Promise<DevshellConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    let fileConfig: Partial<DevshellConfig> = {};

    if (configPath) {
      logger.debug(`Loading config from: ${configPath}`);
      try {
        fileConfig = validateConfig(parseJsoncObject(await readTextFile(configPath), configPath));
      } catch (error) {
        logger.error('Failed to load configuration', { error, configPath });
        if (error instanceof ConfigError) {
          throw error;
        }
        throw new ConfigError(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`, { configPath });
      }
    } else {
      logger.debug('Config file not found, using defaults');
    }

    this.config = {
      ...DEFAULT_CONFIG,
      ...fileConfig,
      ...this.environmentOverrides()
    };
    return this.config;
  }

  async get<K extends keyof DevshellConfig>(key: K): Promise<DevshellConfig[K]> {
    const config = await this.load();
    return config[key];
  }

  private environmentOverrides(): Partial<DevshellConfig> {
    const overrides: Partial<DevshellConfig> = {};
    const storeDir = this.env[ENV_OVERRIDES.STORE_DIR];
    const shell = this.env[ENV_OVERRIDES.SHELL];
    if (storeDir) overrides.storeDir = storeDir;
    if (shell) overrides.shell = shell;
    return overrides;
  }
}

function validateConfig(raw: JsonObject): Partial<DevshellConfig> {
  const config: Partial<DevshellConfig> = {};

  for (const [key, value] of Object.entries(raw)) {
    if (typeof value !== 'string' || value.length === 0) {
      throw new ConfigError(`Invalid configuration: '${key}' must be a non-empty string`, { key });
    }
    switch (key) {
      case 'declarationFile':
        config.declarationFile = value;
        break;
      case 'storeDir':
        config.storeDir = value;
        break;
      case 'shell':
        config.shell = value;
        break;
      default:
        throw new ConfigError(`Invalid configuration: unknown key '${key}'`, { key });
    }
  }

  return config;
}

export const configManager = new ConfigManager();

export { ConfigManager };
