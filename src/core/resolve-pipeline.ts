import { delimiter, resolve as resolvePath } from 'path';
import type { Declaration, DevshellConfig, PriorEnvironment, Resolution } from '../types/index.js';
import { FileSystemError } from '../utils/errors.js';
import { exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { configManager as defaultConfigManager, type ConfigManager } from './config.js';
import { loadDeclaration } from './declaration.js';
import {
  locateRulePackages,
  StoreDirectoryClient,
  type PackageRepositoryClient
} from './package-repository.js';
import { detectPlatform, parsePlatformKind } from './platform.js';
import { resolve } from './resolver.js';

export interface ResolvePipelineOptions {
  cwd: string;
  /** Declaration path; defaults to the configured file name inside cwd */
  file?: string;
  /** Platform override; defaults to the host platform */
  platform?: string;
  /** Host environment; defaults to process.env */
  env?: PriorEnvironment;
  config?: ConfigManager;
  /** Package store; defaults to the configured store directory */
  repository?: PackageRepositoryClient;
}

export interface ResolvePipelineResult {
  declarationPath: string;
  declaration: Declaration;
  resolution: Resolution;
  config: DevshellConfig;
  repository: PackageRepositoryClient;
}

/**
 * Load configuration and the declaration, locate the packages its rules point
 * into, then resolve once for the platform.
 */
export async function runResolvePipeline(options: ResolvePipelineOptions): Promise<ResolvePipelineResult> {
  const config = await (options.config ?? defaultConfigManager).load();
  const declarationPath = resolvePath(options.cwd, options.file ?? config.declarationFile);

  if (!(await exists(declarationPath))) {
    throw new FileSystemError(`Declaration not found: ${declarationPath} (run 'devshell init' to create one)`, {
      path: declarationPath
    });
  }

  const declaration = await loadDeclaration(declarationPath);
  const platform = options.platform === undefined ? detectPlatform() : parsePlatformKind(options.platform);
  const repository = options.repository ?? new StoreDirectoryClient(config.storeDir);
  logger.debug(`Resolving ${declarationPath} for platform ${platform}`);

  const packageLocations = await locateRulePackages(platform, declaration.rules, repository);
  const resolution = resolve(platform, declaration.groups, {
    rules: declaration.rules,
    priorEnv: options.env ?? process.env,
    workingDirectory: options.cwd,
    packageLocations,
    separator: delimiter
  });

  logger.debug('Resolution complete', {
    dependencies: resolution.dependencies.length,
    variables: Object.keys(resolution.environment)
  });

  return { declarationPath, declaration, resolution, config, repository };
}
