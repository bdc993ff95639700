/**
 * Host-facing adapter: turns a resolved environment into shell exports or a
 * running interactive shell.
 */

import { spawn } from 'child_process';
import type { ExportFormat, PriorEnvironment, ResolvedEnvironment } from '../types/index.js';
import { EXPORT_FORMATS } from '../constants/index.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export function parseExportFormat(value: string): ExportFormat {
  const format = EXPORT_FORMATS.find(candidate => candidate === value);
  if (!format) {
    throw new ValidationError(`unknown export format '${value}' (expected ${EXPORT_FORMATS.join(', ')})`);
  }
  return format;
}

export function quoteSh(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function quoteFish(value: string): string {
  return `'${value.replace(/[\\']/g, match => `\\${match}`)}'`;
}

/**
 * Render the environment in a form the target shell can evaluate,
 * one variable per line in resolution order.
 */
export function renderExports(environment: ResolvedEnvironment, format: ExportFormat): string {
  const entries = Object.entries(environment);

  switch (format) {
    case 'sh':
      return entries.map(([name, value]) => `export ${name}=${quoteSh(value)}`).join('\n');
    case 'fish':
      return entries.map(([name, value]) => `set -gx ${name} ${quoteFish(value)}`).join('\n');
    case 'json':
      return JSON.stringify(environment, null, 2);
  }
}

/**
 * Overlay resolved values on the prior environment. Returns a new object.
 */
export function mergeEnvironment(
  prior: PriorEnvironment,
  environment: ResolvedEnvironment
): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const [name, value] of Object.entries(prior)) {
    if (value !== undefined) {
      merged[name] = value;
    }
  }
  return Object.assign(merged, environment);
}

export interface LaunchShellOptions {
  shell: string;
  env: Record<string, string>;
  cwd: string;
}

/**
 * Start an interactive shell with the given environment and wait for it.
 * @returns the shell's exit code
 */
export function launchShell(options: LaunchShellOptions): Promise<number> {
  logger.debug(`Launching shell: ${options.shell}`, { cwd: options.cwd });

  return new Promise((resolve, reject) => {
    const child = spawn(options.shell, [], {
      cwd: options.cwd,
      env: options.env,
      stdio: 'inherit'
    });

    child.on('error', reject);
    child.on('exit', (code, signal) => {
      if (signal) {
        logger.debug(`Shell terminated by signal ${signal}`);
      }
      resolve(code ?? 1);
    });
  });
}
