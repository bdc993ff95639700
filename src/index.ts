#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import fs from 'fs/promises';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { initOutputMode } from './cli/context.js';

import { setupResolveCommand } from './commands/resolve.js';
import { setupDepsCommand } from './commands/deps.js';
import { setupEnvCommand } from './commands/env.js';
import { setupCheckCommand } from './commands/check.js';
import { setupShellCommand } from './commands/shell.js';
import { setupInitCommand } from './commands/init.js';

/**
 * devshell CLI - resolves a declared development shell environment
 */

const program = new Command();

program
  .name('devshell')
  .description('Resolve platform-specific dependencies and environment for a development shell')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .configureHelp({ sortSubcommands: true });

// === RESOLUTION ===
setupResolveCommand(program);
setupDepsCommand(program);
setupEnvCommand(program);

// === HOST ===
setupCheckCommand(program);
setupShellCommand(program);
setupInitCommand(program);

program.hook('preAction', async () => {
  initOutputMode();

  const opts = program.opts();
  if (typeof opts.cwd === 'string') {
    const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
    try {
      const stats = await fs.stat(resolvedCwd);
      if (!stats.isDirectory()) {
        throw new Error(`'${opts.cwd}' is not a directory`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Invalid --cwd: ${message}`);
      process.exit(1);
    }
  }
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  process.exit(1);
});

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Command failed', { error });
  process.exit(1);
});
