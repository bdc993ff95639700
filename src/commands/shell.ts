import { Command } from 'commander';
import { getWorkingDirectory } from '../cli/context.js';
import { verifyDependencies } from '../core/package-repository.js';
import { runResolvePipeline } from '../core/resolve-pipeline.js';
import { launchShell, mergeEnvironment } from '../core/shell-adapter.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

interface ShellCommandOptions {
  shell?: string;
  check: boolean;
  platform?: string;
  file?: string;
}

const FALLBACK_SHELL = '/bin/sh';

export function setupShellCommand(program: Command): void {
  program
    .command('shell')
    .description('Start an interactive shell with the resolved environment')
    .option('--shell <path>', 'shell to launch')
    .option('--no-check', 'skip locating dependencies before launching')
    .option('--platform <kind>', 'resolve for macos, linux or other instead of the host')
    .option('-f, --file <path>', 'declaration file')
    .action(withErrorHandling(async (options: ShellCommandOptions, command: Command) => {
      const cwd = getWorkingDirectory(command);
      const { resolution, config, repository } = await runResolvePipeline({
        cwd,
        file: options.file,
        platform: options.platform
      });

      if (options.check) {
        await verifyDependencies(resolution.dependencies, repository);
      }

      const shell = options.shell ?? config.shell ?? process.env.SHELL ?? FALLBACK_SHELL;
      const exitCode = await launchShell({
        shell,
        cwd,
        env: mergeEnvironment(process.env, resolution.environment)
      });
      logger.debug(`Shell exited with code ${exitCode}`);
      process.exitCode = exitCode;
    }));
}
