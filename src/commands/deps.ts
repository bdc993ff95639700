import { Command } from 'commander';
import { getWorkingDirectory } from '../cli/context.js';
import { runResolvePipeline } from '../core/resolve-pipeline.js';
import { withErrorHandling } from '../utils/errors.js';
import { output } from '../utils/output.js';

interface DepsCommandOptions {
  platform?: string;
  file?: string;
}

export function setupDepsCommand(program: Command): void {
  program
    .command('deps')
    .description('List the dependency set, one package per line')
    .option('--platform <kind>', 'resolve for macos, linux or other instead of the host')
    .option('-f, --file <path>', 'declaration file')
    .action(withErrorHandling(async (options: DepsCommandOptions, command: Command) => {
      const { resolution } = await runResolvePipeline({
        cwd: getWorkingDirectory(command),
        file: options.file,
        platform: options.platform
      });
      for (const dependency of resolution.dependencies) {
        output.message(dependency);
      }
    }));
}
