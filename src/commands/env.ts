import { Command } from 'commander';
import { getWorkingDirectory } from '../cli/context.js';
import { runResolvePipeline } from '../core/resolve-pipeline.js';
import { parseExportFormat, renderExports } from '../core/shell-adapter.js';
import { withErrorHandling } from '../utils/errors.js';
import { output } from '../utils/output.js';

/**
 * Prints exports for `eval "$(devshell env)"`
 */

interface EnvCommandOptions {
  format: string;
  platform?: string;
  file?: string;
}

export function setupEnvCommand(program: Command): void {
  program
    .command('env')
    .description('Print the environment as shell exports')
    .option('--format <format>', 'sh, fish or json', 'sh')
    .option('--platform <kind>', 'resolve for macos, linux or other instead of the host')
    .option('-f, --file <path>', 'declaration file')
    .action(withErrorHandling(async (options: EnvCommandOptions, command: Command) => {
      const format = parseExportFormat(options.format);
      const { resolution } = await runResolvePipeline({
        cwd: getWorkingDirectory(command),
        file: options.file,
        platform: options.platform
      });
      const rendered = renderExports(resolution.environment, format);
      if (rendered.length > 0) {
        output.message(rendered);
      }
    }));
}
