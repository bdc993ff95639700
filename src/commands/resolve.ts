import { Command } from 'commander';
import { getWorkingDirectory } from '../cli/context.js';
import { runResolvePipeline } from '../core/resolve-pipeline.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatResolution } from '../utils/formatters.js';
import { output } from '../utils/output.js';

interface ResolveCommandOptions {
  platform?: string;
  file?: string;
  json?: boolean;
}

async function resolveCommand(options: ResolveCommandOptions, command: Command): Promise<void> {
  const { declaration, resolution } = await runResolvePipeline({
    cwd: getWorkingDirectory(command),
    file: options.file,
    platform: options.platform
  });

  if (options.json) {
    output.message(JSON.stringify({ snapshot: declaration.snapshot ?? null, ...resolution }, null, 2));
    return;
  }
  output.message(formatResolution(resolution, declaration.snapshot));
}

export function setupResolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Show the dependency set and environment for this platform')
    .option('--platform <kind>', 'resolve for macos, linux or other instead of the host')
    .option('-f, --file <path>', 'declaration file')
    .option('--json', 'print machine readable output')
    .action(withErrorHandling(async (options: ResolveCommandOptions, command: Command) => {
      await resolveCommand(options, command);
    }));
}
