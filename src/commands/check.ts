import { Command } from 'commander';
import { getWorkingDirectory } from '../cli/context.js';
import { StoreDirectoryClient, verifyDependencies } from '../core/package-repository.js';
import { runResolvePipeline } from '../core/resolve-pipeline.js';
import { withErrorHandling } from '../utils/errors.js';
import { output } from '../utils/output.js';

interface CheckCommandOptions {
  store?: string;
  platform?: string;
  file?: string;
}

export function setupCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Verify every dependency can be located in the package store')
    .option('--store <dir>', 'package store directory')
    .option('--platform <kind>', 'resolve for macos, linux or other instead of the host')
    .option('-f, --file <path>', 'declaration file')
    .action(withErrorHandling(async (options: CheckCommandOptions, command: Command) => {
      const { resolution, repository: client } = await runResolvePipeline({
        cwd: getWorkingDirectory(command),
        file: options.file,
        platform: options.platform,
        repository: options.store === undefined ? undefined : new StoreDirectoryClient(options.store)
      });

      output.info(`Locating ${resolution.dependencies.length} dependencies in ${client.name}`);
      const located = await verifyDependencies(resolution.dependencies, client);

      for (const { spec, path } of located) {
        output.message(`${spec}\t${path}`);
      }
      output.success(`All ${located.length} dependencies located in ${client.name}`);
    }));
}
