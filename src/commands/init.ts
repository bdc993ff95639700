import { join } from 'path';
import { Command } from 'commander';
import { confirm, isCancel } from '@clack/prompts';
import { getWorkingDirectory, initOutputMode } from '../cli/context.js';
import { parseDeclaration } from '../core/declaration.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { UserCancellationError, ValidationError, withErrorHandling } from '../utils/errors.js';
import { exists, readTextFile, writeTextFile } from '../utils/fs.js';
import { getProjectRoot } from '../utils/jsonc.js';
import { output } from '../utils/output.js';

interface InitCommandOptions {
  force?: boolean;
}

export function getTemplatePath(): string {
  return join(getProjectRoot(), FILE_PATTERNS.TEMPLATE_DIR, FILE_PATTERNS.DECLARATION_YML);
}

/**
 * Write the starter declaration into `cwd`.
 * @returns the path written
 */
export async function writeStarterDeclaration(cwd: string, overwrite: boolean): Promise<string> {
  const target = join(cwd, FILE_PATTERNS.DECLARATION_YML);
  if ((await exists(target)) && !overwrite) {
    throw new ValidationError(`${target} already exists (use --force to overwrite)`, { path: target });
  }

  const template = await readTextFile(getTemplatePath());
  // A broken bundled template should fail here rather than on first resolve
  parseDeclaration(template, getTemplatePath());
  await writeTextFile(target, template);
  return target;
}

async function confirmOverwrite(path: string): Promise<boolean> {
  const answer = await confirm({ message: `${path} exists. Overwrite?`, initialValue: false });
  if (isCancel(answer)) {
    throw new UserCancellationError();
  }
  return answer;
}

export function setupInitCommand(program: Command): void {
  program
    .command('init')
    .description(`Create a starter ${FILE_PATTERNS.DECLARATION_YML}`)
    .option('--force', 'overwrite an existing declaration')
    .action(withErrorHandling(async (options: InitCommandOptions, command: Command) => {
      const cwd = getWorkingDirectory(command);
      const existing = join(cwd, FILE_PATTERNS.DECLARATION_YML);
      let overwrite = options.force === true;

      if (!overwrite && initOutputMode() && (await exists(existing))) {
        overwrite = await confirmOverwrite(existing);
        if (!overwrite) {
          throw new UserCancellationError();
        }
      }

      const written = await writeStarterDeclaration(cwd, overwrite);
      output.success(`Created ${written}`);
    }));
}
