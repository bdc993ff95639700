import { resolve } from 'path';
import type { Command } from 'commander';
import { setOutputMode } from '../utils/output.js';

/**
 * Working directory for a command: the global --cwd option when set,
 * otherwise the process cwd.
 */
export function getWorkingDirectory(command: Command): string {
  const { cwd } = command.optsWithGlobals();
  return typeof cwd === 'string' ? resolve(process.cwd(), cwd) : process.cwd();
}

/**
 * Interactive UI only when both ends are terminals; piped output stays plain.
 */
export function initOutputMode(): boolean {
  const interactive = Boolean(process.stdin.isTTY && process.stdout.isTTY);
  setOutputMode(interactive);
  return interactive;
}
