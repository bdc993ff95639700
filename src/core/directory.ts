import * as os from 'os';
import * as path from 'path';
import { DevshellDirectories } from '../types/index.js';
import { DIR_PATTERNS } from '../constants/index.js';

/**
 * devshell directories, using the dotfile convention (~/.devshell) on every platform
 */
export function getDevshellDirectories(homeDir: string = os.homedir()): DevshellDirectories {
  return {
    config: path.join(homeDir, DIR_PATTERNS.DEVSHELL)
  };
}
