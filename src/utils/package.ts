import { readProjectJsonSync } from './jsonc.js';

/**
 * Version from the package.json shipped next to the sources
 */
export function getVersion(): string {
  try {
    const version = readProjectJsonSync('package.json').version;
    return typeof version === 'string' ? version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}
