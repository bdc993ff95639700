import pico from 'picocolors';
import type { Resolution, SnapshotPin } from '../types/index.js';

export function formatSnapshot(snapshot: SnapshotPin): string {
  return `${snapshot.name} ${pico.dim(`(${snapshot.url} ${snapshot.ref} @ ${snapshot.rev.slice(0, 12)})`)}`;
}

/**
 * Human readable report of a resolution
 */
export function formatResolution(resolution: Resolution, snapshot?: SnapshotPin): string {
  const lines: string[] = [];

  if (snapshot) {
    lines.push(`${pico.bold('Snapshot:')} ${formatSnapshot(snapshot)}`);
  }
  lines.push(`${pico.bold('Platform:')} ${resolution.platform}`);
  lines.push('');

  lines.push(pico.bold(`Dependencies (${resolution.dependencies.length}):`));
  if (resolution.dependencies.length === 0) {
    lines.push(pico.dim('  (none)'));
  }
  for (const dependency of resolution.dependencies) {
    lines.push(`  ${dependency}`);
  }
  lines.push('');

  const variables = Object.entries(resolution.environment);
  lines.push(pico.bold(`Environment (${variables.length}):`));
  if (variables.length === 0) {
    lines.push(pico.dim('  (none)'));
  }
  for (const [name, value] of variables) {
    lines.push(`  ${pico.cyan(name)}=${value.length > 0 ? value : pico.dim('(empty)')}`);
  }

  return lines.join('\n');
}
