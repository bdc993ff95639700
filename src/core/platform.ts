/**
 * Host platform classification
 */

import { PLATFORM_KINDS } from '../constants/index.js';
import type { GroupCondition, PlatformKind, PlatformLists } from '../types/index.js';
import { UnknownPlatformError, ValidationError } from '../utils/errors.js';

export function isPlatformKind(value: string): value is PlatformKind {
  return PLATFORM_KINDS.some(kind => kind === value);
}

/**
 * Parse a user-supplied platform indicator.
 * @throws UnknownPlatformError when the value is not a defined variant
 */
export function parsePlatformKind(value: string): PlatformKind {
  const normalized = value.trim().toLowerCase();
  if (!isPlatformKind(normalized)) {
    throw new UnknownPlatformError(value);
  }
  return normalized;
}

/**
 * Classify a Node.js platform identifier (`process.platform`).
 */
export function detectPlatform(nodePlatform: NodeJS.Platform = process.platform): PlatformKind {
  switch (nodePlatform) {
    case 'darwin':
      return 'macos';
    case 'linux':
      return 'linux';
    default:
      return 'other';
  }
}

/**
 * Pick the value for a platform. Every variant must be supplied, so a
 * platform can never select both branches or silently fall through.
 */
export function selectForPlatform<T>(
  platform: PlatformKind,
  choices: { readonly [K in PlatformKind]: T }
): T {
  switch (platform) {
    case 'macos':
      return choices.macos;
    case 'linux':
      return choices.linux;
    case 'other':
      return choices.other;
    default: {
      const unreachable: never = platform;
      throw new UnknownPlatformError(String(unreachable));
    }
  }
}

/**
 * Flatten platform-conditioned lists: `always` first, then the list for
 * the platform, if any.
 */
export function flattenPlatformLists<T>(platform: PlatformKind, lists: PlatformLists<T>): T[] {
  const conditional = selectForPlatform<readonly T[]>(platform, {
    macos: lists.macos ?? [],
    linux: lists.linux ?? [],
    other: []
  });
  return [...(lists.always ?? []), ...conditional];
}

/**
 * Whether a dependency group tagged with `condition` is included on `platform`.
 * `other` only ever takes `always` groups.
 */
export function groupApplies(condition: GroupCondition, platform: PlatformKind): boolean {
  switch (condition) {
    case 'always':
      return true;
    case 'macos-only':
      return platform === 'macos';
    case 'linux-only':
      return platform === 'linux';
    default: {
      const unreachable: never = condition;
      throw new ValidationError(`unknown group condition '${String(unreachable)}'`);
    }
  }
}
