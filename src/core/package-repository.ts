/**
 * Package repository port
 *
 * Locating packages is delegated to a client; devshell never fetches or
 * builds anything itself.
 */

import { join } from 'path';
import type {
  DependencySpec,
  EnvironmentRule,
  LocatedDependency,
  PackageLocations,
  PlatformKind
} from '../types/index.js';
import { UnresolvedExternalDependencyError } from '../utils/errors.js';
import { isDirectory, listEntries } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { flattenPlatformLists } from './platform.js';

export interface PackageRepositoryClient {
  /** Human readable description used in error messages */
  readonly name: string;
  locate(spec: DependencySpec): Promise<string | undefined>;
}

const STORE_HASH = '[0-9a-z]{32}';

/**
 * Looks packages up in a content-addressed store directory whose entries are
 * named `<hash>-<name>-<version>`, `<hash>-<name>` or plain `<name>`.
 * The last dotted segment of an attribute path is the package name, so
 * `xorg.libX11` matches `...-libX11-1.6.12`.
 */
export class StoreDirectoryClient implements PackageRepositoryClient {
  readonly name: string;
  private entries: Promise<string[]> | null = null;

  constructor(private readonly storeDir: string) {
    this.name = `store ${storeDir}`;
  }

  async locate(spec: DependencySpec): Promise<string | undefined> {
    const matcher = storeEntryMatcher(spec);
    const entries = await this.listStore();
    const match = entries.find(entry => matcher.test(entry));
    return match === undefined ? undefined : join(this.storeDir, match);
  }

  private listStore(): Promise<string[]> {
    if (!this.entries) {
      this.entries = this.readStore();
    }
    return this.entries;
  }

  private async readStore(): Promise<string[]> {
    if (!(await isDirectory(this.storeDir))) {
      logger.warn(`Package store not found: ${this.storeDir}`);
      return [];
    }
    const entries = await listEntries(this.storeDir);
    logger.debug(`Read ${entries.length} store entries from ${this.storeDir}`);
    return entries;
  }
}

export function packageNameOf(spec: DependencySpec): string {
  const segments = spec.split('.');
  return segments[segments.length - 1];
}

export function storeEntryMatcher(spec: DependencySpec): RegExp {
  const name = packageNameOf(spec).replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`^(?:${STORE_HASH}-)?${name}(?:-\\d[^/]*)?$`);
}

/**
 * Locate every dependency in order. The first miss aborts the whole check;
 * there is no partial result and no retry.
 * @throws UnresolvedExternalDependencyError naming the missing dependency
 */
export async function verifyDependencies(
  dependencies: readonly DependencySpec[],
  client: PackageRepositoryClient
): Promise<LocatedDependency[]> {
  const located: LocatedDependency[] = [];

  for (const spec of dependencies) {
    const path = await client.locate(spec);
    if (path === undefined) {
      throw new UnresolvedExternalDependencyError(spec, client.name);
    }
    logger.debug(`Located ${spec} at ${path}`);
    located.push({ spec, path });
  }

  return located;
}

/**
 * Packages referenced by `package` segments of the rules active on the
 * platform, each listed once in rule order.
 */
export function rulePackages(platform: PlatformKind, rules: readonly EnvironmentRule[]): DependencySpec[] {
  const specs = new Set<DependencySpec>();
  for (const rule of rules) {
    if (rule.kind !== 'pathList') continue;
    for (const segment of flattenPlatformLists(platform, rule.segments)) {
      if (typeof segment !== 'string' && 'package' in segment) {
        specs.add(segment.package);
      }
    }
  }
  return [...specs];
}

/**
 * Locate the packages the rules point into, so the resolver can stay pure.
 * @throws UnresolvedExternalDependencyError for the first package not found
 */
export async function locateRulePackages(
  platform: PlatformKind,
  rules: readonly EnvironmentRule[],
  client: PackageRepositoryClient
): Promise<PackageLocations> {
  const located = await verifyDependencies(rulePackages(platform, rules), client);
  return Object.freeze(Object.fromEntries(located.map(({ spec, path }): [DependencySpec, string] => [spec, path])));
}
