/**
 * Configuration Resolver
 *
 * Turns a platform indicator, the declared dependency groups and the
 * environment rules into a frozen dependency set and environment. Pure:
 * the host environment is only seen through `priorEnv`.
 */

import { join, resolve as resolvePath } from 'path';
import { DEFAULT_PATH_SEPARATOR } from '../constants/index.js';
import type {
  DependencySpec,
  EnvironmentRule,
  PackageLocations,
  PathListRule,
  PathSegment,
  PlatformGroups,
  PlatformKind,
  PriorEnvironment,
  Resolution,
  ResolvedEnvironment,
  TemplateRule
} from '../types/index.js';
import {
  MissingTemplateSourceError,
  UnresolvedExternalDependencyError,
  ValidationError
} from '../utils/errors.js';
import { flattenPlatformLists, groupApplies, parsePlatformKind } from './platform.js';

export interface ResolveOptions {
  rules?: readonly EnvironmentRule[];
  /** Host environment observed at call time; only read by appending rules */
  priorEnv?: PriorEnvironment;
  /** Base for `relative` path segments */
  workingDirectory?: string;
  /** Store paths for `package` segments, located before resolving */
  packageLocations?: PackageLocations;
  separator?: string;
}

const PLACEHOLDER_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export function resolve(
  platform: string,
  groups: PlatformGroups,
  options: ResolveOptions = {}
): Resolution {
  const kind = parsePlatformKind(platform);

  return Object.freeze({
    platform: kind,
    dependencies: resolveDependencySet(kind, groups),
    environment: resolveEnvironment(kind, options.rules ?? [], options)
  });
}

/**
 * Members of every group whose condition holds on the platform, base group
 * first, then macos, then linux.
 */
export function resolveDependencySet(
  platform: PlatformKind,
  groups: PlatformGroups
): readonly DependencySpec[] {
  const ordered = [groups.base, groups.macos, groups.linux];
  return Object.freeze(
    ordered.filter(group => groupApplies(group.condition, platform)).flatMap(group => group.members)
  );
}

export function resolveEnvironment(
  platform: PlatformKind,
  rules: readonly EnvironmentRule[],
  options: Omit<ResolveOptions, 'rules'> = {}
): ResolvedEnvironment {
  // Keyed by Map so names such as `__proto__` or `constructor` stay ordinary
  const resolved = new Map<string, string>();

  for (const rule of rules) {
    switch (rule.kind) {
      case 'literal':
        resolved.set(rule.name, rule.value);
        break;
      case 'template':
        resolved.set(rule.name, expandTemplate(rule, resolved));
        break;
      case 'pathList':
        resolved.set(rule.name, joinPathList(platform, rule, resolved, options));
        break;
    }
  }

  return Object.freeze(Object.fromEntries(resolved));
}

/**
 * Names referenced by `${NAME}` placeholders, in order of appearance.
 */
export function templatePlaceholders(template: string): string[] {
  return Array.from(template.matchAll(PLACEHOLDER_PATTERN), match => match[1]);
}

function expandTemplate(rule: TemplateRule, resolved: ReadonlyMap<string, string>): string {
  const placeholders = templatePlaceholders(rule.template);
  if (placeholders.length !== 1) {
    throw new ValidationError(
      `template of '${rule.name}' must contain exactly one \${NAME} placeholder, found ${placeholders.length}`,
      { rule: rule.name, template: rule.template }
    );
  }

  const source = placeholders[0];
  const value = lookupResolved(rule.name, source, resolved);
  return rule.template.replace(PLACEHOLDER_PATTERN, () => value);
}

function joinPathList(
  platform: PlatformKind,
  rule: PathListRule,
  resolved: ReadonlyMap<string, string>,
  options: Omit<ResolveOptions, 'rules'>
): string {
  const separator = options.separator ?? DEFAULT_PATH_SEPARATOR;
  const addition = flattenPlatformLists(platform, rule.segments)
    .map(segment => renderSegment(rule.name, segment, resolved, options))
    .filter(value => value.length > 0)
    .join(separator);

  if (!rule.append) {
    return addition;
  }

  const prior = ownValue(options.priorEnv, rule.name);
  if (!prior) {
    return addition;
  }
  return addition.length > 0 ? `${prior}${separator}${addition}` : prior;
}

function renderSegment(
  ruleName: string,
  segment: PathSegment,
  resolved: ReadonlyMap<string, string>,
  options: Omit<ResolveOptions, 'rules'>
): string {
  if (typeof segment === 'string') {
    return segment;
  }
  if ('from' in segment) {
    return lookupResolved(ruleName, segment.from, resolved);
  }
  if ('package' in segment) {
    const location = ownValue(options.packageLocations, segment.package);
    if (location === undefined) {
      throw new UnresolvedExternalDependencyError(segment.package, 'the located packages');
    }
    return segment.subdir === undefined ? location : join(location, segment.subdir);
  }
  if (options.workingDirectory === undefined) {
    throw new ValidationError(
      `rule '${ruleName}' has a relative segment '${segment.relative}' but no working directory was given`,
      { rule: ruleName, segment: segment.relative }
    );
  }
  return resolvePath(options.workingDirectory, segment.relative);
}

function lookupResolved(
  ruleName: string,
  source: string,
  resolved: ReadonlyMap<string, string>
): string {
  const value = resolved.get(source);
  if (value === undefined) {
    throw new MissingTemplateSourceError(ruleName, source);
  }
  return value;
}

/**
 * Own property only; inherited members such as `constructor` are not values.
 */
function ownValue(
  record: Readonly<Record<string, string | undefined>> | undefined,
  key: string
): string | undefined {
  if (record === undefined || !Object.prototype.hasOwnProperty.call(record, key)) {
    return undefined;
  }
  return record[key];
}
