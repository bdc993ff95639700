/**
 * devshell.yml loading and validation
 */

import * as yaml from 'js-yaml';
import { isAbsolute } from 'path';
import { VARIABLE_NAME_PATTERN } from '../constants/index.js';
import type {
  Declaration,
  DependencyGroup,
  DependencySpec,
  EnvironmentRule,
  PathSegment,
  PlatformLists,
  SnapshotPin
} from '../types/index.js';
import { ValidationError } from '../utils/errors.js';
import { readTextFile } from '../utils/fs.js';
import { isJsonObject, type JsonObject } from '../utils/jsonc.js';
import { logger } from '../utils/logger.js';
import { templatePlaceholders } from './resolver.js';

const PLATFORM_LIST_KEYS = ['always', 'macos', 'linux'] as const;
const RULE_VALUE_KEYS = ['value', 'template', 'paths'] as const;
const COMMIT_PATTERN = /^[0-9a-f]{40}$/;
const SEGMENT_FORMS = 'must be a path, { from: NAME }, { relative: DIR } or { package: NAME, subdir: DIR }';

/**
 * Read and validate a declaration file
 */
export async function loadDeclaration(path: string): Promise<Declaration> {
  logger.debug(`Loading declaration from: ${path}`);
  const content = await readTextFile(path);
  return parseDeclaration(content, path);
}

/**
 * Parse declaration YAML. All problems are collected and reported together.
 * @throws ValidationError listing every problem found
 */
export function parseDeclaration(content: string, source: string = 'devshell.yml'): Declaration {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`${source} is not valid YAML: ${reason}`, { source });
  }

  if (!isJsonObject(parsed)) {
    throw new ValidationError(`${source} must contain a mapping at the top level`, { source });
  }

  const errors: string[] = [];
  const snapshot = parsed.snapshot === undefined ? undefined : parseSnapshot(parsed.snapshot, errors);
  const dependencies = parseDependencyLists(parsed.dependencies, errors);
  const rules = parseRules(parsed.environment, errors);

  if (errors.length > 0) {
    throw new ValidationError(
      `${source} is invalid:\n  - ${errors.join('\n  - ')}`,
      { source, errors }
    );
  }

  return {
    snapshot,
    groups: {
      base: group('base', 'always', dependencies.always),
      macos: group('macos', 'macos-only', dependencies.macos),
      linux: group('linux', 'linux-only', dependencies.linux)
    },
    rules
  };
}

function group(
  name: string,
  condition: DependencyGroup['condition'],
  members: readonly DependencySpec[] | undefined
): DependencyGroup {
  return { name, condition, members: members ?? [] };
}

function parseSnapshot(value: unknown, errors: string[]): SnapshotPin | undefined {
  if (!isJsonObject(value)) {
    errors.push('snapshot: must be a mapping with name, url, ref and rev');
    return undefined;
  }

  const fields = {
    name: requireString(value, 'name', 'snapshot', errors),
    url: requireString(value, 'url', 'snapshot', errors),
    ref: requireString(value, 'ref', 'snapshot', errors),
    rev: requireString(value, 'rev', 'snapshot', errors)
  };
  if (fields.rev !== undefined && !COMMIT_PATTERN.test(fields.rev)) {
    errors.push(`snapshot.rev: '${fields.rev}' is not a 40 character commit id`);
  }

  const { name, url, ref, rev } = fields;
  if (name === undefined || url === undefined || ref === undefined || rev === undefined) {
    return undefined;
  }
  return { name, url, ref, rev };
}

function parseDependencyLists(value: unknown, errors: string[]): PlatformLists<DependencySpec> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isJsonObject(value)) {
    errors.push('dependencies: must be a mapping of always, macos and linux lists');
    return {};
  }

  rejectUnknownKeys(value, PLATFORM_LIST_KEYS, 'dependencies', errors);
  const lists: PlatformLists<DependencySpec> = {};
  for (const key of PLATFORM_LIST_KEYS) {
    const entries = value[key];
    if (entries === undefined || entries === null) continue;
    if (!Array.isArray(entries)) {
      errors.push(`dependencies.${key}: must be a list`);
      continue;
    }

    const specs: DependencySpec[] = [];
    entries.forEach((entry: unknown, index) => {
      if (typeof entry === 'string' && entry.trim().length > 0) {
        specs.push(entry.trim());
      } else {
        errors.push(`dependencies.${key}[${index}]: must be a non-empty package name`);
      }
    });
    lists[key] = specs;
  }
  return lists;
}

function parseRules(value: unknown, errors: string[]): EnvironmentRule[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    errors.push('environment: must be a list of rules');
    return [];
  }

  const rules: EnvironmentRule[] = [];
  const seen = new Set<string>();

  value.forEach((entry: unknown, index) => {
    const location = `environment[${index}]`;
    if (!isJsonObject(entry)) {
      errors.push(`${location}: must be a mapping`);
      return;
    }

    const name = requireString(entry, 'name', location, errors);
    if (name === undefined) return;
    if (!VARIABLE_NAME_PATTERN.test(name)) {
      errors.push(`${location}.name: '${name}' is not a valid environment variable name`);
      return;
    }
    if (seen.has(name)) {
      errors.push(`${location}.name: '${name}' is already defined by an earlier rule`);
      return;
    }
    seen.add(name);

    const rule = parseRule(entry, name, location, errors);
    if (rule) {
      rules.push(rule);
    }
  });

  return rules;
}

function parseRule(
  entry: JsonObject,
  name: string,
  location: string,
  errors: string[]
): EnvironmentRule | undefined {
  const present = RULE_VALUE_KEYS.filter(key => entry[key] !== undefined);
  if (present.length !== 1) {
    errors.push(`${location}: '${name}' must set exactly one of value, template or paths`);
    return undefined;
  }
  if (entry.append !== undefined && present[0] !== 'paths') {
    errors.push(`${location}.append: only path list rules can append`);
    return undefined;
  }

  switch (present[0]) {
    case 'value': {
      const value = requireString(entry, 'value', location, errors);
      return value === undefined ? undefined : { kind: 'literal', name, value };
    }
    case 'template': {
      const template = requireString(entry, 'template', location, errors);
      if (template === undefined) return undefined;
      const count = templatePlaceholders(template).length;
      if (count !== 1) {
        errors.push(`${location}.template: must contain exactly one \${NAME} placeholder, found ${count}`);
        return undefined;
      }
      return { kind: 'template', name, template };
    }
    case 'paths': {
      const segments = parseSegmentLists(entry.paths, `${location}.paths`, errors);
      if (entry.append !== undefined && typeof entry.append !== 'boolean') {
        errors.push(`${location}.append: must be true or false`);
        return undefined;
      }
      return segments === undefined
        ? undefined
        : { kind: 'pathList', name, segments, append: entry.append === true };
    }
  }
}

function parseSegmentLists(
  value: unknown,
  location: string,
  errors: string[]
): PlatformLists<PathSegment> | undefined {
  // A bare list is shorthand for `always`
  const lists = Array.isArray(value) ? { always: value } : value;
  if (!isJsonObject(lists)) {
    errors.push(`${location}: must be a list or a mapping of always, macos and linux lists`);
    return undefined;
  }

  rejectUnknownKeys(lists, PLATFORM_LIST_KEYS, location, errors);
  const result: PlatformLists<PathSegment> = {};
  let valid = true;

  for (const key of PLATFORM_LIST_KEYS) {
    const entries = lists[key];
    if (entries === undefined || entries === null) continue;
    if (!Array.isArray(entries)) {
      errors.push(`${location}.${key}: must be a list`);
      valid = false;
      continue;
    }

    const segments: PathSegment[] = [];
    entries.forEach((entry: unknown, index) => {
      const segment = parseSegment(entry);
      if (segment === undefined) {
        errors.push(`${location}.${key}[${index}]: ${SEGMENT_FORMS}`);
        valid = false;
      } else {
        segments.push(segment);
      }
    });
    result[key] = segments;
  }

  return valid ? result : undefined;
}

function parseSegment(entry: unknown): PathSegment | undefined {
  if (typeof entry === 'string') {
    return entry;
  }
  if (!isJsonObject(entry)) {
    return undefined;
  }
  if (typeof entry.package === 'string') {
    return parsePackageSegment(entry, entry.package);
  }
  if (Object.keys(entry).length !== 1) {
    return undefined;
  }
  if (typeof entry.from === 'string' && VARIABLE_NAME_PATTERN.test(entry.from)) {
    return { from: entry.from };
  }
  if (typeof entry.relative === 'string' && entry.relative.length > 0) {
    return { relative: entry.relative };
  }
  return undefined;
}

function parsePackageSegment(entry: JsonObject, spec: string): PathSegment | undefined {
  const extra = Object.keys(entry).filter(key => key !== 'package' && key !== 'subdir');
  if (spec.trim().length === 0 || extra.length > 0) {
    return undefined;
  }
  if (entry.subdir === undefined) {
    return { package: spec.trim() };
  }
  if (typeof entry.subdir !== 'string' || entry.subdir.length === 0 || isAbsolute(entry.subdir)) {
    return undefined;
  }
  return { package: spec.trim(), subdir: entry.subdir };
}

function requireString(
  value: JsonObject,
  key: string,
  location: string,
  errors: string[]
): string | undefined {
  const field = value[key];
  if (typeof field !== 'string') {
    errors.push(`${location}.${key}: must be a string`);
    return undefined;
  }
  return field;
}

function rejectUnknownKeys(
  value: JsonObject,
  allowed: readonly string[],
  location: string,
  errors: string[]
): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      errors.push(`${location}.${key}: unknown key (expected ${allowed.join(', ')})`);
    }
  }
}
