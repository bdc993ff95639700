/**
 * Common types and interfaces for the devshell CLI
 */

// Platform types
export type PlatformKind = 'macos' | 'linux' | 'other';

export type GroupCondition = 'always' | 'macos-only' | 'linux-only';

/**
 * Name of an external package, resolved by a package repository client.
 * Attribute paths such as `xorg.libX11` are allowed.
 */
export type DependencySpec = string;

export interface DependencyGroup {
  name: string;
  condition: GroupCondition;
  members: readonly DependencySpec[];
}

export interface PlatformGroups {
  base: DependencyGroup;
  macos: DependencyGroup;
  linux: DependencyGroup;
}

/**
 * Ordered lists keyed by the platform condition they apply under.
 * Missing keys mean an empty list.
 */
export interface PlatformLists<T> {
  always?: readonly T[];
  macos?: readonly T[];
  linux?: readonly T[];
}

// Environment rule types
/**
 * Directory inside a located package, e.g. `{ package: libunwind, subdir: lib }`
 */
export interface PackageSegment {
  package: DependencySpec;
  subdir?: string;
}

export type PathSegment =
  | string
  | { from: string }
  | { relative: string }
  | PackageSegment;

export interface LiteralRule {
  kind: 'literal';
  name: string;
  value: string;
}

export interface TemplateRule {
  kind: 'template';
  name: string;
  template: string;
}

export interface PathListRule {
  kind: 'pathList';
  name: string;
  segments: PlatformLists<PathSegment>;
  append: boolean;
}

export type EnvironmentRule = LiteralRule | TemplateRule | PathListRule;

export type ResolvedEnvironment = Readonly<Record<string, string>>;

export type PriorEnvironment = Readonly<Record<string, string | undefined>>;

/** Store path of every package referenced by a `package` segment */
export type PackageLocations = Readonly<Record<DependencySpec, string>>;

export interface Resolution {
  platform: PlatformKind;
  dependencies: readonly DependencySpec[];
  environment: ResolvedEnvironment;
}

// Declaration types
export interface SnapshotPin {
  name: string;
  url: string;
  ref: string;
  rev: string;
}

export interface Declaration {
  snapshot?: SnapshotPin;
  groups: PlatformGroups;
  rules: readonly EnvironmentRule[];
}

// Application types
export interface DevshellDirectories {
  config: string;
}

export interface DevshellConfig {
  declarationFile: string;
  storeDir: string;
  shell?: string;
}

export type ExportFormat = 'sh' | 'fish' | 'json';

export interface LocatedDependency {
  spec: DependencySpec;
  path: string;
}

// Logger types
export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

// Command result types
export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class DevshellError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DevshellError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  UNKNOWN_PLATFORM = 'UNKNOWN_PLATFORM',
  MISSING_TEMPLATE_SOURCE = 'MISSING_TEMPLATE_SOURCE',
  UNRESOLVED_EXTERNAL_DEPENDENCY = 'UNRESOLVED_EXTERNAL_DEPENDENCY',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}
