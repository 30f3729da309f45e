/**
 * Common types and interfaces for the Strata CLI application
 */

// Resource types

export type ResourceKind = 'model' | 'source';

/**
 * Namespace path of a resource: package first, simple name last.
 */
export type Fqn = readonly string[];

export interface NodeMetadata {
  uniqueId: string;
  name: string;
  kind: ResourceKind;
  packageName: string;
  fqn: Fqn;
  tags: ReadonlySet<string>;
  /** Resource file the node was declared in, relative to its package root */
  originalFilePath?: string;
}

// strata_project.yml file types
export interface ProjectConfig {
  name: string;
  version?: string;
  'require-strata-version'?: string;
  'resource-paths': string[];
  'packages-install-path': string;
}

export interface LoadedPackage {
  config: ProjectConfig;
  /** Absolute path of the package root */
  rootDir: string;
  isRoot: boolean;
}

// Resource file types (models/*.yml)

export interface DependsOnEntry {
  ref?: string;
  source?: string;
}

export interface ModelDefinition {
  name: string;
  tags?: string[];
  depends_on?: DependsOnEntry[];
}

export interface SourceTableDefinition {
  name: string;
  tags?: string[];
}

export interface SourceDefinition {
  name: string;
  tags?: string[];
  tables: SourceTableDefinition[];
}

export interface ResourceFile {
  models?: ModelDefinition[];
  sources?: SourceDefinition[];
}

// Command option types

export type LsOutputFormat = 'id' | 'name' | 'path' | 'json';

export type ResourceTypeFilter = ResourceKind | 'all';

export interface LsOptions {
  select?: string[];
  exclude?: string[];
  resourceType?: ResourceTypeFilter;
  output?: LsOutputFormat;
}

export type GlobalOptions = {
  projectDir?: string;
  verbose?: boolean;
};

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class StrataError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'StrataError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  INVALID_SELECTOR = 'INVALID_SELECTOR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CATALOG_LOOKUP = 'CATALOG_LOOKUP',
  GRAPH_INTEGRITY = 'GRAPH_INTEGRITY',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
