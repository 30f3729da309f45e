/**
 * Shared constants for the Strata CLI application
 * This file provides a single source of truth for file names,
 * selector syntax and project defaults.
 */

export const FILE_PATTERNS = {
  PROJECT_YML: 'strata_project.yml',
  RESOURCE_FILES: '**/*.{yml,yaml}',
} as const;

export const PROJECT_DEFAULTS = {
  RESOURCE_PATHS: ['models'],
  PACKAGES_INSTALL_PATH: 'strata_packages'
} as const;

/**
 * Selection language tokens.
 */
export const SELECTOR_SYNTAX = {
  PARENTS: '+',
  CHILDREN: '+',
  CHILDRENS_PARENTS: '@',
  WILDCARD: '*',
  PATH_SEPARATOR: '.',
  TAG_PREFIX: 'tag:',
  SOURCE_PREFIX: 'source:'
} as const;

export const DEFAULT_SELECTION = ['*'] as const;

export const RESOURCE_KINDS = ['model', 'source'] as const;

export const LS_OUTPUT_FORMATS = ['id', 'name', 'path', 'json'] as const;

/**
 * Package names must be usable as a single fqn segment.
 */
export const PACKAGE_NAME_PATTERN = /^[A-Za-z0-9_]+$/;
