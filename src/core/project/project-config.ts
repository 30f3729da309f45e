import { join } from 'path';
import * as semver from 'semver';
import type { ProjectConfig } from '../../types/index.js';
import { FILE_PATTERNS, PACKAGE_NAME_PATTERN, PROJECT_DEFAULTS } from '../../constants/index.js';
import { ConfigError } from '../../utils/errors.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { getVersion } from '../../utils/package.js';
import { loadYamlText } from '../../utils/yaml-helper.js';

export function getProjectYmlPath(projectDir: string): string {
  return join(projectDir, FILE_PATTERNS.PROJECT_YML);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readOptionalString(raw: Record<string, unknown>, key: string, file: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new ConfigError(`${file}: '${key}' must be a string`, { file, key });
  }
  return String(value);
}

function readPathList(raw: Record<string, unknown>, key: string, file: string, fallback: readonly string[]): string[] {
  const value = raw[key];
  if (value === undefined || value === null) {
    return [...fallback];
  }
  const list = typeof value === 'string' ? [value] : value;
  if (!Array.isArray(list) || list.length === 0 || !list.every(item => typeof item === 'string' && item.length > 0)) {
    throw new ConfigError(`${file}: '${key}' must be a non-empty list of paths`, { file, key });
  }
  return list;
}

/**
 * Validate a parsed strata_project.yml document and apply defaults.
 */
export function parseProjectConfig(raw: unknown, file: string, toolVersion: string = getVersion()): ProjectConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${file} must contain a mapping`, { file });
  }

  const name = readOptionalString(raw, 'name', file);
  if (!name) {
    throw new ConfigError(`${file} must contain a name field`, { file });
  }
  if (!PACKAGE_NAME_PATTERN.test(name)) {
    throw new ConfigError(`${file}: name '${name}' may only contain letters, digits and underscores`, { file, name });
  }

  const version = readOptionalString(raw, 'version', file);
  if (version !== undefined && !semver.valid(version)) {
    throw new ConfigError(`${file}: version '${version}' is not a valid semver version`, { file, version });
  }

  const requiredRange = readOptionalString(raw, 'require-strata-version', file);
  if (requiredRange !== undefined) {
    if (!semver.validRange(requiredRange)) {
      throw new ConfigError(`${file}: 'require-strata-version' has an invalid range '${requiredRange}'`, { file });
    }
    if (!semver.satisfies(toolVersion, requiredRange)) {
      throw new ConfigError(
        `Package '${name}' requires strata ${requiredRange}, but the installed version is ${toolVersion}`,
        { file, requiredRange, toolVersion }
      );
    }
  }

  const packagesInstallPath = readOptionalString(raw, 'packages-install-path', file) ?? PROJECT_DEFAULTS.PACKAGES_INSTALL_PATH;

  const config: ProjectConfig = {
    name,
    'resource-paths': readPathList(raw, 'resource-paths', file, PROJECT_DEFAULTS.RESOURCE_PATHS),
    'packages-install-path': packagesInstallPath
  };
  if (version !== undefined) {
    config.version = version;
  }
  if (requiredRange !== undefined) {
    config['require-strata-version'] = requiredRange;
  }
  return config;
}

/**
 * Load strata_project.yml from a project or package directory.
 */
export async function loadProjectConfig(projectDir: string, toolVersion?: string): Promise<ProjectConfig> {
  const file = getProjectYmlPath(projectDir);
  if (!(await exists(file))) {
    throw new ConfigError(`No ${FILE_PATTERNS.PROJECT_YML} found in ${projectDir}`, { projectDir });
  }

  logger.debug(`Loading project config from: ${file}`);
  const raw = loadYamlText(await readTextFile(file), file);
  return parseProjectConfig(raw, file, toolVersion);
}
