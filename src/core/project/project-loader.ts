/**
 * Project loading
 *
 * Reads the root project and its installed packages, parses their resource
 * files and builds the dependency graph and resource catalog that selection
 * runs against. Graph integrity (unique ids, resolvable references, no
 * cycles) is enforced here, not during selection.
 */

import { dirname, join, relative, resolve, sep } from 'path';
import type { DependsOnEntry, LoadedPackage, NodeMetadata } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { ConfigError, GraphIntegrityError } from '../../utils/errors.js';
import { findMatchingFiles } from '../../utils/file-walker.js';
import { exists, isDirectory, listDirectories, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { loadYamlText } from '../../utils/yaml-helper.js';
import { DependencyGraph, findCycles } from '../graph/dependency-graph.js';
import { InMemoryResourceCatalog } from '../graph/resource-catalog.js';
import { getProjectYmlPath, loadProjectConfig } from './project-config.js';
import { parseResourceFile } from './resource-file.js';

export interface LoadedProject {
  project: LoadedPackage;
  /** Root project first, then installed packages by name */
  packages: LoadedPackage[];
  graph: DependencyGraph;
  catalog: InMemoryResourceCatalog;
}

export interface LoadProjectOptions {
  /** Version checked against require-strata-version (defaults to the CLI's own) */
  toolVersion?: string;
}

export interface PendingNode {
  metadata: NodeMetadata;
  dependsOn: DependsOnEntry[];
}

export function modelUniqueId(packageName: string, name: string): string {
  return `model.${packageName}.${name}`;
}

export function sourceUniqueId(packageName: string, sourceName: string, tableName: string): string {
  return `source.${packageName}.${sourceName}.${tableName}`;
}

async function loadInstalledPackages(project: LoadedPackage, toolVersion?: string): Promise<LoadedPackage[]> {
  const installDir = join(project.rootDir, project.config['packages-install-path']);
  if (!(await isDirectory(installDir))) {
    return [];
  }

  const packages: LoadedPackage[] = [];
  for (const entry of await listDirectories(installDir)) {
    const rootDir = join(installDir, entry);
    if (!(await exists(getProjectYmlPath(rootDir)))) {
      logger.debug(`Skipping ${rootDir}: no ${FILE_PATTERNS.PROJECT_YML}`);
      continue;
    }
    const config = await loadProjectConfig(rootDir, toolVersion);
    packages.push({ config, rootDir, isRoot: false });
  }
  return packages;
}

async function collectPackageNodes(pkg: LoadedPackage): Promise<PendingNode[]> {
  const packageName = pkg.config.name;
  const pending: PendingNode[] = [];

  for (const resourcePath of pkg.config['resource-paths']) {
    const resourceDir = join(pkg.rootDir, resourcePath);
    if (!(await isDirectory(resourceDir))) {
      logger.debug(`Resource path ${resourceDir} does not exist, skipping`);
      continue;
    }

    for (const file of await findMatchingFiles(resourceDir, FILE_PATTERNS.RESOURCE_FILES)) {
      const originalFilePath = relative(pkg.rootDir, file).split(sep).join('/');
      const relDir = relative(resourceDir, dirname(file));
      const directorySegments = relDir === '' ? [] : relDir.split(sep);
      const resources = parseResourceFile(loadYamlText(await readTextFile(file), file), originalFilePath);

      for (const model of resources.models ?? []) {
        pending.push({
          metadata: {
            uniqueId: modelUniqueId(packageName, model.name),
            name: model.name,
            kind: 'model',
            packageName,
            fqn: [packageName, ...directorySegments, model.name],
            tags: new Set(model.tags),
            originalFilePath
          },
          dependsOn: model.depends_on ?? []
        });
      }

      for (const source of resources.sources ?? []) {
        for (const table of source.tables) {
          pending.push({
            metadata: {
              uniqueId: sourceUniqueId(packageName, source.name, table.name),
              name: table.name,
              kind: 'source',
              packageName,
              fqn: [packageName, source.name, table.name],
              tags: new Set([...(source.tags ?? []), ...(table.tags ?? [])]),
              originalFilePath
            },
            dependsOn: []
          });
        }
      }
    }
  }

  logger.debug(`Package '${packageName}' declares ${pending.length} node(s)`);
  return pending;
}

/**
 * Resolves `ref`/`source` targets. An unqualified reference prefers the
 * declaring package, then any package where the name is unique.
 */
class ReferenceResolver {
  private readonly byKey = new Map<string, string[]>();

  constructor(private readonly catalog: InMemoryResourceCatalog) {
    for (const node of catalog.values()) {
      const key = this.keyOf(node.kind, node.fqn.slice(node.kind === 'source' ? 1 : -1).join('.'));
      const ids = this.byKey.get(key) ?? [];
      ids.push(node.uniqueId);
      this.byKey.set(key, ids);
    }
  }

  private keyOf(kind: NodeMetadata['kind'], name: string): string {
    return `${kind}:${name}`;
  }

  resolve(entry: DependsOnEntry, from: NodeMetadata): string {
    const kind: NodeMetadata['kind'] = entry.ref !== undefined ? 'model' : 'source';
    const target = entry.ref ?? entry.source ?? '';
    const parts = target.split('.');
    const unqualifiedLength = kind === 'model' ? 1 : 2;
    const describe = `${kind === 'model' ? 'ref' : 'source'} '${target}' in ${from.uniqueId}`;

    if (parts.length === unqualifiedLength + 1) {
      const [packageName, ...rest] = parts;
      const id = kind === 'model'
        ? modelUniqueId(packageName, rest[0])
        : sourceUniqueId(packageName, rest[0], rest[1]);
      if (!this.catalog.get(id)) {
        throw new GraphIntegrityError(`Unresolved ${describe}: no node '${id}'`, { from: from.uniqueId, target });
      }
      return id;
    }

    if (parts.length !== unqualifiedLength) {
      throw new GraphIntegrityError(`Malformed ${describe}`, { from: from.uniqueId, target });
    }

    const local = kind === 'model'
      ? modelUniqueId(from.packageName, parts[0])
      : sourceUniqueId(from.packageName, parts[0], parts[1]);
    if (this.catalog.get(local)) {
      return local;
    }

    const candidates = this.byKey.get(this.keyOf(kind, target)) ?? [];
    if (candidates.length === 0) {
      throw new GraphIntegrityError(`Unresolved ${describe}`, { from: from.uniqueId, target });
    }
    if (candidates.length > 1) {
      throw new GraphIntegrityError(
        `Ambiguous ${describe}: matches ${candidates.join(', ')}; qualify it with a package name`,
        { from: from.uniqueId, target, candidates }
      );
    }
    return candidates[0];
  }
}

/**
 * Build the catalog and graph from pending nodes.
 */
export function buildGraph(pending: PendingNode[]): { graph: DependencyGraph; catalog: InMemoryResourceCatalog } {
  const catalog = new InMemoryResourceCatalog();
  const graph = new DependencyGraph();

  for (const { metadata } of pending) {
    catalog.add(metadata);
    graph.addNode(metadata.uniqueId);
  }

  const resolver = new ReferenceResolver(catalog);
  for (const { metadata, dependsOn } of pending) {
    for (const entry of dependsOn) {
      graph.addEdge(resolver.resolve(entry, metadata), metadata.uniqueId);
    }
  }

  const cycles = findCycles(graph, 1);
  if (cycles.length > 0) {
    throw new GraphIntegrityError(`Found a cycle: ${cycles[0].join(' -> ')}`, { cycle: cycles[0] });
  }

  return { graph, catalog };
}

export async function loadProject(projectDir: string, options: LoadProjectOptions = {}): Promise<LoadedProject> {
  const rootDir = resolve(projectDir);
  const project: LoadedPackage = {
    config: await loadProjectConfig(rootDir, options.toolVersion),
    rootDir,
    isRoot: true
  };

  const packages = [project, ...(await loadInstalledPackages(project, options.toolVersion))];
  const seen = new Map<string, string>();
  for (const pkg of packages) {
    const previous = seen.get(pkg.config.name);
    if (previous) {
      throw new ConfigError(`Package name '${pkg.config.name}' is used by both ${previous} and ${pkg.rootDir}`, {
        name: pkg.config.name
      });
    }
    seen.set(pkg.config.name, pkg.rootDir);
  }

  const pending: PendingNode[] = [];
  for (const pkg of packages) {
    pending.push(...(await collectPackageNodes(pkg)));
  }

  const { graph, catalog } = buildGraph(pending);
  logger.debug(`Loaded ${graph.size} node(s) from ${packages.length} package(s)`);

  return { project, packages, graph, catalog };
}
