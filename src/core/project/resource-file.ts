/**
 * Resource file parsing (models and sources declared in YAML).
 */

import type {
  DependsOnEntry,
  ModelDefinition,
  ResourceFile,
  SourceDefinition,
  SourceTableDefinition
} from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireName(entry: Record<string, unknown>, what: string, file: string): string {
  const name = entry.name;
  if (typeof name !== 'string' || name.length === 0) {
    throw new ValidationError(`${file}: every ${what} needs a non-empty name`, { file });
  }
  if (name.includes('.')) {
    throw new ValidationError(`${file}: ${what} name '${name}' must not contain '.'`, { file, name });
  }
  return name;
}

function readTags(entry: Record<string, unknown>, owner: string, file: string): string[] {
  const tags = entry.tags;
  if (tags === undefined || tags === null) {
    return [];
  }
  if (typeof tags === 'string') {
    return [tags];
  }
  if (Array.isArray(tags) && tags.every(tag => typeof tag === 'string')) {
    return tags;
  }
  throw new ValidationError(`${file}: tags of '${owner}' must be a string or a list of strings`, { file, owner });
}

function readList(value: unknown, what: string, file: string): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ValidationError(`${file}: '${what}' must be a list`, { file });
  }
  return value;
}

function parseDependsOn(value: unknown, owner: string, file: string): DependsOnEntry[] {
  return readList(value, `${owner}.depends_on`, file).map(entry => {
    if (isRecord(entry)) {
      const keys = Object.keys(entry);
      const target = keys.length === 1 ? entry[keys[0]] : undefined;
      if ((keys[0] === 'ref' || keys[0] === 'source') && typeof target === 'string' && target.length > 0) {
        return keys[0] === 'ref' ? { ref: target } : { source: target };
      }
    }
    throw new ValidationError(
      `${file}: depends_on entries of '${owner}' must be a single 'ref: <model>' or 'source: <source>.<table>'`,
      { file, owner }
    );
  });
}

function parseModel(entry: unknown, file: string): ModelDefinition {
  if (!isRecord(entry)) {
    throw new ValidationError(`${file}: models must be mappings`, { file });
  }
  const name = requireName(entry, 'model', file);
  return {
    name,
    tags: readTags(entry, name, file),
    depends_on: parseDependsOn(entry.depends_on, name, file)
  };
}

function parseTable(entry: unknown, sourceName: string, file: string): SourceTableDefinition {
  if (!isRecord(entry)) {
    throw new ValidationError(`${file}: tables of source '${sourceName}' must be mappings`, { file });
  }
  const name = requireName(entry, 'table', file);
  return { name, tags: readTags(entry, `${sourceName}.${name}`, file) };
}

function parseSource(entry: unknown, file: string): SourceDefinition {
  if (!isRecord(entry)) {
    throw new ValidationError(`${file}: sources must be mappings`, { file });
  }
  const name = requireName(entry, 'source', file);
  return {
    name,
    tags: readTags(entry, name, file),
    tables: readList(entry.tables, `${name}.tables`, file).map(table => parseTable(table, name, file))
  };
}

/**
 * Validate a parsed resource YAML document. Empty documents declare nothing.
 */
export function parseResourceFile(raw: unknown, file: string): ResourceFile {
  if (raw === undefined || raw === null) {
    return { models: [], sources: [] };
  }
  if (!isRecord(raw)) {
    throw new ValidationError(`${file} must contain a mapping`, { file });
  }
  return {
    models: readList(raw.models, 'models', file).map(model => parseModel(model, file)),
    sources: readList(raw.sources, 'sources', file).map(source => parseSource(source, file))
  };
}
