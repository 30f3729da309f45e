/**
 * File Walker Utility
 *
 * Walks directory trees for resource file discovery.
 */

import { promises as fs } from 'fs';
import { join, relative, sep } from 'path';
import { minimatch } from 'minimatch';

/**
 * Filter predicate for file walking
 */
export type FileFilter = (path: string, isDirectory: boolean) => boolean;

/**
 * Options for file walking
 */
export interface WalkOptions {
  /**
   * Filter predicate to include/exclude files and directories
   */
  filter?: FileFilter;
}

/**
 * Async generator that walks a directory tree and yields file paths.
 * Entries are visited in name order so discovery is deterministic.
 *
 * @example
 * for await (const filePath of walkFiles('/path/to/models')) {
 *   console.log(filePath);
 * }
 */
export async function* walkFiles(
  dir: string,
  options: WalkOptions = {}
): AsyncGenerator<string> {
  const { filter } = options;
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    // Symlinks are skipped
    if (entry.isSymbolicLink()) {
      continue;
    }

    const fullPath = join(dir, entry.name);
    const isDirectory = entry.isDirectory();

    if (filter && !filter(fullPath, isDirectory)) {
      continue;
    }

    if (isDirectory) {
      yield* walkFiles(fullPath, options);
    } else if (entry.isFile()) {
      yield fullPath;
    }
  }
}

/**
 * Collect every file under `root` whose root-relative path matches `pattern`.
 * Hidden directories are not entered.
 */
export async function findMatchingFiles(root: string, pattern: string): Promise<string[]> {
  const matches: string[] = [];
  const filter: FileFilter = (path, isDirectory) => {
    const rel = relative(root, path).split(sep).join('/');
    if (isDirectory) {
      return !rel.split('/').some(segment => segment.startsWith('.'));
    }
    return minimatch(rel, pattern, { dot: false });
  };

  for await (const file of walkFiles(root, { filter })) {
    matches.push(file);
  }
  return matches;
}
