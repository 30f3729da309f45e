import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { join, relative, sep } from 'path';
import { findMatchingFiles, walkFiles } from '../../src/utils/file-walker.js';
import { getFixturePath } from '../test-helpers.js';

const MODELS = join(getFixturePath('shop'), 'models');

function toRelative(files: string[]): string[] {
  return files.map(file => relative(MODELS, file).split(sep).join('/'));
}

describe('walkFiles', () => {
  it('visits every file at any depth in name order', async () => {
    const files: string[] = [];
    for await (const file of walkFiles(MODELS)) {
      files.push(file);
    }
    assert.deepStrictEqual(toRelative(files), [
      '.drafts/broken.yml',
      'marts/README.md',
      'marts/orders.yaml',
      'sources.yml',
      'staging/staging.yml'
    ]);
  });

  it('does not enter directories the filter rejects', async () => {
    const files: string[] = [];
    const filter = (path: string, isDirectory: boolean) => !(isDirectory && path.endsWith('marts'));
    for await (const file of walkFiles(MODELS, { filter })) {
      files.push(file);
    }
    assert.deepStrictEqual(toRelative(files), ['.drafts/broken.yml', 'sources.yml', 'staging/staging.yml']);
  });
});

describe('findMatchingFiles', () => {
  it('matches root-relative paths and skips hidden directories', async () => {
    const files = await findMatchingFiles(MODELS, '**/*.{yml,yaml}');
    assert.deepStrictEqual(toRelative(files), ['marts/orders.yaml', 'sources.yml', 'staging/staging.yml']);
  });
});
