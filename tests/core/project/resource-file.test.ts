import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseResourceFile } from '../../../src/core/project/resource-file.js';
import { ValidationError } from '../../../src/utils/errors.js';

const FILE = 'models/schema.yml';

describe('parseResourceFile', () => {
  it('normalizes models and sources', () => {
    const parsed = parseResourceFile(
      {
        models: [
          { name: 'orders', tags: 'nightly', depends_on: [{ ref: 'stg_orders' }, { source: 'raw.orders' }] },
          { name: 'stg_orders' }
        ],
        sources: [{ name: 'raw', tags: ['landing'], tables: [{ name: 'orders', tags: ['pii'] }] }]
      },
      FILE
    );

    assert.deepStrictEqual(parsed, {
      models: [
        { name: 'orders', tags: ['nightly'], depends_on: [{ ref: 'stg_orders' }, { source: 'raw.orders' }] },
        { name: 'stg_orders', tags: [], depends_on: [] }
      ],
      sources: [{ name: 'raw', tags: ['landing'], tables: [{ name: 'orders', tags: ['pii'] }] }]
    });
  });

  it('treats an empty document as declaring nothing', () => {
    assert.deepStrictEqual(parseResourceFile(null, FILE), { models: [], sources: [] });
    assert.deepStrictEqual(parseResourceFile({}, FILE), { models: [], sources: [] });
  });

  it('rejects malformed declarations', () => {
    assert.throws(() => parseResourceFile('models', FILE), ValidationError);
    assert.throws(() => parseResourceFile({ models: { name: 'orders' } }, FILE), ValidationError);
    assert.throws(() => parseResourceFile({ models: [{ tags: ['x'] }] }, FILE), ValidationError);
    assert.throws(() => parseResourceFile({ models: [{ name: 'a.b' }] }, FILE), ValidationError);
    assert.throws(() => parseResourceFile({ models: [{ name: 'a', tags: [1] }] }, FILE), ValidationError);
    assert.throws(() => parseResourceFile({ sources: [{ name: 'raw', tables: ['orders'] }] }, FILE), ValidationError);
  });

  it('requires depends_on entries to name exactly one target', () => {
    for (const entry of [{ ref: 'a', source: 'raw.b' }, { model: 'a' }, { ref: '' }, 'a']) {
      assert.throws(
        () => parseResourceFile({ models: [{ name: 'orders', depends_on: [entry] }] }, FILE),
        {
          message: "Validation error: models/schema.yml: depends_on entries of 'orders' must be a single " +
            "'ref: <model>' or 'source: <source>.<table>'"
        }
      );
    }
  });
});
