import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { runLsCommand, splitSpecs } from '../../src/commands/ls.js';
import { InvalidSelectorError } from '../../src/utils/errors.js';
import { createRecordingOutput, getFixturePath } from '../test-helpers.js';

const SHOP = getFixturePath('shop');

describe('splitSpecs', () => {
  it('splits whitespace-separated specs inside each value', () => {
    assert.deepStrictEqual(splitSpecs(['tag:nightly  +orders', 'staging']), ['tag:nightly', '+orders', 'staging']);
    assert.deepStrictEqual(splitSpecs(undefined), []);
    assert.deepStrictEqual(splitSpecs(['  ']), []);
  });
});

describe('ls command', () => {
  it('lists every node sorted by identifier when nothing is selected', async () => {
    const output = createRecordingOutput();
    const result = await runLsCommand(SHOP, {}, { output });

    assert.strictEqual(result.success, true);
    assert.deepStrictEqual(output.lines, [
      'model.shop.orders',
      'model.shop.stg_customers',
      'model.shop.stg_orders',
      'model.utils.calendar',
      'source.shop.raw.customers',
      'source.shop.raw.orders'
    ]);
  });

  it('applies select and exclude specs', async () => {
    const output = createRecordingOutput();
    await runLsCommand(SHOP, { select: ['+marts.orders'], exclude: ['source:raw', 'utils'] }, { output });
    assert.deepStrictEqual(output.lines, [
      'model.shop.orders',
      'model.shop.stg_customers',
      'model.shop.stg_orders'
    ]);
  });

  it('filters by resource type after selection', async () => {
    const output = createRecordingOutput();
    await runLsCommand(SHOP, { select: ['@staging.stg_orders'], resourceType: 'source' }, { output });
    assert.deepStrictEqual(output.lines, ['source.shop.raw.customers', 'source.shop.raw.orders']);
  });

  it('renders names, paths and JSON', async () => {
    const names = createRecordingOutput();
    await runLsCommand(SHOP, { select: ['staging'], output: 'name' }, { output: names });
    assert.deepStrictEqual(names.lines, ['shop.staging.stg_customers', 'shop.staging.stg_orders']);

    const paths = createRecordingOutput();
    await runLsCommand(SHOP, { select: ['utils.calendar'], output: 'path' }, { output: paths });
    assert.deepStrictEqual(paths.lines, ['models/calendar.yml']);

    const json = createRecordingOutput();
    await runLsCommand(SHOP, { select: ['source:raw.orders'], output: 'json' }, { output: json });
    assert.deepStrictEqual(json.lines.map(line => JSON.parse(line)), [
      {
        id: 'source.shop.raw.orders',
        name: 'orders',
        resource_type: 'source',
        package_name: 'shop',
        fqn: ['shop', 'raw', 'orders'],
        tags: ['landing', 'pii']
      }
    ]);
  });

  it('warns when nothing is selected', async () => {
    const output = createRecordingOutput();
    const result = await runLsCommand(SHOP, { select: ['tag:missing'] }, { output });
    assert.deepStrictEqual(output.lines, []);
    assert.deepStrictEqual(output.warnings, ['No nodes selected. Check the --select and --exclude specs.']);
    assert.deepStrictEqual(result.data, []);
  });

  it('rejects malformed specs before printing anything', async () => {
    const output = createRecordingOutput();
    await assert.rejects(runLsCommand(SHOP, { select: ['staging', '@marts.orders+'] }, { output }), InvalidSelectorError);
    assert.deepStrictEqual(output.lines, []);
  });
});
