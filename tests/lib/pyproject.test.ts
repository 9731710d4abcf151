import { describe, test } from 'node:test';
import assert from 'node:assert';

import {
  disablePackageMode,
  formatAuthors,
  formatFieldValue,
  hasPackageModeSetting,
  readFieldRaw,
  readStringField,
  setField
} from '../../scripts/lib/pyproject.js';

const TEMPLATE = [
  '[tool.poetry]',
  'name = "template"',
  'version = "0.1.0"',
  'description = "A template"',
  'authors = ["Someone <someone@example.com>"]',
  '',
  '# keep me',
  '[tool.poetry.dependencies]',
  'python = "^3.11"',
  ''
].join('\n');

describe('pyproject edits', () => {
  test('reads fields', () => {
    assert.strictEqual(readStringField(TEMPLATE, 'name'), 'template');
    assert.strictEqual(readFieldRaw(TEMPLATE, 'authors'), '["Someone <someone@example.com>"]');
    assert.strictEqual(readStringField('version = "1"', 'description'), null);
  });

  test('setField replaces only the field line', () => {
    const next = setField(TEMPLATE, 'name', formatFieldValue('name', 'my-app'));
    assert.strictEqual(readStringField(next, 'name'), 'my-app');
    assert.strictEqual(next.replace('name = "my-app"', 'name = "template"'), TEMPLATE);
  });

  test('authors are formatted as a single-entry array', () => {
    assert.strictEqual(formatAuthors('Ada Tester', 'ada@example.com'), '["Ada Tester <ada@example.com>"]');
    const next = setField(TEMPLATE, 'authors', formatAuthors('Ada Tester', 'ada@example.com'));
    assert.strictEqual(readFieldRaw(next, 'authors'), '["Ada Tester <ada@example.com>"]');
  });

  test('quotes in values are escaped and read back', () => {
    const value = formatFieldValue('description', 'Says "hi"');
    assert.strictEqual(value, '"Says \\"hi\\""');
    assert.strictEqual(readStringField(setField(TEMPLATE, 'description', value), 'description'), 'Says "hi"');
  });

  test('field absent leaves content unchanged', () => {
    const content = '[tool.poetry]\nversion = "1"\n';
    assert.strictEqual(setField(content, 'name', '"x"'), content);
  });

  test('disablePackageMode inserts once under [tool.poetry]', () => {
    const once = disablePackageMode(TEMPLATE);
    assert.strictEqual(once.split('\n')[1], 'package-mode = false');
    assert.strictEqual(hasPackageModeSetting(once), true);
    assert.strictEqual(disablePackageMode(once), once);
  });

  test('disablePackageMode without a poetry section is a no-op', () => {
    const content = '[project]\nname = "x"\n';
    assert.strictEqual(disablePackageMode(content), content);
  });
});
