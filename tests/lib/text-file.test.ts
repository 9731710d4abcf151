import { describe, test, before, after } from 'node:test';
import assert from 'node:assert';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { appendBlock, ensureBlock, isExecutable, writeFileIfChanged } from '../../scripts/lib/text-file.js';
import { createTempDir, removeTempDir } from '../provision/helpers.js';

describe('text file edits', () => {
  let dir: string;

  before(async () => {
    dir = await createTempDir('devkit-text-');
  });

  after(async () => {
    await removeTempDir(dir);
  });

  test('appendBlock creates missing files and directories', async () => {
    const file = path.join(dir, 'nested', 'a.rc');
    appendBlock(file, ['# one', 'two']);
    assert.strictEqual(await fs.readFile(file, 'utf8'), '# one\ntwo\n');
  });

  test('appendBlock separates from existing content with a blank line', async () => {
    const withNewline = path.join(dir, 'b.rc');
    await fs.writeFile(withNewline, 'alias ll="ls -l"\n', 'utf8');
    appendBlock(withNewline, ['x']);
    assert.strictEqual(await fs.readFile(withNewline, 'utf8'), 'alias ll="ls -l"\n\nx\n');

    const withoutNewline = path.join(dir, 'c.rc');
    await fs.writeFile(withoutNewline, 'last', 'utf8');
    appendBlock(withoutNewline, ['x']);
    assert.strictEqual(await fs.readFile(withoutNewline, 'utf8'), 'last\n\nx\n');
  });

  test('ensureBlock appends once', async () => {
    const file = path.join(dir, 'd.rc');
    assert.strictEqual(ensureBlock(file, ['export A=1'], { marker: 'A=1' }), 'appended');
    assert.strictEqual(ensureBlock(file, ['export A=1'], { marker: 'A=1' }), 'present');

    assert.strictEqual(await fs.readFile(file, 'utf8'), 'export A=1\n');
  });

  test('writeFileIfChanged reports whether it wrote and applies the mode', async () => {
    const file = path.join(dir, 'run.sh');
    assert.strictEqual(writeFileIfChanged(file, 'echo hi\n', { mode: 0o755 }), 'written');
    assert.strictEqual(writeFileIfChanged(file, 'echo hi\n', { mode: 0o755 }), 'unchanged');
    assert.strictEqual(isExecutable(file), true);
    assert.strictEqual(writeFileIfChanged(file, 'echo bye\n'), 'written');
  });
});
