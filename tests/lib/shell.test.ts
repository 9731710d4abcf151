import { describe, test } from 'node:test';
import assert from 'node:assert';
import path from 'node:path';

import { detectShell, rcFileFor, SHELL_PROFILES, shellForRcFile } from '../../scripts/lib/shell.js';

describe('shell detection', () => {
  test('maps $SHELL to a known shell', () => {
    assert.strictEqual(detectShell('/usr/bin/zsh'), 'zsh');
    assert.strictEqual(detectShell('/bin/bash'), 'bash');
    assert.strictEqual(detectShell('/usr/local/bin/fish'), 'fish');
  });

  test('unknown or unset shells fall back to posix', () => {
    assert.strictEqual(detectShell(undefined), 'posix');
    assert.strictEqual(detectShell('/bin/tcsh'), 'posix');
  });

  test('rc file per shell', () => {
    assert.strictEqual(rcFileFor('bash', '/home/dev'), '/home/dev/.bashrc');
    assert.strictEqual(rcFileFor('fish', '/home/dev'), path.join('/home/dev', '.config', 'fish', 'config.fish'));
    assert.strictEqual(rcFileFor('posix', '/home/dev'), '/home/dev/.profile');
  });

  test('shell owning an rc file', () => {
    assert.strictEqual(shellForRcFile('/home/dev/.zshrc'), 'zsh');
    assert.strictEqual(shellForRcFile('/home/dev/.config/fish/config.fish'), 'fish');
    assert.strictEqual(shellForRcFile('/home/dev/.cshrc'), null);
  });

  test('posix has no direnv hook', () => {
    assert.strictEqual(SHELL_PROFILES.posix.direnvHook, null);
    assert.strictEqual(SHELL_PROFILES.zsh.direnvHook, 'eval "$(direnv hook zsh)"');
  });
});
