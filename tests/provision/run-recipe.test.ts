import { describe, test, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { PassThrough, Readable } from 'node:stream';

import { createReadlinePrompter } from '../../scripts/lib/params.js';
import { buildParamSources, createProvisionContext, resolveShell } from '../../scripts/provision/context.js';
import { createMemoryLogger } from '../../scripts/provision/logger.js';
import { RECIPES } from '../../scripts/provision/recipes/index.js';
import { positionalParams, runRecipe } from '../../scripts/provision/run-recipe.js';
import { readProvisionState } from '../../scripts/provision/state.js';
import { createBufferedPrinter } from '../../scripts/utils.js';
import { createTempDir, FakeCommandRunner, removeTempDir, scriptedPrompter } from './helpers.js';

describe('provision context', () => {
  test('shell comes from the flag, then config, then $SHELL', () => {
    assert.strictEqual(resolveShell('fish', { shell: 'zsh' }, { SHELL: '/bin/bash' }), 'fish');
    assert.strictEqual(resolveShell(undefined, { shell: 'zsh' }, { SHELL: '/bin/bash' }), 'zsh');
    assert.strictEqual(resolveShell(undefined, {}, { SHELL: '/bin/bash' }), 'bash');
  });

  test('puts ~/.local/bin on PATH and merges skip lists', () => {
    const ctx = createProvisionContext({
      projectRoot: '/work/proj',
      env: { HOME: '/home/dev', PATH: '/usr/bin', SHELL: '/usr/bin/zsh' },
      config: { skip: ['docker'] },
      params: {},
      logger: createMemoryLogger(),
      prompter: scriptedPrompter(),
      skip: ['docker-group', 'docker'],
      exec: new FakeCommandRunner()
    });

    assert.strictEqual(ctx.env.PATH, ['/home/dev/.local/bin', '/usr/bin'].join(path.delimiter));
    assert.strictEqual(ctx.shell, 'zsh');
    assert.strictEqual(ctx.rcFile, '/home/dev/.zshrc');
    assert.deepStrictEqual(ctx.skip, ['docker', 'docker-group']);
    assert.strictEqual(ctx.autoYes, false);
  });

  test('parameter sources are ordered flag, env, .env, config, prompt', async () => {
    const sources = buildParamSources({
      flags: {},
      env: {},
      projectRoot: '/nonexistent',
      config: {},
      prompter: scriptedPrompter()
    });
    assert.deepStrictEqual(
      sources.map((s) => s.label),
      ['flag', 'env', '.env', 'config', 'prompt']
    );
  });

  test('positional arguments fill ssh-setup parameters, flags win', () => {
    const params = positionalParams(RECIPES['ssh-setup'], ['work.laptop', 'dev@example.com'], {
      sshEmail: 'flag@example.com'
    });
    assert.deepStrictEqual(params, { sshKeyName: 'work.laptop', sshEmail: 'flag@example.com' });
    assert.deepStrictEqual(positionalParams(RECIPES['verify-env'], ['ignored']), {});
  });
});

describe('runRecipe', () => {
  let root: string;
  let home: string;

  beforeEach(async () => {
    root = await createTempDir('devkit-run-project-');
    home = await createTempDir('devkit-run-home-');
  });

  afterEach(async () => {
    await removeTempDir(root);
    await removeTempDir(home);
  });

  test('resolves parameters from .env and config and records the run', async () => {
    await fs.writeFile(path.join(root, '.env'), 'DEVKIT_PROJECT_NAME=from-dotenv\n', 'utf8');
    await fs.writeFile(
      path.join(root, 'devkit.config.yml'),
      'params:\n  projectName: from-config\n  projectDescription: Configured\n  authorName: Ada Tester\n  authorEmail: ada@example.com\n',
      'utf8'
    );
    await fs.writeFile(
      path.join(root, 'pyproject.toml'),
      'name = "template"\ndescription = "Template"\nauthors = []\n',
      'utf8'
    );
    const { printer, lines } = createBufferedPrinter();
    const logger = createMemoryLogger();

    const { report, exitCode } = await runRecipe({
      recipe: 'init-project',
      projectRoot: root,
      env: { HOME: home, PATH: '/usr/bin' },
      autoYes: true,
      printer,
      logger,
      exec: new FakeCommandRunner()
    });

    assert.strictEqual(exitCode, 0);
    assert.strictEqual(report.failures, 0);
    assert.strictEqual(
      await fs.readFile(path.join(root, 'pyproject.toml'), 'utf8'),
      'name = "from-dotenv"\ndescription = "Configured"\nauthors = ["Ada Tester <ada@example.com>"]\n'
    );
    assert.strictEqual(lines[0], 'Initialize project from template (init-project)');
    assert.strictEqual(lines[lines.length - 1], '  Steps: 5/5 ok (2 already satisfied, 3 fixed)');
    assert.deepStrictEqual(logger.entries[0].origins, {
      projectName: '.env',
      projectDescription: 'config',
      authorName: 'config',
      authorEmail: 'config'
    });
    assert.strictEqual(readProvisionState(root).runs['init-project'].failures, 0);
  });

  test('non-interactive run without parameters reports them missing', async () => {
    await fs.writeFile(path.join(root, 'pyproject.toml'), 'name = "template"\n', 'utf8');
    const prompter = scriptedPrompter();

    const { report, exitCode } = await runRecipe({
      recipe: 'init-project',
      projectRoot: root,
      env: { HOME: home },
      autoYes: true,
      printer: createBufferedPrinter().printer,
      logger: createMemoryLogger(),
      prompter,
      exec: new FakeCommandRunner()
    });

    assert.strictEqual(exitCode, 1);
    assert.strictEqual(report.outcomes.find((o) => o.stepId === 'pyproject-name')?.reason, 'missing-param');
    assert.deepStrictEqual(prompter.questions, []);
  });

  test('closed terminal input fails the run instead of hanging', async () => {
    const prompter = createReadlinePrompter({ input: Readable.from([]), output: new PassThrough() });

    const { report, exitCode } = await runRecipe({
      recipe: 'init-project',
      projectRoot: root,
      env: { HOME: home },
      printer: createBufferedPrinter().printer,
      logger: createMemoryLogger(),
      prompter,
      exec: new FakeCommandRunner()
    });

    assert.strictEqual(exitCode, 1);
    assert.deepStrictEqual(
      report.outcomes.map((o) => [o.stepId, o.status]),
      [
        ['pyproject', 'failed'],
        ['pyproject-name', 'skipped'],
        ['pyproject-description', 'skipped'],
        ['pyproject-authors', 'skipped'],
        ['readme-title', 'skipped']
      ]
    );
    assert.strictEqual(readProvisionState(root).runs['init-project'].failures, 5);
  });

  test('interactive run prompts for missing parameters', async () => {
    const prompter = scriptedPrompter(['prompted-key', 'dev@example.com', 'Ada Tester', 'ada@example.com']);

    const { report } = await runRecipe({
      recipe: 'ssh-setup',
      projectRoot: root,
      env: { HOME: home },
      checkOnly: false,
      autoYes: false,
      printer: createBufferedPrinter().printer,
      logger: createMemoryLogger(),
      prompter,
      skip: ['ssh-key', 'ssh-config', 'ssh-agent', 'git-user-name', 'git-user-email', 'git-ssh-rewrite'],
      exec: new FakeCommandRunner()
    });

    assert.strictEqual(prompter.questions.length, 4);
    assert.strictEqual(prompter.questions[0], 'Enter a name for your SSH key (e.g., work.laptop): ');
    assert.ok(report.outcomes.every((o) => o.status === 'warned' && o.reason === 'excluded'));
  });
});
