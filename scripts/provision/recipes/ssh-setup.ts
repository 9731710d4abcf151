import fs from 'node:fs';
import path from 'node:path';

import { requireParam } from '../../lib/params.js';
import { readTextIfExists } from '../../lib/text-file.js';
import type { Recipe } from '../recipe.js';
import { blockStep, fromExec, missing, passed, probeFile } from '../steps.js';
import type { ProvisionContext, Step } from '../types.js';

export const GITHUB_KEYS_URL = 'https://github.com/settings/keys';

export function sshKeyPath(ctx: ProvisionContext): string {
  return path.join(ctx.homeDir, '.ssh', requireParam(ctx.params, 'sshKeyName'));
}

export function sshConfigLines(keyPath: string): string[] {
  return ['Host github.com', '  HostName github.com', '  User git', `  IdentityFile ${keyPath}`, '  IdentitiesOnly yes'];
}

/**
 * `git config --global <key>` equals `expected`, else set it.
 */
function gitConfigStep(params: {
  id: string;
  title: string;
  key: string;
  value: (ctx: ProvisionContext) => string;
}): Step {
  return {
    id: params.id,
    title: params.title,
    async probe(ctx) {
      const expected = params.value(ctx);
      const res = await ctx.exec.cmd('git', ['config', '--global', '--get', params.key]);
      if (res.ok && res.stdout === expected) return passed(`${params.key} = ${expected}`);
      return missing(res.ok ? `${params.key} is ${res.stdout}` : `${params.key} is not set`);
    },
    async remedy(ctx) {
      return fromExec(await ctx.exec.cmd('git', ['config', '--global', params.key, params.value(ctx)]));
    }
  };
}

export function buildSshSetupSteps(): Step[] {
  const sshKey: Step = {
    id: 'ssh-key',
    title: 'SSH key generated',
    probe: async (ctx) => probeFile(sshKeyPath(ctx), sshKeyPath(ctx)),
    async remedy(ctx) {
      const keyPath = sshKeyPath(ctx);
      fs.mkdirSync(path.dirname(keyPath), { recursive: true, mode: 0o700 });
      const res = await ctx.exec.cmd('ssh-keygen', [
        '-t',
        'ed25519',
        '-C',
        requireParam(ctx.params, 'sshEmail'),
        '-f',
        keyPath,
        '-N',
        ''
      ]);
      return fromExec(res);
    }
  };

  const sshAgent: Step = {
    id: 'ssh-agent',
    title: 'SSH key loaded in ssh-agent',
    severity: 'optional',
    dependsOn: ['ssh-key'],
    async probe(ctx) {
      const pub = readTextIfExists(`${sshKeyPath(ctx)}.pub`);
      const body = pub?.trim().split(/\s+/)[1];
      if (!body) return missing('public key not readable');
      const res = await ctx.exec.cmd('ssh-add', ['-L']);
      return res.ok && res.stdout.includes(body) ? passed('key loaded') : missing('key not loaded in ssh-agent');
    },
    async remedy(ctx) {
      return fromExec(await ctx.exec.cmd('ssh-add', [sshKeyPath(ctx)]));
    }
  };

  return [
    sshKey,
    blockStep({
      id: 'ssh-config',
      title: 'SSH config uses the key for github.com',
      file: (ctx) => path.join(ctx.homeDir, '.ssh', 'config'),
      marker: (ctx) => `IdentityFile ${sshKeyPath(ctx)}`,
      lines: (ctx) => sshConfigLines(sshKeyPath(ctx))
    }),
    sshAgent,
    gitConfigStep({
      id: 'git-user-name',
      title: 'Git user.name configured',
      key: 'user.name',
      value: (ctx) => requireParam(ctx.params, 'gitName')
    }),
    gitConfigStep({
      id: 'git-user-email',
      title: 'Git user.email configured',
      key: 'user.email',
      value: (ctx) => requireParam(ctx.params, 'gitEmail')
    }),
    gitConfigStep({
      id: 'git-ssh-rewrite',
      title: 'Git uses SSH instead of HTTPS for GitHub',
      key: 'url.git@github.com:.insteadOf',
      value: () => 'https://github.com/'
    })
  ];
}

export const sshSetupRecipe: Recipe = {
  id: 'ssh-setup',
  title: 'SSH key and Git identity',
  description: 'ed25519 key, SSH config for github.com, ssh-agent, global Git identity',
  params: ['sshKeyName', 'sshEmail', 'gitName', 'gitEmail'],
  positionals: ['sshKeyName', 'sshEmail', 'gitName', 'gitEmail'],
  build: () => buildSshSetupSteps(),
  epilogue(ctx) {
    const keyName = ctx.params.sshKeyName;
    if (!keyName) return;
    const pub = readTextIfExists(path.join(ctx.homeDir, '.ssh', `${keyName}.pub`));
    if (!pub) return;
    ctx.printer('Here is your public key. Add it to GitHub:', 'cyan');
    ctx.printer('-'.repeat(60));
    ctx.printer(pub.trim());
    ctx.printer('-'.repeat(60));
    ctx.printer(`Visit: ${GITHUB_KEYS_URL} and paste it as a new SSH key.`, 'cyan');
    ctx.printer('Once added, test it with: ssh -T git@github.com', 'cyan');
  }
};
