import fs from 'node:fs';
import path from 'node:path';

import type { SampleFile } from '../../schemas/devkit-config.zod.js';
import type { Recipe } from '../recipe.js';
import { fileContentStep, probeDirectory } from '../steps.js';
import type { Step } from '../types.js';
import { precommitRunStep } from './common.js';

export const LANGUAGE_DIRS = [
  'python',
  'shell/ubuntu',
  'shell/rhel',
  'shell/centos',
  'powershell',
  'sql/ansi',
  'sql/tsql',
  'sql/plsql',
  'sql/snowflake',
  'sql/source'
] as const;

function shellSample(os: string): SampleFile {
  return {
    path: `shell/${os}/sample.sh`,
    content: `#!/bin/bash\n\necho "Hello from ${os} shell"\n`,
    executable: true
  };
}

export const DEFAULT_SAMPLES: readonly SampleFile[] = [
  { path: 'python/sample.py', content: 'print("Hello, Python")\n' },
  shellSample('ubuntu'),
  shellSample('rhel'),
  shellSample('centos'),
  { path: 'powershell/sample.ps1', content: 'Write-Output "Hello from PowerShell"\n' },
  { path: 'sql/ansi/sample.sql', content: 'SELECT\n    id,\n    name\nFROM users;\n' },
  { path: 'sql/tsql/sample.sql', content: 'SELECT TOP 10\n    id,\n    name\nFROM customers;\n' },
  { path: 'sql/snowflake/sample.sql', content: 'SELECT CURRENT_DATE();\n' },
  { path: 'sql/source/sample.sql', content: '-- raw data source --\n' }
];

function dirStepId(dir: string): string {
  return `dir-${dir.replace(/\//g, '-')}`;
}

/**
 * Configured samples replace defaults with the same path.
 */
export function mergeSamples(extra: readonly SampleFile[] = []): SampleFile[] {
  const byPath = new Map<string, SampleFile>();
  for (const sample of [...DEFAULT_SAMPLES, ...extra]) byPath.set(path.posix.normalize(sample.path), sample);
  return [...byPath.values()];
}

export function buildScaffoldSteps(extra: readonly SampleFile[] = []): Step[] {
  const samples = mergeSamples(extra);
  const dirs = new Set<string>(LANGUAGE_DIRS);
  for (const sample of samples) {
    const dir = path.posix.dirname(path.posix.normalize(sample.path));
    if (dir !== '.') dirs.add(dir);
  }

  const dirSteps = [...dirs].map(
    (dir): Step => ({
      id: dirStepId(dir),
      title: `directory ${dir}`,
      confirm: false,
      probe: async (ctx) => probeDirectory(path.join(ctx.projectRoot, dir), dir),
      async remedy(ctx) {
        fs.mkdirSync(path.join(ctx.projectRoot, dir), { recursive: true });
        return { ok: true };
      }
    })
  );

  const sampleSteps = samples.map((sample) => {
    const normalized = path.posix.normalize(sample.path);
    const dir = path.posix.dirname(normalized);
    return fileContentStep({
      id: `sample-${normalized.replace(/\//g, '-')}`,
      title: `sample ${normalized}`,
      file: (ctx) => path.join(ctx.projectRoot, normalized),
      content: sample.content,
      executable: sample.executable === true,
      dependsOn: dir === '.' ? [] : [dirStepId(dir)]
    });
  });

  return [...dirSteps, ...sampleSteps, precommitRunStep({ severity: 'optional' })];
}

export const scaffoldSamplesRecipe: Recipe = {
  id: 'scaffold-samples',
  title: 'Scaffold sample files',
  description: 'Per-language directories and sample files for exercising pre-commit hooks',
  params: [],
  build: ({ config }) => buildScaffoldSteps(config.samples),
  epilogue(ctx) {
    ctx.printer('You can now run pre-commit hooks against these files: pre-commit run --all-files', 'cyan');
  }
};
