import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';

export const PARAM_NAMES = [
  'sshKeyName',
  'sshEmail',
  'gitName',
  'gitEmail',
  'projectName',
  'projectDescription',
  'authorName',
  'authorEmail'
] as const;

export type ParamName = (typeof PARAM_NAMES)[number];

export type Params = Partial<Record<ParamName, string>>;

export const PARAM_QUESTIONS: Readonly<Record<ParamName, string>> = {
  sshKeyName: 'Enter a name for your SSH key (e.g., work.laptop): ',
  sshEmail: 'Enter your GitHub email address (used for the SSH key comment): ',
  gitName: 'Enter your Git user.name: ',
  gitEmail: 'Enter your Git user.email (must match GitHub email): ',
  projectName: 'Project name: ',
  projectDescription: 'Project description: ',
  authorName: 'Author name: ',
  authorEmail: 'Author email: '
};

export class MissingParamError extends Error {
  readonly param: ParamName;

  constructor(param: ParamName) {
    super(`Missing parameter: ${param} (flag --${toKebab(param)} or ${envVarFor(param)})`);
    this.name = 'MissingParamError';
    this.param = param;
  }
}

export interface ParamSource {
  readonly label: string;
  get(name: ParamName): Promise<string | undefined>;
}

export interface Prompter {
  /** Resolves `null` when input is closed and no answer can come. */
  ask(question: string): Promise<string | null>;
}

export function toKebab(name: string): string {
  return name.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}

/**
 * `sshKeyName` -> `DEVKIT_SSH_KEY_NAME`
 */
export function envVarFor(name: ParamName): string {
  return `DEVKIT_${toKebab(name).replace(/-/g, '_').toUpperCase()}`;
}

function nonEmpty(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

export function staticSource(label: string, values: Params): ParamSource {
  return {
    label,
    async get(name) {
      return nonEmpty(values[name]);
    }
  };
}

export function envSource(env: Readonly<Record<string, string | undefined>>, label = 'env'): ParamSource {
  return {
    label,
    async get(name) {
      return nonEmpty(env[envVarFor(name)]);
    }
  };
}

export function promptSource(prompter: Prompter): ParamSource {
  return {
    label: 'prompt',
    async get(name) {
      return nonEmpty(await prompter.ask(PARAM_QUESTIONS[name]));
    }
  };
}

/**
 * Ask user for input on the terminal (one readline interface per question).
 * Once input has ended every question resolves `null`.
 */
export function createReadlinePrompter(
  streams: { input?: Readable; output?: Writable } = {}
): Prompter {
  const input = streams.input ?? process.stdin;
  const output = streams.output ?? process.stdout;
  let ended = false;

  return {
    ask(question) {
      if (ended || input.readableEnded) {
        ended = true;
        return Promise.resolve(null);
      }
      const rl = readline.createInterface({ input, output });
      return new Promise((resolve) => {
        let answered = false;
        rl.on('close', () => {
          if (answered) return;
          ended = true;
          output.write('\n');
          resolve(null);
        });
        rl.question(question, (answer) => {
          answered = true;
          rl.close();
          resolve(answer.trim());
        });
      });
    }
  };
}

/**
 * Yes unless the answer is n/no. Closed input counts as no.
 */
export async function confirm(prompter: Prompter, question: string): Promise<boolean> {
  const answer = await prompter.ask(`${question} (y/n) [y]: `);
  if (answer === null) return false;
  const normalized = answer.toLowerCase();
  return normalized !== 'n' && normalized !== 'no';
}

export type ResolvedParams = {
  params: Params;
  origins: Partial<Record<ParamName, string>>;
};

/**
 * Resolve each name from the first source that has a non-empty value.
 * Sources are asked in order, so list the most specific first.
 */
export async function resolveParams(names: readonly ParamName[], sources: ParamSource[]): Promise<ResolvedParams> {
  const params: Params = {};
  const origins: Partial<Record<ParamName, string>> = {};

  for (const name of names) {
    for (const source of sources) {
      const value = await source.get(name);
      if (value !== undefined) {
        params[name] = value;
        origins[name] = source.label;
        break;
      }
    }
  }

  return { params, origins };
}

export function requireParam(params: Params, name: ParamName): string {
  const value = nonEmpty(params[name]);
  if (value === undefined) throw new MissingParamError(name);
  return value;
}
