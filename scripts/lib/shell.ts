import path from 'node:path';

export const SHELL_KINDS = ['bash', 'zsh', 'fish', 'posix'] as const;

export type ShellKind = (typeof SHELL_KINDS)[number];

export interface ShellProfile {
  kind: ShellKind;
  /** RC file path relative to the home directory. */
  rcFile: string;
  /** Line that enables direnv for interactive sessions, `null` when direnv has no hook for the shell. */
  direnvHook: string | null;
  /** Line that puts `~/.local/bin` on PATH. */
  localBinPath: string;
}

export const SHELL_PROFILES: Readonly<Record<ShellKind, ShellProfile>> = {
  bash: {
    kind: 'bash',
    rcFile: '.bashrc',
    direnvHook: 'eval "$(direnv hook bash)"',
    localBinPath: 'export PATH="$HOME/.local/bin:$PATH"'
  },
  zsh: {
    kind: 'zsh',
    rcFile: '.zshrc',
    direnvHook: 'eval "$(direnv hook zsh)"',
    localBinPath: 'export PATH="$HOME/.local/bin:$PATH"'
  },
  fish: {
    kind: 'fish',
    rcFile: path.join('.config', 'fish', 'config.fish'),
    direnvHook: 'direnv hook fish | source',
    localBinPath: 'fish_add_path $HOME/.local/bin'
  },
  posix: {
    kind: 'posix',
    rcFile: '.profile',
    direnvHook: null,
    localBinPath: 'export PATH="$HOME/.local/bin:$PATH"'
  }
};

export function isShellKind(value: unknown): value is ShellKind {
  return typeof value === 'string' && SHELL_KINDS.some((kind) => kind === value);
}

/**
 * Map a `$SHELL` value (`/usr/bin/zsh`, `bash`, ...) to a known shell.
 * Anything unrecognised falls back to `posix`, whose RC file is `~/.profile`.
 */
export function detectShell(shellEnv: string | undefined): ShellKind {
  if (!shellEnv) return 'posix';
  const name = path.basename(shellEnv.trim());
  if (name === 'bash' || name === 'zsh' || name === 'fish') return name;
  return 'posix';
}

export function rcFileFor(shell: ShellKind, homeDir: string): string {
  return path.join(homeDir, SHELL_PROFILES[shell].rcFile);
}

/**
 * Shell a given RC file belongs to, judged by its basename.
 */
export function shellForRcFile(rcFile: string): ShellKind | null {
  const base = path.basename(rcFile);
  for (const kind of SHELL_KINDS) {
    if (path.basename(SHELL_PROFILES[kind].rcFile) === base) return kind;
  }
  return null;
}
