/**
 * Tools installed from the system package manager, and the package that provides each.
 */
export const APT_TOOLS: ReadonlyArray<{ tool: string; pkg: string }> = [
  { tool: 'git', pkg: 'git' },
  { tool: 'ssh', pkg: 'openssh-client' },
  { tool: 'python3', pkg: 'python3' },
  { tool: 'pip3', pkg: 'python3-pip' },
  { tool: 'curl', pkg: 'curl' }
];

/** Dev dependencies added to the Poetry project. */
export const DEV_TOOLS = ['pre-commit', 'black', 'ruff', 'sqlfluff'] as const;

/** Tools `verify-env` expects on PATH unless `tools` is configured. */
export const DEFAULT_VERIFY_TOOLS = ['python', 'black', 'ruff', 'pre-commit', 'sqlfluff'] as const;

export const POETRY_INSTALL_COMMAND = 'curl -sSL https://install.python-poetry.org | python3 -';

export const DOCKER_INSTALL_COMMAND =
  'curl -fsSL https://get.docker.com -o /tmp/get-docker.sh && sudo sh /tmp/get-docker.sh; status=$?; rm -f /tmp/get-docker.sh; exit $status';

export const SHFMT_URL = 'https://github.com/mvdan/sh/releases/latest/download/shfmt_linux_amd64';
