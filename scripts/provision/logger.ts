import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Pino-compatible (levels-only) surface:
// - logger.info('msg')
// - logger.info({ key: 'value' }, 'msg')
export type ProvisionLogger = {
  debug: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
  info: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
  warn: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
  error: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
};

function normalizeArgs(
  objOrMsg?: Record<string, unknown> | string,
  msg?: string
): { obj: Record<string, unknown>; msg: string } {
  if (typeof objOrMsg === 'string') {
    return { obj: {}, msg: objOrMsg };
  }
  return { obj: objOrMsg ?? {}, msg: msg ?? '' };
}

function levelToNumber(level: LogLevel): number {
  // Align with pino numeric levels.
  switch (level) {
    case 'debug':
      return 20;
    case 'info':
      return 30;
    case 'warn':
      return 40;
    case 'error':
      return 50;
  }
}

export function getLogFilePath(projectRoot: string): string {
  return path.join(projectRoot, '.cache', 'devkit.log');
}

/**
 * JSON-lines logger appending to `.cache/devkit.log`. With `DEBUG` set the
 * lines are mirrored to stderr.
 */
export function createProvisionLogger(
  projectRoot: string,
  opts: { filePath?: string; echo?: boolean } = {}
): ProvisionLogger {
  const filePath = opts.filePath ?? getLogFilePath(projectRoot);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const echo = opts.echo ?? Boolean(process.env.DEBUG);

  const write = (level: LogLevel, objOrMsg?: Record<string, unknown> | string, msg?: string): void => {
    const { obj, msg: normalizedMsg } = normalizeArgs(objOrMsg, msg);
    const line = JSON.stringify({
      level: levelToNumber(level),
      time: Date.now(),
      msg: normalizedMsg,
      ...obj
    });
    fs.appendFileSync(filePath, line + '\n', 'utf8');
    if (echo) console.error(`[devkit] ${line}`);
  };

  return {
    debug: (objOrMsg, msg) => write('debug', objOrMsg, msg),
    info: (objOrMsg, msg) => write('info', objOrMsg, msg),
    warn: (objOrMsg, msg) => write('warn', objOrMsg, msg),
    error: (objOrMsg, msg) => write('error', objOrMsg, msg)
  };
}

/**
 * Logger that keeps entries in memory.
 */
export function createMemoryLogger(): ProvisionLogger & {
  entries: Array<{ level: LogLevel; msg: string } & Record<string, unknown>>;
} {
  const entries: Array<{ level: LogLevel; msg: string } & Record<string, unknown>> = [];
  const push = (level: LogLevel) => (objOrMsg?: Record<string, unknown> | string, msg?: string) => {
    const { obj, msg: normalizedMsg } = normalizeArgs(objOrMsg, msg);
    entries.push({ ...obj, level, msg: normalizedMsg });
  };
  return {
    entries,
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error')
  };
}
