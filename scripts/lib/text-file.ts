import fs from 'node:fs';
import path from 'node:path';

export function readTextIfExists(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch {
    return null;
  }
}

export function fileIncludes(filePath: string, needle: string): boolean {
  const content = readTextIfExists(filePath);
  return content !== null && content.includes(needle);
}

/**
 * Append `lines` to the end of the file, creating it (and its directory) if needed.
 * A non-empty file gets a blank separator line before the block.
 */
export function appendBlock(filePath: string, lines: string[]): void {
  const existing = readTextIfExists(filePath) ?? '';
  let separator = '';
  if (existing.length > 0) separator = existing.endsWith('\n') ? '\n' : '\n\n';
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, existing + separator + lines.join('\n') + '\n', 'utf8');
}

/**
 * Append the block only when `marker` is not in the file yet.
 */
export function ensureBlock(
  filePath: string,
  lines: string[],
  opts: { marker: string }
): 'present' | 'appended' {
  if (fileIncludes(filePath, opts.marker)) return 'present';
  appendBlock(filePath, lines);
  return 'appended';
}

export function writeFileIfChanged(
  filePath: string,
  content: string,
  opts: { mode?: number } = {}
): 'unchanged' | 'written' {
  const existing = readTextIfExists(filePath);
  if (existing === content) {
    if (opts.mode !== undefined) fs.chmodSync(filePath, opts.mode);
    return 'unchanged';
  }
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf8');
  if (opts.mode !== undefined) fs.chmodSync(filePath, opts.mode);
  return 'written';
}

export function isExecutable(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export function isDirectory(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

export function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}
