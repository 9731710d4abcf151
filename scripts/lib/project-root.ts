import fs from 'node:fs';
import path from 'node:path';

interface FindProjectRootOptions {
  maxDepth?: number;
  markers?: readonly string[];
}

export const PROJECT_ROOT_MARKERS = ['devkit.config.yml', 'pyproject.toml', '.git'] as const;

/**
 * Find the project root by walking parent directories until one of the
 * marker files is found.
 *
 * @param startPath - Starting directory path
 * @param opts - Options object
 * @returns Project root path or null if not found
 */
export function findProjectRoot(
  startPath: string = process.cwd(),
  opts: FindProjectRootOptions = {}
): string | null {
  const maxDepth = opts.maxDepth !== undefined && Number.isFinite(opts.maxDepth) ? opts.maxDepth : 10;
  const markers = opts.markers ?? PROJECT_ROOT_MARKERS;

  let current = path.resolve(startPath);
  for (let depth = 0; depth < maxDepth; depth++) {
    if (markers.some((m) => fs.existsSync(path.join(current, m)))) return current;

    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return null;
}
