#!/usr/bin/env node

/**
 * Configuration file utilities
 *
 * Reads `devkit.config.yml` from the project root and the JSON cache files
 * under `.cache/`.
 */

import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';

import { DevkitConfigSchema, type DevkitConfig } from '../schemas/devkit-config.zod.js';

export const DEVKIT_CONFIG_BASENAMES = ['devkit.config.yml', 'devkit.config.yaml'] as const;

export class ConfigError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`${path.basename(filePath)}: ${message}`);
    this.name = 'ConfigError';
    this.filePath = filePath;
  }
}

/**
 * Read JSON file
 */
export function readJSON(filePath: string): unknown {
  try {
    const content = fs.readFileSync(filePath, 'utf8');
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch {
    return null;
  }
}

/**
 * Write JSON file
 */
export function writeJSON(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2) + '\n', 'utf8');
}

export function findDevkitConfigFile(projectRoot: string): string | null {
  const matches = DEVKIT_CONFIG_BASENAMES.map((name) => path.join(projectRoot, name)).filter((p) =>
    fs.existsSync(p)
  );

  if (matches.length > 1) {
    const list = matches.map((p) => path.basename(p)).join(', ');
    throw new ConfigError(matches[0], `multiple config files found (${list}); keep only one`);
  }

  return matches[0] ?? null;
}

/**
 * Load and validate the project config. No file means an empty config.
 */
export function readDevkitConfig(projectRoot: string): { config: DevkitConfig; configFile: string | null } {
  const configFile = findDevkitConfigFile(projectRoot);
  if (!configFile) return { config: {}, configFile: null };

  let raw: unknown;
  try {
    raw = YAML.parse(fs.readFileSync(configFile, 'utf8'));
  } catch (e) {
    throw new ConfigError(configFile, e instanceof Error ? e.message : String(e));
  }

  // An empty YAML document parses to null.
  if (raw === null || raw === undefined) return { config: {}, configFile };

  const parsed = DevkitConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(configFile, issues);
  }

  return { config: parsed.data, configFile };
}
