#!/usr/bin/env node

// ANSI color codes
export const colors = {
  reset: '\x1b[0m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  blue: '\x1b[34m'
} as const;

// Symbols
export const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
  skip: '↷'
} as const;

export type Color = keyof typeof colors;

export type Printer = (message: string, color?: Color) => void;

/**
 * Print colored message to console
 */
export function print(message: string, color: Color = 'reset'): void {
  console.log(`${colors[color]}${message}${colors.reset}`);
}

/**
 * Printer that keeps every line (without colors); used by tests and by
 * callers that want to render the summary somewhere else.
 */
export function createBufferedPrinter(): { printer: Printer; lines: string[] } {
  const lines: string[] = [];
  return {
    printer: (message) => {
      lines.push(message);
    },
    lines
  };
}

/**
 * Check if command requires sudo
 * @param command - Command to check
 * @returns True if command starts with sudo
 */
export function requiresSudo(command: string): boolean {
  if (!command) return false;
  return command.trim().startsWith('sudo ');
}

export function parseCommaList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}
