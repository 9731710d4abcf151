/**
 * Line-based edits of `pyproject.toml`.
 *
 * The file is patched as text so comments and formatting outside the touched
 * lines are left as they are.
 */

export type PyprojectField = 'name' | 'description' | 'authors';

function escapeTomlString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function unescapeTomlString(value: string): string {
  return value.replace(/\\"/g, '"').replace(/\\\\/g, '\\');
}

function fieldPattern(field: PyprojectField): RegExp {
  return new RegExp(`^${field}\\s*=\\s*(.*)$`, 'm');
}

export function formatAuthors(authorName: string, authorEmail: string): string {
  return `["${escapeTomlString(`${authorName} <${authorEmail}>`)}"]`;
}

export function formatFieldValue(field: PyprojectField, value: string): string {
  if (field === 'authors') return value;
  return `"${escapeTomlString(value)}"`;
}

/**
 * Raw right-hand side of the first top-level `field = ...` line, or `null`.
 */
export function readFieldRaw(content: string, field: PyprojectField): string | null {
  const match = content.match(fieldPattern(field));
  return match ? match[1].trim() : null;
}

/**
 * Value of a string field (`name = "x"`), unquoted.
 */
export function readStringField(content: string, field: 'name' | 'description'): string | null {
  const raw = readFieldRaw(content, field);
  if (raw === null) return null;
  const match = raw.match(/^"((?:[^"\\]|\\.)*)"/);
  return match ? unescapeTomlString(match[1]) : null;
}

/**
 * Replace the first `field = ...` line with the given (already formatted) value.
 * Returns the content unchanged when the field is absent.
 */
export function setField(content: string, field: PyprojectField, formattedValue: string): string {
  return content.replace(fieldPattern(field), () => `${field} = ${formattedValue}`);
}

export function hasPackageModeSetting(content: string): boolean {
  return /^package-mode\s*=/m.test(content);
}

/**
 * Insert `package-mode = false` right after the `[tool.poetry]` header.
 * Content without that section is returned unchanged.
 */
export function disablePackageMode(content: string): string {
  if (hasPackageModeSetting(content)) return content;
  const lines = content.split('\n');
  const idx = lines.findIndex((l) => l.trim() === '[tool.poetry]');
  if (idx < 0) return content;
  lines.splice(idx + 1, 0, 'package-mode = false');
  return lines.join('\n');
}
