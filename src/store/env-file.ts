/**
 * .env file model
 *
 * A ConfigSnapshot keeps every line of the file in order. Lines the console
 * never changes (comments, blank lines, unknown keys, untouched values) are
 * written back exactly as they were read.
 */

import { ConsoleError } from '../errors/console-error';
import { ErrorCode } from '../errors/error-codes';

export type EnvLine =
  | { kind: 'entry'; key: string; value: string; /** Original text, kept while the value is unchanged */ raw?: string }
  | { kind: 'verbatim'; text: string };

export interface ConfigSnapshot {
  readonly lines: readonly EnvLine[];
}

const ENTRY = /^\s*([A-Za-z_][A-Za-z0-9_]*)=(.*)$/;
const NEEDS_QUOTES = /[\s#"'\\]/;

export function emptySnapshot(): ConfigSnapshot {
  return { lines: [] };
}

function unquote(raw: string): string {
  if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) {
    return raw.slice(1, -1).replace(/\\(["\\])/g, '$1');
  }
  if (raw.length >= 2 && raw.startsWith("'") && raw.endsWith("'")) {
    return raw.slice(1, -1);
  }
  return raw;
}

export function formatValue(value: string): string {
  if (value === '' || !NEEDS_QUOTES.test(value)) {
    return value;
  }
  return `"${value.replace(/[\\"]/g, '\\$&')}"`;
}

/**
 * Parse file content.
 * @throws ConsoleError E101 on a line that is neither blank, a comment, nor KEY=value
 */
export function parseEnv(content: string, source: string = '.env'): ConfigSnapshot {
  const rawLines = content.split('\n');
  if (rawLines.length > 0 && rawLines[rawLines.length - 1] === '') {
    rawLines.pop();
  }

  const lines: EnvLine[] = rawLines.map((text, index) => {
    const line = text.replace(/\r$/, '');
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) {
      return { kind: 'verbatim', text: line };
    }
    const match = ENTRY.exec(line);
    if (!match) {
      throw new ConsoleError(
        ErrorCode.E101_MALFORMED_CONFIGURATION,
        `${source} line ${index + 1}`,
        { line: index + 1 }
      );
    }
    return { kind: 'entry', key: match[1], value: unquote(match[2]), raw: line };
  });

  return { lines };
}

export function serializeEnv(snapshot: ConfigSnapshot): string {
  const text = snapshot.lines.map((line) => {
    if (line.kind === 'verbatim') {
      return line.text;
    }
    return line.raw ?? `${line.key}=${formatValue(line.value)}`;
  });
  return text.length === 0 ? '' : text.join('\n') + '\n';
}

/**
 * Current value of a key (last assignment wins, as when the file is sourced)
 */
export function getValue(snapshot: ConfigSnapshot, key: string): string | undefined {
  let value: string | undefined;
  for (const line of snapshot.lines) {
    if (line.kind === 'entry' && line.key === key) {
      value = line.value;
    }
  }
  return value;
}

export function snapshotValues(snapshot: ConfigSnapshot): Record<string, string> {
  const values: Record<string, string> = {};
  for (const line of snapshot.lines) {
    if (line.kind === 'entry') {
      values[line.key] = line.value;
    }
  }
  return values;
}

/**
 * Apply changes without touching any other line.
 *
 * Existing keys are rewritten in place (keeping the original text when the
 * value is unchanged); new keys are appended in the order given.
 */
export function upsert(snapshot: ConfigSnapshot, changes: Readonly<Record<string, string>>): ConfigSnapshot {
  for (const [key, value] of Object.entries(changes)) {
    if (!ENTRY.test(`${key}=`) || /[\r\n]/.test(value)) {
      throw new ConsoleError(ErrorCode.E102_CONFIGURATION_WRITE_FAILURE, `invalid record for ${JSON.stringify(key)}`);
    }
  }

  const seen = new Set<string>();
  const lines: EnvLine[] = snapshot.lines.map((line) => {
    if (line.kind !== 'entry' || !Object.prototype.hasOwnProperty.call(changes, line.key)) {
      return line;
    }
    seen.add(line.key);
    const value = changes[line.key];
    return value === line.value ? line : { kind: 'entry', key: line.key, value };
  });

  for (const [key, value] of Object.entries(changes)) {
    if (!seen.has(key)) {
      lines.push({ kind: 'entry', key, value });
    }
  }

  return { lines };
}
