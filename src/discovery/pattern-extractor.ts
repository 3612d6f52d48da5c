/**
 * Pattern Extractor
 *
 * Anchor-first extraction of credential tokens from probe output. A target
 * names an anchor phrase and the grammar of the token that follows it. The
 * last valid occurrence wins; occurrences whose adjacent token does not
 * satisfy the grammar are skipped.
 */

import { matchesGrammar, type ValueGrammar } from '../models/value-grammar';

/**
 * The part of an extraction target the scanner needs
 */
export interface ScanTarget {
  anchor: string;
  grammar: ValueGrammar;
}

export interface Match {
  value: string;
  /** Index of the line the value was found on */
  lineIndex: number;
}

const LEADING_PUNCTUATION = /^[\s:=("'[]+/;
const TRAILING_PUNCTUATION = /[)"'\],.;:!]+$/;

/**
 * Token immediately following an anchor position, with wrapping punctuation removed
 */
function tokenAfter(text: string): string {
  const trimmed = text.replace(LEADING_PUNCTUATION, '');
  const token = trimmed.split(/\s+/)[0] ?? '';
  return token.replace(TRAILING_PUNCTUATION, '');
}

/**
 * Last valid value on a single line, or undefined
 */
export function matchLine(line: string, target: ScanTarget): string | undefined {
  const haystack = line.toLowerCase();
  const anchor = target.anchor.toLowerCase();
  let position = haystack.lastIndexOf(anchor);
  while (position !== -1) {
    const candidate = tokenAfter(line.slice(position + anchor.length));
    if (candidate !== '' && matchesGrammar(candidate, target.grammar)) {
      return candidate;
    }
    if (position === 0) {
      break;
    }
    position = haystack.lastIndexOf(anchor, position - 1);
  }
  return undefined;
}

/**
 * Scan a complete set of lines
 * @param startLine first line considered (lines before it are ignored)
 */
export function scan(lines: readonly string[], target: ScanTarget, startLine: number = 0): Match | undefined {
  for (let i = lines.length - 1; i >= startLine; i--) {
    const value = matchLine(lines[i], target);
    if (value !== undefined) {
      return { value, lineIndex: i };
    }
  }
  return undefined;
}

/**
 * Incremental scanner.
 *
 * feed() accepts the whole (growing) line list each time and only examines
 * lines it has not seen before, so repeated polling costs O(new lines). The
 * result after any sequence of feeds equals scan() over the same lines.
 */
export class PatternScanner {
  private scanned: number;
  private match: Match | undefined;

  constructor(
    readonly target: ScanTarget,
    readonly startLine: number = 0
  ) {
    this.scanned = startLine;
  }

  feed(lines: readonly string[]): Match | undefined {
    for (let i = this.scanned; i < lines.length; i++) {
      const value = matchLine(lines[i], this.target);
      if (value !== undefined) {
        this.match = { value, lineIndex: i };
      }
    }
    this.scanned = Math.max(this.scanned, lines.length);
    return this.match;
  }

  getMatch(): Match | undefined {
    return this.match;
  }

  getScannedCount(): number {
    return this.scanned;
  }
}
