/**
 * Console Output - operator-facing text
 *
 * Plain lines plus one-line status indicators:
 *   ✓ success    ⚠ degraded / skipped    ✗ failed (followed by a hint line)
 */

import { isConsoleError } from '../errors/console-error';
import type { ServiceStatus } from '../runtime/lifecycle-controller';

export type StatusKind = 'ok' | 'warn' | 'fail';

const STATUS_SYMBOLS: Record<StatusKind, string> = {
  ok: '✓',
  warn: '⚠',
  fail: '✗',
};

const RULE = '═'.repeat(72);

export class ConsoleOutput {
  constructor(private readonly write: (text: string) => void = (text) => process.stdout.write(text)) {}

  line(text: string = ''): void {
    this.write(text + '\n');
  }

  /**
   * Section banner
   */
  heading(title: string): void {
    this.line();
    this.line(RULE);
    this.line(`  ${title}`);
    this.line(RULE);
    this.line();
  }

  status(kind: StatusKind, message: string, hint?: string): void {
    this.line(`${STATUS_SYMBOLS[kind]} ${message}`);
    if (hint) {
      this.line(`  ${hint}`);
    }
  }

  ok(message: string): void {
    this.status('ok', message);
  }

  warn(message: string, hint?: string): void {
    this.status('warn', message, hint);
  }

  /**
   * Report a failure; ConsoleErrors carry their own remediation hint
   */
  fail(error: unknown, hint?: string): void {
    if (isConsoleError(error)) {
      this.status('fail', error.message, hint ?? error.hint);
      return;
    }
    this.status('fail', error instanceof Error ? error.message : String(error), hint);
  }

  /**
   * One line per service: symbol, name, state, runtime detail
   */
  serviceStatus(statuses: readonly ServiceStatus[]): void {
    const width = Math.max(0, ...statuses.map((s) => s.service.length));
    for (const status of statuses) {
      const symbol = status.state === 'running' ? STATUS_SYMBOLS.ok : status.state === 'missing' ? STATUS_SYMBOLS.fail : STATUS_SYMBOLS.warn;
      const detail = status.detail ? `  ${status.detail}` : '';
      this.line(`  ${symbol} ${status.service.padEnd(width)}  ${status.state}${detail}`);
    }
  }
}
