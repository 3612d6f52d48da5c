/**
 * Output Buffer
 *
 * Collects the merged stdout/stderr of a probe as complete lines. A chunk may
 * end mid-line; the unfinished tail of each stream stays pending until the next
 * chunk completes it or the probe exits and the buffer is flushed.
 */

export type OutputStreamName = 'stdout' | 'stderr';

// eslint-disable-next-line no-control-regex
const ANSI_ESCAPE = /\u001b\[[0-9;?]*[A-Za-z]/g;

export class OutputBuffer {
  private lines: string[] = [];
  private pending: Record<OutputStreamName, string> = { stdout: '', stderr: '' };
  private flushed = false;

  /**
   * Append a raw chunk from one stream
   */
  append(chunk: string, stream: OutputStreamName = 'stdout'): void {
    const combined = this.pending[stream] + chunk;
    const parts = combined.split('\n');
    this.pending[stream] = parts.pop() ?? '';
    for (const part of parts) {
      this.lines.push(cleanLine(part));
    }
  }

  /**
   * Promote pending partial lines to complete lines (called once the stream ends)
   */
  flush(): void {
    if (this.flushed) {
      return;
    }
    this.flushed = true;
    for (const stream of ['stdout', 'stderr'] as const) {
      if (this.pending[stream] !== '') {
        this.lines.push(cleanLine(this.pending[stream]));
        this.pending[stream] = '';
      }
    }
  }

  /**
   * Complete lines observed so far (snapshot copy)
   */
  getLines(): string[] {
    return [...this.lines];
  }

  getLineCount(): number {
    return this.lines.length;
  }

  isFlushed(): boolean {
    return this.flushed;
  }
}

function cleanLine(line: string): string {
  return line.replace(ANSI_ESCAPE, '').replace(/\r/g, '');
}
