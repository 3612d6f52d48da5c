/**
 * Probe Log Sink - verbatim copy of a probe's output on disk
 */

import * as fs from 'fs';
import * as path from 'path';

export interface ProbeLogSink {
  /** Where the full log can be read, if persisted */
  readonly path?: string;
  write(chunk: string): void;
  close(): Promise<void>;
}

/**
 * Writes probe output to <logDir>/<probe>.log (truncated on each launch)
 */
export class FileProbeLogSink implements ProbeLogSink {
  readonly path: string;
  private stream: fs.WriteStream;
  private writeError: Error | undefined;

  constructor(logDir: string, probeName: string) {
    fs.mkdirSync(logDir, { recursive: true });
    this.path = path.join(logDir, `${probeName}.log`);
    this.stream = fs.createWriteStream(this.path, { flags: 'w', encoding: 'utf-8' });
    this.stream.on('error', (error) => {
      this.writeError = error;
    });
  }

  write(chunk: string): void {
    if (!this.writeError) {
      this.stream.write(chunk);
    }
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.writeError) {
        reject(this.writeError);
        return;
      }
      this.stream.end(() => resolve());
    });
  }
}
