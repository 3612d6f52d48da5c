/**
 * Command Runner - external commands behind an interface the tests can fake
 */

import { execFile, spawn } from 'child_process';
import { promisify } from 'util';
import { OutputBuffer } from '../supervisor/output-buffer';

const execFileAsync = promisify(execFile);

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
}

export interface FollowOptions {
  cwd?: string;
  /** Aborting stops the command and resolves the follow */
  signal: AbortSignal;
  onLine: (line: string) => void;
}

export interface CommandRunner {
  /** Run to completion. Never rejects: failures come back as a non-zero exit code */
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
  /** Stream output line by line until the command ends or the signal aborts */
  follow(command: string, args: readonly string[], options: FollowOptions): Promise<CommandResult>;
}

/**
 * Exit code 127 mirrors a shell's "command not found"
 */
const SPAWN_FAILURE_EXIT_CODE = 127;

function failureResult(error: unknown): CommandResult {
  if (!(error instanceof Error)) {
    return { exitCode: SPAWN_FAILURE_EXIT_CODE, stdout: '', stderr: String(error) };
  }
  const fields: Record<string, unknown> = { ...error };
  const stdout = typeof fields.stdout === 'string' ? fields.stdout : '';
  const stderr = typeof fields.stderr === 'string' && fields.stderr !== '' ? fields.stderr : error.message;
  const exitCode = typeof fields.code === 'number' ? fields.code : SPAWN_FAILURE_EXIT_CODE;
  return { exitCode, stdout, stderr };
}

export class ChildProcessCommandRunner implements CommandRunner {
  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    try {
      const { stdout, stderr } = await execFileAsync(command, [...args], {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        maxBuffer: 16 * 1024 * 1024,
        encoding: 'utf-8',
      });
      return { exitCode: 0, stdout, stderr };
    } catch (error) {
      return failureResult(error);
    }
  }

  follow(command: string, args: readonly string[], options: FollowOptions): Promise<CommandResult> {
    return new Promise((resolve) => {
      if (options.signal.aborted) {
        resolve({ exitCode: 0, stdout: '', stderr: '' });
        return;
      }

      const child = spawn(command, [...args], { cwd: options.cwd, stdio: ['ignore', 'pipe', 'pipe'] });
      const buffer = new OutputBuffer();
      let emitted = 0;
      let stderr = '';
      const drain = (): void => {
        const lines = buffer.getLines();
        for (; emitted < lines.length; emitted++) {
          options.onLine(lines[emitted]);
        }
      };

      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => {
        buffer.append(chunk, 'stdout');
        drain();
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
        buffer.append(chunk, 'stderr');
        drain();
      });

      const onAbort = (): void => {
        child.kill('SIGTERM');
      };
      options.signal.addEventListener('abort', onAbort, { once: true });

      child.once('error', (error) => {
        options.signal.removeEventListener('abort', onAbort);
        resolve(failureResult(error));
      });
      child.once('close', (code) => {
        options.signal.removeEventListener('abort', onAbort);
        buffer.flush();
        drain();
        // Stopped by the operator counts as a normal end
        resolve({ exitCode: options.signal.aborted ? 0 : code ?? 0, stdout: '', stderr });
      });
    });
  }
}
