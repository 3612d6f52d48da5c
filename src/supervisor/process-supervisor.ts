/**
 * Process Supervisor
 *
 * Launches short-lived probe processes and supervises them:
 * - Output is streamed into an OutputBuffer (and optionally a log sink)
 * - Waits are always bounded by a budget and can be cancelled
 * - terminate() is idempotent and safe after the process has exited
 * - Every probe is tracked in the process-wide ProbeRegistry until it exits
 * - launch() waits for probes that are still being terminated
 */

import { spawn, spawnSync, execFile, ChildProcess } from 'child_process';
import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { ConsoleError } from '../errors/console-error';
import { ErrorCode } from '../errors/error-codes';
import { getConsoleLogger, type ConsoleLogger } from '../logging/console-logger';
import { settlesWithin } from '../utils/timing';
import { OutputBuffer } from './output-buffer';
import { getProbeRegistry, type ProbeRegistry, type TrackedProbe } from './probe-registry';
import type { ProbeLogSink } from './probe-log-sink';

/**
 * What to launch
 */
export interface ProbeLaunchSpec {
  name: string;
  command: string;
  args: readonly string[];
  env?: Record<string, string>;
  cwd?: string;
  /** Probe talks to the operator: stdin is inherited and output mirrored */
  interactive?: boolean;
  /** Command run before signalling, e.g. to stop a named container */
  stopCommand?: readonly string[];
}

export interface ProbeExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export type ProbeWaitOutcome = 'completed' | 'timedOut' | 'interrupted';

/**
 * Handle returned by launch()
 */
export interface ProbeHandle {
  readonly id: string;
  readonly name: string;
  readonly pid: number | undefined;
  readonly output: OutputBuffer;
  /** Resolves once the process has exited and its output is flushed */
  readonly exited: Promise<ProbeExit>;
  hasExited(): boolean;
  readonly logPath?: string;
}

/**
 * Launch/terminate contract consumed by the discovery engine
 */
export interface ProbeLauncher {
  launch(spec: ProbeLaunchSpec, logSink?: ProbeLogSink): Promise<ProbeHandle>;
  terminate(handle: ProbeHandle): Promise<void>;
}

export interface ProcessSupervisorOptions {
  /** Grace period between SIGTERM and SIGKILL (default: 3000ms) */
  terminateGraceMs?: number;
  registry?: ProbeRegistry;
  logger?: ConsoleLogger;
}

/**
 * Supervisor events
 */
export interface ProcessSupervisorEvents {
  'probe:started': (handle: ProbeHandle) => void;
  'probe:exited': (handle: ProbeHandle, exit: ProbeExit) => void;
}

class ChildProbe implements ProbeHandle, TrackedProbe {
  readonly id: string;
  readonly name: string;
  readonly output = new OutputBuffer();
  readonly exited: Promise<ProbeExit>;
  readonly logPath?: string;
  terminating: Promise<void> | null = null;

  constructor(
    readonly spec: ProbeLaunchSpec,
    readonly child: ChildProcess,
    private readonly stopper: (probe: ChildProbe) => Promise<void>,
    logSink?: ProbeLogSink
  ) {
    this.id = uuidv4();
    this.name = spec.name;
    this.logPath = logSink?.path;
    this.exited = new Promise((resolve) => {
      child.once('close', (code, signal) => {
        this.output.flush();
        resolve({ code, signal });
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  hasExited(): boolean {
    return this.child.exitCode !== null || this.child.signalCode !== null;
  }

  terminate(): Promise<void> {
    return this.stopper(this);
  }

  killSync(): void {
    if (this.hasExited()) {
      return;
    }
    if (this.spec.stopCommand && this.spec.stopCommand.length > 0) {
      const [cmd, ...args] = this.spec.stopCommand;
      spawnSync(cmd, args, { stdio: 'ignore', timeout: 5000 });
    }
    this.child.kill('SIGKILL');
  }
}

/**
 * Process Supervisor
 */
export class ProcessSupervisor extends EventEmitter implements ProbeLauncher {
  private readonly terminateGraceMs: number;
  private readonly registry: ProbeRegistry;
  private readonly logger: ConsoleLogger;
  private readonly probes: Map<string, ChildProbe> = new Map();

  constructor(options: ProcessSupervisorOptions = {}) {
    super();
    this.terminateGraceMs = options.terminateGraceMs ?? 3000;
    this.registry = options.registry ?? getProbeRegistry();
    this.logger = options.logger ?? getConsoleLogger();
  }

  /**
   * Start a probe. Resolves once the process has spawned.
   * @throws ConsoleError E201 when the process cannot be started
   */
  async launch(spec: ProbeLaunchSpec, logSink?: ProbeLogSink): Promise<ProbeHandle> {
    // A probe still being stopped may hold the receiver
    await this.settleTerminations();

    let child: ChildProcess;
    try {
      child = spawn(spec.command, [...spec.args], {
        cwd: spec.cwd,
        env: { ...process.env, ...spec.env },
        stdio: [spec.interactive ? 'inherit' : 'ignore', 'pipe', 'pipe'],
        detached: false,
      });
    } catch (error) {
      throw new ConsoleError(
        ErrorCode.E201_PROBE_LAUNCH_FAILURE,
        `${spec.command}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const probe = new ChildProbe(spec, child, (p) => this.stopProbe(p), logSink);

    const onChunk = (stream: 'stdout' | 'stderr') => (chunk: string): void => {
      probe.output.append(chunk, stream);
      logSink?.write(chunk);
      if (spec.interactive) {
        process.stdout.write(chunk);
      }
    };
    child.stdout?.setEncoding('utf-8');
    child.stderr?.setEncoding('utf-8');
    child.stdout?.on('data', onChunk('stdout'));
    child.stderr?.on('data', onChunk('stderr'));

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.off('error', onError);
        resolve();
      };
      const onError = (error: Error): void => {
        child.off('spawn', onSpawn);
        reject(new ConsoleError(ErrorCode.E201_PROBE_LAUNCH_FAILURE, `${spec.command}: ${error.message}`));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    // Late errors (e.g. kill on a dead pid) are recorded, not thrown
    child.on('error', (error) => this.logger.logError(`Probe ${spec.name} error`, error));

    this.probes.set(probe.id, probe);
    this.registry.register(probe);
    this.logger.logProbeLaunch(spec.name, spec.command, spec.args);
    this.emit('probe:started', probe);

    probe.exited.then(
      (exit) => {
        this.probes.delete(probe.id);
        this.registry.unregister(probe.id);
        this.logger.info('PROBE', `Probe ${spec.name} exited`, { code: exit.code, signal: exit.signal });
        this.emit('probe:exited', probe, exit);
        return logSink?.close();
      }
    ).catch((error: unknown) => this.logger.logError(`Probe ${spec.name} log sink failed`, error));

    return probe;
  }

  /**
   * Wait for a probe to exit, bounded by a budget and an optional cancellation signal
   */
  waitFor(handle: ProbeHandle, budgetMs: number, signal?: AbortSignal): Promise<ProbeWaitOutcome> {
    return new Promise((resolve) => {
      let settled = false;
      const finish = (outcome: ProbeWaitOutcome): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(outcome);
      };
      const onAbort = (): void => finish('interrupted');
      const timer = setTimeout(() => finish('timedOut'), budgetMs);

      if (signal?.aborted) {
        finish('interrupted');
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      void handle.exited.then(() => finish('completed'));
    });
  }

  /**
   * Terminate a probe. Safe to call repeatedly and after exit.
   */
  async terminate(handle: ProbeHandle): Promise<void> {
    const probe = this.probes.get(handle.id);
    if (!probe) {
      return;
    }
    await probe.terminate();
  }

  /**
   * Number of probes launched by this supervisor that are still running
   */
  getActiveCount(): number {
    return this.probes.size;
  }

  private async settleTerminations(): Promise<void> {
    const stopping: Promise<void>[] = [];
    for (const probe of this.probes.values()) {
      if (probe.terminating) {
        stopping.push(probe.terminating);
      }
    }
    await Promise.all(stopping);
  }

  private stopProbe(probe: ChildProbe): Promise<void> {
    if (!probe.terminating) {
      probe.terminating = this.escalate(probe);
    }
    return probe.terminating;
  }

  private async escalate(probe: ChildProbe): Promise<void> {
    if (probe.hasExited()) {
      await settlesWithin(probe.exited, this.terminateGraceMs);
      return;
    }

    if (probe.spec.stopCommand && probe.spec.stopCommand.length > 0) {
      await this.runStopCommand(probe.spec.stopCommand);
    }

    if (!probe.hasExited()) {
      probe.child.kill('SIGTERM');
    }
    if (await settlesWithin(probe.exited, this.terminateGraceMs)) {
      return;
    }

    this.logger.warn('PROBE', `Probe ${probe.name} ignored SIGTERM, sending SIGKILL`);
    probe.child.kill('SIGKILL');
    if (!(await settlesWithin(probe.exited, this.terminateGraceMs))) {
      // Something else still holds the pipes; stop reading them
      probe.child.stdout?.destroy();
      probe.child.stderr?.destroy();
      probe.output.flush();
      this.probes.delete(probe.id);
      this.registry.unregister(probe.id);
    }
  }

  private runStopCommand(command: readonly string[]): Promise<void> {
    const [cmd, ...args] = command;
    return new Promise((resolve) => {
      execFile(cmd, args, { timeout: this.terminateGraceMs * 2 }, (error) => {
        if (error) {
          this.logger.warn('PROBE', `Stop command failed: ${command.join(' ')}`, { error: error.message });
        }
        resolve();
      });
    });
  }
}

/**
 * Create a ProcessSupervisor instance
 */
export function createProcessSupervisor(options: ProcessSupervisorOptions = {}): ProcessSupervisor {
  return new ProcessSupervisor(options);
}
