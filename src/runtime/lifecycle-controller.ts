/**
 * Lifecycle Controller
 *
 * Translates service lifecycle requests into container runtime invocations
 * (docker compose by default) and surfaces the runtime's exit status. No
 * operation is retried here.
 */

import type { ServiceCatalog } from '../config/service-catalog';
import { ConsoleError } from '../errors/console-error';
import { ErrorCode } from '../errors/error-codes';
import { getConsoleLogger, type ConsoleLogger } from '../logging/console-logger';
import type { CommandResult, CommandRunner } from './command-runner';

/**
 * 'all' or an explicit subset of catalog service names
 */
export type ServiceSelection = 'all' | readonly string[];

export type ServiceState = 'running' | 'exited' | 'restarting' | 'missing' | 'unknown';

export interface ServiceStatus {
  service: string;
  state: ServiceState;
  /** Runtime's own status text, e.g. "Up 2 hours" */
  detail: string;
}

export interface LogOptions {
  tail?: number;
  errorsOnly?: boolean;
}

export interface LifecycleControllerOptions {
  catalog: ServiceCatalog;
  runner: CommandRunner;
  /** Runtime command prefix, e.g. ['docker', 'compose'] */
  runtimeCommand: readonly string[];
  /** Project directory the runtime is invoked in */
  cwd: string;
  logger?: ConsoleLogger;
}

const ERROR_LINE = /error|fail|fatal|exception/i;
const DEFAULT_TAIL = 50;

function toState(raw: string): ServiceState {
  const state = raw.toLowerCase();
  if (state === 'running' || state === 'exited' || state === 'restarting') {
    return state;
  }
  return 'unknown';
}

function readStatusRecord(value: unknown): ServiceStatus | undefined {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  const record: Record<string, unknown> = { ...value };
  if (typeof record.Service !== 'string') {
    return undefined;
  }
  return {
    service: record.Service,
    state: typeof record.State === 'string' ? toState(record.State) : 'unknown',
    detail: typeof record.Status === 'string' ? record.Status : '',
  };
}

/**
 * Parse `ps --format json`, which is a JSON array on older runtimes and one
 * object per line on newer ones
 */
export function parseStatusOutput(output: string): ServiceStatus[] {
  const trimmed = output.trim();
  if (trimmed === '') {
    return [];
  }
  const documents: unknown[] = [];
  if (trimmed.startsWith('[')) {
    const parsed: unknown = JSON.parse(trimmed);
    if (Array.isArray(parsed)) {
      documents.push(...parsed);
    }
  } else {
    for (const line of trimmed.split('\n')) {
      if (line.trim() !== '') {
        documents.push(JSON.parse(line));
      }
    }
  }
  return documents
    .map(readStatusRecord)
    .filter((status): status is ServiceStatus => status !== undefined);
}

export class LifecycleController {
  private readonly catalog: ServiceCatalog;
  private readonly runner: CommandRunner;
  private readonly runtimeCommand: readonly string[];
  private readonly cwd: string;
  private readonly logger: ConsoleLogger;

  constructor(options: LifecycleControllerOptions) {
    this.catalog = options.catalog;
    this.runner = options.runner;
    this.runtimeCommand = options.runtimeCommand;
    this.cwd = options.cwd;
    this.logger = options.logger ?? getConsoleLogger();
  }

  /**
   * Names passed to the runtime; empty means every service
   * @throws ConsoleError E302 for a name outside the catalog
   */
  resolveServices(selection: ServiceSelection): string[] {
    if (selection === 'all') {
      return [];
    }
    const known = new Set(this.catalog.services.map((s) => s.name));
    const unknown = selection.filter((name) => !known.has(name));
    if (unknown.length > 0) {
      throw new ConsoleError(ErrorCode.E302_UNKNOWN_SERVICE, unknown.join(', '), {
        known: [...known],
      });
    }
    return [...selection];
  }

  async start(selection: ServiceSelection = 'all'): Promise<string> {
    return this.invoke(['up', '-d', ...this.resolveServices(selection)]);
  }

  async stop(selection: ServiceSelection = 'all'): Promise<string> {
    return this.invoke(['stop', ...this.resolveServices(selection)]);
  }

  async restart(selection: ServiceSelection = 'all'): Promise<string> {
    return this.invoke(['restart', ...this.resolveServices(selection)]);
  }

  async pullLatest(selection: ServiceSelection = 'all'): Promise<string> {
    return this.invoke(['pull', ...this.resolveServices(selection)]);
  }

  /**
   * Recreate services whose image or configuration changed
   */
  async recreate(selection: ServiceSelection = 'all'): Promise<string> {
    return this.invoke(['up', '-d', '--remove-orphans', ...this.resolveServices(selection)]);
  }

  /**
   * Stop and remove every managed process
   */
  async down(): Promise<string> {
    return this.invoke(['down', '--remove-orphans']);
  }

  /**
   * Per-service state; catalog services first (missing when not created), then
   * anything else the runtime reports
   */
  async status(): Promise<ServiceStatus[]> {
    const output = await this.invoke(['ps', '--all', '--format', 'json']);
    let reported: ServiceStatus[];
    try {
      reported = parseStatusOutput(output);
    } catch (error) {
      throw new ConsoleError(
        ErrorCode.E301_RUNTIME_OPERATION_FAILURE,
        `unreadable status output: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const byName = new Map(reported.map((status) => [status.service, status]));
    const result: ServiceStatus[] = this.catalog.services.map(
      (service) => byName.get(service.name) ?? { service: service.name, state: 'missing', detail: '' }
    );
    const catalogNames = new Set(this.catalog.services.map((s) => s.name));
    for (const status of reported) {
      if (!catalogNames.has(status.service)) {
        result.push(status);
      }
    }
    return result;
  }

  /**
   * Recent log lines with runtime noise removed
   */
  async logs(selection: ServiceSelection = 'all', options: LogOptions = {}): Promise<string[]> {
    const tail = options.tail ?? DEFAULT_TAIL;
    const output = await this.invoke(['logs', '--no-color', '--tail', String(tail), ...this.resolveServices(selection)]);
    return output
      .split('\n')
      .filter((line) => line.trim() !== '')
      .filter((line) => !this.isNoise(line))
      .filter((line) => !options.errorsOnly || ERROR_LINE.test(line));
  }

  /**
   * Stream live logs until the signal aborts
   */
  async follow(
    selection: ServiceSelection,
    signal: AbortSignal,
    onLine: (line: string) => void
  ): Promise<void> {
    const args = [...this.runtimeCommand.slice(1), 'logs', '-f', '--tail', '20', ...this.resolveServices(selection)];
    this.logger.info('RUNTIME', `follow ${args.join(' ')}`);
    const result = await this.runner.follow(this.runtimeCommand[0], args, {
      cwd: this.cwd,
      signal,
      onLine: (line) => {
        if (!this.isNoise(line)) {
          onLine(line);
        }
      },
    });
    this.check(args, result);
  }

  private isNoise(line: string): boolean {
    return this.catalog.runtimeNoise.some((pattern) => pattern.test(line));
  }

  private async invoke(operation: string[]): Promise<string> {
    const args = [...this.runtimeCommand.slice(1), ...operation];
    this.logger.info('RUNTIME', `${this.runtimeCommand[0]} ${args.join(' ')}`);
    const result = await this.runner.run(this.runtimeCommand[0], args, { cwd: this.cwd });
    this.check(args, result);
    return result.stdout;
  }

  /**
   * @throws ConsoleError E301 carrying the runtime's own message
   */
  private check(args: readonly string[], result: CommandResult): void {
    if (result.exitCode === 0) {
      return;
    }
    const message = result.stderr.trim().split('\n').filter((line) => !this.isNoise(line)).pop() ?? '';
    this.logger.warn('RUNTIME', `Runtime operation failed: ${args.join(' ')}`, {
      exitCode: result.exitCode,
      stderr: result.stderr,
    });
    throw new ConsoleError(
      ErrorCode.E301_RUNTIME_OPERATION_FAILURE,
      message || `${args.join(' ')} exited with code ${result.exitCode}`,
      { exitCode: result.exitCode, stderr: result.stderr }
    );
  }
}
