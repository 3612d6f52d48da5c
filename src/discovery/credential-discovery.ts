/**
 * Credential Discovery Engine
 *
 * Runs one probe for one service and polls its output for the probe's
 * extraction targets. Targets with a prerequisite are only searched after the
 * prerequisite resolved, and only from the prerequisite's line onwards. The
 * probe is terminated as soon as every target is resolved, on deadline, on
 * interrupt, and on any error.
 */

import type { ExtractionTarget, ProbeDefinition } from '../config/service-catalog';
import { ConsoleError, isConsoleError } from '../errors/console-error';
import { ErrorCode } from '../errors/error-codes';
import { getConsoleLogger, type ConsoleLogger } from '../logging/console-logger';
import { metersToFeet, type FeederProfile } from '../models/feeder-profile';
import { FileProbeLogSink, type ProbeLogSink } from '../supervisor/probe-log-sink';
import type { ProbeHandle, ProbeLauncher, ProbeLaunchSpec } from '../supervisor/process-supervisor';
import { settlesWithin, sleep } from '../utils/timing';
import { PatternScanner, type Match } from './pattern-extractor';

export type DiscoveryOutcome =
  /** Every target resolved */
  | 'resolved'
  /** Some targets resolved before the deadline or probe exit */
  | 'partial'
  /** Nothing resolved within the budget */
  | 'timedOut'
  /** Cancelled by the operator */
  | 'interrupted'
  /** Probe exited before anything resolved */
  | 'exited';

export interface DiscoveryResult {
  probe: string;
  service: string;
  outcome: DiscoveryOutcome;
  /** Resolved values keyed by configuration key */
  values: Record<string, string>;
  resolvedTargets: string[];
  unresolvedTargets: string[];
  elapsedMs: number;
  /** Full probe output on disk, when a log directory was given */
  logPath?: string;
}

export interface DiscoverOptions {
  /** Overrides the probe's own budget */
  budgetMs?: number;
  pollIntervalMs?: number;
  signal?: AbortSignal;
  /** Directory for the verbatim probe log */
  logDir?: string;
}

export interface CredentialDiscoveryEngineOptions {
  logger?: ConsoleLogger;
  /** Clock, injectable for tests */
  now?: () => number;
}

export const DEFAULT_POLL_INTERVAL_MS = 1000;

/**
 * Values substituted into probe arguments and instructions
 */
export function probeTemplateValues(profile: FeederProfile): Record<string, string> {
  return {
    lat: String(profile.latitude),
    lon: String(profile.longitude),
    altM: String(profile.altitudeM),
    altFt: String(metersToFeet(profile.altitudeM)),
    tz: profile.timezone,
    name: profile.stationName,
  };
}

/**
 * Replace {name} placeholders; unknown names are left as they are
 */
export function fillTemplate(text: string, values: Readonly<Record<string, string>>): string {
  return text.replace(/\{(\w+)\}/g, (whole, name: string) => values[name] ?? whole);
}

export function buildLaunchSpec(probe: ProbeDefinition, profile: FeederProfile): ProbeLaunchSpec {
  const values = probeTemplateValues(profile);
  return {
    name: probe.name,
    command: probe.command,
    args: probe.args.map((arg) => fillTemplate(arg, values)),
    interactive: probe.interactive,
    stopCommand: probe.stopCommand,
  };
}

interface ScanState {
  scanners: Map<string, PatternScanner>;
  resolved: Map<string, Match>;
}

export class CredentialDiscoveryEngine {
  private readonly logger: ConsoleLogger;
  private readonly now: () => number;

  constructor(
    private readonly launcher: ProbeLauncher,
    options: CredentialDiscoveryEngineOptions = {}
  ) {
    this.logger = options.logger ?? getConsoleLogger();
    this.now = options.now ?? Date.now;
  }

  /**
   * Discover the probe's targets.
   * @throws ConsoleError E201 when the probe or its log cannot be started
   */
  async discover(
    probe: ProbeDefinition,
    profile: FeederProfile,
    options: DiscoverOptions = {}
  ): Promise<DiscoveryResult> {
    const budgetMs = options.budgetMs ?? probe.budgetSeconds * 1000;
    const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const startedAt = this.now();
    const deadline = startedAt + budgetMs;
    const state: ScanState = { scanners: new Map(), resolved: new Map() };

    let sink: ProbeLogSink | undefined;
    let handle: ProbeHandle;
    try {
      sink = options.logDir ? new FileProbeLogSink(options.logDir, probe.name) : undefined;
      handle = await this.launcher.launch(buildLaunchSpec(probe, profile), sink);
    } catch (error) {
      await sink?.close().catch((closeError: unknown) => this.logger.logError('Probe log close failed', closeError));
      if (isConsoleError(error)) {
        throw error;
      }
      throw new ConsoleError(
        ErrorCode.E201_PROBE_LAUNCH_FAILURE,
        `${probe.name}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    let exited = false;
    void handle.exited.then(() => {
      exited = true;
    });

    let outcome: DiscoveryOutcome;
    try {
      outcome = await this.poll(probe, handle, state, {
        deadline,
        pollIntervalMs,
        signal: options.signal,
        hasExited: () => exited,
      });
    } finally {
      // The launcher finishes a slow stop before its next launch
      const stopping = this.launcher
        .terminate(handle)
        .catch((error: unknown) => this.logger.logError(`Probe ${probe.name} terminate failed`, error));
      if (!(await settlesWithin(stopping, pollIntervalMs))) {
        this.logger.warn('PROBE', `Probe ${probe.name} still stopping`, { waitedMs: pollIntervalMs });
      }
    }

    const elapsedMs = this.now() - startedAt;
    const values: Record<string, string> = {};
    const resolvedTargets: string[] = [];
    const unresolvedTargets: string[] = [];
    for (const target of probe.targets) {
      const match = state.resolved.get(target.id);
      if (match) {
        values[target.key] = match.value;
        resolvedTargets.push(target.id);
      } else {
        unresolvedTargets.push(target.id);
        this.logger.logExtraction(probe.name, target.id, false, { elapsedMs });
      }
    }

    this.logger.info('PROBE', `Discovery ${probe.name}: ${outcome}`, {
      outcome,
      resolvedTargets,
      unresolvedTargets,
      elapsedMs,
    });

    return {
      probe: probe.name,
      service: probe.service,
      outcome,
      values,
      resolvedTargets,
      unresolvedTargets,
      elapsedMs,
      logPath: handle.logPath,
    };
  }

  private async poll(
    probe: ProbeDefinition,
    handle: ProbeHandle,
    state: ScanState,
    loop: { deadline: number; pollIntervalMs: number; signal?: AbortSignal; hasExited: () => boolean }
  ): Promise<DiscoveryOutcome> {
    for (;;) {
      if (loop.signal?.aborted) {
        return 'interrupted';
      }

      // Read the exit flag before scanning: once set, the output is final
      const finalPass = loop.hasExited();
      this.scanPending(probe, handle.output.getLines(), state);

      if (state.resolved.size === probe.targets.length) {
        return 'resolved';
      }
      if (finalPass) {
        return state.resolved.size > 0 ? 'partial' : 'exited';
      }

      const remaining = loop.deadline - this.now();
      if (remaining <= 0) {
        return state.resolved.size > 0 ? 'partial' : 'timedOut';
      }

      await Promise.race([
        sleep(Math.min(loop.pollIntervalMs, remaining), loop.signal),
        handle.exited,
      ]);
    }
  }

  /**
   * Feed every active scanner; repeat while resolutions unlock dependents
   */
  private scanPending(probe: ProbeDefinition, lines: readonly string[], state: ScanState): void {
    let progressed = true;
    while (progressed) {
      progressed = false;
      for (const target of probe.targets) {
        if (state.resolved.has(target.id)) {
          continue;
        }
        const scanner = this.scannerFor(target, state);
        if (!scanner) {
          continue;
        }
        const match = scanner.feed(lines);
        if (match) {
          state.resolved.set(target.id, match);
          this.logger.logExtraction(probe.name, target.id, true, { value: match.value });
          progressed = true;
        }
      }
    }
  }

  private scannerFor(target: ExtractionTarget, state: ScanState): PatternScanner | undefined {
    const existing = state.scanners.get(target.id);
    if (existing) {
      return existing;
    }
    let startLine = 0;
    if (target.dependsOn !== undefined) {
      const prerequisite = state.resolved.get(target.dependsOn);
      if (!prerequisite) {
        return undefined;
      }
      startLine = prerequisite.lineIndex;
    }
    const scanner = new PatternScanner(target, startLine);
    state.scanners.set(target.id, scanner);
    return scanner;
  }
}
