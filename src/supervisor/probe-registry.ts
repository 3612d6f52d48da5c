/**
 * Probe Registry
 *
 * Process-wide record of every probe that has been launched and not yet
 * exited. Interrupts and console exit terminate everything registered here so
 * no probe outlives the console.
 */

export interface TrackedProbe {
  readonly id: string;
  readonly name: string;
  /** Graceful termination (stop command, SIGTERM, SIGKILL escalation) */
  terminate(): Promise<void>;
  /** Last-resort synchronous kill, usable from an 'exit' handler */
  killSync(): void;
}

export class ProbeRegistry {
  private probes: Map<string, TrackedProbe> = new Map();

  register(probe: TrackedProbe): void {
    this.probes.set(probe.id, probe);
  }

  unregister(id: string): void {
    this.probes.delete(id);
  }

  has(id: string): boolean {
    return this.probes.has(id);
  }

  size(): number {
    return this.probes.size;
  }

  getNames(): string[] {
    return Array.from(this.probes.values()).map((p) => p.name);
  }

  /**
   * Terminate every outstanding probe and wait for all of them
   */
  async terminateAll(): Promise<void> {
    const outstanding = Array.from(this.probes.values());
    await Promise.all(outstanding.map((probe) => probe.terminate()));
  }

  killAllSync(): void {
    for (const probe of this.probes.values()) {
      probe.killSync();
    }
    this.probes.clear();
  }
}

let globalRegistry: ProbeRegistry | null = null;

export function getProbeRegistry(): ProbeRegistry {
  if (!globalRegistry) {
    globalRegistry = new ProbeRegistry();
  }
  return globalRegistry;
}

export function resetProbeRegistry(): void {
  globalRegistry = null;
}

/**
 * Wire process-level cleanup: 'exit' kills synchronously, SIGTERM/SIGHUP
 * terminate gracefully and exit with the conventional status.
 * SIGINT is left to the console, which turns it into a cancellation.
 *
 * @returns uninstall function
 */
export function installCleanupHandlers(registry: ProbeRegistry = getProbeRegistry()): () => void {
  const onExit = (): void => registry.killAllSync();
  const onSignal = (signal: NodeJS.Signals): void => {
    const status = signal === 'SIGTERM' ? 143 : 129;
    registry.terminateAll().then(
      () => process.exit(status),
      () => process.exit(status)
    );
  };

  process.on('exit', onExit);
  process.on('SIGTERM', onSignal);
  process.on('SIGHUP', onSignal);

  return () => {
    process.off('exit', onExit);
    process.off('SIGTERM', onSignal);
    process.off('SIGHUP', onSignal);
  };
}
