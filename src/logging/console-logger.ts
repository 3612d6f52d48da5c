/**
 * Console Logger - Decision Transparency
 *
 * Captures every control-plane decision the console makes (probe launches,
 * extraction results, configuration writes, backups, runtime calls, menu
 * transitions) as structured entries.
 */

export type ConsoleLogLevel = 'info' | 'warn' | 'error' | 'debug';

export type ConsoleLogCategory =
  | 'PROBE'
  | 'EXTRACTION'
  | 'CONFIG'
  | 'BACKUP'
  | 'ARTIFACT'
  | 'RUNTIME'
  | 'TRANSITION'
  | 'ERROR';

export interface ConsoleLogEntry {
  timestamp: string;
  level: ConsoleLogLevel;
  category: ConsoleLogCategory;
  message: string;
  details?: Record<string, unknown>;
}

export interface ConsoleLogSubscriber {
  onLog(entry: ConsoleLogEntry): void;
}

/**
 * ConsoleLogger - Centralized logging for console decisions
 *
 * Features:
 * - Structured log entries with categories
 * - In-memory buffer for recent logs
 * - Subscriber pattern for sinks (JSONL file, verbose terminal echo)
 */
export class ConsoleLogger {
  private entries: ConsoleLogEntry[] = [];
  private subscribers: Set<ConsoleLogSubscriber> = new Set();
  private maxEntries: number;

  constructor(options: { maxEntries?: number } = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
  }

  /**
   * Log a console decision
   */
  log(
    level: ConsoleLogLevel,
    category: ConsoleLogCategory,
    message: string,
    details?: Record<string, unknown>
  ): ConsoleLogEntry {
    const entry: ConsoleLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      details,
    };

    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }

    for (const subscriber of this.subscribers) {
      try {
        subscriber.onLog(entry);
      } catch (error) {
        // Drop the failing sink and report it once
        this.subscribers.delete(subscriber);
        process.stderr.write(
          `[feeder-console] log sink removed: ${error instanceof Error ? error.message : String(error)}\n`
        );
      }
    }

    return entry;
  }

  info(category: ConsoleLogCategory, message: string, details?: Record<string, unknown>): ConsoleLogEntry {
    return this.log('info', category, message, details);
  }

  warn(category: ConsoleLogCategory, message: string, details?: Record<string, unknown>): ConsoleLogEntry {
    return this.log('warn', category, message, details);
  }

  debug(category: ConsoleLogCategory, message: string, details?: Record<string, unknown>): ConsoleLogEntry {
    return this.log('debug', category, message, details);
  }

  logTransition(from: string, to: string, choice?: string): ConsoleLogEntry {
    return this.log('info', 'TRANSITION', `${from} -> ${to}`, { from, to, choice });
  }

  logProbeLaunch(name: string, command: string, args: readonly string[]): ConsoleLogEntry {
    return this.log('info', 'PROBE', `Launched probe ${name}`, { command, args: [...args] });
  }

  logExtraction(
    probe: string,
    targetId: string,
    resolved: boolean,
    options: { value?: string; elapsedMs?: number } = {}
  ): ConsoleLogEntry {
    return this.log(
      resolved ? 'info' : 'warn',
      'EXTRACTION',
      `Target ${targetId} ${resolved ? 'RESOLVED' : 'UNRESOLVED'} (${probe})`,
      {
        probe,
        targetId,
        resolved,
        value: options.value,
        elapsedMs: options.elapsedMs,
      }
    );
  }

  logError(message: string, error: Error | unknown): ConsoleLogEntry {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;

    return this.log('error', 'ERROR', message, {
      error: errorMessage,
      stack: errorStack,
    });
  }

  /**
   * Get all logs
   */
  getAll(): ConsoleLogEntry[] {
    return [...this.entries];
  }

  /**
   * Get logs by category
   */
  getByCategory(category: ConsoleLogCategory): ConsoleLogEntry[] {
    return this.entries.filter((e) => e.category === category);
  }

  /**
   * Get recent logs (last N entries)
   */
  getRecent(count: number = 50): ConsoleLogEntry[] {
    return this.entries.slice(-count);
  }

  clear(): void {
    this.entries = [];
  }

  /**
   * Subscribe to log events
   */
  subscribe(subscriber: ConsoleLogSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => this.subscribers.delete(subscriber);
  }

  getSubscriberCount(): number {
    return this.subscribers.size;
  }
}

// Singleton instance for global access
let globalLogger: ConsoleLogger | null = null;

export function getConsoleLogger(): ConsoleLogger {
  if (!globalLogger) {
    globalLogger = new ConsoleLogger();
  }
  return globalLogger;
}

export function resetConsoleLogger(): void {
  globalLogger = null;
}
